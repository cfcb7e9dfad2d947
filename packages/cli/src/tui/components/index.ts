export { Header, type HeaderProps, type KeyHint } from "./Header.js";
export { Spinner, type SpinnerProps } from "./Spinner.js";
export { StatusBadge, type StatusBadgeProps } from "./StatusBadge.js";
export { SessionGroup, type SessionGroupProps } from "./SessionGroup.js";
