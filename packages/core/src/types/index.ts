export type {
  SessionStatus,
  TerminalStatus,
  ActiveStatus,
  Session,
  RegisterSessionInput,
  RegistryStats,
  HistoryEntry,
} from "./session.js";

export {
  SESSION_STATUSES,
  DEFAULT_GROUP,
  SIGTERM_EXIT_CODE,
  isSessionStatus,
  isTerminalStatus,
  isActiveStatus,
} from "./session.js";
