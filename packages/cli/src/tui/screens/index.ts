export { BoardScreen, type BoardScreenProps } from "./BoardScreen.js";
