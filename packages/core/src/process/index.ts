export type {
  ProcessEntry,
  ProcessResult,
  KillReport,
  NamePredicate,
  ProcessTree,
} from "./types.js";
export { ok, fail } from "./types.js";
export {
  SystemProcessTree,
  nodeProcessSystem,
  type ProcessSystem,
  type SystemProcessTreeOptions,
} from "./system-tree.js";
export { withTimeout, TimeoutError } from "./timeout.js";
export { runCommand, type RunCommandOptions } from "./command.js";
