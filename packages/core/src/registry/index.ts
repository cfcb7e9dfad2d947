export {
  SessionRegistry,
  type UpdateResult,
  type ActivityState,
  type ActivityClassifier,
  type SessionRegistryOptions,
} from "./session-registry.js";
export { deriveGroup } from "./group.js";
