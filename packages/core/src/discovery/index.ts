export {
  discoverSessions,
  isAgentCandidate,
  sessionName,
  type DiscoveryOptions,
} from "./discover.js";
export {
  createWorkspaceResolver,
  parseLsofCwd,
  type WorkspaceResolver,
} from "./workspace.js";
