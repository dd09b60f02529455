export * from "./core/index.js";

export { PathValidator } from "./security/path-validator.js";
export {
  ALLOWED_GIT_COMMANDS,
  SafeSubprocessRunner,
  type CommandResult,
  type CommandRunner,
  type RunCommandOptions,
} from "./security/subprocess-runner.js";

export { HostingApiClient, isRateLimited, type HostingApiClientOptions } from "./github/client.js";
export { resolveGitHubToken, type ResolvedToken } from "./github/auth.js";

export { RepoStore } from "./store/repo-store.js";

export { Repository, createRepositoryInfo } from "./git/repository.js";
export { GitService, type GitServiceOptions } from "./git/git-service.js";
export { classifyRemoteUrl, describeMismatch, remoteUrlFor } from "./git/remote-url.js";

export {
  ProtocolHandler,
  type ProtocolHandlerOptions,
  type ProtocolResolution,
} from "./protocol/protocol-handler.js";
export {
  createPromptForPolicy,
  createTerminalPrompt,
  fixedChoicePrompt,
  parseProtocolChoice,
  type ProtocolChoice,
  type ProtocolPrompt,
  type ProtocolPromptContext,
} from "./protocol/prompt.js";

export {
  BatchProcessor,
  type BatchProcessorOptions,
  type ExclusionFilter,
  type ProcessOptions,
  type RepositorySyncer,
} from "./batch/batch-processor.js";
export {
  buildBatch,
  createExclusionFilter,
  parseNameList,
  selectRepositories,
} from "./batch/selection.js";

export {
  fetchRepositories,
  syncRepositories,
  type SyncReport,
  type SyncRequest,
} from "./sync/sync.js";
