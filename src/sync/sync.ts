import { BatchProcessor } from "../batch/batch-processor.js";
import { buildBatch, createExclusionFilter, selectRepositories } from "../batch/selection.js";
import { type SyncConfig, defaultCacheFile } from "../core/config.js";
import type { GitfleetEventBus } from "../core/event-bus.js";
import { type Logger, createSilentLogger } from "../core/logger.js";
import type { BatchResult, EntityType, RepositoryInfo } from "../core/types.js";
import { GitService } from "../git/git-service.js";
import { HostingApiClient } from "../github/client.js";
import { ProtocolHandler, type ProtocolResolution } from "../protocol/protocol-handler.js";
import { type ProtocolPrompt, createPromptForPolicy } from "../protocol/prompt.js";
import { PathValidator } from "../security/path-validator.js";
import { type CommandRunner, SafeSubprocessRunner } from "../security/subprocess-runner.js";
import { RepoStore } from "../store/repo-store.js";

export interface RepositoryLister {
  listRepositories(entityType: EntityType, entityName: string): Promise<RepositoryInfo[]>;
}

export type RepositorySource = "api" | "cache";

export interface FetchRequest {
  entityType: EntityType;
  entityName: string;
  /** Read the cache file instead of calling the API. */
  cached?: boolean;
  /** Write the cache file after an API fetch. Defaults to true. */
  refreshCache?: boolean;
}

export interface FetchResult {
  repositories: RepositoryInfo[];
  source: RepositorySource;
  cacheFile: string;
}

export interface SyncRequest extends FetchRequest {
  signal?: AbortSignal;
}

export interface SyncDependencies {
  lister?: RepositoryLister;
  runner?: CommandRunner;
  prompt?: ProtocolPrompt;
  eventBus?: GitfleetEventBus;
  logger?: Logger;
}

export interface SyncReport {
  entityType: EntityType;
  entityName: string;
  source: RepositorySource;
  /** Names from the name filter that the listing did not contain. */
  missing: string[];
  protocol: ProtocolResolution;
  result: BatchResult;
}

export function createHostingApiClient(config: SyncConfig, logger?: Logger): HostingApiClient {
  return new HostingApiClient({
    token: config.token,
    baseUrl: config.api.baseUrl,
    perPage: config.api.perPage,
    maxRetries: config.api.maxRetries,
    backoffMs: config.api.backoffMs,
    maxBackoffMs: config.api.maxBackoffMs,
    requestTimeoutMs: config.api.requestTimeoutMs,
    logger,
  });
}

export function createGitService(
  config: SyncConfig,
  runner: CommandRunner = new SafeSubprocessRunner(),
  logger?: Logger,
): GitService {
  const validator = new PathValidator(PathValidator.validateBaseDirectory(config.baseFolder));
  return new GitService(validator, runner, {
    metadataTimeoutMs: config.git.metadataTimeoutMs,
    cloneTimeoutMs: config.git.cloneTimeoutMs,
    pullTimeoutMs: config.git.pullTimeoutMs,
    logger,
  });
}

/** Loads the listing from the cache file or the hosting API. */
export async function fetchRepositories(
  config: SyncConfig,
  request: FetchRequest,
  dependencies: Pick<SyncDependencies, "lister" | "logger"> = {},
): Promise<FetchResult> {
  const logger = dependencies.logger ?? createSilentLogger();
  const cacheFile = defaultCacheFile(config, request.entityType, request.entityName);
  const store = new RepoStore(cacheFile);

  if (request.cached) {
    const repositories = await store.load();
    logger.debug(`Loaded ${repositories.length} repositories from ${store.filePath}`);
    return { repositories, source: "cache", cacheFile: store.filePath };
  }

  const lister = dependencies.lister ?? createHostingApiClient(config, logger);
  const repositories = await lister.listRepositories(request.entityType, request.entityName);

  if (request.refreshCache !== false) {
    await store.save(repositories);
    logger.debug(`Wrote ${repositories.length} repositories to ${store.filePath}`);
  }

  return { repositories, source: "api", cacheFile: store.filePath };
}

/**
 * One full run: fetch or load the listing, apply the name filter, reconcile
 * remote protocols, then clone or pull every selected repository.
 */
export async function syncRepositories(
  config: SyncConfig,
  request: SyncRequest,
  dependencies: SyncDependencies = {},
): Promise<SyncReport> {
  const logger = dependencies.logger ?? createSilentLogger();
  const gitService = createGitService(config, dependencies.runner, logger);

  const fetched = await fetchRepositories(config, request, dependencies);
  const { selected, missing } = selectRepositories(fetched.repositories, config.filters.names);
  for (const name of missing) {
    logger.warn(`Repository "${name}" was not found for ${request.entityType} ${request.entityName}`);
  }

  const batch = buildBatch(selected, request.entityType, request.entityName, gitService);
  const exclude = createExclusionFilter(config.filters);

  const handler = new ProtocolHandler(gitService, {
    prompt: dependencies.prompt ?? createPromptForPolicy(config.protocolPolicy, {
      signal: request.signal,
    }),
    logger,
    concurrency: config.maxWorkers,
  });
  // Excluded repositories are never touched, their remotes included.
  const included = batch.repositories.filter((repo) => exclude(repo) === null);
  const protocol = await handler.resolve(included, config.transport, {
    dryRun: config.dryRun,
  });
  logger.info(protocol.message);

  const processor = new BatchProcessor(gitService, {
    maxWorkers: config.maxWorkers,
    eventBus: dependencies.eventBus,
    logger,
  });
  const result = await processor.process(batch, {
    transport: config.transport,
    dryRun: config.dryRun,
    signal: request.signal,
    exclude,
  });

  return {
    entityType: request.entityType,
    entityName: request.entityName,
    source: fetched.source,
    missing,
    protocol,
    result,
  };
}
