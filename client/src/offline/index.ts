/**
 * Offline-first support: durable queue, connectivity and sync.
 */

export {
  type ClassifierOptions,
  classifyFetch,
  classifyResponse,
  type ConnectivityOutcome,
  type FetchClassification,
  type FetchFn,
} from "./connectivity-classifier.ts";

export {
  ConnectivityManager,
  type ConnectivityListener,
  type ConnectivityManagerOptions,
  type ConnectivityState,
  DEFAULT_PROBE_URL,
} from "./connectivity-manager.ts";

export { DuplicateOperationError, FormValidationError, QueueStorageError } from "./errors.ts";

export {
  type CacheLike,
  type CacheStorageLike,
  DEFAULT_OFFLINE_URL,
  type FetchPolicyOptions,
  handleFetch,
  type RouteKind,
  routeRequest,
} from "./fetch-policy.ts";

export {
  DB_NAME,
  type EnqueueOptions,
  generateLocalId,
  OperationQueue,
  type OperationSink,
} from "./operation-queue.ts";

export {
  type BackgroundSyncRegistrar,
  type DrainResult,
  SYNC_TAG,
  type SyncEvent,
  type SyncEventListener,
  type SyncEventType,
  SyncOrchestrator,
  type SyncOrchestratorOptions,
} from "./sync-orchestrator.ts";
