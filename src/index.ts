/**
 * slotpost library surface: the scheduling core, the publish pipeline and
 * the long-running roles, for embedding without the CLI.
 */

export * from './shared/errors.js';
export type { ScheduleEntry, ProcessedEntry } from './data/types/scheduleEntry.js';
export { JsonLedger, ScheduleLedger, ProcessedLedger, SCHEDULE_FILENAME, PROCESSED_FILENAME } from './data/ledger.js';

export { WeeklyTemplate, WeeklyTemplateError, DEFAULT_WEEKLY_SCHEDULE } from './schedule/weeklyTemplate.js';
export { SlotAllocator, ALLOCATION_HORIZON_DAYS } from './schedule/slotAllocator.js';
export { IngestCoordinator, type IngestResult } from './schedule/ingest.js';
export { ScheduleEditor } from './schedule/editing.js';
export { Rebalancer, type RebalanceResult, type RebalanceChange } from './schedule/rebalance.js';
export { CONFLICT_WINDOW_MS, findConflicts, hasConflict } from './schedule/validation.js';
export { parseScheduleTime, formatIsoInZone, formatLocal } from './schedule/timezone.js';

export { PublishPipeline, type PublishResult, type PublishPipelineDeps } from './publish/pipeline.js';
export { retryWithBackoff, withTimeout, isTransientFailure, PUBLISH_BACKOFF, type BackoffPolicy } from './publish/retry.js';
export { resolveCaption, type ResolvedCaption } from './publish/caption.js';
export { validateImageFile, checkImageProperties, type ImageValidationResult } from './publish/imageValidation.js';

export type { IStorageUploader, ISocialPublisher, IAccountReader, AccountInfo, MediaSummary } from './clients/types.js';
export { DropboxUploader } from './clients/dropbox.js';
export { InstagramGraphPublisher, classifyGraphError } from './clients/instagram.js';

export { SchedulerLoop, type TickSummary, type SchedulerLoopDeps } from './worker/scheduler.js';
export { IngestWatcher } from './worker/watcher.js';
export { ArchiveMover } from './worker/mover.js';
export { acquireInstanceLock, type RoleName } from './worker/instanceLock.js';

export { createCoreServices, createPublishPipeline, createAccountReader, type CoreServices } from './services.js';
export { ConfigError } from './config/index.js';
