/**
 * Base interface for all release-stager events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the staging, promotion, or compression run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Emitted when a staging run passes its preconditions and starts.
 */
export interface StagingStarted extends BaseEvent {
  type: 'StagingStarted';
  payload: {
    artifactId: string;
    version: string;
    /** SCM URL the artifacts are staged to */
    stagingUrl: string;
    dryRun: boolean;
  };
}

/** Emitted when a run returns early because a business-rule gate was not met */
export interface PreconditionSkipped extends BaseEvent {
  type: 'PreconditionSkipped';
  payload: {
    reason: string;
  };
}

/** Emitted after a working copy has been checked out */
export interface CheckoutCompleted extends BaseEvent {
  type: 'CheckoutCompleted';
  payload: {
    url: string;
    directory: string;
    revision?: string;
  };
}

/** Emitted for each candidate file found in the working directory */
export interface ArtifactClassified extends BaseEvent {
  type: 'ArtifactClassified';
  payload: {
    file: string;
    bucket: string;
  };
}

/** Emitted on every transition of the distribution stager */
export interface StagerStateChanged extends BaseEvent {
  type: 'StagerStateChanged';
  payload: {
    from: string;
    to: string;
  };
}

/** Emitted after the staged files were scheduled for addition */
export interface FilesAdded extends BaseEvent {
  type: 'FilesAdded';
  payload: {
    fileCount: number;
  };
}

/** Emitted after a successful commit */
export interface CommitCompleted extends BaseEvent {
  type: 'CommitCompleted';
  payload: {
    message: string;
    revision?: string;
  };
}

/** Emitted instead of add/commit in dry-run mode */
export interface CommitSkipped extends BaseEvent {
  type: 'CommitSkipped';
  payload: {
    url: string;
    message: string;
    fileCount: number;
  };
}

/** Emitted after the site archive has been written */
export interface SiteArchived extends BaseEvent {
  type: 'SiteArchived';
  payload: {
    outputFile: string;
    fileCount: number;
  };
}

/** Emitted once both promotion working copies are checked out */
export interface PromotionPrepared extends BaseEvent {
  type: 'PromotionPrepared';
  payload: {
    stagingDirectory: string;
    releaseDirectory: string;
  };
}

/**
 * Union type of all release-stager events.
 */
export type StagerEvent =
  | StagingStarted
  | PreconditionSkipped
  | CheckoutCompleted
  | ArtifactClassified
  | StagerStateChanged
  | FilesAdded
  | CommitCompleted
  | CommitSkipped
  | SiteArchived
  | PromotionPrepared;

/**
 * Common metadata for a new event, stamped with the current schema version and time.
 *
 * @example
 * ```typescript
 * logger.log({ ...eventBase(runId), type: 'FilesAdded', payload: { fileCount: 4 } });
 * ```
 */
export function eventBase(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
