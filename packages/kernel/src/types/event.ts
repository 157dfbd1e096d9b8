/**
 * Resforge Kernel — Project Event Types
 *
 * Events recorded over a project's lifetime. Persisted by a LogSink (see
 * logging/log-sink.ts); the kernel itself never writes them anywhere.
 */

/**
 * Kinds of project events.
 *
 * `TargetTypeMismatch` marks the reopen path that discards the stored
 * resources and module configuration of an existing descriptor.
 */
export enum ProjectEventKind {
  ProjectCreated = 'project_created',
  ProjectOpened = 'project_opened',
  TargetTypeMismatch = 'target_type_mismatch',
  ProjectSaved = 'project_saved',
  ProjectUpgraded = 'project_upgraded',
  ResourceRegistered = 'resource_registered',
  ResourceDeleted = 'resource_deleted',
  DefaultsAdded = 'defaults_added',
}

/** Flat detail values: log lines stay one level deep. */
export type ProjectEventDetail = string | number | boolean | null;

export interface ProjectEvent {
  readonly kind: ProjectEventKind;
  /** Path of the descriptor file the event concerns. */
  readonly project: string;
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
  readonly details: Readonly<Record<string, ProjectEventDetail>>;
}
