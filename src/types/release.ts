export type DeployMode = 'symlink' | 'in-place';

export type ReleaseStatus =
  | 'staged'
  | 'built'
  | 'migrated'
  | 'health-checked'
  | 'live'
  | 'retired'
  | 'failed'
  | 'rolled-back-target';

export type MigrationPolicy = 'before-switch' | 'after-switch' | 'skip';

export type DeployStage =
  | 'preflight'
  | 'lock'
  | 'materialize'
  | 'link-shared'
  | 'build'
  | 'migrate'
  | 'self-check'
  | 'switch'
  | 'reload'
  | 'probe'
  | 'prune'
  | 'rollback';

export interface ReleaseRecord {
  id: string;
  mode: DeployMode;
  path: string;
  revision: string;
  commit: string | null;
  status: ReleaseStatus;
  migratedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ReleaseEntry {
  id: string;
  path: string;
  /** Ledger status; `null` for directories the ledger never saw. */
  status: ReleaseStatus | null;
  isCurrent: boolean;
}

export interface BackupMetadata {
  backupId: string;
  sourcePath: string;
  treePath: string;
  databaseDumpPath: string | null;
  excluded: string[];
  createdAt: string;
}

export interface CommandExecutionResult {
  ok: boolean;
  exitCode: number;
  output: string;
  durationMs: number;
  timedOut?: boolean;
}

export interface CommandRunOptions {
  cwd: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (command: string, options: CommandRunOptions) => Promise<CommandExecutionResult>;

export type ProbeFailureClass = 'unreachable' | 'server-error' | 'client-error' | 'unexpected';

export interface HealthProbeResult {
  ok: boolean;
  detail: string;
  statusCode?: number;
  failureClass?: ProbeFailureClass;
}

export type HealthProbe = (url: string, options: { timeoutMs: number }) => Promise<HealthProbeResult>;

export interface ProbeAttempt {
  attempt: number;
  ok: boolean;
  detail: string;
  statusCode?: number;
  failureClass?: ProbeFailureClass;
}

export interface ProbeReport {
  ok: boolean;
  url: string;
  attempts: ProbeAttempt[];
  totalDurationMs: number;
}

export interface RollbackReport {
  /** Human-readable description of what serves traffic after rollback. */
  liveTarget: string;
  restoredPointer: boolean;
  deletedRelease: boolean;
  restoredFromBackup: string | null;
  reinstalledDependencies: boolean;
  /** Where an in-place backup's database dump was kept after the backup itself was discarded. */
  retainedDatabaseDump: string | null;
  reloadWarnings: string[];
}

export type DeployOutcomeStatus = 'succeeded' | 'rolled-back' | 'rollback-failed' | 'aborted';

export interface DeployOutcome {
  status: DeployOutcomeStatus;
  deploymentId: string;
  mode: DeployMode;
  releaseId: string | null;
  previousReleaseId: string | null;
  revision: string;
  commit: string | null;
  failedStage?: DeployStage;
  errorCode?: string;
  error?: string;
  rollback?: RollbackReport;
  pruned: string[];
  warnings: string[];
  liveTarget: string;
  startedAt: string;
  completedAt: string;
}

export interface PruneReport {
  kept: string[];
  removed: string[];
  failed: Array<{ id: string; detail: string }>;
}
