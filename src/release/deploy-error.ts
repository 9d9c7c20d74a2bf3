import type { DeployStage } from '../types/release.js';

export type DeployErrorCode =
  | 'PREFLIGHT_MISSING_TOOL'
  | 'MISSING_SHARED_CONFIG'
  | 'SOURCE_SYNC_FAILED'
  | 'BACKUP_FAILED'
  | 'BUILD_FAILED'
  | 'MIGRATION_FAILED'
  | 'SELF_CHECK_FAILED'
  | 'PROBE_EXHAUSTED'
  | 'SWITCH_FAILED'
  | 'ROLLBACK_RESTORE_FAILED'
  | 'LOCK_HELD'
  | 'RELEASE_EXISTS'
  | 'INVALID_REF'
  | 'CONFIG_INVALID'
  | 'INTERRUPTED'
  | 'INVALID_TRANSITION'
  | 'UNKNOWN';

export const EXIT_CODES = {
  success: 0,
  deployFailed: 1,
  rollbackFailed: 2,
} as const;

export class DeployError extends Error {
  readonly code: DeployErrorCode;
  readonly stage: DeployStage | null;

  constructor(code: DeployErrorCode, message: string, stage: DeployStage | null = null) {
    super(message);
    this.name = 'DeployError';
    this.code = code;
    this.stage = stage;
  }

  static missingTools(tools: string[]): DeployError {
    return new DeployError(
      'PREFLIGHT_MISSING_TOOL',
      `Required tools not found on PATH: ${tools.join(', ')}`,
      'preflight',
    );
  }

  static missingSharedConfig(configPath: string): DeployError {
    return new DeployError(
      'MISSING_SHARED_CONFIG',
      `Shared configuration is missing at ${configPath}; refusing to link a release without it.`,
      'link-shared',
    );
  }

  static sourceSyncFailed(message: string): DeployError {
    return new DeployError('SOURCE_SYNC_FAILED', message, 'materialize');
  }

  static backupFailed(message: string): DeployError {
    return new DeployError('BACKUP_FAILED', message, 'materialize');
  }

  static buildFailed(message: string): DeployError {
    return new DeployError('BUILD_FAILED', message, 'build');
  }

  static migrationFailed(message: string): DeployError {
    return new DeployError('MIGRATION_FAILED', message, 'migrate');
  }

  static selfCheckFailed(message: string): DeployError {
    return new DeployError('SELF_CHECK_FAILED', message, 'self-check');
  }

  static probeExhausted(message: string): DeployError {
    return new DeployError('PROBE_EXHAUSTED', message, 'probe');
  }

  static switchFailed(message: string): DeployError {
    return new DeployError('SWITCH_FAILED', message, 'switch');
  }

  static rollbackRestoreFailed(message: string): DeployError {
    return new DeployError('ROLLBACK_RESTORE_FAILED', message, 'rollback');
  }

  static lockHeld(lockPath: string): DeployError {
    return new DeployError(
      'LOCK_HELD',
      `Another deployment holds the lock at ${lockPath}; refusing to run concurrently.`,
      'lock',
    );
  }

  static releaseExists(releaseId: string): DeployError {
    return new DeployError('RELEASE_EXISTS', `Release '${releaseId}' already exists.`, 'materialize');
  }

  static invalidRef(ref: string): DeployError {
    return new DeployError('INVALID_REF', `Invalid source revision: '${ref}'`, 'materialize');
  }

  static configInvalid(message: string): DeployError {
    return new DeployError('CONFIG_INVALID', message, null);
  }

  static interrupted(stage: DeployStage): DeployError {
    return new DeployError('INTERRUPTED', `Deployment interrupted by operator during ${stage}.`, stage);
  }

  static invalidTransition(releaseId: string, from: string, to: string): DeployError {
    return new DeployError(
      'INVALID_TRANSITION',
      `Release '${releaseId}' cannot move from '${from}' to '${to}'.`,
      null,
    );
  }

  /** Wraps an unexpected error, attributing it to the stage where it surfaced. */
  static from(error: unknown, stage: DeployStage): DeployError {
    if (error instanceof DeployError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new DeployError('UNKNOWN', message, stage);
  }
}
