import path from 'node:path';
import type { DeployMode } from '../types/release.js';

export const STATE_DIR_NAME = '.releasectl';
export const RELEASE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/**
 * Every path the orchestrator touches, rooted under one application base path.
 *
 * symlink:  <base>/releases/<id>, <base>/shared, <base>/current, <base>/.releasectl
 * in-place: <base> serves directly, snapshots live in <backups>/<id>, state in <backups>/.releasectl
 */
export interface ReleaseLayout {
  mode: DeployMode;
  basePath: string;
  /** Directory holding one entry per release (symlink) or backup (in-place). */
  collectionDir: string;
  sharedDir: string;
  currentLink: string;
  stateDir: string;
  ledgerPath: string;
  logDir: string;
}

export function resolveLayout(mode: DeployMode, basePath: string, backupsPath?: string): ReleaseLayout {
  const base = path.resolve(basePath);

  if (mode === 'symlink') {
    const stateDir = path.join(base, STATE_DIR_NAME);
    return {
      mode,
      basePath: base,
      collectionDir: path.join(base, 'releases'),
      sharedDir: path.join(base, 'shared'),
      currentLink: path.join(base, 'current'),
      stateDir,
      ledgerPath: path.join(stateDir, 'ledger.db'),
      logDir: path.join(stateDir, 'logs'),
    };
  }

  const backups = backupsPath ? path.resolve(backupsPath) : path.join(path.dirname(base), 'backups');
  const stateDir = path.join(backups, STATE_DIR_NAME);
  return {
    mode,
    basePath: base,
    collectionDir: backups,
    sharedDir: base,
    currentLink: base,
    stateDir,
    ledgerPath: path.join(stateDir, 'ledger.db'),
    logDir: path.join(stateDir, 'logs'),
  };
}

export function releasePath(layout: ReleaseLayout, releaseId: string): string {
  return path.join(layout.collectionDir, releaseId);
}

/** `YYYYMMDDHHMMSS` in UTC; sorts in creation order. */
export function compactTimestamp(now: () => Date): string {
  return now().toISOString().replace(/[-:.TZ]/g, '').slice(0, 14);
}
