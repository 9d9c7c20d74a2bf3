import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { DeployError } from '../release/deploy-error.js';
import type { DeployMode, DeployOutcomeStatus, DeployStage, ReleaseRecord, ReleaseStatus } from '../types/release.js';

const ALLOWED_TRANSITIONS: Record<ReleaseStatus, readonly ReleaseStatus[]> = {
  staged: ['built', 'failed'],
  built: ['migrated', 'health-checked', 'failed'],
  migrated: ['health-checked', 'failed'],
  'health-checked': ['live', 'failed'],
  live: ['retired', 'rolled-back-target'],
  retired: ['rolled-back-target'],
  'rolled-back-target': ['live', 'retired'],
  failed: [],
};

interface ReleaseRow {
  id: string;
  mode: DeployMode;
  path: string;
  revision: string;
  commit_sha: string | null;
  status: ReleaseStatus;
  migrated_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface DeploymentRow {
  id: string;
  release_id: string | null;
  mode: DeployMode;
  revision: string;
  previous_release_id: string | null;
  outcome: DeployOutcomeStatus | 'running';
  failed_stage: DeployStage | null;
  error_code: string | null;
  detail: string | null;
  started_at: string;
  completed_at: string | null;
}

export interface DeploymentEventRow {
  id: number;
  deployment_id: string;
  stage: DeployStage;
  status: 'started' | 'passed' | 'failed' | 'skipped' | 'warning';
  detail: string | null;
  created_at: string;
}

export interface CreateReleaseInput {
  id: string;
  mode: DeployMode;
  path: string;
  revision: string;
  createdAt?: string;
}

export interface StartDeploymentInput {
  id: string;
  mode: DeployMode;
  revision: string;
  previousReleaseId: string | null;
  startedAt?: string;
}

export interface CompleteDeploymentInput {
  outcome: DeployOutcomeStatus;
  releaseId: string | null;
  failedStage?: DeployStage | null;
  errorCode?: string | null;
  detail?: string | null;
  completedAt?: string;
}

function toRecord(row: ReleaseRow): ReleaseRecord {
  return {
    id: row.id,
    mode: row.mode,
    path: row.path,
    revision: row.revision,
    commit: row.commit_sha,
    status: row.status,
    migratedAt: row.migrated_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function canTransition(from: ReleaseStatus, to: ReleaseStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Durable record of releases and deployment attempts.
 * Release status lives here; the filesystem decides which releases still exist.
 */
export class DeploymentLedger {
  readonly #db: Database.Database;
  readonly #now: () => Date;

  constructor(dbPath: string, now: () => Date = () => new Date()) {
    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.#db = new Database(dbPath);
    this.#now = now;
    this.#db.pragma('journal_mode = WAL');
    this.#db.pragma('foreign_keys = ON');
    this.#db.exec(`
      CREATE TABLE IF NOT EXISTS releases (
        id TEXT PRIMARY KEY,
        mode TEXT NOT NULL,
        path TEXT NOT NULL,
        revision TEXT NOT NULL,
        commit_sha TEXT,
        status TEXT NOT NULL,
        migrated_at TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS deployments (
        id TEXT PRIMARY KEY,
        release_id TEXT,
        mode TEXT NOT NULL,
        revision TEXT NOT NULL,
        previous_release_id TEXT,
        outcome TEXT NOT NULL,
        failed_stage TEXT,
        error_code TEXT,
        detail TEXT,
        started_at TEXT NOT NULL,
        completed_at TEXT
      );

      CREATE TABLE IF NOT EXISTS deployment_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        deployment_id TEXT NOT NULL,
        stage TEXT NOT NULL,
        status TEXT NOT NULL,
        detail TEXT,
        created_at TEXT NOT NULL,
        FOREIGN KEY(deployment_id) REFERENCES deployments(id)
      );

      CREATE INDEX IF NOT EXISTS idx_deployment_events_deployment
        ON deployment_events(deployment_id, id);
    `);
  }

  close(): void {
    this.#db.close();
  }

  // ── Releases ───────────────────────────────────────────────────────────────

  createRelease(input: CreateReleaseInput): ReleaseRecord {
    if (this.getRelease(input.id)) {
      throw DeployError.releaseExists(input.id);
    }
    const createdAt = input.createdAt ?? this.#now().toISOString();
    this.#db.prepare(`
      INSERT INTO releases (id, mode, path, revision, commit_sha, status, migrated_at, created_at, updated_at)
      VALUES (?, ?, ?, ?, NULL, 'staged', NULL, ?, ?)
    `).run(input.id, input.mode, input.path, input.revision, createdAt, createdAt);
    return this.#requireRelease(input.id);
  }

  getRelease(id: string): ReleaseRecord | undefined {
    const row = this.#db
      .prepare<[string], ReleaseRow>('SELECT * FROM releases WHERE id = ?')
      .get(id);
    return row ? toRecord(row) : undefined;
  }

  listReleases(limit = 100): ReleaseRecord[] {
    const boundedLimit = Math.max(1, Math.min(1000, Math.floor(limit)));
    return this.#db
      .prepare<[number], ReleaseRow>('SELECT * FROM releases ORDER BY id DESC LIMIT ?')
      .all(boundedLimit)
      .map(toRecord);
  }

  transition(id: string, to: ReleaseStatus): ReleaseRecord {
    const current = this.#requireRelease(id);
    if (current.status === to) {
      return current;
    }
    if (!canTransition(current.status, to)) {
      throw DeployError.invalidTransition(id, current.status, to);
    }
    this.#db
      .prepare('UPDATE releases SET status = ?, updated_at = ? WHERE id = ?')
      .run(to, this.#now().toISOString(), id);
    return this.#requireRelease(id);
  }

  setCommit(id: string, commit: string): void {
    this.#db
      .prepare('UPDATE releases SET commit_sha = ?, updated_at = ? WHERE id = ?')
      .run(commit, this.#now().toISOString(), id);
  }

  markMigrated(id: string): void {
    const at = this.#now().toISOString();
    this.#db
      .prepare('UPDATE releases SET migrated_at = COALESCE(migrated_at, ?), updated_at = ? WHERE id = ?')
      .run(at, at, id);
  }

  /** Highest release id ever recorded, whatever its status. */
  newestReleaseId(): string | null {
    const row = this.#db
      .prepare<[], { id: string }>('SELECT id FROM releases ORDER BY id DESC LIMIT 1')
      .get();
    return row?.id ?? null;
  }

  /** Newest release currently recorded as live, optionally ignoring one id. */
  findLive(excludeId?: string): ReleaseRecord | undefined {
    const row = this.#db
      .prepare<[string], ReleaseRow>(`
        SELECT * FROM releases
        WHERE status = 'live' AND id != ?
        ORDER BY id DESC
        LIMIT 1
      `)
      .get(excludeId ?? '');
    return row ? toRecord(row) : undefined;
  }

  /**
   * The release that served before `currentId`: the previous target recorded by
   * the deployment that promoted it, else the newest older release that was live.
   */
  findRollbackTarget(currentId: string): string | null {
    const promoted = this.#db
      .prepare<[string], { previous_release_id: string | null }>(`
        SELECT previous_release_id FROM deployments
        WHERE release_id = ? AND outcome = 'succeeded'
        ORDER BY started_at DESC
        LIMIT 1
      `)
      .get(currentId);
    if (promoted?.previous_release_id) {
      return promoted.previous_release_id;
    }

    const older = this.#db
      .prepare<[string], { id: string }>(`
        SELECT id FROM releases
        WHERE id < ? AND status IN ('retired', 'rolled-back-target', 'live')
        ORDER BY id DESC
        LIMIT 1
      `)
      .get(currentId);
    return older?.id ?? null;
  }

  // ── Deployments ────────────────────────────────────────────────────────────

  startDeployment(input: StartDeploymentInput): void {
    this.#db.prepare(`
      INSERT INTO deployments (id, release_id, mode, revision, previous_release_id, outcome, started_at)
      VALUES (?, NULL, ?, ?, ?, 'running', ?)
    `).run(
      input.id,
      input.mode,
      input.revision,
      input.previousReleaseId,
      input.startedAt ?? this.#now().toISOString(),
    );
  }

  attachRelease(deploymentId: string, releaseId: string): void {
    this.#db.prepare('UPDATE deployments SET release_id = ? WHERE id = ?').run(releaseId, deploymentId);
  }

  recordEvent(
    deploymentId: string,
    stage: DeployStage,
    status: DeploymentEventRow['status'],
    detail: string | null = null,
  ): void {
    this.#db.prepare(`
      INSERT INTO deployment_events (deployment_id, stage, status, detail, created_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(deploymentId, stage, status, detail, this.#now().toISOString());
  }

  completeDeployment(id: string, input: CompleteDeploymentInput): void {
    this.#db.prepare(`
      UPDATE deployments
      SET outcome = ?, release_id = COALESCE(?, release_id), failed_stage = ?, error_code = ?, detail = ?, completed_at = ?
      WHERE id = ?
    `).run(
      input.outcome,
      input.releaseId,
      input.failedStage ?? null,
      input.errorCode ?? null,
      input.detail ?? null,
      input.completedAt ?? this.#now().toISOString(),
      id,
    );
  }

  getDeployment(id: string): DeploymentRow | undefined {
    return this.#db
      .prepare<[string], DeploymentRow>('SELECT * FROM deployments WHERE id = ?')
      .get(id);
  }

  listDeployments(limit = 20): DeploymentRow[] {
    const boundedLimit = Math.max(1, Math.min(500, Math.floor(limit)));
    return this.#db
      .prepare<[number], DeploymentRow>('SELECT * FROM deployments ORDER BY started_at DESC, id DESC LIMIT ?')
      .all(boundedLimit);
  }

  listEvents(deploymentId: string): DeploymentEventRow[] {
    return this.#db
      .prepare<[string], DeploymentEventRow>(
        'SELECT * FROM deployment_events WHERE deployment_id = ? ORDER BY id ASC',
      )
      .all(deploymentId);
  }

  #requireRelease(id: string): ReleaseRecord {
    const record = this.getRelease(id);
    if (!record) {
      throw new Error(`Release '${id}' is not recorded in the ledger.`);
    }
    return record;
  }
}
