import crypto from 'crypto';
import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { CheckpointConflictError, CheckpointCorruptError, CheckpointLockedError, describeError } from './errors';
import type { WorkflowLogger } from './logger';
import { formatIssues } from './state';

export const PendingResumeSchema = z.object({
  stage: z.string().min(1),
  targetStage: z.string().min(1),
  payload: z.unknown(),
  suspendedAt: z.string(),
});

/** Envelope of a persisted thread. The state itself is validated by the graph's state schema. */
export const CheckpointSchema = z.object({
  threadId: z.string().min(1),
  version: z.number().int().positive(),
  createdAt: z.string(),
  updatedAt: z.string(),
  lastStage: z.string().optional(),
  pendingResume: PendingResumeSchema.optional(),
  state: z.record(z.unknown()),
});

export type StoredCheckpoint = z.infer<typeof CheckpointSchema>;

export interface CheckpointSummary {
  threadId: string;
  version: number;
  createdAt: string;
  updatedAt: string;
  lastStage?: string;
  suspended: boolean;
}

/**
 * Durable per-thread storage. `save` must be atomic: a reader never sees a
 * half-written checkpoint. It must also reject a checkpoint whose version is
 * not exactly one above the stored version (1 for a new thread).
 */
export interface CheckpointStore {
  load(threadId: string): Promise<StoredCheckpoint | null>;
  save(checkpoint: StoredCheckpoint): Promise<void>;
  /** Summaries of every stored thread, most recently updated first */
  list(): Promise<CheckpointSummary[]>;
}

export function summarize(checkpoint: StoredCheckpoint): CheckpointSummary {
  return {
    threadId: checkpoint.threadId,
    version: checkpoint.version,
    createdAt: checkpoint.createdAt,
    updatedAt: checkpoint.updatedAt,
    lastStage: checkpoint.lastStage,
    suspended: checkpoint.pendingResume !== undefined,
  };
}

function assertNextVersion(checkpoint: StoredCheckpoint, stored: StoredCheckpoint | null): void {
  const storedVersion = stored?.version ?? 0;
  if (checkpoint.version !== storedVersion + 1) {
    throw new CheckpointConflictError(checkpoint.threadId, checkpoint.version - 1, storedVersion);
  }
}

function byUpdatedAtDesc(a: CheckpointSummary, b: CheckpointSummary): number {
  return Date.parse(b.updatedAt) - Date.parse(a.updatedAt);
}

// ── In-memory ───────────────────────────────────────────────────────────

/** Process-local store. Holds deep copies so callers can never alias stored state. */
export class MemoryCheckpointStore implements CheckpointStore {
  private checkpoints = new Map<string, StoredCheckpoint>();

  async load(threadId: string): Promise<StoredCheckpoint | null> {
    const stored = this.checkpoints.get(threadId);
    return stored ? structuredClone(stored) : null;
  }

  async save(checkpoint: StoredCheckpoint): Promise<void> {
    assertNextVersion(checkpoint, this.checkpoints.get(checkpoint.threadId) ?? null);
    this.checkpoints.set(checkpoint.threadId, structuredClone(checkpoint));
  }

  async list(): Promise<CheckpointSummary[]> {
    return [...this.checkpoints.values()].map(summarize).sort(byUpdatedAtDesc);
  }
}

// ── Filesystem ──────────────────────────────────────────────────────────

export interface FileCheckpointStoreOptions {
  /** Receives a warning for every thread directory `list` cannot read */
  logger?: WorkflowLogger;
  /** Attempts to take a thread's lock file before giving up (default: 40) */
  lockAttempts?: number;
  lockRetryDelayMs?: number;
  /** A lock file older than this is left over from a dead writer and is removed (default: 30s) */
  staleLockMs?: number;
}

/**
 * One JSON file per thread at `<rootDir>/<encoded thread id>/checkpoint.json`.
 *
 * `save` holds `<thread dir>/.lock` (created exclusively) while it reads the
 * stored version, compares it, and renames a fully written temp file into
 * place, so writers in other processes are checked against each other.
 */
export class FileCheckpointStore implements CheckpointStore {
  static readonly FILE_NAME = 'checkpoint.json';
  static readonly LOCK_FILE_NAME = '.lock';

  private logger?: WorkflowLogger;
  private lockAttempts: number;
  private lockRetryDelayMs: number;
  private staleLockMs: number;

  constructor(
    private rootDir: string,
    options: FileCheckpointStoreOptions = {},
  ) {
    this.logger = options.logger;
    this.lockAttempts = options.lockAttempts ?? 40;
    this.lockRetryDelayMs = options.lockRetryDelayMs ?? 25;
    this.staleLockMs = options.staleLockMs ?? 30_000;
  }

  checkpointPath(threadId: string): string {
    return path.join(this.threadDir(threadId), FileCheckpointStore.FILE_NAME);
  }

  lockPath(threadId: string): string {
    return path.join(this.threadDir(threadId), FileCheckpointStore.LOCK_FILE_NAME);
  }

  async load(threadId: string): Promise<StoredCheckpoint | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.checkpointPath(threadId), 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return null;
      throw error;
    }
    return this.parse(threadId, raw);
  }

  async save(checkpoint: StoredCheckpoint): Promise<void> {
    const filePath = this.checkpointPath(checkpoint.threadId);
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    await this.withLock(checkpoint.threadId, async () => {
      assertNextVersion(checkpoint, await this.load(checkpoint.threadId));

      const tempPath = `${filePath}.${crypto.randomUUID()}.tmp`;
      await fs.writeFile(tempPath, JSON.stringify(checkpoint, null, 2), 'utf-8');
      try {
        await fs.rename(tempPath, filePath);
      } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
      }
    });
  }

  /** Unreadable thread directories are skipped with a warning. */
  async list(): Promise<CheckpointSummary[]> {
    let entries: string[];
    try {
      entries = (await fs.readdir(this.rootDir, { withFileTypes: true })).filter((e) => e.isDirectory()).map((e) => e.name);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return [];
      throw error;
    }

    const summaries: CheckpointSummary[] = [];
    for (const dir of entries) {
      const checkpoint = await this.loadEntry(dir);
      if (checkpoint) summaries.push(summarize(checkpoint));
    }
    return summaries.sort(byUpdatedAtDesc);
  }

  private async loadEntry(dir: string): Promise<StoredCheckpoint | null> {
    let threadId: string;
    try {
      threadId = decodeURIComponent(dir);
    } catch (error) {
      this.logger?.warn('Skipping thread directory with an undecodable name', { dir, error: describeError(error) });
      return null;
    }

    try {
      return await this.load(threadId);
    } catch (error) {
      this.logger?.warn('Skipping unreadable checkpoint', { threadId, error: describeError(error) });
      return null;
    }
  }

  private threadDir(threadId: string): string {
    return path.join(this.rootDir, encodeURIComponent(threadId));
  }

  private async withLock<T>(threadId: string, task: () => Promise<T>): Promise<T> {
    const lockPath = this.lockPath(threadId);
    const handle = await this.acquireLock(threadId, lockPath);
    try {
      return await task();
    } finally {
      await handle.close();
      await fs.rm(lockPath, { force: true });
    }
  }

  private async acquireLock(threadId: string, lockPath: string): Promise<FileHandle> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fs.open(lockPath, 'wx');
      } catch (error) {
        if (!hasErrorCode(error, 'EEXIST')) throw error;
      }

      if (await this.isStale(lockPath)) {
        this.logger?.warn('Removing stale checkpoint lock', { threadId, lockPath });
        await fs.rm(lockPath, { force: true });
        continue;
      }
      if (attempt >= this.lockAttempts) {
        throw new CheckpointLockedError(threadId, lockPath);
      }
      await new Promise((resolve) => setTimeout(resolve, this.lockRetryDelayMs));
    }
  }

  private async isStale(lockPath: string): Promise<boolean> {
    try {
      const { mtimeMs } = await fs.stat(lockPath);
      return Date.now() - mtimeMs > this.staleLockMs;
    } catch (error) {
      // Released since the failed open
      if (hasErrorCode(error, 'ENOENT')) return false;
      throw error;
    }
  }

  private parse(threadId: string, raw: string): StoredCheckpoint {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CheckpointCorruptError(threadId, 'invalid JSON', { cause: error });
    }

    const result = CheckpointSchema.safeParse(json);
    if (!result.success) {
      throw new CheckpointCorruptError(threadId, formatIssues(result.error));
    }
    if (result.data.threadId !== threadId) {
      throw new CheckpointCorruptError(threadId, `file belongs to thread [${result.data.threadId}]`);
    }
    return result.data;
  }
}

/** fs errors come from another realm under some runners, so match on shape, not class. */
function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
