/**
 * Checkpoint file store for resumable runs
 *
 * One directory per job under the checkpoint root, holding a single
 * `checkpoint.json` that is replaced atomically on every save.
 */

import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { parseSnapshot } from './serialization.js';
import type { CheckpointSnapshot, CreateCheckpointOptions, SnapshotMeta, SnapshotStore } from './types.js';

export const DEFAULT_CHECKPOINT_DIR = '.debt-checkpoints';

const CHECKPOINT_FILE = 'checkpoint.json';

function checkpointPathFor(jobId: string, checkpointDir: string): string {
  return path.join(checkpointDir, jobId, CHECKPOINT_FILE);
}

function assertJobId(jobId: string): void {
  if (jobId.trim() === '' || jobId !== path.basename(jobId) || jobId === '.' || jobId === '..') {
    throw new Error(`Invalid job id: "${jobId}"`);
  }
}

/**
 * SHA-256 of a file, streamed. Stored in the snapshot so that a resume
 * against a modified input can be detected.
 */
export async function calculateFileHash(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);

    stream.on('data', chunk => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', err => reject(new Error(`Failed to hash ${filePath}: ${err.message}`)));
  });
}

export class CheckpointManager implements SnapshotStore {
  private readonly jobId: string;
  private readonly jobDir: string;
  private readonly checkpointPath: string;
  private readonly meta: SnapshotMeta;
  private loaded: CheckpointSnapshot | null;

  private constructor(
    meta: SnapshotMeta,
    checkpointDir: string,
    loaded: CheckpointSnapshot | null = null
  ) {
    this.jobId = meta.jobId;
    this.meta = meta;
    this.jobDir = path.join(checkpointDir, meta.jobId);
    this.checkpointPath = path.join(this.jobDir, CHECKPOINT_FILE);
    this.loaded = loaded;
  }

  /**
   * Create the job directory for a fresh run. Nothing is written until the
   * first save.
   */
  static async create(options: CreateCheckpointOptions, now: () => number = Date.now): Promise<CheckpointManager> {
    assertJobId(options.jobId);
    const checkpointDir = options.checkpointDir || DEFAULT_CHECKPOINT_DIR;
    await fs.promises.mkdir(path.join(checkpointDir, options.jobId), { recursive: true });

    return new CheckpointManager(
      {
        jobId: options.jobId,
        inputPath: options.inputPath ?? null,
        inputHash: options.inputHash ?? null,
        createdAt: now()
      },
      checkpointDir
    );
  }

  /**
   * Open an existing checkpoint and validate its contents
   */
  static async resume(jobId: string, checkpointDir?: string): Promise<CheckpointManager> {
    assertJobId(jobId);
    const dir = checkpointDir || DEFAULT_CHECKPOINT_DIR;
    const checkpointPath = checkpointPathFor(jobId, dir);

    if (!fs.existsSync(checkpointPath)) {
      throw new Error(`Checkpoint not found for job: ${jobId} at ${checkpointPath}`);
    }

    const snapshot = await CheckpointManager.readSnapshot(checkpointPath);
    if (snapshot.jobId !== jobId) {
      throw new Error(`Checkpoint at ${checkpointPath} belongs to job "${snapshot.jobId}", expected "${jobId}"`);
    }

    return new CheckpointManager(
      {
        jobId,
        inputPath: snapshot.inputPath,
        inputHash: snapshot.inputHash,
        createdAt: snapshot.createdAt
      },
      dir,
      snapshot
    );
  }

  static async exists(jobId: string, checkpointDir?: string): Promise<boolean> {
    const dir = checkpointDir || DEFAULT_CHECKPOINT_DIR;
    return fs.existsSync(checkpointPathFor(jobId, dir));
  }

  private static async readSnapshot(checkpointPath: string): Promise<CheckpointSnapshot> {
    const data = await fs.promises.readFile(checkpointPath, 'utf8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Checkpoint at ${checkpointPath} is not valid JSON: ${message}`);
    }
    try {
      return parseSnapshot(parsed);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Checkpoint at ${checkpointPath} is invalid: ${message}`);
    }
  }

  /**
   * Save a snapshot (atomic write)
   */
  async save(snapshot: CheckpointSnapshot): Promise<void> {
    if (snapshot.jobId !== this.jobId) {
      throw new Error(`Snapshot for job "${snapshot.jobId}" cannot be saved under job "${this.jobId}"`);
    }
    await fs.promises.mkdir(this.jobDir, { recursive: true });

    // Atomic write: write to temp file, then rename
    const tempPath = `${this.checkpointPath}.tmp`;
    await fs.promises.writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf8');
    await fs.promises.rename(tempPath, this.checkpointPath);
  }

  /**
   * Read the snapshot currently on disk
   */
  async load(): Promise<CheckpointSnapshot> {
    const snapshot = await CheckpointManager.readSnapshot(this.checkpointPath);
    this.loaded = snapshot;
    return snapshot;
  }

  /** Snapshot read by `resume` or the last `load`, if any */
  getLoadedSnapshot(): CheckpointSnapshot | null {
    return this.loaded;
  }

  getMeta(): Readonly<SnapshotMeta> {
    return this.meta;
  }

  getJobId(): string {
    return this.jobId;
  }

  getCheckpointDir(): string {
    return this.jobDir;
  }

  getCheckpointPath(): string {
    return this.checkpointPath;
  }

  /**
   * Compare the stored input fingerprint with a freshly computed one.
   * Returns null when they match or nothing was stored.
   */
  describeInputChange(currentHash: string | null): string | null {
    const stored = this.meta.inputHash;
    if (!stored || !currentHash || stored === currentHash) return null;
    return `Input file changed since job ${this.jobId} was checkpointed (hash ${stored.slice(0, 12)}… → ${currentHash.slice(0, 12)}…)`;
  }

  /**
   * Delete checkpoint directory and all files
   */
  async delete(): Promise<void> {
    await fs.promises.rm(this.jobDir, { recursive: true, force: true });
  }
}

/**
 * Find the most recent job in the checkpoint directory
 * Used for --resume without job-id
 */
export async function findLastJob(checkpointDir?: string): Promise<string | null> {
  const dir = checkpointDir || DEFAULT_CHECKPOINT_DIR;

  if (!fs.existsSync(dir)) {
    return null;
  }

  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  let latestJob: string | null = null;
  let latestTime = 0;

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const checkpointPath = checkpointPathFor(entry.name, dir);
    if (!fs.existsSync(checkpointPath)) continue;
    const stats = await fs.promises.stat(checkpointPath);
    if (stats.mtimeMs > latestTime) {
      latestTime = stats.mtimeMs;
      latestJob = entry.name;
    }
  }

  return latestJob;
}
