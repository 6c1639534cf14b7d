import * as fs from 'fs/promises';
import { FILE_PROCESSING_CONFIG } from '../extraction/config';
import { RemoteProcessingFailed, type SkippedFile } from '../extraction/errors';
import { createLogger, errorMessage, type Logger } from '../utils/logger';
import type { RemoteFileService } from './fileService';
import { prepareInput, type PreparedInput } from './prepareInput';

export type RemoteResourceState = 'pending' | 'uploading' | 'processing' | 'ready' | 'failed';

export type Sleep = (ms: number) => Promise<void>;

export interface ReadyFile {
  sourcePath: string;
  displayName: string;
  name: string;
  uri: string;
  mimeType: string;
}

export interface RemoteResourceOptions {
  service: RemoteFileService;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
  pollIntervalMs?: number;
  maxWaitMs?: number;
  prepare?: (filePath: string) => Promise<PreparedInput>;
}

const defaultLogger = createLogger('RemoteFiles');

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Lifecycle of one file on the extraction service:
 * pending → uploading → processing → ready | failed.
 *
 * `release()` may be called from any state and performs cleanup once; the
 * owner must call it on every exit path (see {@link withRemoteResources}).
 */
export class RemoteResource {
  private current: RemoteResourceState = 'pending';
  private remoteName: string | null = null;
  private artifacts: string[] = [];
  private released = false;
  private readonly history: RemoteResourceState[] = ['pending'];

  private readonly service: RemoteFileService;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;
  private readonly prepare: (filePath: string) => Promise<PreparedInput>;

  constructor(
    public readonly filePath: string,
    options: RemoteResourceOptions
  ) {
    this.service = options.service;
    this.logger = options.logger ?? defaultLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.pollIntervalMs = options.pollIntervalMs ?? FILE_PROCESSING_CONFIG.pollIntervalMs;
    this.maxWaitMs = options.maxWaitMs ?? FILE_PROCESSING_CONFIG.maxWaitMs;
    this.prepare = options.prepare ?? prepareInput;
  }

  get state(): RemoteResourceState {
    return this.current;
  }

  get transitions(): readonly RemoteResourceState[] {
    return this.history;
  }

  get isReleased(): boolean {
    return this.released;
  }

  async acquire(): Promise<ReadyFile> {
    if (this.current !== 'pending') {
      throw new Error(`Resource for ${this.filePath} was already acquired (state: ${this.current})`);
    }

    try {
      this.transition('uploading');
      const prepared = await this.prepare(this.filePath);
      this.artifacts.push(...prepared.artifacts);

      let status = await this.service.upload(prepared.uploadPath, prepared.mimeType, prepared.displayName);
      this.remoteName = status.name;
      this.transition('processing');
      this.logger.info(`Uploaded ${prepared.displayName} as ${status.name}`);

      const startedAt = this.now();
      while (status.state === 'processing') {
        const elapsed = this.now() - startedAt;
        if (elapsed >= this.maxWaitMs) {
          throw new RemoteProcessingFailed(
            this.filePath,
            `still processing after ${elapsed}ms (limit ${this.maxWaitMs}ms)`
          );
        }
        await this.sleep(this.pollIntervalMs);
        status = await this.service.getStatus(status.name);
      }

      if (status.state === 'failed') {
        throw new RemoteProcessingFailed(
          this.filePath,
          status.error ?? 'remote side reported failure without a diagnostic'
        );
      }

      this.transition('ready');
      return {
        sourcePath: this.filePath,
        displayName: prepared.displayName,
        name: status.name,
        uri: status.uri,
        mimeType: status.mimeType || prepared.mimeType,
      };
    } catch (error) {
      this.transition('failed');
      if (error instanceof RemoteProcessingFailed) {
        throw error;
      }
      throw new RemoteProcessingFailed(this.filePath, errorMessage(error), error);
    }
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;

    if (this.remoteName) {
      try {
        await this.service.delete(this.remoteName);
        this.logger.info(`Deleted remote file ${this.remoteName}`);
      } catch (error) {
        this.logger.warn(`Failed to delete remote file ${this.remoteName}`, {
          file: this.filePath,
          error: errorMessage(error),
        });
      }
    }

    for (const artifact of this.artifacts) {
      try {
        await fs.rm(artifact, { recursive: true, force: true });
      } catch (error) {
        this.logger.warn(`Failed to remove local artifact ${artifact}`, {
          file: this.filePath,
          error: errorMessage(error),
        });
      }
    }
  }

  private transition(next: RemoteResourceState): void {
    this.current = next;
    this.history.push(next);
  }
}

export interface AcquisitionOutcome {
  ready: ReadyFile[];
  skipped: SkippedFile[];
}

/**
 * Acquires every file in order, hands the ready ones to `fn`, and releases
 * all acquired resources afterwards, including when `fn` or an acquisition
 * throws. Files whose processing fails are skipped with a warning.
 */
export async function withRemoteResources<T>(
  filePaths: string[],
  options: RemoteResourceOptions,
  fn: (outcome: AcquisitionOutcome) => Promise<T>
): Promise<T> {
  const logger = options.logger ?? defaultLogger;
  const resources: RemoteResource[] = [];

  try {
    const ready: ReadyFile[] = [];
    const skipped: SkippedFile[] = [];

    for (const filePath of filePaths) {
      const resource = new RemoteResource(filePath, options);
      resources.push(resource);
      try {
        ready.push(await resource.acquire());
      } catch (error) {
        if (!(error instanceof RemoteProcessingFailed)) {
          throw error;
        }
        logger.warn(`Skipping ${filePath}`, { diagnostic: error.diagnostic });
        skipped.push({ file: filePath, reason: error.diagnostic });
      }
    }

    return await fn({ ready, skipped });
  } finally {
    for (const resource of resources) {
      await resource.release();
    }
  }
}
