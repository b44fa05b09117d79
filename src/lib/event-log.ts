// Path: src/lib/event-log.ts
// Append-only JSONL sink for rotation events

import { mkdir, open, type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { createLogger } from './logger.js';
import { EventLogError } from '../utils/error.js';
import type { RotationEvent, RotationRecord } from '../services/cid-lifecycle/types.js';

const log = createLogger({ module: 'event-log' });

/**
 * Destination for rotation events. append() resolves once the record is durable.
 */
export interface RotationEventSink {
  append(event: RotationEvent): Promise<void>;
}

export interface JsonlEventLogOptions {
  /** Wall clock in seconds since the epoch, used for `ts` */
  wallClock?: () => number;
}

/**
 * Appends one JSON object per line and fsyncs before each append resolves.
 *
 * Appends are queued, so concurrent callers never interleave partial lines.
 * A failed append rejects for its own caller only; later appends still run.
 */
export class JsonlEventLog implements RotationEventSink {
  private readonly filePath: string;
  private readonly wallClock: () => number;
  private handle: FileHandle | null = null;
  private queue: Promise<void> = Promise.resolve();
  private appended = 0;

  constructor(filePath: string, options: JsonlEventLogOptions = {}) {
    this.filePath = filePath;
    this.wallClock = options.wallClock ?? (() => Date.now() / 1000);
  }

  get path(): string {
    return this.filePath;
  }

  /** Number of records written by this instance */
  get count(): number {
    return this.appended;
  }

  append(event: RotationEvent): Promise<void> {
    const pending = this.queue.then(() => this.write(event));
    // The error is delivered through `pending`; the queue only tracks completion
    this.queue = pending.then(
      () => undefined,
      () => undefined
    );
    return pending;
  }

  /**
   * Wait for queued appends and release the file handle.
   */
  async close(): Promise<void> {
    await this.queue;
    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      await handle.close();
    }
  }

  private async write(event: RotationEvent): Promise<void> {
    const record: RotationRecord = { ...event, ts: this.wallClock() };
    const line = JSON.stringify(record) + '\n';

    try {
      const handle = await this.openHandle();
      await handle.appendFile(line, 'utf-8');
      await handle.sync();
    } catch (err) {
      log.error({ err, path: this.filePath }, 'Rotation event append failed');
      throw new EventLogError(this.filePath, err);
    }

    this.appended++;
  }

  private async openHandle(): Promise<FileHandle> {
    if (this.handle) {
      return this.handle;
    }
    await mkdir(path.dirname(this.filePath), { recursive: true });
    this.handle = await open(this.filePath, 'a');
    log.debug({ path: this.filePath }, 'Opened rotation event log');
    return this.handle;
  }
}
