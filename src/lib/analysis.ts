// Path: src/lib/analysis.ts
// Offline reporting over a rotation event log

import { open } from 'node:fs/promises';
import { createLogger } from './logger.js';

const log = createLogger({ module: 'analysis' });

export const DEFAULT_LAST_RECORDS = 10;

/** A parsed log line; older or foreign writers may omit fields */
export type LoggedRecord = Record<string, unknown>;

export interface RotationLogContents {
  records: LoggedRecord[];
  /** Non-blank lines that were not JSON objects */
  invalidLines: number;
}

export interface RotationLogSummary {
  total: number;
  /** Events per `event` value, in order of first appearance */
  counts: Record<string, number>;
  last: LoggedRecord[];
  invalidLines: number;
}

function isLoggedRecord(value: unknown): value is LoggedRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse one line of the log. Returns null for anything but a JSON object.
 */
export function parseRecordLine(line: string): LoggedRecord | null {
  try {
    const parsed: unknown = JSON.parse(line);
    return isLoggedRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Read every record of a line-delimited log, in file order.
 */
export async function readRotationLog(filePath: string): Promise<RotationLogContents> {
  // Rejects up front for a missing or unreadable file; the line stream closes the handle
  const file = await open(filePath, 'r');

  const records: LoggedRecord[] = [];
  let invalidLines = 0;
  let lineNumber = 0;

  for await (const line of file.readLines()) {
    lineNumber++;
    if (line.trim() === '') continue;

    const record = parseRecordLine(line);
    if (record) {
      records.push(record);
    } else {
      invalidLines++;
      log.warn({ path: filePath, line: lineNumber }, 'Skipping unparseable rotation log line');
    }
  }

  return { records, invalidLines };
}

export function eventKindOf(record: LoggedRecord): string {
  const kind = record.event;
  return typeof kind === 'string' ? kind : '<none>';
}

export function summarizeRotationLog(
  contents: RotationLogContents,
  lastN: number = DEFAULT_LAST_RECORDS
): RotationLogSummary {
  const counts: Record<string, number> = {};
  for (const record of contents.records) {
    const kind = eventKindOf(record);
    counts[kind] = (counts[kind] ?? 0) + 1;
  }

  const keep = Math.max(0, Math.floor(lastN));
  return {
    total: contents.records.length,
    counts,
    last: keep === 0 ? [] : contents.records.slice(-keep),
    invalidLines: contents.invalidLines,
  };
}

/**
 * Plain-text report: totals, per-event counts, then the last records in full.
 */
export function formatRotationLogSummary(summary: RotationLogSummary): string {
  const lines: string[] = [];
  lines.push(`Total events: ${summary.total}`);

  const counts = Object.entries(summary.counts).map(([kind, count]) => `${kind}=${count}`);
  lines.push(`Counts: ${counts.length > 0 ? counts.join(', ') : '(none)'}`);

  if (summary.invalidLines > 0) {
    lines.push(`Skipped lines: ${summary.invalidLines}`);
  }

  if (summary.last.length > 0) {
    lines.push('');
    lines.push(`Last ${summary.last.length} record(s):`);
    for (const record of summary.last) {
      lines.push(JSON.stringify(record, null, 2));
    }
  }

  return lines.join('\n');
}
