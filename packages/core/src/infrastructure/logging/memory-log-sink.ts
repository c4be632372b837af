/**
 * @fileoverview MemoryLogSink - In-Process pino Destination
 *
 * @packageDocumentation
 * @module @scopelab/core/infrastructure/logging
 * @license Apache-2.0
 *
 * Append-only store of the JSON records a pino logger writes. The demo
 * prints it after a session; tests assert on it.
 *
 * @version 1.0.0
 */

import type { DestinationStream } from 'pino';

/**
 * One parsed pino record.
 */
export interface LogRecord {
  level: number;
  time?: string;
  msg?: string;
  $label?: string;
  [key: string]: unknown;
}

function isLogRecord(value: unknown): value is LogRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'level' in value &&
    typeof value.level === 'number'
  );
}

export class MemoryLogSink implements DestinationStream {
  /** Raw lines, as written by pino. */
  readonly lines: string[] = [];

  /** Parsed records, in write order. */
  readonly records: LogRecord[] = [];

  write(msg: string): void {
    this.lines.push(msg);

    const parsed: unknown = JSON.parse(msg);
    if (!isLogRecord(parsed)) {
      throw new TypeError(`Not a pino record: ${msg}`);
    }
    this.records.push(parsed);
  }

  /**
   * Messages of every record, in write order.
   */
  messages(): string[] {
    return this.records.map((record) => record.msg ?? '');
  }

  /**
   * Records whose fields equal every field of `match`.
   */
  where(match: Readonly<Record<string, unknown>>): LogRecord[] {
    return this.records.filter((record) =>
      Object.entries(match).every(([key, value]) => record[key] === value),
    );
  }

  clear(): void {
    this.lines.length = 0;
    this.records.length = 0;
  }
}
