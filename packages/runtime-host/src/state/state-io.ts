/**
 * Resforge Runtime Host — StateIO Interface
 *
 * A directory-scoped, injectable I/O abstraction for reading and writing JSON
 * state files and appending to JSONL log files under the Resforge home.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under a specific directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * Values read back are `unknown`. Callers validate them (see host-config.ts)
 * before use.
 */

import { mkdirSync, readFileSync, writeFileSync, appendFileSync } from 'node:fs';
import { join } from 'node:path';
import { isNodeError } from '@resforge/module-loader';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * All file paths are relative filenames. The implementation resolves them:
 * - readJson and writeJson address the `state/` subdirectory
 * - appendLine and readLogRaw address the `logs/` subdirectory
 */
export interface StateIO {
  /**
   * Read and parse a JSON file.
   *
   * Returns `fallback` if the file does not exist or is not valid JSON.
   *
   * @param filename - Filename within the state subdirectory (e.g. 'host-config.json')
   */
  readJson(filename: string, fallback: unknown): unknown;

  /**
   * Serialize a value as JSON and write it, creating the state subdirectory
   * if needed. Overwrites any existing file.
   */
  writeJson(filename: string, value: unknown): void;

  /**
   * Append a line (a newline is added) to a log file, creating the logs
   * subdirectory if needed.
   *
   * @param logfilename - Filename within the logs subdirectory (e.g. 'project-events.jsonl')
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Raw text content of a log file, or '' if it does not exist.
   * Used by readLog() for dedupe-on-read.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable file-system StateIO rooted at `baseDir`.
 *
 * Reads and writes JSON state at `<baseDir>/state/<filename>`.
 * Appends log lines to         `<baseDir>/logs/<logfilename>`.
 *
 * ENOENT and SyntaxError on read are recoverable (fallback / empty string).
 * Other I/O errors are rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly baseDir: string) {}

  readJson(filename: string, fallback: unknown): unknown {
    const filePath = join(this.baseDir, 'state', filename);
    try {
      const raw = readFileSync(filePath, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return fallback;
      }
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const subDir = join(this.baseDir, 'state');
    mkdirSync(subDir, { recursive: true });
    writeFileSync(join(subDir, filename), JSON.stringify(value, null, 2), 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.baseDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    const logPath = join(this.baseDir, 'logs', logfilename);
    try {
      return readFileSync(logPath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. Instances are isolated from each other.
 *
 * writeJson round-trips through JSON serialization to match FileStateIO
 * (undefined values are dropped, Dates become strings).
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, unknown> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson(filename: string, fallback: unknown): unknown {
    return this.store.has(filename) ? this.store.get(filename) : fallback;
  }

  writeJson(filename: string, value: unknown): void {
    const roundTripped: unknown = JSON.parse(JSON.stringify(value));
    this.store.set(filename, roundTripped);
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * All lines appended to a log file. Not part of the StateIO interface;
   * tests use it to inspect log output without touching the file system.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Match FileStateIO: each appendLine adds 'line\n'
    return lines.join('\n') + '\n';
  }
}
