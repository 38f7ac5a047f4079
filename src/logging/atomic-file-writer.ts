/**
 * Atomic File Writer
 *
 * Report files are written to a temporary sibling first, fsynced, then
 * renamed over the target, so a reader never observes a half-written
 * review document. Failed attempts are retried a bounded number of times.
 */

import * as fs from 'fs';
import * as path from 'path';

export const DEFAULT_MAX_RETRIES = 3;

export interface AtomicWriteOptions {
  /** Maximum retry attempts (default: 3) */
  maxRetries?: number;
  /** fsync the temporary file before renaming (default: true) */
  fsync?: boolean;
  /** File permissions (default: 0o644) */
  mode?: number;
  /** Encoding (default: 'utf-8') */
  encoding?: BufferEncoding;
}

export interface AtomicWriteResult {
  success: boolean;
  retryCount: number;
  error?: Error;
}

function temporaryPathFor(filePath: string, attempt: number): string {
  const dir = path.dirname(filePath);
  return path.join(dir, `.${path.basename(filePath)}.${process.pid}.${attempt}.tmp`);
}

function writeOnce(filePath: string, content: string, tmpPath: string, options: AtomicWriteOptions): void {
  const encoding = options.encoding ?? 'utf-8';
  const mode = options.mode ?? 0o644;

  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const fd = fs.openSync(tmpPath, 'w', mode);
  try {
    fs.writeSync(fd, content, null, encoding);
    if (options.fsync ?? true) {
      fs.fsyncSync(fd);
    }
  } finally {
    fs.closeSync(fd);
  }

  fs.renameSync(tmpPath, filePath);
}

function removeIfPresent(tmpPath: string): void {
  if (fs.existsSync(tmpPath)) {
    fs.unlinkSync(tmpPath);
  }
}

/**
 * Synchronous atomic file write with retry
 *
 * @returns Result with success status and retry count
 */
export function atomicWriteFileSync(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): AtomicWriteResult {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const tmpPath = temporaryPathFor(filePath, attempt);
    try {
      writeOnce(filePath, content, tmpPath, options);
      return { success: true, retryCount: attempt };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      removeIfPresent(tmpPath);
    }
  }

  return {
    success: false,
    retryCount: maxRetries,
    error: lastError,
  };
}
