// packages/core/src/corpus/read.ts — Bounded file reads shared by the loaders

import { readFile, stat } from 'node:fs/promises';
import type { LoadIssue } from '../types/analysis.js';
import { LoadError, errorMessage } from '../utils/errors.js';

function isAbortTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * Read a UTF-8 file, aborting after `timeoutMs`.
 * Rejects with LoadError tagged `read` or `timeout`.
 */
export async function readTextFile(
  absPath: string,
  relPath: string,
  timeoutMs: number,
): Promise<string> {
  try {
    return await readFile(absPath, { encoding: 'utf-8', signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    if (isAbortTimeout(err)) {
      throw new LoadError(`Read timed out after ${timeoutMs}ms`, relPath, 'timeout');
    }
    throw new LoadError(errorMessage(err), relPath, 'read');
  }
}

/** Read and JSON-parse a file; parse failures are tagged `parse`. */
export async function readJsonFile(
  absPath: string,
  relPath: string,
  timeoutMs: number,
): Promise<unknown> {
  const text = await readTextFile(absPath, relPath, timeoutMs);
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new LoadError(errorMessage(err), relPath, 'parse');
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Like readJsonFile, but resolves undefined when the file does not exist. */
export async function readOptionalJsonFile(
  absPath: string,
  relPath: string,
  timeoutMs: number,
): Promise<unknown> {
  try {
    await stat(absPath);
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw new LoadError(errorMessage(err), relPath, 'read');
  }
  return readJsonFile(absPath, relPath, timeoutMs);
}

export function toLoadIssue(err: unknown, fallbackPath: string): LoadIssue {
  if (err instanceof LoadError) {
    return { path: err.path, phase: err.phase, message: err.message };
  }
  return { path: fallbackPath, phase: 'read', message: errorMessage(err) };
}
