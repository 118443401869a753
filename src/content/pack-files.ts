import type { Dirent } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { contentLoadAbortedError } from '../kernel/content-error.js';
import { compareText } from '../kernel/diagnostic-order.js';
import { detectDataFileFormat } from './decode-file.js';
import type { DataFileFormat } from './decode-file.js';

export interface PackFile {
  /** File name without its extension, e.g. `weapons` or `mod`. */
  readonly stem: string;
  readonly fileName: string;
  readonly filePath: string;
  readonly format: DataFileFormat;
}

/** Recognized files of one directory grouped by stem, each group in ascending file-name order. */
export type PackListing = ReadonlyMap<string, readonly PackFile[]>;

/** Returns null when `dir` does not exist or is not a directory. */
export async function listPackFiles(dir: string): Promise<PackListing | null> {
  const entries = await readDirectory(dir);
  if (entries === null) {
    return null;
  }

  const listing = new Map<string, PackFile[]>();
  const fileNames = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort(compareText);
  for (const fileName of fileNames) {
    const format = detectDataFileFormat(fileName);
    if (format === null) {
      continue;
    }
    const stem = basename(fileName, extname(fileName));
    const group = listing.get(stem) ?? [];
    group.push({ stem, fileName, filePath: join(dir, fileName), format });
    listing.set(stem, group);
  }
  return listing;
}

/** Immediate subdirectory names, ascending; null when `dir` does not exist. */
export async function listSubdirectories(dir: string): Promise<readonly string[] | null> {
  const entries = await readDirectory(dir);
  if (entries === null) {
    return null;
  }
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort(compareText);
}

export async function readPackFile(file: PackFile, signal?: AbortSignal): Promise<string> {
  throwIfAborted(signal, file.filePath);
  const text = await readFile(file.filePath, 'utf8');
  throwIfAborted(signal, file.filePath);
  return text;
}

export function throwIfAborted(signal: AbortSignal | undefined, at: string): void {
  if (signal?.aborted === true) {
    throw contentLoadAbortedError({ at });
  }
}

async function readDirectory(dir: string): Promise<Dirent[] | null> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isMissingDirectoryError(error)) {
      return null;
    }
    throw error;
  }
}

function isMissingDirectoryError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
