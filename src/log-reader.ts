// ABOUTME: Opens plain or gzip-compressed access logs as streams of trimmed lines
// ABOUTME: Open and read failures surface as InputError so no partial report is produced

import * as fs from 'fs/promises';
import * as path from 'path';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { createGunzip } from 'zlib';
import { InputError, errorMessage } from './errors.js';

export interface LogSource {
  name: string;
  lines: AsyncIterable<string> | Iterable<string>;
  close?: () => void;
}

async function* trimmedLines(name: string, input: Readable): AsyncGenerator<string> {
  const reader = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of reader) {
      yield line.trim();
    }
  } catch (error) {
    throw new InputError(name, `Failed to read ${name}: ${errorMessage(error)}`, { cause: error });
  } finally {
    reader.close();
    input.destroy();
  }
}

/**
 * Open a log file for reading; ".gz" files are decompressed on the fly
 */
export async function openLogFile(filePath: string): Promise<LogSource> {
  const name = path.resolve(filePath);

  let handle: fs.FileHandle;
  try {
    handle = await fs.open(name, 'r');
  } catch (error) {
    throw new InputError(name, `Cannot open log file ${name}: ${errorMessage(error)}`, { cause: error });
  }

  const raw = handle.createReadStream();
  let input: Readable = raw;
  if (name.toLowerCase().endsWith('.gz')) {
    const gunzip = createGunzip();
    raw.on('error', error => gunzip.destroy(error));
    input = raw.pipe(gunzip);
  }

  return {
    name,
    lines: trimmedLines(name, input),
    close: () => {
      input.destroy();
      raw.destroy();
    },
  };
}

/**
 * Open every file up front so a missing file aborts the run before any counting
 */
export async function openLogFiles(filePaths: string[]): Promise<LogSource[]> {
  const sources: LogSource[] = [];
  try {
    for (const filePath of filePaths) {
      sources.push(await openLogFile(filePath));
    }
  } catch (error) {
    sources.forEach(source => source.close?.());
    throw error;
  }
  return sources;
}

/**
 * Wrap in-memory text (a fixture, or log content passed to the MCP tool) as a line source
 */
export function sourceFromText(name: string, text: string): LogSource {
  return { name, lines: text.split(/\r?\n/).map(line => line.trim()) };
}
