/**
 * File-backed durable cache storage.
 *
 * Layout: <rootDir>/<partition>/<encoded key>.json, one record per key.
 * Writes go to a uniquely named temp file first and are renamed into place,
 * so readers never see a partially written record and concurrent writers of
 * the same key resolve as last-rename-wins.
 */

import { promises as fs, constants as fsConstants } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { DurableBackend } from './types';
import { logger } from '../observability/logger';

/** Maps a cache key to the subdirectory it is stored under */
export type KeyPartitioner = (key: string) => string;

const FALLBACK_PARTITION = '_misc';

export interface FileBackendOptions {
  rootDir: string;
  partition?: KeyPartitioner;
}

export class FileBackend implements DurableBackend {
  readonly kind = 'file' as const;
  private readonly rootDir: string;
  private readonly partition: KeyPartitioner;
  private readonly log = logger.child({ component: 'cache-file' });

  constructor(options: FileBackendOptions) {
    this.rootDir = options.rootDir;
    this.partition = options.partition ?? (() => FALLBACK_PARTITION);
  }

  pathFor(key: string): string {
    return path.join(this.rootDir, safeSegment(this.partition(key)), `${encodeURIComponent(key)}.json`);
  }

  async readRaw(key: string): Promise<string | null> {
    try {
      return await fs.readFile(this.pathFor(key), 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw err;
    }
  }

  async writeRaw(key: string, payload: string): Promise<void> {
    const target = this.pathFor(key);
    const tmp = `${target}.${uuidv4()}.tmp`;
    await fs.mkdir(path.dirname(target), { recursive: true });
    try {
      await fs.writeFile(tmp, payload, 'utf8');
      await fs.rename(tmp, target);
    } catch (err) {
      await fs.rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
        this.log.debug({ err: cleanupErr, tmp }, 'Temp file cleanup failed');
      });
      throw err;
    }
  }

  async ping(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
    await fs.access(this.rootDir, fsConstants.W_OK);
  }
}

function safeSegment(segment: string): string {
  const encoded = encodeURIComponent(segment);
  if (!encoded || encoded === '.' || encoded === '..') return FALLBACK_PARTITION;
  return encoded;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
