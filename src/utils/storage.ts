import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { ZodType, ZodTypeDef } from 'zod';

import { logger } from './logger.js';

export interface JsonStorageOptions<T> {
  /** Validates and normalizes parsed JSON; a failed parse counts as a corrupt file. */
  schema: ZodType<T, ZodTypeDef, unknown>;
  /** Maps the in-memory value to its on-disk shape before stringifying. */
  serialize?: (data: T) => unknown;
}

export class JsonStorage<T> {
  constructor(
    private readonly filePath: string,
    private readonly fallback: () => T,
    private readonly options: JsonStorageOptions<T>
  ) {}

  get path(): string {
    return this.filePath;
  }

  async read(): Promise<T> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === 'ENOENT') {
        logger.info('Storage file not found, using default state', { file: this.filePath });
      } else {
        logger.warn('Failed reading storage, using default state', {
          file: this.filePath,
          error: error instanceof Error ? error.message : String(error)
        });
      }
      return this.fallback();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn('Storage file is not valid JSON, starting fresh', {
        file: this.filePath,
        error: error instanceof Error ? error.message : String(error)
      });
      return this.fallback();
    }

    const parsed = this.options.schema.safeParse(json);
    if (!parsed.success) {
      logger.warn('Storage file has an unexpected shape, starting fresh', {
        file: this.filePath,
        error: parsed.error.message
      });
      return this.fallback();
    }
    return parsed.data;
  }

  async write(data: T): Promise<void> {
    const payload = this.options.serialize ? this.options.serialize(data) : data;
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    await mkdir(dirname(this.filePath), { recursive: true });
    try {
      await writeFile(tempPath, `${JSON.stringify(payload, null, 2)}\n`, 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}
