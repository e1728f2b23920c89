import * as path from 'path';
import * as fs from 'fs-extra';
import type { z } from 'zod';
import { BaseModel } from './BaseModel';
import { ValidationError } from '../services/base/ServiceError';
import type { IRecordStore } from '../services/interfaces';
import { logger } from '../utils/logger';

const SAFE_KEY = /^[A-Za-z0-9_.-]+$/;

/**
 * One JSON file per record in a directory. Records are validated against
 * `schema` on every read; files that fail validation are skipped by `list()`.
 */
export class JsonFileStore<T> extends BaseModel implements IRecordStore<T> {
  protected readonly modelName: string;

  constructor(
    private readonly directory: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    modelName = 'JsonFileStore'
  ) {
    super();
    this.modelName = modelName;
  }

  async get(key: string): Promise<T | null> {
    const file = this.fileFor(key);
    try {
      if (!(await fs.pathExists(file))) {
        return null;
      }
      return this.parse(await fs.readJson(file), file);
    } catch (error) {
      this.handleIoError(error, `get(${key})`);
    }
  }

  async put(key: string, value: T): Promise<void> {
    const file = this.fileFor(key);
    const tmp = `${file}.tmp`;
    try {
      await fs.outputJson(tmp, value, { spaces: 2 });
      await fs.move(tmp, file, { overwrite: true });
    } catch (error) {
      this.handleIoError(error, `put(${key})`);
    }
  }

  async delete(key: string): Promise<boolean> {
    const file = this.fileFor(key);
    try {
      if (!(await fs.pathExists(file))) {
        return false;
      }
      await fs.remove(file);
      return true;
    } catch (error) {
      this.handleIoError(error, `delete(${key})`);
    }
  }

  async list(): Promise<T[]> {
    try {
      if (!(await fs.pathExists(this.directory))) {
        return [];
      }
      const names = (await fs.readdir(this.directory)).filter(name => name.endsWith('.json')).sort();
      const records: T[] = [];
      for (const name of names) {
        const file = path.join(this.directory, name);
        const result = this.schema.safeParse(await fs.readJson(file));
        if (result.success) {
          records.push(result.data);
        } else {
          logger.warn(`[${this.modelName}] Skipping invalid record ${name}`);
        }
      }
      return records;
    } catch (error) {
      this.handleIoError(error, 'list');
    }
  }

  private fileFor(key: string): string {
    if (!SAFE_KEY.test(key)) {
      throw new ValidationError(`Invalid record key '${key}'`);
    }
    return path.join(this.directory, `${key}.json`);
  }

  private parse(raw: unknown, file: string): T {
    const result = this.schema.safeParse(raw);
    if (!result.success) {
      throw new ValidationError(`Invalid record in ${path.basename(file)}`, result.error.issues);
    }
    return result.data;
  }
}
