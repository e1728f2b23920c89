import * as fs from 'fs-extra';
import { z } from 'zod';
import { BaseModel } from './BaseModel';
import type { IKeyValueCache } from '../services/interfaces';
import { logger } from '../utils/logger';

/**
 * A string-keyed map persisted as a single JSON object file, replaced through
 * a temp file on every save. Nothing touches the disk until `load()` or
 * `save()` is called.
 */
export class JsonFileCache<V> extends BaseModel implements IKeyValueCache<V> {
  protected readonly modelName = 'JsonFileCache';
  private entries = new Map<string, V>();
  private pendingSave: Promise<void> = Promise.resolve();
  private readonly fileSchema: z.ZodType<Record<string, V>, z.ZodTypeDef, unknown>;

  constructor(private readonly filePath: string, valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>) {
    super();
    this.fileSchema = z.record(valueSchema);
  }

  async load(): Promise<void> {
    try {
      this.entries = await this.readEntries();
    } catch (error) {
      this.handleIoError(error, 'load');
    }
  }

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: V): void {
    this.entries.set(key, value);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Saves run one at a time, each writing the entries as they stand when it
   * starts. A failed save rejects only its own caller.
   */
  save(): Promise<void> {
    const run = this.pendingSave.then(() => this.writeEntries());
    this.pendingSave = run.catch((error: unknown) => {
      logger.debug(`[${this.modelName}] Save failed, next save proceeds`, error);
    });
    return run;
  }

  private async readEntries(): Promise<Map<string, V>> {
    if (!(await fs.pathExists(this.filePath))) {
      return new Map();
    }
    let raw: unknown;
    try {
      raw = await fs.readJson(this.filePath);
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      logger.warn(`[${this.modelName}] Ignoring corrupt cache file ${this.filePath}: ${error.message}`);
      return new Map();
    }
    const result = this.fileSchema.safeParse(raw);
    if (!result.success) {
      logger.warn(`[${this.modelName}] Ignoring unreadable cache file ${this.filePath}`);
      return new Map();
    }
    logger.info(`[${this.modelName}] Loaded ${Object.keys(result.data).length} entries from ${this.filePath}`);
    return new Map(Object.entries(result.data));
  }

  private async writeEntries(): Promise<void> {
    const tmp = `${this.filePath}.tmp`;
    try {
      await fs.outputJson(tmp, Object.fromEntries(this.entries));
      await fs.move(tmp, this.filePath, { overwrite: true });
    } catch (error) {
      this.handleIoError(error, 'save');
    }
  }
}
