import * as fs from 'fs/promises';
import * as path from 'path';
import { InvalidInputError } from '../../errors';
import type { Store, Serializer, FsStoreOptions } from '../store';

const DEFAULT_SERIALIZER: Serializer = {
  stringify: (value) => JSON.stringify(value, null, 2),
  parse: (text) => JSON.parse(text),
};

/**
 * IDs are URI-encoded into file names, so `/` and `\` never reach the path.
 */
function validateId(id: string): void {
  if (typeof id !== 'string' || id === '') {
    throw new InvalidInputError('id', id, 'must be a non-empty string');
  }
}

function isNotFound(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'ENOENT';
}

/**
 * FsStore<T> - one JSON file per record under `basePath`.
 *
 * IDs are URI-encoded into file names, so ids such as `GHSA/npm/lodash-0002` are safe.
 *
 * @example
 * const store = new FsStore<NormalizedVulnerability>({ basePath: '.vulnrank/vulnerabilities' });
 * await store.put('CVE-2024-0001', vuln);
 */
export class FsStore<T> implements Store<T> {
  private readonly basePath: string;
  private readonly extension: string;
  private readonly serializer: Serializer;
  private readonly createIfMissing: boolean;

  constructor(options: FsStoreOptions) {
    this.basePath = options.basePath;
    this.extension = options.extension ?? '.json';
    this.serializer = options.serializer ?? DEFAULT_SERIALIZER;
    this.createIfMissing = options.createIfMissing ?? true;
  }

  private getFilePath(id: string): string {
    validateId(id);
    return path.join(this.basePath, `${encodeURIComponent(id)}${this.extension}`);
  }

  async get(id: string): Promise<T | null> {
    const filePath = this.getFilePath(id);
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      return this.serializer.parse<T>(content);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async put(id: string, value: T): Promise<void> {
    const filePath = this.getFilePath(id);
    if (this.createIfMissing) {
      await fs.mkdir(this.basePath, { recursive: true });
    }
    await fs.writeFile(filePath, this.serializer.stringify(value), 'utf-8');
  }

  async delete(id: string): Promise<void> {
    try {
      await fs.unlink(this.getFilePath(id));
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  async list(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.basePath);
      return files
        .filter((f) => f.endsWith(this.extension))
        .map((f) => decodeURIComponent(f.slice(0, -this.extension.length)))
        .sort();
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  async values(): Promise<T[]> {
    const records: T[] = [];
    for (const id of await this.list()) {
      const record = await this.get(id);
      if (record !== null) records.push(record);
    }
    return records;
  }

  async exists(id: string): Promise<boolean> {
    try {
      await fs.access(this.getFilePath(id));
      return true;
    } catch {
      return false;
    }
  }
}
