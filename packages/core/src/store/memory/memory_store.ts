import { InvalidInputError } from '../../errors';
import type { Store } from '../store';

export interface MemoryStoreOptions<T> {
  /** Initial records */
  initial?: Iterable<[string, T]>;

  /** Clone data on get/put (default: true) */
  deepClone?: boolean;
}

/**
 * MemoryStore<T> - In-memory implementation of Store<T>
 *
 * Used by tests and one-off CLI runs that need no persistence.
 * Values are cloned on the way in and out so callers cannot mutate stored records.
 *
 * @example
 * const vulnerabilities = new MemoryStore<NormalizedVulnerability>();
 * await vulnerabilities.put('CVE-2024-0001', vuln);
 * expect(vulnerabilities.size()).toBe(1);
 */
export class MemoryStore<T> implements Store<T> {
  private readonly data: Map<string, T>;
  private readonly deepClone: boolean;

  constructor(options: MemoryStoreOptions<T> = {}) {
    this.deepClone = options.deepClone ?? true;
    this.data = new Map();
    for (const [id, value] of options.initial ?? []) {
      this.data.set(id, this.clone(value));
    }
  }

  private clone(value: T): T {
    if (!this.deepClone) return value;
    return structuredClone(value);
  }

  async get(id: string): Promise<T | null> {
    const value = this.data.get(id);
    return value !== undefined ? this.clone(value) : null;
  }

  async put(id: string, value: T): Promise<void> {
    if (id === '') {
      throw new InvalidInputError('id', id, 'must be a non-empty string');
    }
    this.data.set(id, this.clone(value));
  }

  async delete(id: string): Promise<void> {
    this.data.delete(id);
  }

  async list(): Promise<string[]> {
    return Array.from(this.data.keys());
  }

  async values(): Promise<T[]> {
    return Array.from(this.data.values(), (value) => this.clone(value));
  }

  async exists(id: string): Promise<boolean> {
    return this.data.has(id);
  }

  // Test helpers, not part of Store<T>

  clear(): void {
    this.data.clear();
  }

  size(): number {
    return this.data.size;
  }
}
