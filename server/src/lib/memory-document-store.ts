import type { Document, DocumentFilter, DocumentStore, FindOptions, InsertResult } from './document-store.js';

export interface MemoryDocumentStoreOptions<T extends Document> {
  /** Field groups that must be unique together, like a composite unique index. */
  uniqueBy?: Array<Array<keyof T & string>>;
}

function matches<T extends Document>(doc: T, filter: DocumentFilter<T>): boolean {
  return Object.entries(filter).every(([field, value]) => doc[field] === value);
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a ?? '');
  const right = String(b ?? '');
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * In-process document store for tests and local runs. Every operation runs
 * synchronously inside one event-loop turn, so the unique-index check and
 * the insert are atomic with respect to concurrent callers.
 */
export class MemoryDocumentStore<T extends Document> implements DocumentStore<T> {
  readonly name = 'memory';
  private readonly docs: T[] = [];
  private readonly uniqueIndexes: Array<{ fields: Array<keyof T & string>; keys: Set<string> }>;

  constructor(options: MemoryDocumentStoreOptions<T> = {}) {
    this.uniqueIndexes = (options.uniqueBy ?? []).map((fields) => ({ fields, keys: new Set<string>() }));
  }

  private indexKey(doc: T, fields: Array<keyof T & string>): string {
    return JSON.stringify(fields.map((field) => doc[field] ?? null));
  }

  async find(filter: DocumentFilter<T>, options?: FindOptions<T>): Promise<T[]> {
    let rows = this.docs.filter((doc) => matches(doc, filter));
    const orderBy = options?.orderBy ?? [];
    if (orderBy.length > 0) {
      rows = [...rows].sort((a, b) => {
        for (const sort of orderBy) {
          const direction = sort.ascending === false ? -1 : 1;
          const compared = compareValues(a[sort.field], b[sort.field]);
          if (compared !== 0) return direction * compared;
        }
        return 0;
      });
    }
    if (options?.limit !== undefined) {
      rows = rows.slice(0, options.limit);
    }
    return rows.map((doc) => structuredClone(doc));
  }

  async findOne(filter: DocumentFilter<T>): Promise<T | null> {
    const found = this.docs.find((doc) => matches(doc, filter));
    return found ? structuredClone(found) : null;
  }

  async exists(filter: DocumentFilter<T>): Promise<boolean> {
    return this.docs.some((doc) => matches(doc, filter));
  }

  async insert(doc: T): Promise<InsertResult> {
    const keys = this.uniqueIndexes.map((index) => this.indexKey(doc, index.fields));
    if (this.uniqueIndexes.some((index, i) => index.keys.has(keys[i]))) {
      return { inserted: false, reason: 'duplicate' };
    }
    this.uniqueIndexes.forEach((index, i) => index.keys.add(keys[i]));
    this.docs.push(structuredClone(doc));
    return { inserted: true };
  }

  async updateOne(filter: DocumentFilter<T>, patch: Partial<T>): Promise<boolean> {
    const index = this.docs.findIndex((doc) => matches(doc, filter));
    if (index < 0) return false;
    const current = this.docs[index];
    const next: T = { ...current, ...structuredClone(patch) };
    for (const unique of this.uniqueIndexes) {
      const before = this.indexKey(current, unique.fields);
      const after = this.indexKey(next, unique.fields);
      if (before !== after) {
        if (unique.keys.has(after)) return false;
        unique.keys.delete(before);
        unique.keys.add(after);
      }
    }
    this.docs[index] = next;
    return true;
  }

  async count(filter: DocumentFilter<T>): Promise<number> {
    return this.docs.filter((doc) => matches(doc, filter)).length;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  get size(): number {
    return this.docs.length;
  }
}
