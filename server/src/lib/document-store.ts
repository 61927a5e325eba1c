import type { SupabaseClient } from '@supabase/supabase-js';
import type { z } from 'zod';
import logger from './logger.js';

export type Document = Record<string, unknown>;

/** Equality filter: every listed field must match. */
export type DocumentFilter<T extends Document> = Partial<T>;

export interface SortKey<T extends Document> {
  field: keyof T & string;
  ascending?: boolean;
}

export interface FindOptions<T extends Document> {
  limit?: number;
  orderBy?: Array<SortKey<T>>;
}

export type InsertResult = { inserted: true } | { inserted: false; reason: 'duplicate' };

/**
 * Persistent keyed collection. Implementations guarantee read-your-writes in
 * one process and reject inserts that violate a uniqueness constraint with
 * `{ inserted: false, reason: 'duplicate' }` rather than an error.
 */
export interface DocumentStore<T extends Document> {
  readonly name: string;
  find(filter: DocumentFilter<T>, options?: FindOptions<T>): Promise<T[]>;
  findOne(filter: DocumentFilter<T>): Promise<T | null>;
  exists(filter: DocumentFilter<T>): Promise<boolean>;
  insert(doc: T): Promise<InsertResult>;
  /** Applies `patch` to documents matching `filter`; callers filter by primary key. */
  updateOne(filter: DocumentFilter<T>, patch: Partial<T>): Promise<boolean>;
  count(filter: DocumentFilter<T>): Promise<number>;
  ping(): Promise<boolean>;
}

/** Postgres unique_violation, surfaced by PostgREST. */
const UNIQUE_VIOLATION = '23505';

export class DocumentStoreError extends Error {
  readonly code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.name = 'DocumentStoreError';
    this.code = code;
  }
}

interface SupabaseDocumentStoreOptions<T extends Document> {
  table: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  client: () => SupabaseClient;
}

/**
 * Supabase table as a document store. Rows read back are validated against
 * `schema`, so drift between the migration and the code fails loudly.
 */
export class SupabaseDocumentStore<T extends Document> implements DocumentStore<T> {
  readonly name = 'supabase';
  private readonly table: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly client: () => SupabaseClient;

  constructor(options: SupabaseDocumentStoreOptions<T>) {
    this.table = options.table;
    this.schema = options.schema;
    this.client = options.client;
  }

  async find(filter: DocumentFilter<T>, options?: FindOptions<T>): Promise<T[]> {
    let query = this.client().from(this.table).select('*');
    for (const [field, value] of Object.entries(filter)) {
      query = query.eq(field, value);
    }
    for (const sort of options?.orderBy ?? []) {
      query = query.order(sort.field, { ascending: sort.ascending ?? true });
    }
    if (options?.limit !== undefined) {
      query = query.limit(options.limit);
    }

    const { data, error } = await query;
    if (error) {
      throw new DocumentStoreError(`Failed to query ${this.table}: ${error.message}`, error.code);
    }
    return this.schema.array().parse(data ?? []);
  }

  async findOne(filter: DocumentFilter<T>): Promise<T | null> {
    const rows = await this.find(filter, { limit: 1 });
    return rows[0] ?? null;
  }

  async exists(filter: DocumentFilter<T>): Promise<boolean> {
    return (await this.count(filter)) > 0;
  }

  async insert(doc: T): Promise<InsertResult> {
    const { error } = await this.client().from(this.table).insert(doc);
    if (!error) return { inserted: true };
    if (error.code === UNIQUE_VIOLATION) {
      return { inserted: false, reason: 'duplicate' };
    }
    throw new DocumentStoreError(`Failed to insert into ${this.table}: ${error.message}`, error.code);
  }

  async updateOne(filter: DocumentFilter<T>, patch: Partial<T>): Promise<boolean> {
    let query = this.client().from(this.table).update(patch);
    for (const [field, value] of Object.entries(filter)) {
      query = query.eq(field, value);
    }
    const { data, error } = await query.select();
    if (error) {
      throw new DocumentStoreError(`Failed to update ${this.table}: ${error.message}`, error.code);
    }
    return Array.isArray(data) && data.length > 0;
  }

  async count(filter: DocumentFilter<T>): Promise<number> {
    let query = this.client().from(this.table).select('*', { count: 'exact', head: true });
    for (const [field, value] of Object.entries(filter)) {
      query = query.eq(field, value);
    }
    const { count, error } = await query;
    if (error) {
      throw new DocumentStoreError(`Failed to count ${this.table}: ${error.message}`, error.code);
    }
    return count ?? 0;
  }

  async ping(): Promise<boolean> {
    try {
      const { error } = await this.client().from(this.table).select('*', { head: true }).limit(1);
      return !error;
    } catch (err) {
      logger.warn({ table: this.table, error: err instanceof Error ? err.message : String(err) }, 'Store ping failed');
      return false;
    }
  }
}
