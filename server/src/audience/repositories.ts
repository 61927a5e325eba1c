import type { DocumentStore, InsertResult } from '../lib/document-store.js';
import type { AudienceRecord, ClientRecord } from './types.js';

export type ClientPatch = Partial<Omit<ClientRecord, 'id' | 'created_at'>>;

export class ClientRepository {
  constructor(private readonly store: DocumentStore<ClientRecord>) {}

  get(clientId: string): Promise<ClientRecord | null> {
    return this.store.findOne({ id: clientId });
  }

  list(): Promise<ClientRecord[]> {
    return this.store.find({}, { orderBy: [{ field: 'created_at' }] });
  }

  async create(client: ClientRecord): Promise<void> {
    const result = await this.store.insert(client);
    if (!result.inserted) {
      throw new Error(`Client ${client.id} already exists`);
    }
  }

  update(clientId: string, patch: ClientPatch): Promise<boolean> {
    return this.store.updateOne({ id: clientId }, patch);
  }

  ping(): Promise<boolean> {
    return this.store.ping();
  }
}

export class AudienceRepository {
  constructor(private readonly store: DocumentStore<AudienceRecord>) {}

  exists(clientId: string, platform: string, uniqueKey: string): Promise<boolean> {
    return this.store.exists({ client_id: clientId, platform, unique_key: uniqueKey });
  }

  /** Relies on the store's (client_id, platform, unique_key) uniqueness. */
  insert(record: AudienceRecord): Promise<InsertResult> {
    return this.store.insert(record);
  }

  /** Stored records in fetch order, oldest first. */
  list(clientId: string, platform: string, limit?: number): Promise<AudienceRecord[]> {
    return this.store.find(
      { client_id: clientId, platform },
      { orderBy: [{ field: 'fetched_at' }, { field: 'position' }], limit },
    );
  }

  count(clientId: string, platform: string): Promise<number> {
    return this.store.count({ client_id: clientId, platform });
  }
}
