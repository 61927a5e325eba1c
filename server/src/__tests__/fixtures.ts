import { vi } from 'vitest';
import type { GenerationContext, GenerationEngine } from '../lib/llm-provider.js';
import { MemoryDocumentStore } from '../lib/memory-document-store.js';
import type { ProfileSource, ProfileSourceRequest } from '../audience/profile-source.js';
import { AudienceRepository, ClientRepository } from '../audience/repositories.js';
import type { AudienceRecord, ClientRecord, RawRecord } from '../audience/types.js';

export const CLIENT_ID = '11111111-2222-4333-8444-555555555555';

export function makeClient(overrides: Partial<ClientRecord> = {}): ClientRecord {
  return {
    id: CLIENT_ID,
    name: 'Glow Studio',
    role: 'Brand manager',
    email: 'team@example.com',
    platform: 'instagram',
    search_terms: ['makeup', 'skincare'],
    preferred_profession: null,
    preferred_location: null,
    status: 'registered',
    created_at: '2026-01-01T00:00:00.000Z',
    data_fetched_at: null,
    profiles_count: 0,
    messages_generated_at: null,
    generated_message: null,
    generation_provenance: null,
    last_error: null,
    ...overrides,
  };
}

export function makeRepositories() {
  const clientStore = new MemoryDocumentStore<ClientRecord>({ uniqueBy: [['id']] });
  const audienceStore = new MemoryDocumentStore<AudienceRecord>({
    uniqueBy: [['id'], ['client_id', 'platform', 'unique_key']],
  });
  return {
    clientStore,
    audienceStore,
    clients: new ClientRepository(clientStore),
    audience: new AudienceRepository(audienceStore),
  };
}

/** Profile source returning a fixed batch per platform, recording each request. */
export class StaticProfileSource implements ProfileSource {
  readonly name = 'static';
  readonly requests: ProfileSourceRequest[] = [];
  private readonly batches: Partial<Record<string, RawRecord[]>>;

  constructor(batches: Partial<Record<string, RawRecord[]>>) {
    this.batches = batches;
  }

  async fetch(request: ProfileSourceRequest): Promise<RawRecord[]> {
    this.requests.push(request);
    return structuredClone(this.batches[request.platform] ?? []);
  }
}

/** Engine that plays back `replies` in order; an Error entry is thrown. */
export function scriptedEngine(replies: Array<string | Error>) {
  const queue = [...replies];
  const complete = vi.fn(async (_prompt: string, _context?: GenerationContext): Promise<string> => {
    const next = queue.shift();
    if (next === undefined) throw new Error('No scripted reply left');
    if (next instanceof Error) throw next;
    return next;
  });
  const engine: GenerationEngine = { name: 'scripted', model: 'test-model', complete };
  return { engine, complete };
}

export const instagramPosts: RawRecord[] = [
  {
    url: 'https://www.instagram.com/p/AAA111/',
    caption: 'Morning routine\nLoving this glow #skincare',
    hashtags: ['skincare', 'glow'],
    likesCount: 120,
    commentsCount: 8,
    ownerUsername: 'glowdaily',
    ownerId: '9001',
  },
  {
    url: 'https://www.instagram.com/p/BBB222/',
    caption: 'Weekend hike',
    hashtags: ['travel'],
    likesCount: 3,
    commentsCount: 0,
    ownerUsername: 'trailwalker',
  },
  {
    url: 'https://www.instagram.com/p/CCC333/',
    caption: 'New palette swatches',
    hashtags: ['makeup', 'makeupartist'],
    likesCount: 40,
    commentsCount: 1,
    ownerUsername: 'palettepro',
  },
];
