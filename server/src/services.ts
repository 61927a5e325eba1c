import type { AppConfig } from './lib/config.js';
import { SupabaseDocumentStore, type DocumentStore } from './lib/document-store.js';
import { JobRunner } from './lib/job-runner.js';
import type { GenerationEngine } from './lib/llm-provider.js';
import { createGenerationEngine } from './lib/llm.js';
import { MemoryDocumentStore } from './lib/memory-document-store.js';
import { getSupabaseAdmin } from './lib/supabase.js';
import { TaskRegistry } from './lib/task-registry.js';
import type { IngestionDeps } from './audience/ingestion.js';
import { ApifyProfileSource, type ProfileSource } from './audience/profile-source.js';
import { AudienceRepository, ClientRepository } from './audience/repositories.js';
import { IngestionScheduler } from './audience/scheduler.js';
import { audienceRecordSchema, clientRecordSchema } from './audience/schemas.js';
import type { AudienceRecord, ClientRecord } from './audience/types.js';
import type { GenerationJobDeps } from './agents/generation-job.js';

export interface AppServices {
  config: AppConfig;
  storeName: string;
  clients: ClientRepository;
  audience: AudienceRepository;
  source: ProfileSource;
  /** Built on first use so the server starts without LLM credentials. */
  getEngine(): GenerationEngine;
  registry: TaskRegistry;
  runner: JobRunner;
  scheduler: IngestionScheduler;
  ingestionDeps: IngestionDeps;
  generationDeps(): GenerationJobDeps;
}

export interface ServiceOverrides {
  clientStore?: DocumentStore<ClientRecord>;
  audienceStore?: DocumentStore<AudienceRecord>;
  source?: ProfileSource;
  engine?: GenerationEngine;
  registry?: TaskRegistry;
  now?: () => Date;
}

function createStores(config: AppConfig): {
  clientStore: DocumentStore<ClientRecord>;
  audienceStore: DocumentStore<AudienceRecord>;
} {
  if (config.store.backend === 'memory') {
    return {
      clientStore: new MemoryDocumentStore<ClientRecord>({ uniqueBy: [['id']] }),
      audienceStore: new MemoryDocumentStore<AudienceRecord>({
        uniqueBy: [['id'], ['client_id', 'platform', 'unique_key']],
      }),
    };
  }
  return {
    clientStore: new SupabaseDocumentStore({
      table: config.store.clientsTable,
      schema: clientRecordSchema,
      client: getSupabaseAdmin,
    }),
    audienceStore: new SupabaseDocumentStore({
      table: config.store.audienceTable,
      schema: audienceRecordSchema,
      client: getSupabaseAdmin,
    }),
  };
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const stores = createStores(config);
  const clientStore = overrides.clientStore ?? stores.clientStore;
  const clients = new ClientRepository(clientStore);
  const audience = new AudienceRepository(overrides.audienceStore ?? stores.audienceStore);
  const source = overrides.source ?? new ApifyProfileSource(config.profileSource);
  const registry = overrides.registry ?? new TaskRegistry({ gracePeriodMs: config.jobs.taskGracePeriodMs });
  const runner = new JobRunner(registry, config.jobs.concurrency);

  let engine: GenerationEngine | null = overrides.engine ?? null;
  const getEngine = (): GenerationEngine => {
    if (!engine) {
      engine = createGenerationEngine(config.llm);
    }
    return engine;
  };

  const ingestionDeps: IngestionDeps = {
    clients,
    audience,
    source,
    sourceTimeoutMs: config.profileSource.timeoutMs,
    now: overrides.now,
  };

  const scheduler = new IngestionScheduler({
    deps: ingestionDeps,
    limit: runner.run,
    intervalMs: config.jobs.ingestionIntervalMs,
    enabled: config.jobs.schedulerEnabled,
  });

  return {
    config,
    storeName: clientStore.name,
    clients,
    audience,
    source,
    getEngine,
    registry,
    runner,
    scheduler,
    ingestionDeps,
    generationDeps: () => ({
      clients,
      audience,
      engine: getEngine(),
      engineTimeoutMs: config.llm.timeoutMs,
      maxIterations: config.chain.maxIterations,
      now: overrides.now,
    }),
  };
}
