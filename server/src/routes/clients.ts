import { randomUUID } from 'node:crypto';
import { Hono } from 'hono';
import { ingestForClient } from '../audience/ingestion.js';
import { computeAudienceStats } from '../audience/stats.js';
import { generateMessagesSchema, registerClientSchema } from '../audience/schemas.js';
import { SUPPORTED_PLATFORMS, isSupportedPlatform, type ClientRecord } from '../audience/types.js';
import { runGenerationJob } from '../agents/generation-job.js';
import { extractRequirements } from '../agents/requirements.js';
import { isRequestError } from '../lib/errors.js';
import { readJsonBody } from '../lib/http-body.js';
import type { AppServices } from '../services.js';

const AUDIENCE_SAMPLE_SIZE = 10;
const GENERATION_READY_STATUSES = new Set<ClientRecord['status']>(['data_fetched', 'messages_generated', 'failed']);
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function createClientRoutes(services: AppServices): Hono {
  const clients = new Hono();

  clients.use('/:id/*', async (c, next) => {
    if (!UUID_PATTERN.test(c.req.param('id'))) {
      return c.json({ error: 'Invalid client id' }, 400);
    }
    await next();
  });

  clients.post('/', async (c) => {
    const body = await readJsonBody(c);
    if (!body.ok) return body.response;
    const parsed = registerClientSchema.safeParse(body.data);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.flatten() }, 400);
    }

    const input = parsed.data;
    if (!isSupportedPlatform(input.platform)) {
      return c.json({
        error: `Unsupported platform: ${input.platform}`,
        supported_platforms: SUPPORTED_PLATFORMS,
      }, 400);
    }

    const client: ClientRecord = {
      id: randomUUID(),
      name: input.name,
      role: input.role,
      email: input.email,
      platform: input.platform,
      search_terms: input.search_terms.map((term) => term.trim()).filter(Boolean),
      preferred_profession: input.preferred_profession,
      preferred_location: input.preferred_location,
      status: 'registered',
      created_at: new Date().toISOString(),
      data_fetched_at: null,
      profiles_count: 0,
      messages_generated_at: null,
      generated_message: null,
      generation_provenance: null,
      last_error: null,
    };
    await services.clients.create(client);
    c.get('log').info({ client_id: client.id, platform: client.platform }, 'Client registered');

    return c.json({
      client_id: client.id,
      platform: client.platform,
      status: client.status,
      message: 'Client registered successfully',
    }, 201);
  });

  clients.get('/:id/status', async (c) => {
    const client = await services.clients.get(c.req.param('id'));
    if (!client) {
      return c.json({ error: 'Client not found' }, 404);
    }
    const audienceCount = await services.audience.count(client.id, client.platform);
    return c.json({
      client_id: client.id,
      name: client.name,
      platform: client.platform,
      status: client.status,
      created_at: client.created_at,
      data_fetched_at: client.data_fetched_at,
      profiles_count: client.profiles_count,
      audience_count: audienceCount,
      messages_generated_at: client.messages_generated_at,
      generated_message: client.generated_message,
      generation_provenance: client.generation_provenance,
      last_error: client.last_error,
    });
  });

  clients.get('/:id/audience', async (c) => {
    const client = await services.clients.get(c.req.param('id'));
    if (!client) {
      return c.json({ error: 'Client not found' }, 404);
    }
    const records = await services.audience.list(client.id, client.platform);
    const payloads = records.map((record) => record.payload);
    return c.json({
      client_id: client.id,
      platform: client.platform,
      total_count: records.length,
      sample: payloads.slice(0, AUDIENCE_SAMPLE_SIZE),
      stats: computeAudienceStats(client.platform, payloads),
    });
  });

  clients.post('/:id/fetch-audience', async (c) => {
    const client = await services.clients.get(c.req.param('id'));
    if (!client) {
      return c.json({ error: 'Client not found' }, 404);
    }
    if (!isSupportedPlatform(client.platform)) {
      return c.json({ error: `Unsupported platform: ${client.platform}` }, 400);
    }

    const task = services.registry.create('ingestion', client.id);
    c.get('log').info({ client_id: client.id, task_id: task.task_id }, 'Audience fetch queued');
    void services.runner.submit(task, ({ log }) => ingestForClient(client, services.ingestionDeps, log));

    return c.json({
      task_id: task.task_id,
      status: task.status,
      message: `Audience fetch started for ${client.platform}`,
    }, 202);
  });

  clients.post('/:id/generate-messages', async (c) => {
    const body = await readJsonBody(c);
    if (!body.ok) return body.response;
    const parsedBody = generateMessagesSchema.safeParse(body.data);
    if (!parsedBody.success) {
      return c.json({ error: 'Invalid request', details: parsedBody.error.flatten() }, 400);
    }

    const client = await services.clients.get(c.req.param('id'));
    if (!client) {
      return c.json({ error: 'Client not found' }, 404);
    }

    const requestedPlatform = parsedBody.data.platform;
    try {
      extractRequirements(client, requestedPlatform);
    } catch (error) {
      if (isRequestError(error)) {
        return c.json({ error: error.message, code: error.kind }, 400);
      }
      throw error;
    }

    if (!GENERATION_READY_STATUSES.has(client.status)) {
      return c.json({
        error: 'Audience data must be fetched before generating messages',
        status: client.status,
      }, 400);
    }
    const audienceCount = await services.audience.count(client.id, client.platform);
    if (audienceCount === 0) {
      return c.json({ error: `No ${client.platform} audience data stored for this client` }, 400);
    }

    const active = services.registry.findActive('generation', client.id);
    if (active) {
      c.get('log').info({ client_id: client.id, task_id: active.task_id }, 'Generation already in progress');
      return c.json({
        task_id: active.task_id,
        status: active.status,
        deduplicated: true,
        message: 'Message generation already in progress',
      }, 202);
    }

    const task = services.registry.create('generation', client.id);
    c.get('log').info({ client_id: client.id, task_id: task.task_id }, 'Message generation queued');
    void services.runner.submit(task, ({ taskId, log }) =>
      runGenerationJob(client, services.generationDeps(), { taskId, log, requestedPlatform }),
    );

    return c.json({
      task_id: task.task_id,
      status: task.status,
      deduplicated: false,
      message: 'Message generation started',
    }, 202);
  });

  return clients;
}
