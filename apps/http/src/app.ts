// apps/http/src/app.ts
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { EntityType, Principal, QueryFailure } from '@sieve/core';
import { UNKNOWN_ERROR_MESSAGE } from '@sieve/core';
import type { QueryEngine, RequestOptions } from '@sieve/engine';
import { z } from 'zod';

export interface AppOptions {
  engine: QueryEngine;
  /** Require `x-user` and check `view:<Entity>` permissions on relations. */
  usePermissions?: boolean;
  /** Comma-separated allow list; empty allows every origin. */
  corsOrigin?: string;
  rateLimit?: { max: number; timeWindow: string };
  logger?: FastifyServerOptions['logger'];
}

const EntityParams = z.object({ entity: z.string().min(1) });

// Failures the caller caused are 400s; only UNKNOWN is the server's fault.
function statusOf(result: { status: boolean; code?: unknown }): number {
  if (result.status) return 200;
  return result.code === 'UNKNOWN' ? 500 : 400;
}

function header(req: FastifyRequest, name: string): string | undefined {
  const v = req.headers[name];
  return typeof v === 'string' && v.trim() !== '' ? v.trim() : undefined;
}

/** Caller identity as forwarded by a trusted proxy; not authenticated here. */
export function principalOf(req: FastifyRequest): Principal | undefined {
  const id = header(req, 'x-user');
  if (!id) return undefined;
  const permissions = (header(req, 'x-user-permissions') ?? '')
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean);
  return { id, permissions };
}

function searchParams(req: FastifyRequest): URLSearchParams {
  const i = req.url.indexOf('?');
  return new URLSearchParams(i < 0 ? '' : req.url.slice(i + 1));
}

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const { engine } = opts;
  const usePermissions = opts.usePermissions ?? false;
  const app = Fastify({ logger: opts.logger ?? true });

  const allow = (opts.corsOrigin ?? '').split(',').map((s) => s.trim()).filter(Boolean);
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true,
  });

  await app.register(rateLimit, opts.rateLimit ?? { max: 600, timeWindow: '1 minute' });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.addHook('onClose', async () => {
    await engine.backend.close?.();
  });

  app.setErrorHandler((err, req, reply) => {
    const status = err.statusCode !== undefined && err.statusCode < 500 ? err.statusCode : 500;
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    reply.status(status).send({
      status: false,
      code: status === 429 ? 'RATE_LIMITED' : 'UNKNOWN',
      message: status >= 500 ? UNKNOWN_ERROR_MESSAGE : err.message,
      requestId: req.id,
    });
  });

  // Resolves the entity and caller, or answers the request itself.
  function prepare(req: FastifyRequest, reply: FastifyReply): { entity: EntityType; options: RequestOptions } | undefined {
    const { entity: name } = EntityParams.parse(req.params);
    const entity = engine.schema.entity(name);
    if (!entity) {
      const body: QueryFailure = { status: false, code: 'NOT_FOUND', message: `Unknown entity '${name}'` };
      reply.status(404).send(body);
      return undefined;
    }
    const user = principalOf(req);
    if (usePermissions && !user) {
      const body: QueryFailure = { status: false, code: 'UNAUTHENTICATED', message: "The 'x-user' header is required" };
      reply.status(401).send(body);
      return undefined;
    }
    return { entity, options: { user, usePermissions, logger: req.log } };
  }

  app.get('/query/:entity', async (req, reply) => {
    const ready = prepare(req, reply);
    if (!ready) return reply;
    const result = await engine.query(ready.entity, searchParams(req), ready.options);
    return reply.status(statusOf(result)).send(result);
  });

  app.get('/explain/:entity', async (req, reply) => {
    const ready = prepare(req, reply);
    if (!ready) return reply;
    const result = await engine.explain(ready.entity, searchParams(req), ready.options);
    return reply.status(statusOf(result)).send(result);
  });

  app.get('/entities', async () => {
    const censor = engine.censor();
    return {
      entities: engine.schema.entities().map((e) => ({
        name: e.name,
        primaryKey: e.primaryKey,
        fields: engine.schema.fieldsOf(e)
          .filter((f) => censor.isVisible(e, f.name))
          .map((f) => ({ name: f.name, type: f.type, nullable: f.nullable ?? false })),
        relations: engine.schema.relationsOf(e)
          .filter((r) => censor.isVisible(e, r.name))
          .map((r) => ({ name: r.name, target: r.target, cardinality: r.cardinality })),
      })),
    };
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async (_req, reply) => {
    const health = await engine.backend.health();
    return reply.status(health.ok ? 200 : 503).send({ ...health, backend: engine.backend.name });
  });

  return app;
}
