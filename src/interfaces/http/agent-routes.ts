import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { agentConfigSchema } from '../../application/index.js';
import type { Agent } from '../../application/index.js';
import { AgentError } from '../../domain/index.js';

export type AgentApi = Pick<
  Agent,
  'execute' | 'publish' | 'config' | 'addConfig' | 'services'
>;

export interface AgentRoutesOptions {
  agent: AgentApi;
}

const publishBodySchema = z.object({
  topic: z.string().min(1),
  payload: z.string(),
});

const execBodySchema = z.object({
  bn: z.string().default(''),
  vs: z.string().min(1),
});

const STATUS_BY_CODE: Record<string, number> = {
  invalid_command: 400,
  unknown_command: 400,
  decoding_error: 400,
  no_such_service: 404,
};

/**
 * Maps agent errors to HTTP statuses; anything else is rethrown to
 * Fastify's default handler (500).
 */
function sendAgentError(reply: FastifyReply, err: unknown): FastifyReply {
  if (!(err instanceof AgentError)) throw err;
  const status = STATUS_BY_CODE[err.code] ?? 500;
  return reply.status(status).send({ error: err.message, code: err.code });
}

/**
 * Agent management API.
 *
 * POST /pub       publish a payload on a channel's response topic
 * POST /exec      run a local command (SenML-style `{ bn, vs }` body)
 * GET  /config    current agent configuration
 * POST /config    persist a new agent configuration
 * GET  /services  service registry
 * GET  /health    liveness
 */
async function agentRoutes(fastify: FastifyInstance, opts: AgentRoutesOptions): Promise<void> {
  const { agent } = opts;

  // ── POST /pub ────────────────────────────────────────────
  fastify.post(
    '/pub',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = publishBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      await agent.publish(parsed.data.topic, parsed.data.payload);
      return reply.status(202).send({ published: true });
    },
  );

  // ── POST /exec ───────────────────────────────────────────
  fastify.post(
    '/exec',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = execBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      try {
        const response = await agent.execute(parsed.data.bn, parsed.data.vs);
        return reply.status(200).send({ response });
      } catch (err: unknown) {
        return sendAgentError(reply, err);
      }
    },
  );

  // ── GET /config ──────────────────────────────────────────
  fastify.get('/config', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send(agent.config());
  });

  // ── POST /config ─────────────────────────────────────────
  fastify.post(
    '/config',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = agentConfigSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      await agent.addConfig(parsed.data);
      return reply.status(200).send(parsed.data);
    },
  );

  // ── GET /services ────────────────────────────────────────
  fastify.get('/services', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send(Object.fromEntries(agent.services()));
  });

  // ── GET /health ──────────────────────────────────────────
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'pass', service: 'agent' });
  });
}

export default fp(agentRoutes, {
  name: 'agent-routes',
  fastify: '5.x',
});
