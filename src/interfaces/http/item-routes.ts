import fp from 'fastify-plugin';
import { z } from 'zod';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ITEM_TYPES, MODERATION_STATUSES } from '../../domain/index.js';
import {
  defaultModerationPolicy,
  transitionStatus,
} from '../../application/index.js';
import type { ModerationPolicy } from '../../application/index.js';

export interface ItemRoutesOptions {
  policy?: ModerationPolicy;
}

const itemParamsSchema = z.object({
  itemType: z.enum(ITEM_TYPES),
  itemId: z.string().min(1).max(255),
});

const statusBodySchema = z.object({
  status: z.enum(MODERATION_STATUSES),
});

/**
 * Administrative item routes. This is the surface an external moderator
 * acts through; the ingestion path never calls it.
 *
 * GET   /api/v1/items/:itemType/:itemId         — get single item
 * PATCH /api/v1/items/:itemType/:itemId/status  — moderation transition
 */
async function itemRoutes(fastify: FastifyInstance, options: ItemRoutesOptions): Promise<void> {
  const policy = options.policy ?? defaultModerationPolicy;

  // ── GET /api/v1/items/:itemType/:itemId ──────────────────
  fastify.get(
    '/api/v1/items/:itemType/:itemId',
    async (
      request: FastifyRequest<{ Params: { itemType: string; itemId: string } }>,
      reply: FastifyReply,
    ) => {
      const params = itemParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: params.error.flatten() });
      }

      const item = await fastify.itemStore.get(params.data);
      if (item === null) {
        return reply.status(404).send({ error: 'Item not found' });
      }

      return reply.status(200).send(item);
    },
  );

  // ── PATCH /api/v1/items/:itemType/:itemId/status ─────────
  fastify.patch(
    '/api/v1/items/:itemType/:itemId/status',
    async (
      request: FastifyRequest<{ Params: { itemType: string; itemId: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const params = itemParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: params.error.flatten() });
      }

      const body = statusBodySchema.safeParse(request.body);
      if (!body.success) {
        return reply.status(400).send({ error: body.error.flatten() });
      }

      const result = await transitionStatus(fastify.itemStore, policy, params.data, body.data.status);

      switch (result.kind) {
        case 'updated':
          request.log.info(
            { ...params.data, status: result.item.status },
            'Moderation status changed',
          );
          return reply.status(200).send(result.item);
        case 'not_found':
          return reply.status(404).send({ error: 'Item not found' });
        case 'invalid_transition':
          return reply.status(409).send({
            error: `Cannot move item from ${result.from} to ${result.to}`,
          });
        case 'conflict':
          return reply.status(409).send({ error: 'Item status changed concurrently' });
      }
    },
  );
}

export default fp(itemRoutes, {
  name: 'item-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
