import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { validationError } from '../../common/validation.js';
import { requireIdentity, roleGuard } from '../auth/auth.middleware.js';
import type { SequenceService } from './sequence.service.js';

export interface SequenceRoutesOptions {
  sequences: SequenceService;
}

const paramsSchema = z.object({
  category: z.string().regex(/^[A-Za-z0-9_]+$/).min(1).max(16),
});

const periodQuerySchema = z.object({
  period: z.string().regex(/^\d{4}$/).optional(),
});

export async function sequenceRoutes(app: FastifyInstance, options: SequenceRoutesOptions) {
  const { sequences } = options;

  app.post('/:category', { preHandler: roleGuard('owner', 'admin') }, async (req, reply) => {
    const params = paramsSchema.safeParse(req.params);
    if (!params.success) {
      return validationError(params.error, reply);
    }
    const identity = requireIdentity(req);
    const identifier = await sequences.next(identity.tenantId, params.data.category);
    reply.code(201);
    return { identifier };
  });

  app.get('/:category', { preHandler: roleGuard('owner', 'admin') }, async (req, reply) => {
    const params = paramsSchema.safeParse(req.params);
    if (!params.success) {
      return validationError(params.error, reply);
    }
    const query = periodQuerySchema.safeParse(req.query);
    if (!query.success) {
      return validationError(query.error, reply);
    }
    const identity = requireIdentity(req);
    const current = await sequences.current(identity.tenantId, params.data.category, query.data.period);
    return { category: params.data.category.toUpperCase(), current };
  });
}
