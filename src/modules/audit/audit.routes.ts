import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { validationError } from '../../common/validation.js';
import { requireIdentity } from '../auth/auth.middleware.js';
import type { AuditLogService } from './audit-log.service.js';

export interface AuditRoutesOptions {
  audit: AuditLogService;
}

const historyParamsSchema = z.object({
  taskId: z.string().min(1),
});

const limitQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).optional(),
});

export async function auditRoutes(app: FastifyInstance, options: AuditRoutesOptions) {
  const { audit } = options;

  app.get('/tasks/:taskId/history', async (req, reply) => {
    const params = historyParamsSchema.safeParse(req.params);
    if (!params.success) {
      return validationError(params.error, reply);
    }
    const identity = requireIdentity(req);
    return audit.history(identity.tenantId, params.data.taskId);
  });

  app.get('/activity/recent', async (req, reply) => {
    const query = limitQuerySchema.safeParse(req.query);
    if (!query.success) {
      return validationError(query.error, reply);
    }
    const identity = requireIdentity(req);
    return audit.recentActivity(identity.tenantId, { limit: query.data.limit ?? 20 });
  });
}
