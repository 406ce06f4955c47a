import type { FastifyReply } from 'fastify';
import type { z } from 'zod';

export function validationError(error: z.ZodError, reply: FastifyReply) {
  reply.code(400);
  return {
    error: 'Validation error',
    details: error.errors.map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`),
  };
}
