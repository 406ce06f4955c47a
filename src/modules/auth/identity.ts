import { z } from 'zod';
import { AuthError } from '../../common/errors.js';
import { ROLES, type Identity } from '../../common/types.js';

export const identitySchema = z.object({
  userId: z.string().min(1),
  tenantId: z.string().min(1),
  role: z.enum(ROLES),
  allowedVerticals: z.array(z.string().min(1)).optional(),
  financeAccess: z.boolean().optional(),
});

/**
 * Rebuilds the per-request identity from claims the upstream authenticator
 * already verified. Malformed claims are an authentication failure.
 */
export function parseIdentity(claims: unknown): Identity {
  const parsed = identitySchema.safeParse(claims);
  if (!parsed.success) {
    const details = parsed.error.errors.map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new AuthError(`Invalid identity claims (${details.join('; ')})`);
  }
  return parsed.data;
}
