import { errors, jwtVerify, type JWTPayload } from 'jose';
import { AuthError } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { IdentityResolver } from './auth.middleware.js';
import { parseIdentity } from './identity.js';

export interface JwtIdentityOptions {
  secret: string;
  issuer?: string;
  audience?: string;
  logger: Logger;
}

const BEARER = /^Bearer\s+(\S+)$/i;

function claimsToIdentity(payload: JWTPayload) {
  const role = payload.role;
  return parseIdentity({
    userId: payload.sub,
    tenantId: payload.agency_id,
    role: typeof role === 'string' ? role.trim().toLowerCase() : role,
    allowedVerticals: payload.allowed_verticals,
    financeAccess: payload.finance_access,
  });
}

/**
 * Verifies an HS256 bearer token and rebuilds the identity from its claims:
 * `sub`, `agency_id`, `role`, and optionally `allowed_verticals` and
 * `finance_access`.
 */
export function createJwtIdentityResolver(options: JwtIdentityOptions): IdentityResolver {
  const secret = new TextEncoder().encode(options.secret);
  const logger = options.logger.child({ component: 'jwt-identity' });

  return async request => {
    const header = request.headers.authorization;
    if (header === undefined) {
      return undefined;
    }
    const match = BEARER.exec(header);
    if (!match) {
      throw new AuthError('Malformed authorization header');
    }

    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(match[1], secret, {
        algorithms: ['HS256'],
        issuer: options.issuer,
        audience: options.audience,
      }));
    } catch (err) {
      if (err instanceof errors.JOSEError) {
        logger.warn({ code: err.code }, 'Rejected bearer token');
        throw new AuthError('Invalid or expired token');
      }
      throw err;
    }
    return claimsToIdentity(payload);
  };
}
