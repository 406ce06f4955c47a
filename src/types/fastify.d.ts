import type { Identity } from '../common/types.js';
import type { ScopedStore } from '../modules/scope/scoped-store.js';

declare module 'fastify' {
  interface FastifyRequest {
    identity?: Identity;
    db?: ScopedStore;
  }
}
