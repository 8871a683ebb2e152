import type { FastifyReply, FastifyRequest } from 'fastify';
import { TokenVerificationError } from './errors.js';
import { TokenVerifier, VerifiedIdentity } from './verifier.js';

declare module 'fastify' {
  interface FastifyRequest {
    identity?: VerifiedIdentity;
  }
}

/**
 * preHandler that runs the verifier and attaches the identity to the request.
 * Every rejection gets the same 401 body; the reason is only in the logs.
 */
export function createAuthHook(verifier: TokenVerifier) {
  return async function authenticate(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    try {
      request.identity = await verifier.verify(request.headers);
    } catch (err) {
      if (!(err instanceof TokenVerificationError)) {
        throw err;
      }
      request.log.debug({ code: err.code }, 'request rejected by token verifier');
      return reply.status(401).header('www-authenticate', 'Bearer').send({ error: 'unauthorized' });
    }
  };
}

export function requireIdentity(request: FastifyRequest): VerifiedIdentity {
  if (!request.identity) {
    throw new Error('route is missing the auth preHandler');
  }
  return request.identity;
}
