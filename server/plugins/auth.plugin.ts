import { FastifyRequest } from 'fastify';
import { authService, JwtPayload } from '../services/auth.service';
import { AuthenticationError } from '../lib/errors';

declare module 'fastify' {
  interface FastifyRequest {
    user?: JwtPayload;
  }
}

const BEARER = /^Bearer\s+(\S+)$/;

/**
 * Route guard. Rejections go through the shared error handler as 401s.
 * Usage: { preHandler: [authenticate] }
 */
export async function authenticate(request: FastifyRequest): Promise<void> {
  const match = BEARER.exec(request.headers.authorization ?? '');
  if (!match) {
    throw new AuthenticationError('Authentication required');
  }
  request.user = authService.verifyToken(match[1]);
}
