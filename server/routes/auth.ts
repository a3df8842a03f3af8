import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticate } from '../plugins/auth.plugin';
import { authService } from '../services/auth.service';
import { ok } from './schemas';

const loginBody = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

export async function authRoutes(server: FastifyInstance) {
  // POST /api/auth/login
  server.post('/auth/login', async (request) => {
    const body = loginBody.parse(request.body);
    return ok(await authService.login(body));
  });

  // GET /api/auth/me
  server.get('/auth/me', { preHandler: [authenticate] }, async (request) => {
    return ok(request.user);
  });
}
