import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticate } from '../plugins/auth.plugin';
import { counterpartyService, paymentAccountService } from '../services/masters.service';
import { ACCOUNT_TYPES, USER_ROLES } from '../../shared/constants';
import { idParams, ok, pageQuery } from './schemas';

const counterpartyBody = z.object({
  name: z.string().trim().min(1).max(200),
  email: z.string().trim().email().optional(),
});

const listCounterpartiesQuery = pageQuery.extend({
  role: z.nativeEnum(USER_ROLES).optional(),
});

const paymentAccountBody = z.object({
  name: z.string().trim().min(1).max(100),
  type: z.nativeEnum(ACCOUNT_TYPES),
});

export async function mastersRoutes(server: FastifyInstance) {
  // ──────────────────────────────────────────────────────────
  // Suppliers / customers
  // ──────────────────────────────────────────────────────────
  server.post('/suppliers', { preHandler: [authenticate] }, async (request, reply) => {
    const body = counterpartyBody.parse(request.body);
    return reply.code(201).send(ok(await counterpartyService.createCounterparty({ ...body, role: 'supplier' })));
  });

  server.post('/customers', { preHandler: [authenticate] }, async (request, reply) => {
    const body = counterpartyBody.parse(request.body);
    return reply.code(201).send(ok(await counterpartyService.createCounterparty({ ...body, role: 'customer' })));
  });

  server.get('/counterparties', { preHandler: [authenticate] }, async (request) => {
    const result = await counterpartyService.listCounterparties(listCounterpartiesQuery.parse(request.query));
    return { success: true, ...result };
  });

  server.get('/counterparties/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await counterpartyService.getCounterparty(id));
  });

  // ──────────────────────────────────────────────────────────
  // Payment accounts
  // ──────────────────────────────────────────────────────────
  server.get('/payment-accounts', { preHandler: [authenticate] }, async () => {
    return ok(await paymentAccountService.listPaymentAccounts());
  });

  server.post('/payment-accounts', { preHandler: [authenticate] }, async (request, reply) => {
    const account = await paymentAccountService.createPaymentAccount(paymentAccountBody.parse(request.body));
    return reply.code(201).send(ok(account));
  });
}
