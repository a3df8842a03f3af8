import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticate } from '../plugins/auth.plugin';
import { paymentService } from '../services/payment.service';
import { ALLOCATION_METHODS } from '../../shared/constants';
import { amount, idParams, ok } from './schemas';

const simulateBody = z.object({
  supplier_id: z.string().trim().min(1),
  amount,
  method: z.nativeEnum(ALLOCATION_METHODS).optional(),
});

const supplierPaymentBody = simulateBody.extend({
  account_id: z.string().trim().min(1),
});

export async function paymentRoutes(server: FastifyInstance) {
  server.delete('/payments/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await paymentService.deletePayment(id));
  });

  // ──────────────────────────────────────────────────────────
  // POST /api/supplier-payments
  // One payment spread across the supplier's open invoices.
  // ──────────────────────────────────────────────────────────
  server.post('/supplier-payments', { preHandler: [authenticate] }, async (request, reply) => {
    const result = await paymentService.paySupplier(supplierPaymentBody.parse(request.body));
    return reply.code(201).send(ok(result));
  });

  server.post('/supplier-payments/simulate', { preHandler: [authenticate] }, async (request) => {
    return ok(await paymentService.simulatePayment(simulateBody.parse(request.body)));
  });

  server.get('/suppliers/:id/outstanding', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await paymentService.getSupplierOutstanding(id));
  });
}
