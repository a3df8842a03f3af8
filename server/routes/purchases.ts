import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticate } from '../plugins/auth.plugin';
import { purchaseService } from '../services/purchase.service';
import { paymentService } from '../services/payment.service';
import { PAYMENT_STATUSES } from '../../shared/constants';
import { amount, dateRangeQuery, idParams, isoDate, ok, pageQuery } from './schemas';

const purchaseLines = z
  .array(
    z.object({
      item_id: z.string().trim().min(1),
      quantity: z.number().int().positive(),
      unit_price: z.number().finite().positive(),
    }),
  )
  .min(1);

const createPurchaseBody = z.object({
  supplier_id: z.string().trim().min(1),
  items: purchaseLines,
  payment_amount: z.number().finite().nonnegative().optional(),
  payment_account_id: z.string().trim().min(1).optional(),
  invoice_date: isoDate.optional(),
  notes: z.string().max(2000).nullish(),
});

const updatePurchaseBody = z.object({
  items: purchaseLines.optional(),
  notes: z.string().max(2000).nullish(),
});

const listPurchasesQuery = pageQuery.merge(dateRangeQuery).extend({
  supplier_id: z.string().trim().min(1).optional(),
  payment_status: z.nativeEnum(PAYMENT_STATUSES).optional(),
});

const addPaymentBody = z.object({
  amount,
  account_id: z.string().trim().min(1),
});

export async function purchaseRoutes(server: FastifyInstance) {
  // ──────────────────────────────────────────────────────────
  // GET /api/purchases
  // ──────────────────────────────────────────────────────────
  server.get('/purchases', { preHandler: [authenticate] }, async (request) => {
    const result = await purchaseService.listPurchases(listPurchasesQuery.parse(request.query));
    return { success: true, ...result };
  });

  // Registered before /purchases/:id so the literal segment wins.
  server.get('/purchases/summary/suppliers', { preHandler: [authenticate] }, async () => {
    return ok(await purchaseService.getSupplierPurchaseSummary());
  });

  server.get('/purchases/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await purchaseService.getPurchase(id));
  });

  // ──────────────────────────────────────────────────────────
  // POST /api/purchases
  // ──────────────────────────────────────────────────────────
  server.post('/purchases', { preHandler: [authenticate] }, async (request, reply) => {
    const purchase = await purchaseService.createPurchase(createPurchaseBody.parse(request.body));
    return reply.code(201).send(ok(purchase));
  });

  server.put('/purchases/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await purchaseService.updatePurchase(id, updatePurchaseBody.parse(request.body)));
  });

  server.delete('/purchases/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await purchaseService.deletePurchase(id));
  });

  // ──────────────────────────────────────────────────────────
  // Invoice payments
  // ──────────────────────────────────────────────────────────
  server.post('/purchases/:id/payments', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const result = await paymentService.addPayment(id, addPaymentBody.parse(request.body));
    return reply.code(201).send(ok(result));
  });

  server.get('/purchases/:id/payments', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const purchase = await purchaseService.getPurchase(id);
    return ok(purchase.payments);
  });
}
