import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticate } from '../plugins/auth.plugin';
import { stockAdjustmentService } from '../services/stock-adjustment.service';
import { ADJUSTMENT_DIRECTIONS } from '../../shared/constants';
import { ok, pageQuery } from './schemas';

const adjustmentBody = z.object({
  item_id: z.string().trim().min(1),
  direction: z.nativeEnum(ADJUSTMENT_DIRECTIONS),
  quantity: z.number().int().positive(),
  unit_price: z.number().finite().positive().optional(),
  reason: z.string().trim().min(1).max(500),
});

const listAdjustmentsQuery = pageQuery.extend({
  item_id: z.string().trim().min(1).optional(),
  direction: z.nativeEnum(ADJUSTMENT_DIRECTIONS).optional(),
});

export async function stockAdjustmentRoutes(server: FastifyInstance) {
  server.get('/stock-adjustments', { preHandler: [authenticate] }, async (request) => {
    const result = await stockAdjustmentService.listAdjustments(listAdjustmentsQuery.parse(request.query));
    return { success: true, ...result };
  });

  server.post('/stock-adjustments', { preHandler: [authenticate] }, async (request, reply) => {
    const adjustment = await stockAdjustmentService.adjustStock(adjustmentBody.parse(request.body));
    return reply.code(201).send(ok(adjustment));
  });
}
