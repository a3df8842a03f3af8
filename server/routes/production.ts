import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticate } from '../plugins/auth.plugin';
import { productionService } from '../services/production.service';
import { PRODUCTION_STAGES } from '../../shared/constants';
import { idParams, ok, pageQuery, recipeItems } from './schemas';

const previewQuery = z.object({
  final_product_id: z.string().trim().min(1),
  quantity: z.coerce.number().int().positive(),
});

const feasibilityBody = z.object({
  final_product_id: z.string().trim().min(1),
  quantity: z.number().int().positive(),
});

const serialNumbers = z.array(z.string()).max(10000);

const createBatchBody = z.object({
  final_product_id: z.string().trim().min(1),
  quantity: z.number().int().positive(),
  serial_numbers: serialNumbers.default([]),
});

const updateBatchBody = z.object({
  quantity: z.number().int().positive().optional(),
  serial_numbers: serialNumbers.optional(),
  recipe_items: recipeItems.optional(),
});

const listBatchesQuery = pageQuery.extend({
  final_product_id: z.string().trim().min(1).optional(),
  stage: z.nativeEnum(PRODUCTION_STAGES).optional(),
});

export async function productionRoutes(server: FastifyInstance) {
  // ──────────────────────────────────────────────────────────
  // Planning
  // ──────────────────────────────────────────────────────────
  server.get('/production/preview', { preHandler: [authenticate] }, async (request) => {
    const { final_product_id, quantity } = previewQuery.parse(request.query);
    return ok(await productionService.preview(final_product_id, quantity));
  });

  server.post('/production/feasibility', { preHandler: [authenticate] }, async (request) => {
    const { final_product_id, quantity } = feasibilityBody.parse(request.body);
    return ok(await productionService.feasibility(final_product_id, quantity));
  });

  // ──────────────────────────────────────────────────────────
  // Batches
  // ──────────────────────────────────────────────────────────
  server.get('/production/batches', { preHandler: [authenticate] }, async (request) => {
    const result = await productionService.listBatches(listBatchesQuery.parse(request.query));
    return { success: true, ...result };
  });

  server.get('/production/batches/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await productionService.getBatchDetail(id));
  });

  server.post('/production/batches', { preHandler: [authenticate] }, async (request, reply) => {
    const batch = await productionService.createDraft(createBatchBody.parse(request.body));
    return reply.code(201).send(ok(batch));
  });

  server.put('/production/batches/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await productionService.updateDraft(id, updateBatchBody.parse(request.body)));
  });

  server.delete('/production/batches/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await productionService.deleteDraft(id));
  });

  // ──────────────────────────────────────────────────────────
  // Stage transitions
  // ──────────────────────────────────────────────────────────
  server.post('/production/batches/:id/execute', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await productionService.executeDraft(id));
  });

  server.post('/production/batches/:id/complete', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await productionService.completeBatch(id));
  });
}
