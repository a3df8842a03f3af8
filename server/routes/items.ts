import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticate } from '../plugins/auth.plugin';
import { itemService } from '../services/item.service';
import { stockLedgerService } from '../services/stock-ledger.service';
import { ITEM_KINDS, UNIT_TYPES } from '../../shared/constants';
import { idParams, ok, pageQuery } from './schemas';

const createItemBody = z.object({
  name: z.string().trim().min(1).max(200),
  kind: z.nativeEnum(ITEM_KINDS),
  unit_type: z.nativeEnum(UNIT_TYPES).optional(),
});

const listItemsQuery = pageQuery.extend({
  kind: z.nativeEnum(ITEM_KINDS).optional(),
});

export async function itemRoutes(server: FastifyInstance) {
  server.get('/items', { preHandler: [authenticate] }, async (request) => {
    const result = await itemService.listItems(listItemsQuery.parse(request.query));
    return { success: true, ...result };
  });

  server.get('/items/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await itemService.getItem(id));
  });

  server.get('/items/:id/stock-summary', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await stockLedgerService.getItemStockSummary(id));
  });

  server.post('/items', { preHandler: [authenticate] }, async (request, reply) => {
    const item = await itemService.createItem(createItemBody.parse(request.body));
    return reply.code(201).send(ok(item));
  });
}
