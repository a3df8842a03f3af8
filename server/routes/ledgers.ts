import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticate } from '../plugins/auth.plugin';
import { stockLedgerService } from '../services/stock-ledger.service';
import { financialLedgerService } from '../services/financial-ledger.service';
import { FINANCIAL_REF_TYPES, STOCK_REF_TYPES } from '../../shared/constants';
import { dateRangeQuery, ok, pageQuery } from './schemas';

const stockLedgerQuery = pageQuery.merge(dateRangeQuery).extend({
  item_id: z.string().trim().min(1).optional(),
  ref_type: z.nativeEnum(STOCK_REF_TYPES).optional(),
  ref_id: z.string().trim().min(1).optional(),
});

const financialLedgerQuery = pageQuery.merge(dateRangeQuery).extend({
  user_id: z.string().trim().min(1).optional(),
  ref_type: z.nativeEnum(FINANCIAL_REF_TYPES).optional(),
  ref_id: z.string().trim().min(1).optional(),
});

const userParams = z.object({ userId: z.string().trim().min(1) });

export async function ledgerRoutes(server: FastifyInstance) {
  server.get('/stock-ledger', { preHandler: [authenticate] }, async (request) => {
    const result = await stockLedgerService.listEntries(stockLedgerQuery.parse(request.query));
    return { success: true, ...result };
  });

  server.get('/financial-ledger', { preHandler: [authenticate] }, async (request) => {
    const result = await financialLedgerService.listEntries(financialLedgerQuery.parse(request.query));
    return { success: true, ...result };
  });

  server.get('/financial-ledger/balance/:userId', { preHandler: [authenticate] }, async (request) => {
    const { userId } = userParams.parse(request.params);
    return ok(await financialLedgerService.getBalance(userId));
  });
}
