import { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { authenticate } from '../plugins/auth.plugin';
import { expenseService } from '../services/expense.service';
import { expenseCategoryService } from '../services/expense-category.service';
import { AuthenticationError } from '../lib/errors';
import { amount, dateRangeQuery, idParams, isoDate, ok, pageQuery } from './schemas';

const expenseLine = z.object({
  name: z.string().trim().min(1).max(200),
  amount,
  account_id: z.string().trim().min(1),
  // Defaults to the signed-in owner.
  user_id: z.string().trim().min(1).optional(),
  expense_category_id: z.string().trim().min(1).nullish(),
  description: z.string().max(2000).nullish(),
});

const expenseBody = expenseLine.extend({ expense_date: isoDate.optional() });

const bulkExpenseBody = z.object({
  expense_date: isoDate.optional(),
  items: z.array(expenseLine).min(1),
});

const listExpensesQuery = pageQuery.merge(dateRangeQuery).extend({
  expense_date: isoDate.optional(),
  account_id: z.string().trim().min(1).optional(),
  user_id: z.string().trim().min(1).optional(),
  expense_category_id: z.string().trim().min(1).optional(),
});

const todayTotalQuery = z.object({ user_id: z.string().trim().min(1).optional() });

const categoryBody = z.object({ name: z.string().trim().min(1).max(100) });

function payerOf(request: FastifyRequest, userId: string | undefined): string {
  const payer = userId ?? request.user?.userId;
  if (!payer) throw new AuthenticationError('Authentication required');
  return payer;
}

export async function expenseRoutes(server: FastifyInstance) {
  // ── Categories ──────────────────────────────────────────────

  server.get('/expense-categories', { preHandler: [authenticate] }, async (request) => {
    const result = await expenseCategoryService.listCategories(pageQuery.parse(request.query));
    return { success: true, ...result };
  });

  server.get('/expense-categories/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await expenseCategoryService.getCategory(id));
  });

  server.post('/expense-categories', { preHandler: [authenticate] }, async (request, reply) => {
    const category = await expenseCategoryService.createCategory(categoryBody.parse(request.body));
    return reply.code(201).send(ok(category));
  });

  server.put('/expense-categories/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await expenseCategoryService.renameCategory(id, categoryBody.parse(request.body)));
  });

  server.delete('/expense-categories/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await expenseCategoryService.deleteCategory(id));
  });

  // ── Expenses ────────────────────────────────────────────────

  server.get('/expenses', { preHandler: [authenticate] }, async (request) => {
    const result = await expenseService.listExpenses(listExpensesQuery.parse(request.query));
    return { success: true, ...result };
  });

  server.get('/expenses/today-total', { preHandler: [authenticate] }, async (request) => {
    const { user_id } = todayTotalQuery.parse(request.query);
    return ok(await expenseService.getTodayTotal(user_id));
  });

  server.post('/expenses', { preHandler: [authenticate] }, async (request, reply) => {
    const body = expenseBody.parse(request.body);
    const expense = await expenseService.createExpense({ ...body, user_id: payerOf(request, body.user_id) });
    return reply.code(201).send(ok(expense));
  });

  server.post('/expenses/bulk', { preHandler: [authenticate] }, async (request, reply) => {
    const body = bulkExpenseBody.parse(request.body);
    const expenses = await expenseService.createExpensesBulk({
      expense_date: body.expense_date,
      items: body.items.map((item) => ({ ...item, user_id: payerOf(request, item.user_id) })),
    });
    return reply.code(201).send(ok(expenses));
  });

  server.delete('/expenses/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await expenseService.deleteExpense(id));
  });
}
