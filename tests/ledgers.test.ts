/**
 * Stock adjustments, expenses and the two ledgers' queries.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { cleanAllData, getTestDb } from './setup';
import { createAccount, createOwner, createRawMaterial, createSupplier, resetCounters, stockUp } from './helpers/factory';
import { assertStockMatchesLedger } from './helpers/assertions';

import { stockAdjustmentService } from '../server/services/stock-adjustment.service';
import { stockLedgerService, nextDay } from '../server/services/stock-ledger.service';
import { financialLedgerService } from '../server/services/financial-ledger.service';
import { expenseService } from '../server/services/expense.service';
import { expenseCategoryService } from '../server/services/expense-category.service';
import { itemService } from '../server/services/item.service';
import { InsufficientStockError, StateViolationError, ValidationError } from '../server/lib/errors';
import { toIsoTimestamp, today } from '../server/lib/ids';
import type { FinancialLedgerEntry, Item, PaymentAccount, User } from '../shared/types';

let bolt: Item;

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
  bolt = await createRawMaterial('Hex Bolt');
});

describe('Stock adjustments', () => {
  it('brings stock in at a given price and out at the running average', async () => {
    const inbound = await stockAdjustmentService.adjustStock({
      item_id: bolt.id,
      direction: 'in',
      quantity: 5,
      unit_price: 10,
      reason: 'opening stock',
    });
    expect(inbound).toMatchObject({ direction: 'in', quantity: 5, unit_price: 10 });

    const outbound = await stockAdjustmentService.adjustStock({
      item_id: bolt.id,
      direction: 'out',
      quantity: 2,
      reason: 'lost in transit',
    });
    expect(outbound.unit_price).toBe(10);

    const item = await itemService.getItem(bolt.id);
    expect(item.total_quantity).toBe(3);
    expect(item.avg_cost).toBe(10);
    await assertStockMatchesLedger(bolt.id);

    const rows = await stockLedgerService.listByReference(getTestDb(), 'ADJUSTMENT', outbound.id);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ qty_in: 0, qty_out: 2, unit_price: 10 });
  });

  it('validates direction-specific input', async () => {
    await expect(
      stockAdjustmentService.adjustStock({ item_id: bolt.id, direction: 'in', quantity: 5, reason: 'found' }),
    ).rejects.toThrow('unit_price is required for incoming adjustments');
    await expect(
      stockAdjustmentService.adjustStock({ item_id: bolt.id, direction: 'out', quantity: 1, reason: 'broken' }),
    ).rejects.toThrow(InsufficientStockError);
    await expect(
      stockAdjustmentService.adjustStock({ item_id: bolt.id, direction: 'out', quantity: 1, reason: '  ' }),
    ).rejects.toThrow('A reason is required');
    await expect(
      stockAdjustmentService.adjustStock({ item_id: 'ITM-MISSING', direction: 'in', quantity: 1, unit_price: 1, reason: 'x' }),
    ).rejects.toThrow('Item ITM-MISSING does not exist');

    expect(await getTestDb()('stock_adjustments')).toHaveLength(0);
  });

  it('lists adjustments with item names', async () => {
    await stockAdjustmentService.adjustStock({ item_id: bolt.id, direction: 'in', quantity: 5, unit_price: 2, reason: 'count' });
    await stockAdjustmentService.adjustStock({ item_id: bolt.id, direction: 'out', quantity: 1, reason: 'damaged' });

    const outs = await stockAdjustmentService.listAdjustments({ direction: 'out' });
    expect(outs.total).toBe(1);
    expect(outs.data[0]).toMatchObject({ item_name: 'Hex Bolt', reason: 'damaged' });

    const searched = await stockAdjustmentService.listAdjustments({ search: 'COUNT' });
    expect(searched.data.map((row) => row.direction)).toEqual(['in']);
  });
});

describe('Stock ledger', () => {
  it('filters entries and totals quantities', async () => {
    const nut = await createRawMaterial('Hex Nut');
    await stockUp(bolt.id, 8, 1.5);
    await stockUp(nut.id, 4, 0.5);
    await stockAdjustmentService.adjustStock({ item_id: bolt.id, direction: 'out', quantity: 3, reason: 'scrap' });

    const page = await stockLedgerService.listEntries({ item_id: bolt.id });
    expect(page.total).toBe(2);
    expect(page.totals).toEqual({ total_qty_in: 8, total_qty_out: 3 });
    expect(page.data.every((row) => row.item_name === 'Hex Bolt')).toBe(true);

    const purchases = await stockLedgerService.listEntries({ ref_type: 'PURCHASE', limit: 1 });
    expect(purchases.total).toBe(2);
    expect(purchases.data).toHaveLength(1);
    expect(purchases.totalPages).toBe(2);

    const summary = await stockLedgerService.getItemStockSummary(bolt.id);
    expect(summary).toEqual({
      item_id: bolt.id,
      item_name: 'Hex Bolt',
      current_quantity: 5,
      avg_price: 1.5,
      stock_value: 7.5,
      total_qty_in: 8,
      total_qty_out: 3,
    });
  });

  it('treats the upper date bound as inclusive of the whole day', async () => {
    await stockUp(bolt.id, 1, 1);
    const day = new Date().toISOString().slice(0, 10);

    expect((await stockLedgerService.listEntries({ from_date: day, to_date: day })).total).toBe(1);
    expect((await stockLedgerService.listEntries({ to_date: '2000-01-01' })).total).toBe(0);
    expect(nextDay('2026-02-28')).toBe('2026-03-01');
    expect(nextDay('2024-12-31')).toBe('2025-01-01');
    expect(() => nextDay('not-a-date')).toThrow(ValidationError);
  });
});

describe('Database timestamps', () => {
  it('normalises server text to ISO-8601 UTC', () => {
    expect(toIsoTimestamp('2026-10-19 08:39:00.123+00')).toBe('2026-10-19T08:39:00.123Z');
    expect(toIsoTimestamp('2026-10-19 10:39:00+02')).toBe('2026-10-19T08:39:00.000Z');
    expect(toIsoTimestamp('2026-10-19 08:39:00.123456+05:30')).toBe('2026-10-19T03:09:00.123Z');
    expect(toIsoTimestamp('2026-10-19 08:39:00')).toBe('2026-10-19T08:39:00.000Z');
    expect(toIsoTimestamp('2026-10-19T08:39:00.5Z')).toBe('2026-10-19T08:39:00.500Z');
  });

  it('leaves values that are not timestamps alone', () => {
    expect(toIsoTimestamp('infinity')).toBe('infinity');
  });
});

describe('Expenses and the financial ledger', () => {
  let owner: User;
  let account: PaymentAccount;

  beforeEach(async () => {
    owner = await createOwner();
    account = await createAccount('Petty Cash');
  });

  it('debits the payer and removes the debit on delete', async () => {
    const expense = await expenseService.createExpense({
      name: 'Electricity',
      amount: 150.5,
      account_id: account.id,
      user_id: owner.id,
      expense_date: '2026-05-01',
    });
    expect(expense).toMatchObject({ amount: 150.5, expense_date: '2026-05-01', description: null });

    const rows: FinancialLedgerEntry[] = await getTestDb()('financial_ledger').where({ ref_id: expense.id });
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ ref_type: 'EXPENSE', user_id: owner.id, debit: 150.5, credit: 0 });
    expect((await financialLedgerService.getBalance(owner.id)).balance).toBe(150.5);

    await expenseService.deleteExpense(expense.id);
    expect((await financialLedgerService.getBalance(owner.id)).balance).toBe(0);
    await expect(expenseService.deleteExpense(expense.id)).rejects.toThrow(`Expense not found: ${expense.id}`);
  });

  it('validates amounts and references', async () => {
    await expect(
      expenseService.createExpense({ name: 'Rent', amount: 0, account_id: account.id, user_id: owner.id }),
    ).rejects.toThrow('Expense amount must be greater than zero');
    await expect(
      expenseService.createExpense({ name: 'Rent', amount: 10, account_id: 'ACC-MISSING', user_id: owner.id }),
    ).rejects.toThrow('Payment account ACC-MISSING does not exist');
    await expect(
      expenseService.createExpense({ name: 'Rent', amount: 10, account_id: account.id, user_id: 'OWN-MISSING' }),
    ).rejects.toThrow('User OWN-MISSING does not exist');
  });

  it('lists expenses by date range', async () => {
    await expenseService.createExpense({ name: 'Rent', amount: 900, account_id: account.id, user_id: owner.id, expense_date: '2026-04-01' });
    await expenseService.createExpense({ name: 'Water', amount: 40, account_id: account.id, user_id: owner.id, expense_date: '2026-05-01' });

    const may = await expenseService.listExpenses({ from_date: '2026-05-01', to_date: '2026-05-31' });
    expect(may.data.map((e) => e.name)).toEqual(['Water']);
    const all = await expenseService.listExpenses({});
    expect(all.data.map((e) => e.name)).toEqual(['Water', 'Rent']);
  });

  it('manages expense categories', async () => {
    const utilities = await expenseCategoryService.createCategory({ name: ' Utilities ' });
    expect(utilities.name).toBe('Utilities');
    expect(utilities.id).toMatch(/^EXPCAT-[A-Z]{6}$/);
    await expect(expenseCategoryService.createCategory({ name: 'utilities' })).rejects.toThrow(
      'Expense category utilities already exists',
    );

    const travel = await expenseCategoryService.createCategory({ name: 'Travel' });
    await expect(expenseCategoryService.renameCategory(travel.id, { name: 'Utilities' })).rejects.toThrow(
      'Expense category Utilities already exists',
    );
    expect((await expenseCategoryService.renameCategory(travel.id, { name: 'Travel & Lodging' })).name).toBe(
      'Travel & Lodging',
    );

    const searched = await expenseCategoryService.listCategories({ search: 'UTIL' });
    expect(searched.data.map((c) => c.name)).toEqual(['Utilities']);

    await expenseService.createExpense({
      name: 'Gas bill',
      amount: 75,
      account_id: account.id,
      user_id: owner.id,
      expense_category_id: utilities.id,
    });
    await expect(expenseCategoryService.deleteCategory(utilities.id)).rejects.toThrow(StateViolationError);
    await expect(
      expenseService.createExpense({
        name: 'Gas bill',
        amount: 75,
        account_id: account.id,
        user_id: owner.id,
        expense_category_id: 'EXPCAT-MISSING',
      }),
    ).rejects.toThrow('Expense category EXPCAT-MISSING does not exist');

    expect(await expenseCategoryService.deleteCategory(travel.id)).toEqual({ id: travel.id });
    await expect(expenseCategoryService.getCategory(travel.id)).rejects.toThrow(
      `Expense category not found: ${travel.id}`,
    );
  });

  it('records a day of expenses at once, all or nothing', async () => {
    const fuel = await expenseCategoryService.createCategory({ name: 'Fuel' });
    const created = await expenseService.createExpensesBulk({
      expense_date: '2026-06-02',
      items: [
        { name: 'Diesel', amount: 80, account_id: account.id, user_id: owner.id, expense_category_id: fuel.id },
        { name: 'Tea', amount: 12.5, account_id: account.id, user_id: owner.id },
      ],
    });
    expect(created.map((e) => [e.name, e.expense_date, e.expense_category_id])).toEqual([
      ['Diesel', '2026-06-02', fuel.id],
      ['Tea', '2026-06-02', null],
    ]);
    expect((await financialLedgerService.getBalance(owner.id)).balance).toBe(92.5);

    await expect(
      expenseService.createExpensesBulk({
        items: [
          { name: 'Lunch', amount: 20, account_id: account.id, user_id: owner.id },
          { name: 'Taxi', amount: 15, account_id: 'ACC-MISSING', user_id: owner.id },
        ],
      }),
    ).rejects.toThrow('Payment account ACC-MISSING does not exist');
    await expect(
      expenseService.createExpensesBulk({
        items: [
          { name: 'Lunch', amount: 20, account_id: account.id, user_id: owner.id },
          { name: 'Taxi', amount: 0, account_id: account.id, user_id: owner.id },
        ],
      }),
    ).rejects.toThrow('Expense 2 amount must be greater than zero');
    await expect(expenseService.createExpensesBulk({ items: [] })).rejects.toThrow('At least one expense is required');

    expect(await getTestDb()('expenses')).toHaveLength(2);
    expect((await financialLedgerService.getBalance(owner.id)).balance).toBe(92.5);
  });

  it('filters the expense list and totals every match', async () => {
    const office = await expenseCategoryService.createCategory({ name: 'Office' });
    const fuel = await expenseCategoryService.createCategory({ name: 'Fuel' });
    await expenseService.createExpense({
      name: 'Rent', amount: 900, account_id: account.id, user_id: owner.id, expense_category_id: office.id, expense_date: '2026-04-01',
    });
    await expenseService.createExpense({
      name: 'Water', amount: 40, account_id: account.id, user_id: owner.id, expense_date: '2026-05-01', description: 'Office cooler',
    });
    await expenseService.createExpense({
      name: 'Petrol', amount: 60.25, account_id: account.id, user_id: owner.id, expense_category_id: fuel.id, expense_date: '2026-05-01',
    });

    const day = await expenseService.listExpenses({ expense_date: '2026-05-01' });
    expect(day.total).toBe(2);
    expect(day.total_amount).toBe(100.25);

    const byCategory = await expenseService.listExpenses({ expense_category_id: fuel.id });
    expect(byCategory.data.map((e) => [e.name, e.category_name])).toEqual([['Petrol', 'Fuel']]);

    const searched = await expenseService.listExpenses({ search: 'office' });
    expect(searched.data.map((e) => e.name)).toEqual(['Water', 'Rent']);
    expect(searched.total_amount).toBe(940);

    const firstPage = await expenseService.listExpenses({ limit: 1 });
    expect(firstPage.data).toHaveLength(1);
    expect(firstPage.total).toBe(3);
    expect(firstPage.total_amount).toBe(1000.25);
  });

  it("totals today's expenses, optionally for one payer", async () => {
    const courier = await createSupplier('Courier Co');
    await expenseService.createExpense({ name: 'Stamps', amount: 10, account_id: account.id, user_id: owner.id });
    await expenseService.createExpense({ name: 'Parcel', amount: 5.55, account_id: account.id, user_id: courier.id });
    await expenseService.createExpense({
      name: 'Old invoice', amount: 99, account_id: account.id, user_id: owner.id, expense_date: '2000-01-01',
    });

    expect(await expenseService.getTodayTotal()).toEqual({ date: today(), total_amount: 15.55, count: 2 });
    expect(await expenseService.getTodayTotal(owner.id)).toEqual({ date: today(), total_amount: 10, count: 1 });
  });

  it('totals a filtered ledger page', async () => {
    const supplier = await createSupplier('Bolt Works');
    await stockUp(bolt.id, 10, 3, supplier.id);
    await expenseService.createExpense({ name: 'Freight', amount: 12.25, account_id: account.id, user_id: owner.id });

    const page = await financialLedgerService.listEntries({ user_id: supplier.id });
    expect(page.total).toBe(1);
    expect(page.totals).toEqual({ total_debit: 30, total_credit: 0, balance: 30 });

    const expenses = await financialLedgerService.listEntries({ ref_type: 'EXPENSE' });
    expect(expenses.data.map((row) => row.debit)).toEqual([12.25]);
  });
});
