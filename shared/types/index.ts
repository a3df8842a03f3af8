import {
  ITEM_KINDS,
  UNIT_TYPES,
  USER_ROLES,
  ACCOUNT_TYPES,
  STOCK_REF_TYPES,
  FINANCIAL_REF_TYPES,
  PAYMENT_STATUSES,
  PAYMENT_TYPES,
  ALLOCATION_METHODS,
  PRODUCTION_STAGES,
  ADJUSTMENT_DIRECTIONS,
} from '../constants';

type ValueOf<T> = T[keyof T];

export type ItemKind = ValueOf<typeof ITEM_KINDS>;
export type UnitType = ValueOf<typeof UNIT_TYPES>;
export type UserRole = ValueOf<typeof USER_ROLES>;
export type AccountType = ValueOf<typeof ACCOUNT_TYPES>;
export type StockRefType = ValueOf<typeof STOCK_REF_TYPES>;
export type FinancialRefType = ValueOf<typeof FINANCIAL_REF_TYPES>;
export type PaymentStatus = ValueOf<typeof PAYMENT_STATUSES>;
export type PaymentType = ValueOf<typeof PAYMENT_TYPES>;
export type AllocationMethod = ValueOf<typeof ALLOCATION_METHODS>;
export type ProductionStage = ValueOf<typeof PRODUCTION_STAGES>;
export type AdjustmentDirection = ValueOf<typeof ADJUSTMENT_DIRECTIONS>;

// ============================================================
// Rows as stored. Numeric columns are parsed to numbers and
// timestamps are kept as strings by the connection layer.
// ============================================================

export interface Timestamps {
  created_at: string;
  updated_at: string;
}

export interface User extends Timestamps {
  id: string;
  name: string;
  email: string | null;
  password_hash: string | null;
  role: UserRole;
}

export interface PaymentAccount {
  id: string;
  name: string;
  type: AccountType;
  created_at: string;
}

export interface Item extends Timestamps {
  id: string;
  name: string;
  kind: ItemKind;
  unit_type: UnitType;
  total_quantity: number;
  /** Value of the units on hand at 6 decimal places; avg_cost derives from it. */
  stock_value: number;
  /** Weighted average carried at 6 decimal places. */
  avg_cost: number;
  /** avg_cost rounded half-up to 2 places. */
  avg_price: number;
  /** Recipe standard cost of one unit; final products only. */
  standard_cost: number;
}

export interface StockLedgerEntry {
  id: string;
  item_id: string;
  ref_type: StockRefType;
  ref_id: string;
  qty_in: number;
  qty_out: number;
  unit_price: number;
  created_at: string;
}

export interface FinancialLedgerEntry {
  id: string;
  user_id: string;
  ref_type: FinancialRefType;
  ref_id: string;
  debit: number;
  credit: number;
  created_at: string;
}

export interface PurchaseInvoice extends Timestamps {
  id: string;
  supplier_id: string;
  invoice_date: string;
  total_amount: number;
  paid_amount: number;
  balance_due: number;
  payment_status: PaymentStatus;
  notes: string | null;
}

export interface PurchaseItem {
  id: string;
  purchase_invoice_id: string;
  line_number: number;
  item_id: string;
  quantity: number;
  unit_price: number;
  line_total: number;
}

export interface Payment {
  id: string;
  user_id: string;
  purchase_invoice_id: string;
  amount: number;
  account_id: string;
  payment_type: PaymentType;
  direct_payment_id: string | null;
  created_at: string;
}

export interface Recipe extends Timestamps {
  id: string;
  final_product_id: string;
  name: string;
}

export interface RecipeItem {
  id: string;
  recipe_id: string;
  raw_item_id: string;
  quantity_per_unit: number;
}

export interface ProductionBatch extends Timestamps {
  id: string;
  final_product_id: string;
  quantity_produced: number;
  stage: ProductionStage;
}

export interface ProductionSerial {
  id: string;
  production_batch_id: string;
  final_product_id: string;
  serial_number: string;
}

export interface ProductionBatchRecipeItem {
  id: string;
  production_batch_id: string;
  raw_item_id: string;
  quantity_per_unit: number;
}

export interface StockAdjustment {
  id: string;
  item_id: string;
  direction: AdjustmentDirection;
  quantity: number;
  unit_price: number;
  reason: string;
  created_at: string;
}

export interface ExpenseCategory extends Timestamps {
  id: string;
  name: string;
}

export interface Expense {
  id: string;
  name: string;
  amount: number;
  account_id: string;
  user_id: string;
  expense_category_id: string | null;
  expense_date: string;
  description: string | null;
  created_at: string;
}

// ============================================================
// Query envelopes
// ============================================================

export interface Paginated<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiFailure {
  success: false;
  error: string;
  details?: unknown;
}
