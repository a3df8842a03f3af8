export const APP_NAME = 'Inventory Ledger';
export const APP_VERSION = '1.0.0';

export const DEFAULT_API_PORT = 3001;
export const DEFAULT_DB_PORT = 5432;

export const ITEM_KINDS = {
  RAW_MATERIAL: 'RAW_MATERIAL',
  FINAL_PRODUCT: 'FINAL_PRODUCT',
} as const;

export const UNIT_TYPES = {
  PCS: 'PCS',
  SET: 'SET',
} as const;

export const USER_ROLES = {
  OWNER: 'owner',
  SUPPLIER: 'supplier',
  CUSTOMER: 'customer',
} as const;

export const ACCOUNT_TYPES = {
  CASH: 'cash',
  BANK: 'bank',
  WALLET: 'wallet',
} as const;

export const STOCK_REF_TYPES = {
  PURCHASE: 'PURCHASE',
  SALE: 'SALE',
  PRODUCTION: 'PRODUCTION',
  ADJUSTMENT: 'ADJUSTMENT',
} as const;

export const FINANCIAL_REF_TYPES = {
  PURCHASE: 'PURCHASE',
  PURCHASE_UPDATE: 'PURCHASE_UPDATE',
  PAYMENT: 'PAYMENT',
  DIRECT_PAYMENT: 'DIRECT_PAYMENT',
  PAYMENT_REVERSAL: 'PAYMENT_REVERSAL',
  EXPENSE: 'EXPENSE',
  SALE: 'SALE',
} as const;

export const PAYMENT_STATUSES = {
  UNPAID: 'UNPAID',
  PARTIAL: 'PARTIAL',
  PAID: 'PAID',
} as const;

export const PAYMENT_TYPES = {
  FULL: 'FULL',
  PARTIAL: 'PARTIAL',
  UN_PAID: 'UN_PAID',
} as const;

export const ALLOCATION_METHODS = {
  FIFO: 'FIFO',
  LIFO: 'LIFO',
  PROPORTIONAL: 'PROPORTIONAL',
} as const;

export const PRODUCTION_STAGES = {
  DRAFT: 'DRAFT',
  IN_PROCESS: 'IN_PROCESS',
  DONE: 'DONE',
} as const;

export const ADJUSTMENT_DIRECTIONS = {
  IN: 'in',
  OUT: 'out',
} as const;

/** Prefix added to every production serial number that lacks it. */
export const SERIAL_PREFIX = 'LEH-';

/** Prefix and random-suffix length of each generated identifier. */
export const ID_FORMATS = {
  owner: { prefix: 'OWN', length: 8 },
  supplier: { prefix: 'SUP', length: 8 },
  customer: { prefix: 'CUS', length: 8 },
  account: { prefix: 'ACC', length: 8 },
  item: { prefix: 'ITM', length: 8 },
  stockEntry: { prefix: 'STK', length: 8 },
  ledgerEntry: { prefix: 'FLG', length: 8 },
  purchaseInvoice: { prefix: 'PINV', length: 8 },
  purchaseItem: { prefix: 'PIT', length: 8 },
  payment: { prefix: 'PAY', length: 8 },
  directPayment: { prefix: 'DPAY', length: 8 },
  recipe: { prefix: 'RCP', length: 8 },
  recipeItem: { prefix: 'RCI', length: 8 },
  batch: { prefix: 'PROD', length: 5 },
  batchRecipeItem: { prefix: 'PBR', length: 8 },
  serial: { prefix: 'SRL', length: 8 },
  adjustment: { prefix: 'ADJ', length: 8 },
  expense: { prefix: 'EXP', length: 8 },
  expenseCategory: { prefix: 'EXPCAT', length: 6 },
} as const;

export const ID_GENERATION_ATTEMPTS = 10;

export const PAGINATION = {
  DEFAULT_PAGE: 1,
  DEFAULT_LIMIT: 50,
  MAX_LIMIT: 200,
} as const;
