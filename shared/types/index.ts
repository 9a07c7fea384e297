// ============================================================
// Identity
// ============================================================

export type UserRole = 'admin' | 'user';

/** Verified principal handed to the services by the caller. */
export interface Actor {
  userId: string;
  displayName: string;
  role: UserRole;
}

// ============================================================
// Master data
// ============================================================

export interface Vendor {
  id: number;
  name: string;
  contact: string;
  created_at: string;
}

// ============================================================
// Inventory
// ============================================================

export type StockLotSource = 'intake' | 'return';

export interface StockLot {
  id: number;
  seq: number;
  fruit: string;
  quantity: number;
  cost_price: number;
  intake_date: string;
  remaining: number;
  source: StockLotSource;
  return_id: number | null;
  created_at: string;
}

/** One lot's share of a FIFO depletion. */
export interface DepletionLayer {
  lot_id: number;
  seq: number;
  intake_date: string;
  quantity: number;
  remaining_after: number;
}

export interface FifoDepletion {
  fruit: string;
  quantity: number;
  layers: DepletionLayer[];
}

export type StockSnapshot = Record<string, number>;

// ============================================================
// Transactions
// ============================================================

export interface Sale {
  id: number;
  entry_seq: number;
  transaction_date: string;
  vendor_id: number;
  fruit: string;
  boxes: number;
  price_per_box: number;
  total_price: number;
  box_deposit_per_box: number;
  box_deposit_collected: number;
  note: string;
  created_by: string | null;
  created_at: string;
  updated_at: string;
}

export interface SaleWithVendor extends Sale {
  vendor_name: string;
}

export interface SaleReturn {
  id: number;
  entry_seq: number;
  transaction_date: string;
  vendor_id: number;
  fruit: string;
  boxes_returned: number;
  box_deposit_per_box: number;
  box_deposit_refunded: number;
  note: string;
  created_by: string | null;
  created_at: string;
}

export interface Payment {
  id: number;
  entry_seq: number;
  transaction_date: string;
  vendor_id: number;
  amount: number;
  note: string;
  created_by: string | null;
  created_at: string;
}

// ============================================================
// Change requests
// ============================================================

export type ChangeRequestStatus = 'pending' | 'approved' | 'rejected';

/** Editable fields of a sale, as captured in change-request snapshots. */
export interface SaleSnapshot {
  transaction_date: string;
  fruit: string;
  boxes: number;
  price_per_box: number;
  box_deposit_per_box: number;
  note: string;
}

export type SaleEdit = Partial<SaleSnapshot>;

export interface ChangeRequest {
  id: number;
  sale_id: number;
  change_type: 'edit_sale';
  requested_by: string;
  requester_name: string;
  current_data: SaleSnapshot;
  requested_data: SaleSnapshot;
  status: ChangeRequestStatus;
  note: string;
  reviewed_by: string | null;
  reviewed_at: string | null;
  admin_comment: string | null;
  created_at: string;
}

export interface FieldChange {
  field: keyof SaleSnapshot;
  current: string | number;
  requested: string | number;
}

export interface ChangeRequestDetail extends ChangeRequest {
  changes: FieldChange[];
  /** The sale no longer matches the snapshot the requester saw. */
  stale: boolean;
}

export type ChangeRequestCounts = Record<ChangeRequestStatus, number>;

// ============================================================
// Reports
// ============================================================

export interface VendorSummaryRow {
  vendor_id: number;
  vendor_name: string;
  total_sales: number;
  cogs: number;
  profit: number;
  profit_margin: number;
  payments: number;
  net_due: number;
  deposits_collected: number;
  deposits_refunded: number;
  net_deposits_held: number;
}

export interface DailySummary {
  date: string;
  total_sales: number;
  boxes_sold: number;
  payments_received: number;
  boxes_returned: number;
  deposits_collected: number;
  deposits_refunded: number;
  cogs: number;
  profit: number;
  num_transactions: number;
}

export type LedgerEntryType = 'SALE' | 'PAYMENT' | 'RETURN';

export interface VendorLedgerRow {
  date: string;
  type: LedgerEntryType;
  fruit: string | null;
  qty: number;
  amount: number;
  deposit: number;
  note: string;
  running_due: number;
  running_deposits: number;
}

export interface SalesReport {
  from: string;
  to: string;
  sales: SaleWithVendor[];
  total_boxes: number;
  total_sales: number;
  total_deposits: number;
}

export interface DashboardSummary {
  total_boxes_in_stock: number;
  stock: StockSnapshot;
  total_net_due: number;
  pending_requests: number;
}
