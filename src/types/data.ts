
// Core data structure based on the order line-item CSV
export interface OrderRow {
  // Identity (null when the cell is blank; such rows belong to no order or customer)
  orderId: string | null;
  customerId: string | null;
  customerName: string | null;

  // Product dimensions
  productName: string;
  category: string;

  // Customer dimensions
  state: string;
  gender: string;
  ageBracket: string;

  // Time dimensions (null when missing or unparseable)
  orderDate: Date | null;
  registrationDate: Date | null;

  // Metrics
  quantity: number;
  unitPrice: number;
  lineRevenue: number;
  orderTotal: number;
}

export type OrderColumn = keyof OrderRow;

export type CategoricalColumn = {
  [K in OrderColumn]: OrderRow[K] extends string | null ? K : never;
}[OrderColumn];

export type IdentityColumn = 'orderId' | 'customerId' | 'customerName';

export type NumericColumn = {
  [K in OrderColumn]: OrderRow[K] extends number ? K : never;
}[OrderColumn];

export type DateColumn = 'orderDate' | 'registrationDate';

export const CATEGORICAL_COLUMNS: readonly CategoricalColumn[] = [
  'orderId',
  'customerId',
  'customerName',
  'productName',
  'category',
  'state',
  'gender',
  'ageBracket'
];

export const NUMERIC_COLUMNS: readonly NumericColumn[] = ['quantity', 'unitPrice', 'lineRevenue', 'orderTotal'];

export const DATE_COLUMNS: readonly DateColumn[] = ['orderDate', 'registrationDate'];

export const ORDER_COLUMNS: readonly OrderColumn[] = [...CATEGORICAL_COLUMNS, ...DATE_COLUMNS, ...NUMERIC_COLUMNS];

export const UNKNOWN = 'Unknown';
export const ALL = 'All';
export const NOT_AVAILABLE = 'N/A';

/**
 * A read-only set of rows together with the columns the source actually had.
 * A column missing from `columns` was absent from the file, which is different
 * from a column whose cells were all defaulted.
 */
export interface DataView {
  readonly columns: readonly OrderColumn[];
  readonly rows: readonly OrderRow[];
}

export interface ColumnSchema {
  name: OrderColumn;
  sourceHeader: string | null;
  type: 'string' | 'number' | 'date';
  nonNullCount: number;
  nullCount: number;
  derived?: boolean;
}

export interface DatasetSchema {
  totalRows: number;
  totalColumns: number;
  columns: ColumnSchema[];
}

export interface OrderTable extends DataView {
  readonly version: string;
  readonly source: string;
  readonly loadedAt: string;
  readonly schema: DatasetSchema;
}

// Filter interfaces
export type FilterColumn = 'productName' | 'category' | 'state' | 'gender';

export const FILTER_COLUMNS: readonly FilterColumn[] = ['productName', 'category', 'state', 'gender'];

export interface DateRange {
  start: Date;
  end: Date;
}

export interface FilterOptions {
  dateRange?: DateRange;
  categoricalEquals?: Partial<Record<FilterColumn, string>>;
  minRevenue?: number;
}

// Aggregation interfaces
export type Aggregator = 'sum' | 'countDistinct';

export type GroupOrdering = 'desc' | 'firstSeen';

export type Measure =
  | { column: NumericColumn; aggregator: 'sum' }
  | { column: OrderColumn; aggregator: 'countDistinct' };

export interface AggregationPair {
  key: string;
  value: number;
}

export interface TimeSeriesPoint {
  date: string;
  value: number;
}

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

// KPI and insight interfaces
export interface KpiSet {
  totalRevenue: number;
  totalOrders: number;
  uniqueCustomers: number;
  totalQuantity: number;
  avgTicket: number;
}

export interface Insight {
  name: string;
  value: number;
  metric: 'quantity' | 'revenue';
}

export interface CustomerInsight extends Insight {
  customerId: string;
}

export interface InsightSet {
  bestSellingProduct: Insight;
  mostProfitableCategory: Insight;
  highestRevenueState: Insight;
  highestSpendingAgeBracket: Insight;
  topCustomer: CustomerInsight;
}

export type CustomerGrouping = 'pair' | 'id';

// Dashboard interfaces
export interface DashboardCharts {
  revenueOverTime: TimeSeriesPoint[];
  revenueByCategory: AggregationPair[];
  topProductsByRevenue: AggregationPair[];
  topProductsByQuantity: AggregationPair[];
  revenueByState: AggregationPair[];
  revenueByGender: AggregationPair[];
  orderValueDistribution: HistogramBin[];
}

export interface DashboardSnapshot {
  datasetVersion: string;
  filteredRecords: number;
  kpis: KpiSet;
  charts: DashboardCharts;
  insights: InsightSet;
}

export interface FilterOptionLists {
  products: string[];
  categories: string[];
  states: string[];
  genders: string[];
  dateBounds: { min: string; max: string } | null;
}

export interface FetchMeta {
  source: string;
  rowCount: number;
  lastUpdated: string;
  version: string;
}

export interface DataHealth {
  schema: DatasetSchema;
  meta: FetchMeta;
  sourceChanged: boolean;
}

// API Response interfaces
export interface ApiResponse<T> {
  success: true;
  data: T;
  message?: string;
}

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
