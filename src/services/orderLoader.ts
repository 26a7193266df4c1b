import fs from 'fs';
import { Readable } from 'stream';
import csv from 'csv-parser';
import Joi from 'joi';
import moment from 'moment';
import {
  CategoricalColumn,
  ColumnSchema,
  DATE_COLUMNS,
  DateColumn,
  DatasetSchema,
  IdentityColumn,
  NUMERIC_COLUMNS,
  NumericColumn,
  ORDER_COLUMNS,
  OrderColumn,
  OrderRow,
  OrderTable,
  UNKNOWN
} from '@/types/data';
import { ConfigurationError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export type ColumnAliases = Record<OrderColumn, string[]>;

export interface LoadOptions {
  aliases: ColumnAliases;
  source: string;
}

type RawRecord = Record<string, string | undefined>;

const aliasSchema = Joi.object<ColumnAliases>(
  Object.fromEntries(
    ORDER_COLUMNS.map(column => [
      column,
      Joi.array().items(Joi.string().min(1)).min(1).required()
    ])
  )
);

const DATE_FORMATS: moment.MomentFormatSpecification = [
  moment.ISO_8601,
  'YYYY-MM-DD HH:mm:ss',
  'YYYY-MM-DD HH:mm',
  'MM/DD/YYYY',
  'MM/DD/YYYY HH:mm',
  'MM/DD/YYYY HH:mm:ss'
];

let versionCounter = 0;

function columnType(column: OrderColumn): ColumnSchema['type'] {
  if (NUMERIC_COLUMNS.some(c => c === column)) return 'number';
  if (DATE_COLUMNS.some(c => c === column)) return 'date';
  return 'string';
}

/**
 * Read and validate the header alias map (canonical column -> accepted CSV headers).
 */
export function loadColumnAliases(filePath: string): ColumnAliases {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Column map ${filePath} could not be read`, error instanceof Error ? error.message : undefined);
  }
  return validateColumnAliases(parsed);
}

export function validateColumnAliases(value: unknown): ColumnAliases {
  const { error, value: validated } = aliasSchema.validate(value, { abortEarly: false });
  if (error) {
    throw new ConfigurationError('Invalid column map', error.details.map(d => d.message));
  }
  return validated;
}

const THOUSANDS_COMMA = /^-?\d{1,3}(,\d{3})+(\.\d+)?$/;
const DECIMAL_COMMA = /^-?(\d{1,3}(\.\d{3})+|\d+),\d+$/;

/**
 * Parse a number safely, handling currency symbols and both `1,234.56` and
 * `1.234,56` notation. Returns null when the value is missing or not a finite
 * number.
 */
export function parseNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') {
    return null;
  }
  let cleaned = value.replace(/R\$|[€£$\s]/g, '');
  if (THOUSANDS_COMMA.test(cleaned)) {
    cleaned = cleaned.replace(/,/g, '');
  } else if (DECIMAL_COMMA.test(cleaned)) {
    cleaned = cleaned.replace(/\./g, '').replace(',', '.');
  } else if (cleaned.includes(',')) {
    return null;
  }
  if (cleaned === '') return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseDate(value: string | undefined): Date | null {
  if (value === undefined || value.trim() === '') {
    return null;
  }
  const parsed = moment.utc(value.trim(), DATE_FORMATS, true);
  return parsed.isValid() ? parsed.toDate() : null;
}

function parseText(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Map each canonical column to the first CSV header that matches one of its aliases.
 */
export function resolveHeaders(headers: readonly string[], aliases: ColumnAliases): Map<OrderColumn, string> {
  const byLowerCase = new Map(headers.map(h => [h.toLowerCase(), h]));
  const resolved = new Map<OrderColumn, string>();

  for (const column of ORDER_COLUMNS) {
    const match = [column, ...aliases[column]].map(n => byLowerCase.get(n.toLowerCase())).find(Boolean);
    if (match) {
      resolved.set(column, match);
    }
  }
  return resolved;
}

/**
 * Normalise raw CSV records into an immutable order table.
 *
 * Categorical cells default to "Unknown", numeric cells to 0 and dates to null.
 * Blank order ids, customer ids and customer names stay null.
 * When the file has no line-revenue column but does have quantity and unit
 * price, line revenue is derived from them.
 */
export function buildOrderTable(records: readonly RawRecord[], headers: readonly string[], options: LoadOptions): OrderTable {
  const headerFor = resolveHeaders(headers, options.aliases);
  const deriveRevenue = !headerFor.has('lineRevenue') && headerFor.has('quantity') && headerFor.has('unitPrice');

  const nullCounts = new Map<OrderColumn, number>();
  const countNull = (column: OrderColumn) => nullCounts.set(column, (nullCounts.get(column) || 0) + 1);

  const read = (record: RawRecord, column: OrderColumn): string | undefined => {
    const header = headerFor.get(column);
    return header === undefined ? undefined : record[header];
  };

  const rows = records.map(record => {
    const text = (column: Exclude<CategoricalColumn, IdentityColumn>) => {
      const value = parseText(read(record, column));
      if (value === null) countNull(column);
      return value ?? UNKNOWN;
    };
    const ident = (column: IdentityColumn) => {
      const value = parseText(read(record, column));
      if (value === null) countNull(column);
      return value;
    };
    const num = (column: NumericColumn) => {
      const value = parseNumber(read(record, column));
      if (value === null || (column === 'quantity' && value < 0)) {
        countNull(column);
        return 0;
      }
      return value;
    };
    const date = (column: DateColumn) => {
      const value = parseDate(read(record, column));
      if (value === null) countNull(column);
      return value;
    };

    const quantity = num('quantity');
    const unitPrice = num('unitPrice');

    const row: OrderRow = {
      orderId: ident('orderId'),
      customerId: ident('customerId'),
      customerName: ident('customerName'),
      productName: text('productName'),
      category: text('category'),
      state: text('state'),
      gender: text('gender'),
      ageBracket: text('ageBracket'),
      orderDate: date('orderDate'),
      registrationDate: date('registrationDate'),
      quantity,
      unitPrice,
      lineRevenue: deriveRevenue ? quantity * unitPrice : num('lineRevenue'),
      orderTotal: num('orderTotal')
    };
    return Object.freeze(row);
  });

  const columns = ORDER_COLUMNS.filter(
    column => headerFor.has(column) || (column === 'lineRevenue' && deriveRevenue)
  );

  const schemaColumns: ColumnSchema[] = columns.map(column => {
    const nullCount = column === 'lineRevenue' && deriveRevenue ? 0 : nullCounts.get(column) || 0;
    return {
      name: column,
      sourceHeader: headerFor.get(column) ?? null,
      type: columnType(column),
      nonNullCount: rows.length - nullCount,
      nullCount,
      ...(column === 'lineRevenue' && deriveRevenue ? { derived: true } : {})
    };
  });

  const schema: DatasetSchema = {
    totalRows: rows.length,
    totalColumns: columns.length,
    columns: schemaColumns
  };

  versionCounter += 1;
  const loadedAt = new Date();

  return Object.freeze({
    version: `${loadedAt.getTime().toString(36)}-${versionCounter}`,
    source: options.source,
    loadedAt: loadedAt.toISOString(),
    columns: Object.freeze(columns),
    rows: Object.freeze(rows),
    schema
  });
}

/**
 * Stream a CSV into an order table.
 */
export function parseOrders(stream: Readable, options: LoadOptions): Promise<OrderTable> {
  const records: RawRecord[] = [];
  let headers: string[] = [];

  return new Promise((resolve, reject) => {
    stream
      .on('error', reject)
      .pipe(csv({ mapHeaders: ({ header }) => header.trim() }))
      .on('headers', (parsedHeaders: string[]) => {
        headers = parsedHeaders;
      })
      .on('data', (row: RawRecord) => {
        records.push(row);
      })
      .on('end', () => {
        try {
          const table = buildOrderTable(records, headers, options);
          logger.info(`Parsed ${table.rows.length} rows from ${options.source}`, {
            columns: table.columns.length,
            version: table.version
          });
          resolve(table);
        } catch (error) {
          reject(error);
        }
      })
      .on('error', (error: Error) => {
        logger.error('Error parsing CSV:', error);
        reject(error);
      });
  });
}
