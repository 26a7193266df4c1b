import path from 'path';
import { CustomerGrouping } from '@/types/data';

const dataSource: 'azure' | 'file' = process.env.DATA_SOURCE === 'azure' ? 'azure' : 'file';
const grouping: CustomerGrouping = process.env.CUSTOMER_INSIGHT_GROUPING === 'id' ? 'id' : 'pair';

export const config = {
  port: Number(process.env.PORT || 5001),
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  dataSource,
  dataFilePath: path.resolve(process.env.DATA_FILE_PATH || path.join(process.cwd(), 'data', 'orders.csv')),
  columnMapPath: path.resolve(process.env.COLUMN_MAP_PATH || path.join(process.cwd(), 'config', 'columns.json')),
  azure: {
    connectionString: process.env.AZURE_STORAGE_CONNECTION_STRING || '',
    containerName: process.env.AZURE_CONTAINER_NAME || '',
    blobPath: process.env.AZURE_BLOB_PATH || 'orders.csv',
  },
  topNDefaultLimit: Number(process.env.TOPN_LIMIT_DEFAULT || 10),
  orderValueBins: Number(process.env.ORDER_VALUE_BINS || 50),
  cacheTtlSeconds: Number(process.env.CACHE_TTL_SECONDS || 1800),
  cacheMaxEntries: Number(process.env.CACHE_MAX_ENTRIES || 500),
  customerInsightGrouping: grouping,
  rateLimit: {
    enabled: process.env.RATE_LIMIT_ENABLED === 'true',
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000'),
    max: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '10000'),
  },
};
