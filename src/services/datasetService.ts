import fs from 'fs';
import { Readable } from 'stream';
import { BlobServiceClient } from '@azure/storage-blob';
import { DataHealth, FetchMeta, OrderTable } from '@/types/data';
import { config } from '@/utils/config';
import { ConfigurationError, DatasetUnavailableError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { ColumnAliases, loadColumnAliases, parseOrders } from './orderLoader';

/**
 * Where the order CSV comes from.
 */
export interface DatasetSource {
  readonly name: string;
  open(): Promise<Readable>;
  /** Epoch millis of the last change, or null when the source cannot tell. */
  lastModified(): Promise<number | null>;
}

export class FileDatasetSource implements DatasetSource {
  readonly name: string;

  constructor(private readonly filePath: string) {
    this.name = `file:${filePath}`;
  }

  async open(): Promise<Readable> {
    await fs.promises.access(this.filePath, fs.constants.R_OK);
    return fs.createReadStream(this.filePath);
  }

  async lastModified(): Promise<number | null> {
    const stats = await fs.promises.stat(this.filePath);
    return stats.mtimeMs;
  }
}

export class BlobDatasetSource implements DatasetSource {
  readonly name: string;
  private blobServiceClient: BlobServiceClient;

  constructor(connectionString: string, private readonly containerName: string, private readonly blobPath: string) {
    if (!connectionString || !containerName) {
      throw new ConfigurationError('AZURE_STORAGE_CONNECTION_STRING and AZURE_CONTAINER_NAME are required for the azure data source');
    }
    this.blobServiceClient = BlobServiceClient.fromConnectionString(connectionString);
    this.name = `azure:${containerName}/${blobPath}`;
  }

  private blobClient() {
    return this.blobServiceClient.getContainerClient(this.containerName).getBlobClient(this.blobPath);
  }

  async open(): Promise<Readable> {
    const blobClient = this.blobClient();

    logger.info(`Checking if blob exists: ${this.blobPath}`);
    const exists = await blobClient.exists();
    if (!exists) {
      throw new Error(`CSV file not found: ${this.blobPath}`);
    }

    const downloadResponse = await blobClient.download();
    const body = downloadResponse.readableStreamBody;
    if (!body) {
      throw new Error('Failed to download CSV file');
    }
    return Readable.from(body);
  }

  async lastModified(): Promise<number | null> {
    const properties = await this.blobClient().getProperties();
    return properties.lastModified ? properties.lastModified.getTime() : null;
  }
}

/**
 * Holds the loaded order table.
 *
 * The table is loaded once and shared by every request. A reload builds a
 * complete new table and then swaps the reference, so readers see either the
 * old snapshot or the new one, never a mix.
 */
export class DatasetService {
  private snapshot: OrderTable | null = null;
  private snapshotModified: number | null = null;
  private pending: Promise<OrderTable> | null = null;
  private lastFetchMeta: FetchMeta = { source: '', rowCount: 0, lastUpdated: '', version: '' };

  constructor(private readonly source: DatasetSource, private readonly aliases: ColumnAliases) {
    logger.info('Dataset service initialized', { source: source.name });
  }

  /**
   * Current snapshot, loading it on first use.
   */
  async getTable(): Promise<OrderTable> {
    if (this.snapshot) {
      return this.snapshot;
    }
    return this.load();
  }

  /**
   * Load the source again and publish the result as the new snapshot.
   *
   * A load already in flight may have opened the source before the change
   * that prompted the reload, so the reload waits for it and then reads again.
   */
  async reload(): Promise<OrderTable> {
    const inFlight = this.pending;
    if (inFlight) {
      await inFlight.catch((error: unknown) => {
        logger.warn('Load in flight failed before reload', { error: String(error) });
      });
    }
    return this.load();
  }

  private load(): Promise<OrderTable> {
    if (!this.pending) {
      this.pending = this.fetch().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async fetch(): Promise<OrderTable> {
    logger.info(`Loading orders from ${this.source.name}`);
    try {
      const modified = await this.source.lastModified().catch((error: unknown) => {
        logger.warn(`Could not read last-modified time of ${this.source.name}`, { error: String(error) });
        return null;
      });
      const stream = await this.source.open();
      const table = await parseOrders(stream, { aliases: this.aliases, source: this.source.name });

      this.snapshot = table;
      this.snapshotModified = modified;
      this.lastFetchMeta = {
        source: table.source,
        rowCount: table.rows.length,
        lastUpdated: table.loadedAt,
        version: table.version
      };
      return table;
    } catch (error) {
      logger.error(`Error loading orders from ${this.source.name}:`, error);
      throw new DatasetUnavailableError(this.source.name, error);
    }
  }

  getLastFetchMeta(): FetchMeta {
    return this.lastFetchMeta;
  }

  /**
   * Whether the source has changed since the current snapshot was read.
   */
  async checkForUpdates(): Promise<boolean> {
    try {
      const modified = await this.source.lastModified();
      return modified !== null && this.snapshotModified !== null && modified > this.snapshotModified;
    } catch (error) {
      logger.error('Error checking for CSV updates:', error);
      return false;
    }
  }

  async getDataHealth(): Promise<DataHealth> {
    const table = await this.getTable();
    return {
      schema: table.schema,
      meta: this.getLastFetchMeta(),
      sourceChanged: await this.checkForUpdates()
    };
  }
}

export function createDatasetSource(): DatasetSource {
  if (config.dataSource === 'azure') {
    return new BlobDatasetSource(config.azure.connectionString, config.azure.containerName, config.azure.blobPath);
  }
  return new FileDatasetSource(config.dataFilePath);
}

// Lazy initialization to ensure environment variables are loaded
let _datasetService: DatasetService | null = null;

export const getDatasetService = (): DatasetService => {
  if (!_datasetService) {
    _datasetService = new DatasetService(createDatasetSource(), loadColumnAliases(config.columnMapPath));
  }
  return _datasetService;
};
