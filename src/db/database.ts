import mongoose, { type Connection } from 'mongoose';
import { StoreUnavailableError } from '../errors';
import { logger } from '../utils/logger';
import type { StoreDiagnostics } from '../types';

export interface DatabaseOptions {
  url?: string;
  name?: string;
}

const COLLECTION_PREVIEW_LIMIT = 10;
const ERROR_PREVIEW_LENGTH = 50;

/**
 * Owns the MongoDB connection for the lifetime of the process.
 * Opened at start-up and closed on shutdown. A failed attempt is retried
 * on the next store call, so the service recovers once MongoDB is up.
 */
export class Database {
  private connection: Connection | null = null;
  private connecting: Promise<void> | null = null;
  private lastError: string | null = null;

  constructor(private readonly options: DatabaseOptions) {}

  get isConfigured(): boolean {
    return Boolean(this.options.url);
  }

  async open(): Promise<void> {
    if (this.connection) {
      return;
    }

    if (!this.options.url) {
      logger.warn('DATABASE_URL is not set; running without a database');
      return;
    }

    // Concurrent callers share one attempt
    if (!this.connecting) {
      this.connecting = this.connect(this.options.url).finally(() => {
        this.connecting = null;
      });
    }
    await this.connecting;
  }

  private async connect(url: string): Promise<void> {
    const connection = mongoose.createConnection(url, {
      dbName: this.options.name,
    });

    try {
      await connection.asPromise();
    } catch (error) {
      this.lastError = error instanceof Error ? error.message : String(error);
      logger.error({ error: this.lastError }, 'Failed to connect to MongoDB');
      await connection.close();
      return;
    }

    this.connection = connection;
    this.lastError = null;
    logger.info({ database: connection.name }, 'Connected to MongoDB');
  }

  async close(): Promise<void> {
    if (!this.connection) {
      return;
    }

    await this.connection.close();
    this.connection = null;
    logger.info('MongoDB connection closed');
  }

  async getConnection(): Promise<Connection> {
    if (!this.connection && this.isConfigured) {
      await this.open();
    }
    if (!this.connection) {
      throw new StoreUnavailableError();
    }
    return this.connection;
  }

  async diagnose(): Promise<StoreDiagnostics> {
    if (!this.connection && this.isConfigured) {
      await this.open();
    }
    if (!this.connection) {
      return {
        connected: false,
        databaseName: null,
        collections: [],
        ...(this.lastError ? { error: this.lastError.slice(0, ERROR_PREVIEW_LENGTH) } : {}),
      };
    }

    const databaseName = this.connection.name;

    try {
      const db = this.connection.db;
      if (!db) {
        throw new Error('Connection has no database handle');
      }
      const collections = await db.listCollections({}, { nameOnly: true }).toArray();
      return {
        connected: true,
        databaseName,
        collections: collections.map((c) => c.name).slice(0, COLLECTION_PREVIEW_LIMIT),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        connected: true,
        databaseName,
        collections: [],
        error: message.slice(0, ERROR_PREVIEW_LENGTH),
      };
    }
  }
}
