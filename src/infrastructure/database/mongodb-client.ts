/**
 * MongoDB Client - Connection Management
 * Owns the driver connection and the indexes the repositories rely on
 */

import { CreateIndexesOptions, Db, IndexSpecification, MongoClient } from 'mongodb';
import { DISPATCH_SLOT } from '../../domain/models/job';

interface IndexDefinition {
  collection: string;
  key: IndexSpecification;
  options?: CreateIndexesOptions;
}

/**
 * Indexes per collection. The partial unique index on `active_slot` is what
 * keeps a second queued/running job out, so a failure to build it is fatal.
 */
export const INDEXES: IndexDefinition[] = [
  // Recipient directory
  { collection: 'recipients', key: { recipient_id: 1 }, options: { unique: true } },
  { collection: 'recipients', key: { name_key: 1 } },
  { collection: 'recipients', key: { active: 1, kind: 1 } },
  { collection: 'recipient_aliases', key: { alias_key: 1 }, options: { unique: true } },
  { collection: 'recipient_aliases', key: { recipient_id: 1 } },
  { collection: 'group_members', key: { group_id: 1, member_id: 1 }, options: { unique: true } },
  { collection: 'group_members', key: { member_id: 1, created_at: -1 } },

  // Dispatch queue
  { collection: 'scheduled_jobs', key: { job_id: 1 }, options: { unique: true } },
  {
    collection: 'scheduled_jobs',
    key: { active_slot: 1 },
    options: {
      name: 'single_active_job',
      unique: true,
      partialFilterExpression: { active_slot: { $eq: DISPATCH_SLOT } },
    },
  },
  { collection: 'scheduled_jobs', key: { status: 1, created_at: 1 } },
  { collection: 'scheduled_jobs', key: { created_at: -1 } },
  { collection: 'scheduled_job_items', key: { item_id: 1 }, options: { unique: true } },
  { collection: 'scheduled_job_items', key: { job_id: 1, seq: 1 } },

  // Audit and reports
  { collection: 'statement_runs', key: { run_id: 1 }, options: { unique: true } },
  { collection: 'statement_runs', key: { recipient_id: 1, invoice_ref: 1, status: 1, created_at: -1 } },
  { collection: 'aging_report_runs', key: { run_id: 1 }, options: { unique: true } },
  { collection: 'aging_report_runs', key: { created_at: -1 } },
  { collection: 'aging_report_items', key: { run_id: 1, overdue_amount: -1 } },
  {
    collection: 'notice_sends',
    key: { invoice_ref: 1, recipient_id: 1, notice_type: 1 },
    options: { unique: true },
  },
];

export class MongoDBClient {
  private client: MongoClient;
  private db: Db | null = null;

  constructor(private connectionUri: string, private dbName: string = 'statement_dispatch') {
    this.client = new MongoClient(this.connectionUri);
  }

  /**
   * Connect and make sure every index exists
   *
   * The job queue uses multi-document transactions, so the server must be
   * a replica set member (a single-node replica set is enough).
   */
  async connect(): Promise<void> {
    if (this.db) {
      console.log('MongoDB: Already connected');
      return;
    }

    try {
      await this.client.connect();
      const db = this.client.db(this.dbName);
      console.log(`MongoDB: Connected to database "${this.dbName}"`);

      await this.ensureIndexes(db);
      this.db = db;
    } catch (error) {
      console.error('MongoDB: Connection failed', error);
      await this.client.close();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.db) return;

    this.db = null;
    await this.client.close();
    console.log('MongoDB: Disconnected');
  }

  getDb(): Db {
    if (!this.db) {
      throw new Error('MongoDB: Not connected. Call connect() first.');
    }
    return this.db;
  }

  /**
   * Driver client, for sessions and transactions
   */
  getClient(): MongoClient {
    return this.client;
  }

  private async ensureIndexes(db: Db): Promise<void> {
    console.log(`MongoDB: Ensuring ${INDEXES.length} indexes...`);
    for (const index of INDEXES) {
      await db.collection(index.collection).createIndex(index.key, index.options ?? {});
    }
    console.log('MongoDB: Indexes ready');
  }

  async healthCheck(): Promise<boolean> {
    if (!this.db) return false;
    try {
      await this.db.admin().ping();
      return true;
    } catch (error) {
      console.error('MongoDB: Health check failed', error);
      return false;
    }
  }
}

/**
 * Singleton instance for application-wide use
 */
let mongoDBClient: MongoDBClient | null = null;

export function getMongoDBClient(uri?: string, dbName?: string): MongoDBClient {
  if (!mongoDBClient) {
    if (!uri) {
      throw new Error('MongoDB URI required for first initialization');
    }
    mongoDBClient = new MongoDBClient(uri, dbName);
  }
  return mongoDBClient;
}
