/**
 * Application Configuration
 * Loads and validates environment variables
 */

import * as dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

export type InvoiceSourceMode = 'latest_upload' | 'path';

/**
 * Application Configuration Interface
 */
export interface AppConfig {
  // Server
  port: number;
  nodeEnv: string;
  apiKey: string;

  // MongoDB
  mongodbUri: string;
  mongodbDbName: string;

  // Invoice source
  invoiceSource: InvoiceSourceMode;
  invoicePath: string;
  invoiceUploadFolder: string;

  // Email (Amazon SES)
  awsRegion: string;
  sesEndpoint: string; // Empty = the regional SES endpoint
  mailFrom: string;
  mailCc: string;
  sendTimeoutMs: number;

  // Scheduling
  dispatchCron: string;
  maxJobRecipients: number; // 0 = no limit

  // Dispatch worker
  workerIdleMs: number;
  workerErrorDelayMs: number;
  heartbeatStaleMs: number;
  dispatchRetries: number;
  retryBackoffMs: number;
  interItemDelayMs: number;
}

function parseIntEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config: AppConfig = {
    // Server
    port: parseIntEnv(env.PORT, 3000),
    nodeEnv: env.NODE_ENV || 'development',
    apiKey: env.API_KEY || '',

    // MongoDB
    mongodbUri: env.MONGODB_URI || 'mongodb://localhost:27017/?replicaSet=rs0',
    mongodbDbName: env.MONGODB_DB_NAME || 'statement_dispatch',

    // Invoice source
    invoiceSource: env.INVOICE_SOURCE === 'path' ? 'path' : 'latest_upload',
    invoicePath: env.INVOICE_PATH || '',
    invoiceUploadFolder: env.INVOICE_UPLOAD_FOLDER || './uploads/invoices',

    // Email (Amazon SES)
    awsRegion: env.AWS_REGION || 'us-east-1',
    sesEndpoint: env.SES_ENDPOINT || '',
    mailFrom: env.MAIL_FROM || '',
    mailCc: env.MAIL_CC || '',
    sendTimeoutMs: parseIntEnv(env.SEND_TIMEOUT_MS, 30000),

    // Scheduling
    dispatchCron: env.DISPATCH_CRON || '0 8 * * *', // 8 AM daily
    maxJobRecipients: parseIntEnv(env.MAX_JOB_RECIPIENTS, 0),

    // Dispatch worker
    workerIdleMs: parseIntEnv(env.WORKER_IDLE_MS, 5000),
    workerErrorDelayMs: parseIntEnv(env.WORKER_ERROR_DELAY_MS, 2000),
    heartbeatStaleMs: parseIntEnv(env.HEARTBEAT_STALE_MS, 5 * 60 * 1000),
    dispatchRetries: parseIntEnv(env.DISPATCH_RETRIES, 2),
    retryBackoffMs: parseIntEnv(env.RETRY_BACKOFF_MS, 5000),
    interItemDelayMs: parseIntEnv(env.INTER_ITEM_DELAY_MS, 0),
  };

  // Validate required fields
  validateConfig(config);

  return config;
}

/**
 * Validate configuration
 */
function validateConfig(config: AppConfig): void {
  const errors: string[] = [];

  if (!config.mongodbUri) {
    errors.push('MONGODB_URI is required');
  }

  if (config.port < 1 || config.port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  if (config.invoiceSource === 'path' && !config.invoicePath) {
    errors.push('INVOICE_PATH is required when INVOICE_SOURCE=path');
  }

  if (!config.mailFrom) {
    console.warn('WARNING: MAIL_FROM is not set - statement delivery will fail');
  }

  if (config.sendTimeoutMs < 1000) {
    errors.push('SEND_TIMEOUT_MS must be at least 1000');
  }

  if (config.dispatchRetries < 0 || config.dispatchRetries > 10) {
    errors.push('DISPATCH_RETRIES must be between 0 and 10');
  }

  if (config.retryBackoffMs < 0 || config.interItemDelayMs < 0) {
    errors.push('RETRY_BACKOFF_MS and INTER_ITEM_DELAY_MS must not be negative');
  }

  if (config.workerIdleMs < 100) {
    errors.push('WORKER_IDLE_MS must be at least 100');
  }

  // The worker heartbeats before each send and each wait; neither may outlast the stale threshold
  const longestRetryGap = config.sendTimeoutMs + config.retryBackoffMs * config.dispatchRetries;
  if (config.heartbeatStaleMs <= longestRetryGap) {
    errors.push(
      'HEARTBEAT_STALE_MS must be greater than SEND_TIMEOUT_MS + RETRY_BACKOFF_MS * DISPATCH_RETRIES'
    );
  }

  if (config.heartbeatStaleMs <= config.interItemDelayMs) {
    errors.push('HEARTBEAT_STALE_MS must be greater than INTER_ITEM_DELAY_MS');
  }

  if (config.maxJobRecipients < 0) {
    errors.push('MAX_JOB_RECIPIENTS must not be negative');
  }

  if (errors.length > 0) {
    throw new Error(
      `Configuration validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`
    );
  }
}

/**
 * Get configuration singleton
 */
let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
