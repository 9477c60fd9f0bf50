/**
 * Application Entry Point
 * Initializes and starts the Statement Dispatch Engine
 */

import { Server } from 'http';
import { getConfig } from './config/app.config';
import { MongoDBClient, getMongoDBClient } from './infrastructure/database/mongodb-client';
import { MongoRecipientRepository } from './infrastructure/database/recipient-repository.impl';
import { MongoJobRepository } from './infrastructure/database/job-repository.impl';
import { MongoStatementRunRepository } from './infrastructure/database/statement-run-repository.impl';
import { MongoAgingReportRepository } from './infrastructure/database/aging-report-repository.impl';
import { MongoNoticeSendRepository } from './infrastructure/database/notice-send-repository.impl';
import { FileInvoiceSource } from './infrastructure/invoices/file-invoice-source';
import { SesMailClient, sesSendEmail } from './infrastructure/messaging/ses-mail-client';
import { EmailStatementBuilder } from './infrastructure/messaging/email-statement-builder';
import { EmailNoticeSender } from './infrastructure/messaging/email-notice-sender';
import { JobQueue } from './domain/services/job-queue';
import { StatementDispatcher } from './domain/services/statement-dispatcher';
import { EnqueueDispatchCommand } from './application/commands/enqueue-dispatch.command';
import { RunAgingReportCommand } from './application/commands/run-aging-report.command';
import { SendStatementCommand } from './application/commands/send-statement.command';
import { CreateRecipientCommand } from './application/commands/create-recipient.command';
import { AddRecipientAliasCommand } from './application/commands/add-recipient-alias.command';
import { AddGroupMemberCommand } from './application/commands/add-group-member.command';
import { SendNoticeCommand } from './application/commands/send-notice.command';
import { ImportRecipientsCommand } from './application/commands/import-recipients.command';
import { ImportCustomerMappingsCommand } from './application/commands/import-customer-mappings.command';
import { GetDispatchJobsQuery } from './application/queries/get-dispatch-jobs.query';
import { GetAgingReportQuery } from './application/queries/get-aging-report.query';
import { GetRecipientsQuery } from './application/queries/get-recipients.query';
import { createServer } from './api/server';
import { DispatchWorker } from './workers/dispatch-worker';
import { DispatchScheduler } from './workers/dispatch-scheduler';

/**
 * Main application class
 */
class Application {
  private mongoClient: MongoDBClient | null = null;
  private server: Server | null = null;
  private dispatchWorker: DispatchWorker | null = null;
  private dispatchScheduler: DispatchScheduler | null = null;

  async start(): Promise<void> {
    console.log('='.repeat(60));
    console.log('Statement Dispatch Engine - Starting...');
    console.log('='.repeat(60));

    try {
      // Load configuration
      const config = getConfig();
      console.log(`Environment: ${config.nodeEnv}`);
      console.log(`Port: ${config.port}`);
      console.log(`Invoice source: ${config.invoiceSource}`);

      // Connect to MongoDB
      console.log('Connecting to MongoDB...');
      const mongoClient = getMongoDBClient(config.mongodbUri, config.mongodbDbName);
      this.mongoClient = mongoClient;
      await mongoClient.connect();

      const db = mongoClient.getDb();

      // Initialize repositories
      const recipientRepository = new MongoRecipientRepository(db);
      const jobRepository = new MongoJobRepository(mongoClient.getClient(), db);
      const statementRunRepository = new MongoStatementRunRepository(db);
      const agingReportRepository = new MongoAgingReportRepository(db);
      const noticeSendRepository = new MongoNoticeSendRepository(db);

      const invoiceSource = new FileInvoiceSource({
        mode: config.invoiceSource,
        invoicePath: config.invoicePath,
        uploadFolder: config.invoiceUploadFolder,
      });

      // Initialize email delivery
      const mailClient = new SesMailClient(
        sesSendEmail({ region: config.awsRegion, endpoint: config.sesEndpoint || undefined })
      );
      const senderOptions = { from: config.mailFrom, cc: config.mailCc };
      const statementBuilder = new EmailStatementBuilder(mailClient, senderOptions);
      const noticeSender = new EmailNoticeSender(mailClient, senderOptions);

      // Initialize services
      const jobQueue = new JobQueue(jobRepository, recipientRepository, invoiceSource, {
        maxJobRecipients: config.maxJobRecipients,
        heartbeatStaleMs: config.heartbeatStaleMs,
      });
      const dispatcher = new StatementDispatcher(
        recipientRepository,
        statementRunRepository,
        statementBuilder,
        { sendTimeoutMs: config.sendTimeoutMs }
      );

      // Initialize commands
      const enqueueDispatchCommand = new EnqueueDispatchCommand(jobQueue);
      const runAgingReportCommand = new RunAgingReportCommand(
        recipientRepository,
        agingReportRepository,
        invoiceSource
      );
      const sendStatementCommand = new SendStatementCommand(
        recipientRepository,
        invoiceSource,
        dispatcher
      );
      const createRecipientCommand = new CreateRecipientCommand(recipientRepository);
      const addRecipientAliasCommand = new AddRecipientAliasCommand(recipientRepository);
      const addGroupMemberCommand = new AddGroupMemberCommand(recipientRepository);
      const sendNoticeCommand = new SendNoticeCommand(
        recipientRepository,
        agingReportRepository,
        noticeSendRepository,
        invoiceSource,
        noticeSender,
        { sendTimeoutMs: config.sendTimeoutMs }
      );
      const importRecipientsCommand = new ImportRecipientsCommand(recipientRepository);
      const importCustomerMappingsCommand = new ImportCustomerMappingsCommand(recipientRepository);

      // Initialize queries
      const getDispatchJobsQuery = new GetDispatchJobsQuery(jobRepository);
      const getAgingReportQuery = new GetAgingReportQuery(agingReportRepository, noticeSendRepository);
      const getRecipientsQuery = new GetRecipientsQuery(recipientRepository);

      // Create Express server
      console.log('Creating HTTP server...');
      const app = createServer({
        apiKey: config.apiKey,
        enqueueDispatchCommand,
        runAgingReportCommand,
        sendStatementCommand,
        createRecipientCommand,
        addRecipientAliasCommand,
        addGroupMemberCommand,
        sendNoticeCommand,
        importRecipientsCommand,
        importCustomerMappingsCommand,
        getDispatchJobsQuery,
        getAgingReportQuery,
        getRecipientsQuery,
        healthCheck: () => mongoClient.healthCheck(),
      });

      if (!config.apiKey) {
        console.warn('WARNING: API_KEY is not set - control API is unauthenticated');
      }

      // Start HTTP server
      this.server = app.listen(config.port, () => {
        console.log(`HTTP server listening on port ${config.port}`);
        console.log(`Health check: http://localhost:${config.port}/health`);
      });

      // Start background workers
      console.log('Starting background workers...');

      this.dispatchWorker = new DispatchWorker(
        jobQueue,
        jobRepository,
        recipientRepository,
        statementRunRepository,
        invoiceSource,
        dispatcher,
        {
          idleMs: config.workerIdleMs,
          errorDelayMs: config.workerErrorDelayMs,
          retries: config.dispatchRetries,
          retryBackoffMs: config.retryBackoffMs,
          interItemDelayMs: config.interItemDelayMs,
        }
      );
      this.dispatchWorker.start();

      this.dispatchScheduler = new DispatchScheduler(enqueueDispatchCommand);
      this.dispatchScheduler.start(config.dispatchCron);

      console.log('='.repeat(60));
      console.log('Statement Dispatch Engine - RUNNING');
      console.log('='.repeat(60));
    } catch (error) {
      console.error('Failed to start application:', error);
      await this.shutdown();
      process.exit(1);
    }
  }

  async shutdown(): Promise<void> {
    console.log('\nShutting down gracefully...');

    // Stop workers
    if (this.dispatchScheduler) {
      this.dispatchScheduler.stop();
    }
    if (this.dispatchWorker) {
      await this.dispatchWorker.stop();
    }

    // Close HTTP server
    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => {
          console.log('HTTP server closed');
          resolve();
        });
      });
    }

    // Disconnect from MongoDB
    if (this.mongoClient) {
      await this.mongoClient.disconnect();
    }

    console.log('Shutdown complete');
  }
}

// Create and start application
const app = new Application();

// Graceful shutdown handlers
process.on('SIGINT', () => {
  console.log('\nReceived SIGINT');
  app.shutdown().then(() => process.exit(0), () => process.exit(1));
});

process.on('SIGTERM', () => {
  console.log('\nReceived SIGTERM');
  app.shutdown().then(() => process.exit(0), () => process.exit(1));
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  console.error('Uncaught exception:', error);
  app.shutdown().finally(() => process.exit(1));
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
  app.shutdown().finally(() => process.exit(1));
});

// Start the application
app.start().catch((error) => {
  console.error('Application startup failed:', error);
  process.exit(1);
});
