/**
 * Express Server Setup
 * Configures and creates the Express application
 */

import express, { Application } from 'express';
import { createDispatchRouter } from './routes/dispatch.routes';
import { createAgingReportsRouter } from './routes/aging-reports.routes';
import { createStatementsRouter } from './routes/statements.routes';
import { createRecipientsRouter } from './routes/recipients.routes';
import { apiKeyAuth } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { EnqueueDispatchCommand } from '../application/commands/enqueue-dispatch.command';
import { RunAgingReportCommand } from '../application/commands/run-aging-report.command';
import { SendStatementCommand } from '../application/commands/send-statement.command';
import { CreateRecipientCommand } from '../application/commands/create-recipient.command';
import { AddRecipientAliasCommand } from '../application/commands/add-recipient-alias.command';
import { AddGroupMemberCommand } from '../application/commands/add-group-member.command';
import { SendNoticeCommand } from '../application/commands/send-notice.command';
import { ImportRecipientsCommand } from '../application/commands/import-recipients.command';
import { ImportCustomerMappingsCommand } from '../application/commands/import-customer-mappings.command';
import { GetDispatchJobsQuery } from '../application/queries/get-dispatch-jobs.query';
import { GetAgingReportQuery } from '../application/queries/get-aging-report.query';
import { GetRecipientsQuery } from '../application/queries/get-recipients.query';

/**
 * Dependencies for server
 */
export interface ServerDependencies {
  apiKey: string;
  enqueueDispatchCommand: EnqueueDispatchCommand;
  runAgingReportCommand: RunAgingReportCommand;
  sendStatementCommand: SendStatementCommand;
  createRecipientCommand: CreateRecipientCommand;
  addRecipientAliasCommand: AddRecipientAliasCommand;
  addGroupMemberCommand: AddGroupMemberCommand;
  sendNoticeCommand: SendNoticeCommand;
  importRecipientsCommand: ImportRecipientsCommand;
  importCustomerMappingsCommand: ImportCustomerMappingsCommand;
  getDispatchJobsQuery: GetDispatchJobsQuery;
  getAgingReportQuery: GetAgingReportQuery;
  getRecipientsQuery: GetRecipientsQuery;
  healthCheck?: () => Promise<boolean>;
}

/**
 * Create and configure Express server
 */
export function createServer(dependencies: ServerDependencies): Application {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Request logging
  app.use((req, _res, next) => {
    console.log(`${new Date().toISOString()} - ${req.method} ${req.path}`);
    next();
  });

  // Health check endpoint (no auth)
  app.get('/health', async (_req, res) => {
    const database = dependencies.healthCheck ? await dependencies.healthCheck() : true;
    res.status(database ? 200 : 503).json({
      status: database ? 'healthy' : 'degraded',
      database: database ? 'up' : 'down',
      timestamp: new Date().toISOString(),
      service: 'statement-dispatch-engine',
    });
  });

  // API Routes
  app.use('/api', apiKeyAuth(dependencies.apiKey));

  app.use(
    '/api/dispatch',
    createDispatchRouter(dependencies.enqueueDispatchCommand, dependencies.getDispatchJobsQuery)
  );

  app.use(
    '/api/aging-reports',
    createAgingReportsRouter(
      dependencies.runAgingReportCommand,
      dependencies.sendNoticeCommand,
      dependencies.getAgingReportQuery
    )
  );

  app.use('/api/statements', createStatementsRouter(dependencies.sendStatementCommand));

  app.use(
    '/api/recipients',
    createRecipientsRouter(
      dependencies.createRecipientCommand,
      dependencies.addRecipientAliasCommand,
      dependencies.addGroupMemberCommand,
      dependencies.importRecipientsCommand,
      dependencies.importCustomerMappingsCommand,
      dependencies.getRecipientsQuery
    )
  );

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
