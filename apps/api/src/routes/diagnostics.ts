import type { FastifyInstance } from 'fastify';
import type { DiagnosticsResponse } from '@houseplants/shared';
import type { AppConfig } from '../config.js';
import type { DocumentGateway } from '../services/document-gateway.js';
import { runDiagnostics } from '../services/diagnostics.js';

export interface DiagnosticsRouteOptions {
  gateway: DocumentGateway;
  config: Pick<AppConfig, 'databaseUrl' | 'databaseName'>;
}

export function diagnosticsRoute(app: FastifyInstance, options: DiagnosticsRouteOptions): void {
  const { gateway, config } = options;

  app.get('/test', async (request): Promise<DiagnosticsResponse> => {
    const report = await runDiagnostics(gateway, config);
    request.log.info(
      { database: report.database, connectionStatus: report.connection_status },
      'Diagnostics requested',
    );
    return report;
  });
}
