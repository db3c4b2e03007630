import { CONNECTION_STATUS, type DiagnosticsResponse } from '@houseplants/shared';
import type { AppConfig } from '../config.js';
import type { DocumentGateway } from './document-gateway.js';

const ERROR_MESSAGE_LENGTH = 50;

function describeError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  // Cut by code point so an emoji at the boundary is never split in half.
  return Array.from(message).slice(0, ERROR_MESSAGE_LENGTH).join('');
}

/**
 * Probe the datastore and report, in plain words, what is configured and
 * whether it answers. Never throws: datastore errors end up in `database`.
 */
export async function runDiagnostics(
  gateway: DocumentGateway,
  config: Pick<AppConfig, 'databaseUrl' | 'databaseName'>,
): Promise<DiagnosticsResponse> {
  const report: DiagnosticsResponse = {
    backend: '✅ Running',
    database: '⚠️  Available but not initialized',
    database_url: config.databaseUrl ? '✅ Set' : '❌ Not Set',
    database_name: config.databaseName ? '✅ Set' : '❌ Not Set',
    connection_status: CONNECTION_STATUS.NOT_CONNECTED,
    collections: [],
  };

  if (!gateway.configured) return report;

  report.database = '✅ Available';
  report.connection_status = CONNECTION_STATUS.CONNECTED;
  try {
    const collections = await gateway.listCollections();
    report.collections = collections.slice(0, 10);
    report.database = '✅ Connected & Working';
  } catch (err) {
    report.database = `⚠️  Connected but Error: ${describeError(err)}`;
  }

  return report;
}
