import { vi, type Mock } from 'vitest';
import type { AppConfig } from '../src/config.js';
import type { Datastore } from '../src/db.js';
import type { DocumentParser, DocumentRecord } from '../src/services/document-gateway.js';

export const TEST_TABLE = 'test-table';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 8000,
    host: '127.0.0.1',
    databaseUrl: undefined,
    databaseName: undefined,
    region: undefined,
    corsOrigins: true,
    ...overrides,
  };
}

export const configuredConfig = testConfig({
  databaseUrl: 'http://localhost:8000',
  databaseName: TEST_TABLE,
});

export interface FakeDatastore {
  datastore: Datastore;
  /** Document client sends (Query, Put). */
  docSend: Mock;
  /** Low-level client sends (ListTables). */
  clientSend: Mock;
}

export function fakeDatastore(): FakeDatastore {
  const docSend = vi.fn();
  const clientSend = vi.fn();
  const datastore = {
    client: { send: clientSend },
    docClient: { send: docSend },
    tableName: TEST_TABLE,
  } as unknown as Datastore;
  return { datastore, docSend, clientSend };
}

/** Input of the n-th command passed to a mocked `send`. */
export function commandInput(send: Mock, call = 0): Record<string, unknown> {
  const command: unknown = send.mock.calls[call]?.[0];
  if (typeof command !== 'object' || command === null || !('input' in command)) {
    throw new Error(`send was not called ${String(call + 1)} time(s) with a command`);
  }
  return command.input as Record<string, unknown>;
}

export const keepDocument: DocumentParser<DocumentRecord> = (document) => document;

/** Accepts only documents whose light level is one of the plant enum values. */
export const knownLightOnly: DocumentParser<DocumentRecord> = (document) =>
  ['low', 'medium', 'bright'].includes(String(document.light)) ? document : undefined;
