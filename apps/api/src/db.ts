import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { AppConfig } from './config.js';

export interface Datastore {
  client: DynamoDBClient;
  docClient: DynamoDBDocumentClient;
  tableName: string;
}

/**
 * Open the DynamoDB connection described by the config, or return null when
 * either the endpoint or the table name is missing.
 */
export function connectDatastore(
  config: Pick<AppConfig, 'databaseUrl' | 'databaseName' | 'region'>,
): Datastore | null {
  if (!config.databaseUrl || !config.databaseName) return null;

  const client = new DynamoDBClient({
    endpoint: config.databaseUrl,
    region: config.region,
  });

  const docClient = DynamoDBDocumentClient.from(client, {
    marshallOptions: { removeUndefinedValues: true },
    unmarshallOptions: { wrapNumbers: false },
  });

  return { client, docClient, tableName: config.databaseName };
}
