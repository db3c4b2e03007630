import { randomUUID } from 'node:crypto';
import { ListTablesCommand } from '@aws-sdk/client-dynamodb';
import { PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import { PLANT_COLLECTION } from '@houseplants/shared';
import type { AppConfig } from '../config.js';
import { connectDatastore, type Datastore } from '../db.js';
import { SEED_PLANTS } from '../data/seed-plants.js';
import { DatastoreUnavailableError } from '../lib/errors.js';
import {
  SEARCH_ATTRIBUTE,
  matchesPredicate,
  renderFilterExpression,
  type Predicate,
} from './filter-builder.js';

export type DocumentRecord = Record<string, unknown>;

/** Turn a stored document into T, or return undefined to skip it. */
export type DocumentParser<T> = (document: DocumentRecord) => T | undefined;

/**
 * Read/write access to document collections. Identifiers and timestamps are
 * always strings on the way out.
 */
export interface DocumentGateway {
  /** False when running on seed data without a datastore. */
  readonly configured: boolean;
  readonly databaseName: string | undefined;
  /** Up to `limit` matching documents that `parse` accepts. */
  list<T>(
    collection: string,
    predicate: Predicate,
    limit: number,
    parse: DocumentParser<T>,
  ): Promise<T[]>;
  /** Persist an already validated record and return its generated id. */
  create(collection: string, record: DocumentRecord): Promise<string>;
  listCollections(): Promise<string[]>;
}

const GSI1 = 'GSI1';
const MAX_LISTED_COLLECTIONS = 10;

function collectionKey(collection: string): string {
  return `COLLECTION#${collection}`;
}

function searchIndex(record: DocumentRecord): Record<string, string> {
  const index: Record<string, string> = {};
  for (const [field, value] of Object.entries(record)) {
    if (typeof value === 'string') index[field] = value.toLowerCase();
  }
  return index;
}

const INTERNAL_ATTRIBUTES = ['PK', 'SK', 'GSI1PK', 'GSI1SK', 'entityType', SEARCH_ATTRIBUTE];

function toDocument(item: DocumentRecord): DocumentRecord {
  const document = { ...item };
  for (const attribute of INTERNAL_ATTRIBUTES) {
    delete document[attribute];
  }
  return document;
}

/**
 * Single-table DynamoDB gateway. Every document is stored under
 * PK = SK = `<COLLECTION>#<id>` and indexed on GSI1 by collection, newest last.
 */
export class DynamoDocumentGateway implements DocumentGateway {
  readonly configured = true;

  constructor(private readonly datastore: Datastore) {}

  get databaseName(): string {
    return this.datastore.tableName;
  }

  async list<T>(
    collection: string,
    predicate: Predicate,
    limit: number,
    parse: DocumentParser<T>,
  ): Promise<T[]> {
    const filter = renderFilterExpression(predicate);
    const names = Object.keys(filter.names).length > 0 ? filter.names : undefined;
    const documents: T[] = [];
    let startKey: DocumentRecord | undefined;

    // DynamoDB applies Limit before the filter, and parse may reject documents,
    // so keep paging until enough are accepted.
    do {
      const result = await this.datastore.docClient.send(
        new QueryCommand({
          TableName: this.datastore.tableName,
          IndexName: GSI1,
          KeyConditionExpression: 'GSI1PK = :collection',
          FilterExpression: filter.expression,
          ExpressionAttributeNames: names,
          ExpressionAttributeValues: { ':collection': collectionKey(collection), ...filter.values },
          ExclusiveStartKey: startKey,
        }),
      );
      for (const item of result.Items ?? []) {
        const document = parse(toDocument(item));
        if (document !== undefined) documents.push(document);
      }
      startKey = result.LastEvaluatedKey;
    } while (startKey && documents.length < limit);

    return documents.slice(0, limit);
  }

  async create(collection: string, record: DocumentRecord): Promise<string> {
    const id = randomUUID();
    const now = new Date().toISOString();
    const key = `${collection.toUpperCase()}#${id}`;

    await this.datastore.docClient.send(
      new PutCommand({
        TableName: this.datastore.tableName,
        Item: {
          PK: key,
          SK: key,
          GSI1PK: collectionKey(collection),
          GSI1SK: `${now}#${id}`,
          entityType: collection,
          [SEARCH_ATTRIBUTE]: searchIndex(record),
          ...record,
          id,
          created_at: now,
          updated_at: now,
        },
        ConditionExpression: 'attribute_not_exists(PK)',
      }),
    );

    return id;
  }

  async listCollections(): Promise<string[]> {
    const result = await this.datastore.client.send(
      new ListTablesCommand({ Limit: MAX_LISTED_COLLECTIONS }),
    );
    return result.TableNames ?? [];
  }
}

/**
 * Read-only stand-in used when no datastore is configured: serves fixed seed
 * records and refuses every write.
 */
export class SeedDocumentGateway implements DocumentGateway {
  readonly configured = false;
  readonly databaseName = undefined;

  constructor(private readonly seeds: Readonly<Record<string, readonly DocumentRecord[]>>) {}

  list<T>(
    collection: string,
    predicate: Predicate,
    limit: number,
    parse: DocumentParser<T>,
  ): Promise<T[]> {
    const documents: T[] = [];
    for (const record of this.seeds[collection] ?? []) {
      if (documents.length >= limit) break;
      if (!matchesPredicate(record, predicate)) continue;
      const document = parse({ ...record });
      if (document !== undefined) documents.push(document);
    }
    return Promise.resolve(documents);
  }

  create(): Promise<string> {
    return Promise.reject(new DatastoreUnavailableError());
  }

  listCollections(): Promise<string[]> {
    return Promise.resolve([]);
  }
}

export function createSeedGateway(): SeedDocumentGateway {
  return new SeedDocumentGateway({ [PLANT_COLLECTION]: SEED_PLANTS });
}

export function createDocumentGateway(
  config: Pick<AppConfig, 'databaseUrl' | 'databaseName' | 'region'>,
): DocumentGateway {
  const datastore = connectDatastore(config);
  return datastore ? new DynamoDocumentGateway(datastore) : createSeedGateway();
}
