/**
 * DynamoDB-backed connection store for the RPC bridge.
 *
 * Lambda invocations share no memory, so the initialize handshake is
 * recorded in a table keyed by connectionId with a TTL.
 */

import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  PutCommand,
  GetCommand,
  DeleteCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { ConnectionStore, expiryFrom, makeConnectionRecord } from '../models/connection';
import { ClientInfo } from '../models/rpc';
import { logger } from '../utils/logger';

// ─── Client singleton ───────────────────────────────────────────────────────

let docClient: DynamoDBDocumentClient | null = null;

export function getDocClient(): DynamoDBDocumentClient {
  if (!docClient) {
    docClient = DynamoDBDocumentClient.from(new DynamoDBClient({}), {
      marshallOptions: { removeUndefinedValues: true },
    });
  }
  return docClient;
}

/** For testing injection. */
export function setDocClient(client: DynamoDBDocumentClient): void {
  docClient = client;
}

// ─── Table name from env ────────────────────────────────────────────────────

export function getConnectionsTable(): string {
  return process.env.RPC_CONNECTIONS_TABLE || 'RelayAgent-RpcConnections';
}

// ─── Store ──────────────────────────────────────────────────────────────────

export class DynamoConnectionStore implements ConnectionStore {
  private readonly tableName: string;

  constructor(tableName: string = getConnectionsTable()) {
    this.tableName = tableName;
  }

  async markInitialized(connectionId: string, client: ClientInfo): Promise<void> {
    await getDocClient().send(new PutCommand({
      TableName: this.tableName,
      Item: makeConnectionRecord(connectionId, client),
    }));
    logger.info('Connection saved', { connectionId });
  }

  async isInitialized(connectionId: string): Promise<boolean> {
    if (!connectionId) {
      return false;
    }

    const result = await getDocClient().send(new GetCommand({
      TableName: this.tableName,
      Key: { connectionId },
    }));

    const ttl = result.Item?.ttl;
    // DynamoDB deletes expired items lazily, so the TTL is checked here as well.
    return typeof ttl === 'number' && ttl * 1000 > Date.now();
  }

  async touch(connectionId: string): Promise<void> {
    try {
      await getDocClient().send(new UpdateCommand({
        TableName: this.tableName,
        Key: { connectionId },
        UpdateExpression: 'SET #ttl = :ttl',
        ConditionExpression: 'attribute_exists(connectionId)',
        ExpressionAttributeNames: { '#ttl': 'ttl' },
        ExpressionAttributeValues: { ':ttl': expiryFrom(Date.now()) },
      }));
    } catch (err) {
      if (err instanceof ConditionalCheckFailedException) {
        logger.warn('Connection vanished before TTL refresh', { connectionId });
        return;
      }
      throw err;
    }
  }

  async remove(connectionId: string): Promise<void> {
    await getDocClient().send(new DeleteCommand({
      TableName: this.tableName,
      Key: { connectionId },
    }));
    logger.info('Connection deleted', { connectionId });
  }
}
