/**
 * Tests for the DynamoDB connection store.
 */

import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DeleteCommand, DynamoDBDocumentClient, GetCommand, PutCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { DynamoConnectionStore, setDocClient } from '../src/services/dynamodb';

const docClient = DynamoDBDocumentClient.from(new DynamoDBClient({ region: 'us-east-1' }));

beforeAll(() => {
  setDocClient(docClient);
});

afterEach(() => {
  jest.restoreAllMocks();
});

function mockSend(output: Record<string, unknown> = {}): jest.SpyInstance {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  return jest.spyOn(docClient, 'send').mockImplementation(async () => ({ $metadata: {}, ...output }));
}

describe('DynamoConnectionStore', () => {
  test('markInitialized writes a record with a TTL', async () => {
    const send = mockSend();
    jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);

    await new DynamoConnectionStore('test-table').markInitialized('conn-1', { name: 'cli', version: '2.0.0' });

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutCommand);
    expect(command.input).toEqual({
      TableName: 'test-table',
      Item: {
        connectionId: 'conn-1',
        clientName: 'cli',
        clientVersion: '2.0.0',
        initializedAt: '2023-11-14T22:13:20.000Z',
        ttl: 1_700_003_600,
      },
    });
  });

  test('isInitialized honours the TTL', async () => {
    const store = new DynamoConnectionStore('test-table');
    const nowSeconds = Math.floor(Date.now() / 1000);

    const send = mockSend({ Item: { connectionId: 'conn-1', ttl: nowSeconds + 60 } });
    await expect(store.isInitialized('conn-1')).resolves.toBe(true);
    expect(send.mock.calls[0][0]).toBeInstanceOf(GetCommand);
    expect(send.mock.calls[0][0].input).toEqual({ TableName: 'test-table', Key: { connectionId: 'conn-1' } });

    mockSend({ Item: { connectionId: 'conn-1', ttl: nowSeconds - 60 } });
    await expect(store.isInitialized('conn-1')).resolves.toBe(false);

    mockSend({});
    await expect(store.isInitialized('conn-2')).resolves.toBe(false);
  });

  test('an empty connection id is never initialized', async () => {
    const send = mockSend();

    await expect(new DynamoConnectionStore('test-table').isInitialized('')).resolves.toBe(false);
    expect(send).not.toHaveBeenCalled();
  });

  test('touch moves the TTL an hour past now', async () => {
    const send = mockSend();
    jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);

    await new DynamoConnectionStore('test-table').touch('conn-1');

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(UpdateCommand);
    expect(command.input).toEqual({
      TableName: 'test-table',
      Key: { connectionId: 'conn-1' },
      UpdateExpression: 'SET #ttl = :ttl',
      ConditionExpression: 'attribute_exists(connectionId)',
      ExpressionAttributeNames: { '#ttl': 'ttl' },
      ExpressionAttributeValues: { ':ttl': 1_700_003_600 },
    });
  });

  test('touch on a vanished record is a no-op', async () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(docClient, 'send').mockImplementation(async () => {
      throw new ConditionalCheckFailedException({ message: 'The conditional request failed', $metadata: {} });
    });

    await expect(new DynamoConnectionStore('test-table').touch('gone')).resolves.toBeUndefined();
  });

  test('remove deletes the record', async () => {
    const send = mockSend();

    await new DynamoConnectionStore('test-table').remove('conn-1');

    expect(send.mock.calls[0][0]).toBeInstanceOf(DeleteCommand);
    expect(send.mock.calls[0][0].input).toEqual({ TableName: 'test-table', Key: { connectionId: 'conn-1' } });
  });
});
