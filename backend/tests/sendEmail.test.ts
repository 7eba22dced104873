/**
 * Tests for the send_email tool and its delivery backends.
 */

import { SESv2Client, SendEmailCommand } from '@aws-sdk/client-sesv2';
import {
  DeliveryReceipt,
  EmailDelivery,
  EmailMessage,
  HttpEmailDelivery,
  SesEmailDelivery,
  buildEmailDelivery,
  buildSesInput,
  setSesClient,
} from '../src/services/email';
import { ToolRegistry } from '../src/services/toolRegistry';
import { SEND_EMAIL_TOOL, createSendEmailTool } from '../src/tools/sendEmail';

class RecordingDelivery implements EmailDelivery {
  readonly name = 'fake';
  readonly sent: EmailMessage[] = [];
  failWith?: Error;

  async send(message: EmailMessage): Promise<DeliveryReceipt> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push(message);
    return { messageId: `msg-${this.sent.length}`, backend: this.name };
  }
}

function registryWith(delivery: EmailDelivery): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(createSendEmailTool(delivery));
  registry.seal();
  return registry;
}

const VALID_ARGS = {
  to: 'a@example.com',
  from: 'b@example.com',
  subject: 'X',
  content: 'Y',
};

describe('send_email tool', () => {
  test('delivers a message and reports the receipt', async () => {
    const delivery = new RecordingDelivery();

    const result = await registryWith(delivery).invoke({
      callId: 'mail-1',
      toolName: SEND_EMAIL_TOOL,
      arguments: { ...VALID_ARGS, cc: ['c@example.com'] },
    });

    expect(result).toEqual({
      callId: 'mail-1',
      status: 'ok',
      payload: {
        delivered: true,
        messageId: 'msg-1',
        backend: 'fake',
        to: 'a@example.com',
        cc: ['c@example.com'],
      },
    });
    expect(delivery.sent).toEqual([
      { to: 'a@example.com', from: 'b@example.com', subject: 'X', content: 'Y', cc: ['c@example.com'] },
    ]);
  });

  test('missing subject never reaches the backend', async () => {
    const delivery = new RecordingDelivery();
    const { subject: _omitted, ...args } = VALID_ARGS;

    const result = await registryWith(delivery).invoke({ callId: 'mail-2', toolName: SEND_EMAIL_TOOL, arguments: args });

    expect(result).toEqual({
      callId: 'mail-2',
      status: 'error',
      error: { kind: 'ValidationError', message: 'Invalid arguments for send_email: missing required field "subject"' },
    });
    expect(delivery.sent).toHaveLength(0);
  });

  test('malformed addresses are a tool failure', async () => {
    const delivery = new RecordingDelivery();

    const result = await registryWith(delivery).invoke({
      callId: 'mail-3',
      toolName: SEND_EMAIL_TOOL,
      arguments: { ...VALID_ARGS, to: 'not-an-address' },
    });

    expect(result).toEqual({
      callId: 'mail-3',
      status: 'error',
      error: { kind: 'ToolExecutionError', message: 'to is not a valid email address: not-an-address' },
    });
  });

  test('backend rejections surface as opaque tool failures', async () => {
    const delivery = new RecordingDelivery();
    delivery.failWith = new Error('Email address is not verified.');

    const result = await registryWith(delivery).invoke({ callId: 'mail-4', toolName: SEND_EMAIL_TOOL, arguments: VALID_ARGS });

    expect(result).toEqual({
      callId: 'mail-4',
      status: 'error',
      error: { kind: 'ToolExecutionError', message: 'Email address is not verified.' },
    });
  });
});

describe('buildSesInput', () => {
  test('plain text body without cc', () => {
    expect(buildSesInput(VALID_ARGS)).toEqual({
      FromEmailAddress: 'b@example.com',
      Destination: { ToAddresses: ['a@example.com'], CcAddresses: undefined },
      Content: {
        Simple: {
          Subject: { Data: 'X', Charset: 'UTF-8' },
          Body: { Text: { Data: 'Y', Charset: 'UTF-8' } },
        },
      },
    });
  });

  test('HTML content goes in the Html part', () => {
    const input = buildSesInput({ ...VALID_ARGS, content: '<p>Hello</p>', cc: ['c@example.com'] });

    expect(input.Content?.Simple?.Body).toEqual({ Html: { Data: '<p>Hello</p>', Charset: 'UTF-8' } });
    expect(input.Destination?.CcAddresses).toEqual(['c@example.com']);
  });
});

describe('HttpEmailDelivery', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('posts the email API payload', async () => {
    const fetchMock = jest.spyOn(globalThis, 'fetch').mockResolvedValueOnce(
      new Response('{}', { status: 200, headers: { 'x-message-id': 'api-77' } }),
    );

    const receipt = await new HttpEmailDelivery('http://mail.test/send').send({ ...VALID_ARGS, cc: ['c@example.com'] });

    expect(receipt).toEqual({ messageId: 'api-77', backend: 'http' });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://mail.test/send');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      to_email: 'a@example.com',
      from_email: 'b@example.com',
      subject: 'X',
      content: 'Y',
      cc: ['c@example.com'],
    });
  });

  test('non-2xx responses throw', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValueOnce(new Response('sender rejected', { status: 403 }));

    await expect(new HttpEmailDelivery('http://mail.test/send').send(VALID_ARGS))
      .rejects.toThrow('email_api_http_403:sender rejected');
  });
});

describe('SesEmailDelivery', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('sends the built input and reports the message id', async () => {
    const client = new SESv2Client({ region: 'us-east-1' });
    const send = jest.spyOn(client, 'send').mockImplementation(async () => ({ $metadata: {}, MessageId: 'ses-1' }));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    setSesClient(client);

    const receipt = await new SesEmailDelivery().send(VALID_ARGS);

    expect(receipt).toEqual({ messageId: 'ses-1', backend: 'ses' });
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(SendEmailCommand);
    expect(command.input).toEqual(buildSesInput(VALID_ARGS));
  });

  test('hands the caller signal to the SDK so a cancel aborts the send', async () => {
    const client = new SESv2Client({ region: 'us-east-1' });
    const send = jest.spyOn(client, 'send').mockImplementation(async () => ({ $metadata: {}, MessageId: 'ses-2' }));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    setSesClient(client);
    const controller = new AbortController();

    await new SesEmailDelivery().send(VALID_ARGS, controller.signal);

    expect(send.mock.calls[0][1]).toEqual({ abortSignal: controller.signal });
  });
});

describe('buildEmailDelivery', () => {
  test('http needs an API URL', () => {
    expect(() => buildEmailDelivery({ delivery: 'http' })).toThrow('EMAIL_API_URL is required when EMAIL_DELIVERY=http');
    expect(buildEmailDelivery({ delivery: 'http', apiUrl: 'http://mail.test/send' }).name).toBe('http');
  });

  test('ses is the default backend', () => {
    expect(buildEmailDelivery({ delivery: 'ses', region: 'eu-west-1' }).name).toBe('ses');
  });
});
