/**
 * Email delivery backends for the send_email tool.
 *
 * Sender verification (SES identities, SPF/DKIM alignment) is the delivery
 * backend's business: whatever it reports comes back as a thrown error and
 * ends up as an opaque tool failure.
 */

import { SESv2Client, SendEmailCommand, type SendEmailCommandInput } from '@aws-sdk/client-sesv2';
import { logger } from '../utils/logger';

export interface EmailMessage {
  to: string;
  from: string;
  subject: string;
  content: string;
  cc?: string[];
}

export interface DeliveryReceipt {
  messageId: string | null;
  backend: string;
}

export interface EmailDelivery {
  readonly name: string;
  send(message: EmailMessage, signal?: AbortSignal): Promise<DeliveryReceipt>;
}

const HTML_PATTERN = /<[a-z][\s\S]*>/i;

// ─── SES ────────────────────────────────────────────────────────────────────

let sesClient: SESv2Client | null = null;

export function initSesClient(region?: string): void {
  sesClient = new SESv2Client({
    region: region || process.env.AWS_REGION || 'us-east-1',
  });
}

export function getSesClient(): SESv2Client {
  if (!sesClient) {
    sesClient = new SESv2Client({ region: process.env.AWS_REGION || 'us-east-1' });
  }
  return sesClient;
}

/** For testing injection. */
export function setSesClient(client: SESv2Client): void {
  sesClient = client;
}

export function buildSesInput(message: EmailMessage): SendEmailCommandInput {
  const body = HTML_PATTERN.test(message.content)
    ? { Html: { Data: message.content, Charset: 'UTF-8' } }
    : { Text: { Data: message.content, Charset: 'UTF-8' } };

  return {
    FromEmailAddress: message.from,
    Destination: {
      ToAddresses: [message.to],
      CcAddresses: message.cc && message.cc.length > 0 ? message.cc : undefined,
    },
    Content: {
      Simple: {
        Subject: { Data: message.subject, Charset: 'UTF-8' },
        Body: body,
      },
    },
  };
}

export class SesEmailDelivery implements EmailDelivery {
  readonly name = 'ses';

  async send(message: EmailMessage, signal?: AbortSignal): Promise<DeliveryReceipt> {
    const output = await getSesClient().send(new SendEmailCommand(buildSesInput(message)), { abortSignal: signal });
    logger.info('Email accepted by SES', {}, { messageId: output.MessageId });
    return { messageId: output.MessageId ?? null, backend: this.name };
  }
}

// ─── HTTP email API ─────────────────────────────────────────────────────────

export class HttpEmailDelivery implements EmailDelivery {
  readonly name = 'http';

  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(endpoint: string, timeoutMs = 30_000) {
    this.endpoint = endpoint;
    this.timeoutMs = timeoutMs;
  }

  async send(message: EmailMessage, signal?: AbortSignal): Promise<DeliveryReceipt> {
    const payload: Record<string, unknown> = {
      to_email: message.to,
      from_email: message.from,
      subject: message.subject,
      content: message.content,
    };
    if (message.cc && message.cc.length > 0) {
      payload.cc = message.cc;
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'Accept': 'application/json' },
      body: JSON.stringify(payload),
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });

    if (!response.ok) {
      const bodyText = await response.text();
      throw new Error(`email_api_http_${response.status}:${bodyText.slice(0, 120)}`);
    }

    logger.info('Email accepted by email API', {}, { status: response.status });
    return { messageId: response.headers.get('x-message-id'), backend: this.name };
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────

export interface EmailDeliveryConfig {
  delivery: 'ses' | 'http';
  apiUrl?: string;
  region?: string;
}

export function buildEmailDelivery(config: EmailDeliveryConfig): EmailDelivery {
  if (config.delivery === 'http') {
    if (!config.apiUrl) {
      throw new Error('EMAIL_API_URL is required when EMAIL_DELIVERY=http');
    }
    return new HttpEmailDelivery(config.apiUrl);
  }

  initSesClient(config.region);
  return new SesEmailDelivery();
}
