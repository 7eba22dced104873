import { ToolDescriptor } from '../models/tool';
import { EmailDelivery, EmailMessage } from '../services/email';

export const SEND_EMAIL_TOOL = 'send_email';

const ADDRESS_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function assertAddress(field: string, value: string): void {
  if (!ADDRESS_PATTERN.test(value)) {
    throw new Error(`${field} is not a valid email address: ${value}`);
  }
}

/**
 * send_email — delivers one message through the configured backend.
 * Both addresses must satisfy the backend's sender/recipient verification.
 */
export function createSendEmailTool(delivery: EmailDelivery): ToolDescriptor {
  return {
    name: SEND_EMAIL_TOOL,
    description:
      'Send an email. The sender address must be verified with the delivery backend. ' +
      'Optionally include cc as a list of addresses. HTML content is supported.',
    parameters: {
      to: { type: 'string', required: true, description: 'Recipient email address' },
      from: { type: 'string', required: true, description: 'Sender email address (must be verified)' },
      subject: { type: 'string', required: true, description: 'Email subject line' },
      content: { type: 'string', required: true, description: 'Email body (HTML supported)' },
      cc: { type: 'array', items: 'string', description: 'CC recipients (optional)' },
    },
    handler: async (args, context) => {
      const message: EmailMessage = {
        to: String(args.to),
        from: String(args.from),
        subject: String(args.subject),
        content: String(args.content),
      };

      assertAddress('to', message.to);
      assertAddress('from', message.from);

      if (Array.isArray(args.cc) && args.cc.length > 0) {
        message.cc = args.cc.map(String);
        message.cc.forEach((address) => assertAddress('cc', address));
      }

      const receipt = await delivery.send(message, context.signal);
      return {
        delivered: true,
        messageId: receipt.messageId,
        backend: receipt.backend,
        to: message.to,
        cc: message.cc ?? [],
      };
    },
  };
}
