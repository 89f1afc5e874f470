import { z } from 'zod';
import { defineTool } from './defineTool.js';

export const EMAIL_SENT = 'email_sent';

export const SendEmailSchema = z.object({
  recipients: z.array(z.string()).describe('Email addresses to deliver to'),
  subject: z.string().describe('Subject line'),
  body: z.string().describe('Message body'),
});

export type SendEmailArgs = z.infer<typeof SendEmailSchema>;

/**
 * Send the summary via email (stub).
 * Nothing leaves the process: the message is written to the log.
 */
export const sendEmailTool = defineTool({
  name: 'send_email',
  description: 'Send the summary via email.',
  parameters: SendEmailSchema,
  execute: ({ recipients, subject, body }: SendEmailArgs) => {
    console.log(`[EMAIL] To: ${recipients.join(', ')}\nSubject: ${subject}\n${body}`);
    return EMAIL_SENT;
  },
});
