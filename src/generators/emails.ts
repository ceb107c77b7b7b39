import { BaseGenerator } from './base.js';
import { getTemplateBank } from '../lib/template-bank.js';
import type { JsonRecord, UserIdentity } from '../agents/types.js';
import type { GenerationRequest } from './types.js';

const EMAIL_CATEGORIES = ['work', 'personal', 'promotional', 'social'] as const;

/** Mailbox owner derived from the analysed identity. */
export function userMailbox(identity: UserIdentity): { email: string; name: string } {
  const local = [identity.first_name, identity.last_name]
    .map((part) => part.toLowerCase().replace(/[^a-z0-9]/g, ''))
    .filter(Boolean)
    .join('.');
  return {
    email: `${local || 'user'}@example.com`,
    name: `${identity.first_name} ${identity.last_name}`.trim() || 'User',
  };
}

export class EmailsGenerator extends BaseGenerator {
  readonly appName = 'emails';
  protected readonly idPrefix = 'email';

  protected instructions(): string {
    return `
Please generate email data in the following JSON format:
{
    "emails": [
        {
            "id": "unique_identifier",
            "subject": "Subject line",
            "from": { "email": "sender@example.com", "name": "Sender Name" },
            "to": [{ "email": "recipient@example.com", "name": "Recipient Name" }],
            "cc": [],
            "bcc": [],
            "body": { "text": "Plain text body" },
            "timestamp": "ISO timestamp",
            "is_sent": false,
            "is_read": true,
            "is_starred": false,
            "priority": "low|normal|high",
            "folder": "inbox|sent|drafts|archive|spam|trash",
            "labels": [],
            "attachments": [],
            "thread_id": "thread_identifier",
            "account": "user@example.com",
            "category": "work|personal|promotional|social"
        }
    ]
}

Mix personal and work emails with realistic subjects and content.
Include sent and received emails with appropriate timing and relationships.
`;
  }

  protected synthesize(count: number, request: GenerationRequest): JsonRecord[] {
    const f = this.faker;
    const bank = getTemplateBank().emails;
    const owner = userMailbox(request.analysis.user_identity);

    return Array.from({ length: count }, () => {
      const isSent = f.datatype.boolean();
      const category = f.helpers.arrayElement(EMAIL_CATEGORIES);
      const firstName = f.person.firstName();
      const lastName = f.person.lastName();
      const other = {
        email: f.internet.email({ firstName, lastName }).toLowerCase(),
        name: `${firstName} ${lastName}`,
      };
      const id = this.nextId();

      return {
        id,
        subject: f.helpers.arrayElement(bank.subjects[category] ?? ['General Email']),
        from: isSent ? { ...owner } : other,
        to: [isSent ? other : { ...owner }],
        cc: [],
        bcc: [],
        body: { text: bank.bodies[category] ?? '' },
        timestamp: this.randomTimestamp(),
        is_sent: isSent,
        is_read: isSent ? true : f.datatype.boolean(),
        is_starred: f.datatype.boolean({ probability: 0.1 }),
        priority: 'normal',
        folder: isSent ? 'sent' : 'inbox',
        labels: [],
        attachments: [],
        thread_id: `thread_${id}`,
        account: owner.email,
        category,
      };
    });
  }
}
