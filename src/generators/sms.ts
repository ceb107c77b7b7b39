import { BaseGenerator, MINUTE_MS } from './base.js';
import { getTemplateBank } from '../lib/template-bank.js';
import type { JsonRecord } from '../agents/types.js';

type ConversationType = 'family' | 'friend' | 'work' | 'group';
type AttachmentType = 'image' | 'video' | 'audio' | 'document';

const CONVERSATION_WEIGHTS: Array<{ value: ConversationType; weight: number }> = [
  { value: 'family', weight: 30 },
  { value: 'friend', weight: 40 },
  { value: 'work', weight: 20 },
  { value: 'group', weight: 10 },
];

const ATTACHMENT_TYPES: AttachmentType[] = ['image', 'video', 'audio', 'document'];

export const USER_PHONE = '+15550000000';

interface Participant {
  phone_number: string;
  contact_name: string;
}

export class SmsGenerator extends BaseGenerator {
  readonly appName = 'sms';
  protected readonly idPrefix = 'conv';
  protected readonly idField = 'conversation_id';

  protected instructions(): string {
    return `
Please generate SMS conversation data in the following JSON format:
{
    "conversations": [
        {
            "conversation_id": "unique_identifier",
            "participants": [{ "phone_number": "+1234567890", "contact_name": "Contact Name" }],
            "messages": [
                {
                    "id": "unique_identifier",
                    "sender_phone": "+1234567890",
                    "is_from_user": true,
                    "content": "Message content",
                    "timestamp": "ISO timestamp",
                    "message_type": "text|image|video|audio|document|location|contact|other",
                    "delivery_status": "sent|delivered|read|failed",
                    "attachments": [
                        { "type": "image|video|audio|document", "filename": "file.jpg", "size_bytes": 1024, "mime_type": "image/jpeg" }
                    ],
                    "read_receipt": true,
                    "group_info": { "is_group": false, "group_name": "Group Name", "group_id": "group_id" }
                }
            ]
        }
    ]
}

Create realistic conversations that:
- Show natural messaging patterns and conversation flow
- Include both individual and group conversations
- Relate to the provided events and user profile
- Mix different message types (text, images, etc.)
- Show realistic timing and response patterns
- Include casual, work, and family communication styles
- Have messages flowing both ways (sent and received)
`;
  }

  protected synthesize(count: number): JsonRecord[] {
    return Array.from({ length: count }, () => {
      const type = this.faker.helpers.weightedArrayElement(CONVERSATION_WEIGHTS);
      const conversationId = this.nextId();

      if (type === 'group') {
        const participants = Array.from(
          { length: this.faker.number.int({ min: 3, max: 6 }) },
          () => this.participant('friend'),
        );
        return {
          conversation_id: conversationId,
          participants,
          messages: this.groupMessages(conversationId, participants),
        };
      }

      const participant = this.participant(type);
      return {
        conversation_id: conversationId,
        participants: [participant],
        messages: this.individualMessages(conversationId, participant, type),
      };
    });
  }

  private participant(type: Exclude<ConversationType, 'group'>): Participant {
    const f = this.faker;
    let name: string;
    if (type === 'family') {
      name = f.helpers.arrayElement(getTemplateBank().sms.family_names);
    } else if (type === 'work') {
      name = `${f.person.firstName()} ${f.person.lastName()}`;
    } else {
      name = f.person.firstName();
    }
    return { phone_number: f.phone.number({ style: 'international' }), contact_name: name };
  }

  private individualMessages(
    conversationId: string,
    participant: Participant,
    type: Exclude<ConversationType, 'group'>,
  ): JsonRecord[] {
    const f = this.faker;
    const bank = getTemplateBank().sms.individual[type];
    const timeline = this.timeline(f.number.int({ min: 3, max: 15 }), 120);
    let fromUser = f.datatype.boolean();

    return timeline.map((sentAt, i) => {
      const content = f.helpers.arrayElement(fromUser ? bank.user_messages : bank.other_messages);
      const message: JsonRecord = {
        id: `${conversationId}_msg_${i + 1}`,
        sender_phone: fromUser ? USER_PHONE : participant.phone_number,
        is_from_user: fromUser,
        content,
        timestamp: sentAt.toISOString(),
        message_type: 'text',
        delivery_status: 'read',
        attachments: [],
        read_receipt: true,
        group_info: { is_group: false },
      };

      if (f.datatype.boolean({ probability: 0.1 })) {
        const attachment = this.attachment();
        message.attachments = [attachment];
        message.message_type = attachment.type;
      }

      fromUser = !fromUser;
      return message;
    });
  }

  private groupMessages(conversationId: string, participants: Participant[]): JsonRecord[] {
    const f = this.faker;
    const bank = getTemplateBank().sms;
    const senders = [USER_PHONE, ...participants.map((p) => p.phone_number)];
    const groupInfo = {
      is_group: true,
      group_name: `${participants[0].contact_name}, ${participants[1].contact_name} and others`,
      group_id: `group_${f.string.alphanumeric({ length: 8, casing: 'lower' })}`,
    };
    const timeline = this.timeline(f.number.int({ min: 5, max: 20 }), 60);

    return timeline.map((sentAt, i) => {
      const sender = f.helpers.arrayElement(senders);
      const message: JsonRecord = {
        id: `${conversationId}_msg_${i + 1}`,
        sender_phone: sender,
        is_from_user: sender === USER_PHONE,
        content: f.helpers.arrayElement(bank.group_messages),
        timestamp: sentAt.toISOString(),
        message_type: 'text',
        delivery_status: 'read',
        attachments: [],
        read_receipt: true,
        group_info: { ...groupInfo },
      };
      return message;
    });
  }

  /**
   * Send times for one conversation, 1 to `maxGapMinutes` apart. The start is
   * drawn so the last message still lands inside the window.
   */
  private timeline(messageCount: number, maxGapMinutes: number): Date[] {
    const f = this.faker;
    const gaps = Array.from({ length: messageCount - 1 }, () => f.number.int({ min: 1, max: maxGapMinutes }) * MINUTE_MS);
    const span = gaps.reduce((sum, gap) => sum + gap, 0);
    const latestStart = new Date(Math.max(this.windowStart.getTime(), this.windowEnd.getTime() - span));

    let current = f.date.between({ from: this.windowStart, to: latestStart }).getTime();
    const times = [new Date(current)];
    for (const gap of gaps) {
      current += gap;
      times.push(this.clampToWindow(new Date(current)));
    }
    return times;
  }

  private attachment(): { type: AttachmentType; filename: string; size_bytes: number; mime_type: string } {
    const f = this.faker;
    const type = f.helpers.arrayElement(ATTACHMENT_TYPES);
    const kind = getTemplateBank().sms.attachments[type];
    return {
      type,
      filename: `${kind.prefix}_${f.number.int({ min: 1000, max: 9999 })}.${kind.extension}`,
      size_bytes: f.number.int({ min: 1024, max: 10_485_760 }),
      mime_type: kind.mime_type,
    };
  }
}
