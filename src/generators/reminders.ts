import { BaseGenerator } from './base.js';
import { getTemplateBank } from '../lib/template-bank.js';
import type { JsonRecord } from '../agents/types.js';

const REMINDER_CATEGORIES = ['personal', 'work', 'shopping', 'health'] as const;

export class RemindersGenerator extends BaseGenerator {
  readonly appName = 'reminders';
  protected readonly idPrefix = 'reminder';

  protected instructions(): string {
    return `
Please generate reminders data in the following JSON format:
{
    "reminders": [
        {
            "id": "unique_identifier",
            "title": "Reminder title",
            "notes": "Optional notes",
            "completed": false,
            "completion_date": "ISO timestamp (only when completed)",
            "due_date": "ISO timestamp",
            "priority": "low|medium|high",
            "list_name": "List Name",
            "category": "personal|work|shopping|health",
            "location_reminder": { "enabled": false },
            "time_reminder": { "enabled": true, "alert_times": ["ISO timestamp"], "repeat": { "frequency": "never|daily|weekly|monthly" } },
            "subtasks": [],
            "flagged": false,
            "created_date": "ISO timestamp",
            "modified_date": "ISO timestamp"
        }
    ]
}

Include personal tasks, work items, shopping lists, and location-based reminders
with appropriate due dates and priorities.
`;
  }

  protected synthesize(count: number): JsonRecord[] {
    const f = this.faker;
    const bank = getTemplateBank().reminders;

    return Array.from({ length: count }, () => {
      const category = f.helpers.arrayElement(REMINDER_CATEGORIES);
      const title = f.helpers.arrayElement(bank.titles[category] ?? ['Reminder']);
      const completed = f.datatype.boolean();
      const [createdDate, modifiedDate] = this.orderedTimestamps();

      const reminder: JsonRecord = {
        id: this.nextId(),
        title,
        notes: `Notes for ${title.toLowerCase()}`,
        completed,
        due_date: this.randomTimestamp(),
        priority: f.helpers.arrayElement(['low', 'medium', 'high']),
        list_name: category[0].toUpperCase() + category.slice(1),
        category,
        location_reminder: { enabled: false },
        time_reminder: {
          enabled: true,
          alert_times: [this.randomTimestamp()],
          repeat: { frequency: 'never' },
        },
        subtasks: [],
        flagged: f.datatype.boolean({ probability: 0.1 }),
        created_date: createdDate.toISOString(),
        modified_date: modifiedDate.toISOString(),
      };

      if (completed) {
        reminder.completion_date = f.date.between({ from: createdDate, to: this.windowEnd }).toISOString();
      }
      return reminder;
    });
  }
}
