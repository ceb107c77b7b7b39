import { BaseGenerator } from './base.js';
import { fillTemplate, getTemplateBank } from '../lib/template-bank.js';
import type { JsonRecord } from '../agents/types.js';

const NOTE_CATEGORIES = ['personal', 'work', 'ideas', 'shopping'] as const;

export class NotesGenerator extends BaseGenerator {
  readonly appName = 'notes';
  protected readonly idPrefix = 'note';

  protected instructions(): string {
    return `
Please generate notes data in the following JSON format:
{
    "notes": [
        {
            "id": "unique_identifier",
            "title": "Note title",
            "content": "Note body",
            "folder": "Folder Name",
            "category": "personal|work|ideas|shopping",
            "tags": ["tag"],
            "created_date": "ISO timestamp",
            "modified_date": "ISO timestamp",
            "pinned": false,
            "locked": false,
            "shared": false,
            "attachments": [],
            "checklist": { "is_checklist": false, "items": [{ "id": "item_0", "text": "Item", "completed": false }] },
            "formatting": { "has_formatting": false, "style": "plain" }
        }
    ]
}

Include meeting notes, personal thoughts, shopping lists, ideas, and other
typical note-taking scenarios.
`;
  }

  protected synthesize(count: number): JsonRecord[] {
    const f = this.faker;
    const bank = getTemplateBank().notes;

    return Array.from({ length: count }, () => {
      const category = f.helpers.arrayElement(NOTE_CATEGORIES);
      const title = f.helpers.arrayElement(bank.titles[category] ?? ['Note']);
      const [createdDate, modifiedDate] = this.orderedTimestamps();
      const isChecklist = category === 'shopping';

      return {
        id: this.nextId(),
        title,
        content: fillTemplate(bank.contents[category] ?? 'Notes about {title}', { title: title.toLowerCase() }),
        folder: category[0].toUpperCase() + category.slice(1),
        category,
        tags: [category],
        created_date: createdDate.toISOString(),
        modified_date: modifiedDate.toISOString(),
        pinned: f.datatype.boolean({ probability: 0.1 }),
        locked: false,
        shared: false,
        attachments: [],
        checklist: isChecklist
          ? {
              is_checklist: true,
              items: bank.checklist_items.map((text, i) => ({
                id: `item_${i}`,
                text,
                completed: f.datatype.boolean(),
              })),
            }
          : { is_checklist: false },
        formatting: { has_formatting: false, style: 'plain' },
      };
    });
  }
}
