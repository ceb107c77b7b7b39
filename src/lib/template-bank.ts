import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL('../../data/templates.json', import.meta.url));

const StringList = z.array(z.string().min(1)).min(1);

const MessageBankSchema = z.object({
  user_messages: StringList,
  other_messages: StringList,
});

const AttachmentKindSchema = z.object({
  mime_type: z.string(),
  prefix: z.string(),
  extension: z.string(),
});

export const AlarmFrequencySchema = z.enum(['daily', 'weekdays', 'weekends', 'custom', 'once']);
export const AlarmPrioritySchema = z.enum(['high', 'medium', 'low']);

export const AlarmTemplateSchema = z.object({
  label: z.string().min(1),
  /** [startHour, startMinute, endHour, endMinute] */
  time_range: z.tuple([z.number().int(), z.number().int(), z.number().int(), z.number().int()]),
  category: z.string().min(1),
  frequency: AlarmFrequencySchema,
  priority: AlarmPrioritySchema,
});

export type AlarmTemplate = z.infer<typeof AlarmTemplateSchema>;
export type AlarmFrequency = z.infer<typeof AlarmFrequencySchema>;
export type AlarmPriority = z.infer<typeof AlarmPrioritySchema>;

export const TemplateBankSchema = z.object({
  calendar: z.object({
    titles: z.record(StringList),
    descriptions: z.record(z.string()),
    calendar_names: z.record(z.string()),
  }),
  sms: z.object({
    family_names: StringList,
    individual: z.object({
      family: MessageBankSchema,
      friend: MessageBankSchema,
      work: MessageBankSchema,
    }),
    group_messages: StringList,
    attachments: z.object({
      image: AttachmentKindSchema,
      video: AttachmentKindSchema,
      audio: AttachmentKindSchema,
      document: AttachmentKindSchema,
    }),
  }),
  emails: z.object({
    subjects: z.record(StringList),
    bodies: z.record(z.string()),
  }),
  reminders: z.object({
    titles: z.record(StringList),
  }),
  notes: z.object({
    titles: z.record(StringList),
    contents: z.record(z.string()),
    checklist_items: StringList,
  }),
  wallet: z.object({
    organizations: z.record(StringList),
    pass_names: z.record(z.string()),
  }),
  alarms: z.object({
    built_in_sounds: StringList,
    template_groups: z.object({
      office: z.array(AlarmTemplateSchema),
      healthcare: z.array(AlarmTemplateSchema),
      student: z.array(AlarmTemplateSchema),
      medication: z.array(AlarmTemplateSchema),
      fitness: z.array(AlarmTemplateSchema),
      general: z.array(AlarmTemplateSchema).min(1),
    }),
    occupation_keywords: z.object({
      office: StringList,
      healthcare: StringList,
      student: StringList,
    }),
    lifestyle_keywords: z.object({
      medication: StringList,
      fitness: StringList,
    }),
  }),
});

export type TemplateBank = z.infer<typeof TemplateBankSchema>;

let cached: TemplateBank | null = null;

/** Loads and validates the fallback template bank once per process. */
export function getTemplateBank(): TemplateBank {
  if (!cached) {
    cached = loadTemplateBank(DEFAULT_TEMPLATE_PATH);
  }
  return cached;
}

export function loadTemplateBank(path: string): TemplateBank {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const parsed = TemplateBankSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid template bank at ${path}: ${detail}`);
  }
  return parsed.data;
}

/** Fills `{title}`-style placeholders. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}
