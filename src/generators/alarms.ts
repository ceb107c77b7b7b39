import { BaseGenerator, DAY_MS, MINUTE_MS, startOfDayUTC } from './base.js';
import { getTemplateBank } from '../lib/template-bank.js';
import type { AlarmFrequency, AlarmPriority, AlarmTemplate } from '../lib/template-bank.js';
import type { JsonRecord, UserProfile } from '../agents/types.js';
import type { GenerationRequest } from './types.js';

/** Index matches Date#getUTCDay(). */
const DAY_NAMES = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];
const WEEK_ORDER = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];
const DEFAULT_AGE = 30;

const SNOOZE_PROBABILITY: Record<AlarmPriority, number> = { high: 1 / 2, medium: 2 / 3, low: 3 / 4 };
const SNOOZE_RATE: Record<AlarmPriority, number> = { high: 0.1, medium: 0.3, low: 0.5 };

interface RepeatSchedule {
  is_recurring: boolean;
  days_of_week?: string[];
  frequency: AlarmFrequency;
}

function profileText(profile: UserProfile, key: string): string {
  const value = profile[key];
  return typeof value === 'string' ? value.toLowerCase() : '';
}

function profileAge(profile: UserProfile): number {
  const value = profile.age;
  const age = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(age) ? age : DEFAULT_AGE;
}

/**
 * Alarm templates that fit the profile's occupation, age and lifestyle.
 * The generic wake / weekend wake / bedtime set is always included.
 */
export function getAlarmTemplates(profile: UserProfile): AlarmTemplate[] {
  const { template_groups: groups, occupation_keywords, lifestyle_keywords } = getTemplateBank().alarms;
  const occupation = profileText(profile, 'occupation');
  const lifestyle = profileText(profile, 'lifestyle');
  const age = profileAge(profile);
  const mentions = (text: string, keywords: string[]) => keywords.some((k) => text.includes(k));

  const templates: AlarmTemplate[] = [];
  if (mentions(occupation, occupation_keywords.office)) templates.push(...groups.office);
  if (mentions(occupation, occupation_keywords.healthcare)) templates.push(...groups.healthcare);
  if (mentions(occupation, occupation_keywords.student) || age < 25) templates.push(...groups.student);
  if (mentions(lifestyle, lifestyle_keywords.medication) || age > 40) templates.push(...groups.medication);
  if (mentions(lifestyle, lifestyle_keywords.fitness)) templates.push(...groups.fitness);
  templates.push(...groups.general);
  return templates;
}

function formatTime(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

export class AlarmsGenerator extends BaseGenerator {
  readonly appName = 'alarms';
  protected readonly idPrefix = 'alarm';

  protected instructions(): string {
    return `
Please generate alarms data in the following JSON format:
{
    "alarms": [
        {
            "id": "unique_identifier",
            "label": "Alarm label/description",
            "time": "HH:MM",
            "enabled": true,
            "repeat_schedule": {
                "is_recurring": true,
                "days_of_week": ["monday", "tuesday", "wednesday", "thursday", "friday"],
                "frequency": "daily|weekdays|weekends|custom|once"
            },
            "sound": { "sound_name": "Sound name", "sound_type": "built_in|song|custom", "volume": 0.8, "vibration": true },
            "snooze": { "enabled": true, "duration_minutes": 9, "max_snoozes": 3 },
            "bedtime_alarm": false,
            "smart_wake": { "enabled": true, "window_minutes": 15 },
            "category": "work|personal|medication|exercise|sleep|other",
            "created_date": "ISO timestamp",
            "last_modified": "ISO timestamp",
            "last_triggered": "ISO timestamp",
            "next_trigger": "ISO timestamp",
            "statistics": { "times_triggered": 45, "times_snoozed": 12, "average_snooze_count": 1.2, "turned_off_quickly": 8 },
            "location_based": { "enabled": false, "travel_adjustment": false }
        }
    ]
}

Create realistic alarms that:
- Reflect the user's daily routine and lifestyle
- Include work alarms, personal alarms, and special purpose alarms
- Show realistic usage patterns (some enabled, some disabled)
- Include both recurring and one-time alarms
- Have appropriate timing based on the user's schedule
- Include realistic statistics showing actual usage
- Consider the user's profession and lifestyle for alarm purposes
`;
  }

  protected synthesize(count: number, request: GenerationRequest): JsonRecord[] {
    const templates = getAlarmTemplates(request.profile);
    return Array.from({ length: count }, () =>
      this.alarmFromTemplate(this.faker.helpers.arrayElement(templates)),
    );
  }

  private alarmFromTemplate(template: AlarmTemplate): JsonRecord {
    const f = this.faker;
    const [startHour, startMinute, endHour, endMinute] = template.time_range;
    const alarmMinutes = f.number.int({ min: startHour * 60 + startMinute, max: endHour * 60 + endMinute });
    const repeat = this.repeatSchedule(template.frequency);
    const enabled = f.datatype.boolean({ probability: 0.75 });
    const [createdDate, lastModified] = this.orderedTimestamps();

    const alarm: JsonRecord = {
      id: this.nextId(),
      label: template.label,
      time: formatTime(alarmMinutes),
      enabled,
      repeat_schedule: repeat,
      sound: this.sound(),
      snooze: this.snooze(template.priority),
      bedtime_alarm: template.category === 'sleep',
      smart_wake: this.smartWake(),
      category: template.category,
      created_date: createdDate.toISOString(),
      last_modified: lastModified.toISOString(),
      statistics: this.statistics(enabled, template.priority),
    };

    if (enabled && repeat.is_recurring) {
      const snapshot = this.snapshotInstant();
      alarm.last_triggered = this.lastTriggered(snapshot).toISOString();
      alarm.next_trigger = this.nextTrigger(snapshot, alarmMinutes, repeat).toISOString();
    }

    alarm.location_based = {
      enabled: f.datatype.boolean(),
      travel_adjustment: f.datatype.boolean(),
    };
    return alarm;
  }

  private repeatSchedule(frequency: AlarmFrequency): RepeatSchedule {
    switch (frequency) {
      case 'weekdays':
        return { is_recurring: true, days_of_week: WEEK_ORDER.slice(0, 5), frequency };
      case 'weekends':
        return { is_recurring: true, days_of_week: WEEK_ORDER.slice(5), frequency };
      case 'daily':
        return { is_recurring: true, days_of_week: [...WEEK_ORDER], frequency };
      case 'custom': {
        const picked = this.faker.helpers.arrayElements(WEEK_ORDER, { min: 2, max: 5 });
        return {
          is_recurring: true,
          days_of_week: WEEK_ORDER.filter((day) => picked.includes(day)),
          frequency,
        };
      }
      case 'once':
        return { is_recurring: false, frequency };
    }
  }

  /** "Now" for trigger bookkeeping: one week before the window ends. */
  private snapshotInstant(): Date {
    const weekBeforeEnd = startOfDayUTC(this.windowEnd).getTime() - 7 * DAY_MS;
    return new Date(Math.max(this.windowStart.getTime(), weekBeforeEnd));
  }

  private lastTriggered(snapshot: Date): Date {
    const from = new Date(Math.max(this.windowStart.getTime(), snapshot.getTime() - 7 * DAY_MS));
    return this.faker.date.between({ from, to: snapshot });
  }

  private nextTrigger(snapshot: Date, alarmMinutes: number, repeat: RepeatSchedule): Date {
    const dayStart = startOfDayUTC(snapshot).getTime();
    const days = repeat.days_of_week ?? [];

    if (days.length > 0) {
      for (let i = 0; i < 7; i++) {
        const candidate = new Date(dayStart + i * DAY_MS + alarmMinutes * MINUTE_MS);
        if (days.includes(DAY_NAMES[candidate.getUTCDay()]) && candidate.getTime() > snapshot.getTime()) {
          return this.clampToWindow(candidate);
        }
      }
    }
    return this.clampToWindow(new Date(dayStart + DAY_MS + alarmMinutes * MINUTE_MS));
  }

  private sound(): JsonRecord {
    const f = this.faker;
    const soundType = f.helpers.weightedArrayElement([
      { value: 'built_in', weight: 70 },
      { value: 'song', weight: 20 },
      { value: 'custom', weight: 10 },
    ]);

    let soundName: string;
    if (soundType === 'built_in') {
      soundName = f.helpers.arrayElement(getTemplateBank().alarms.built_in_sounds);
    } else if (soundType === 'song') {
      soundName = `${f.company.catchPhrase()} - ${f.person.fullName()}`;
    } else {
      soundName = `Custom Sound ${f.number.int({ min: 1, max: 10 })}`;
    }

    return {
      sound_name: soundName,
      sound_type: soundType,
      volume: f.number.float({ min: 0.4, max: 1, fractionDigits: 2 }),
      vibration: f.datatype.boolean(),
    };
  }

  private snooze(priority: AlarmPriority): JsonRecord {
    const f = this.faker;
    if (!f.datatype.boolean({ probability: SNOOZE_PROBABILITY[priority] })) {
      return { enabled: false };
    }
    return {
      enabled: true,
      duration_minutes: f.helpers.arrayElement([5, 9, 10, 15]),
      max_snoozes: f.helpers.arrayElement([1, 2, 3, 5]),
    };
  }

  private smartWake(): JsonRecord {
    const f = this.faker;
    if (!f.datatype.boolean()) return { enabled: false };
    return { enabled: true, window_minutes: f.helpers.arrayElement([10, 15, 20, 30]) };
  }

  private statistics(enabled: boolean, priority: AlarmPriority): JsonRecord {
    const f = this.faker;
    if (!enabled) {
      return {
        times_triggered: f.number.int({ min: 0, max: 5 }),
        times_snoozed: f.number.int({ min: 0, max: 2 }),
        average_snooze_count: 0,
        turned_off_quickly: f.number.int({ min: 0, max: 3 }),
      };
    }

    const triggers = f.number.int({ min: 10, max: 100 });
    const timesSnoozed = Math.floor(triggers * SNOOZE_RATE[priority] * f.number.float({ min: 0.5, max: 1.5 }));
    return {
      times_triggered: triggers,
      times_snoozed: timesSnoozed,
      average_snooze_count: Math.round((timesSnoozed / triggers) * 10) / 10,
      turned_off_quickly: Math.floor(triggers * f.number.float({ min: 0.1, max: 0.4 })),
    };
  }
}
