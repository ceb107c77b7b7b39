import { BaseGenerator, DAY_MS, HOUR_MS, startOfDayUTC, toDateString } from './base.js';
import { fillTemplate, getTemplateBank } from '../lib/template-bank.js';
import type { JsonRecord } from '../agents/types.js';

export const EVENT_CATEGORIES = ['work', 'personal', 'social', 'health', 'family'] as const;
export type EventCategory = (typeof EVENT_CATEGORIES)[number];

const CATEGORY_WEIGHTS: Array<{ value: EventCategory; weight: number }> = [
  { value: 'work', weight: 40 },
  { value: 'personal', weight: 25 },
  { value: 'social', weight: 15 },
  { value: 'health', weight: 10 },
  { value: 'family', weight: 10 },
];

const QUARTER_HOURS = [0, 15, 30, 45];
const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'];

export class CalendarGenerator extends BaseGenerator {
  readonly appName = 'calendar';
  protected readonly idPrefix = 'event';

  protected instructions(): string {
    return `
Please generate calendar events data in the following JSON format:
{
    "events": [
        {
            "id": "unique_identifier",
            "title": "Event Title",
            "description": "Event description",
            "start_datetime": "ISO timestamp",
            "end_datetime": "ISO timestamp",
            "all_day": false,
            "location": { "name": "Location Name", "latitude": 37.7749, "longitude": -122.4194 },
            "attendees": [
                { "name": "Attendee Name", "email": "attendee@example.com", "status": "accepted|declined|tentative|pending" }
            ],
            "calendar_name": "Calendar Name",
            "category": "work|personal|health|travel|social|family|education|other",
            "priority": "low|normal|high",
            "reminder": { "enabled": true, "minutes_before": 15 },
            "recurrence": {
                "frequency": "daily|weekly|monthly|yearly",
                "interval": 1,
                "end_date": "YYYY-MM-DD",
                "days_of_week": ["monday", "tuesday", "wednesday", "thursday", "friday"]
            },
            "created_date": "ISO timestamp",
            "modified_date": "ISO timestamp"
        }
    ]
}

Create realistic events that:
- Relate to the provided events and user profile
- Include both one-time and recurring events
- Have appropriate durations and timing
- Include relevant attendees and locations
- Mix different categories and priorities
- Show realistic calendar usage patterns
`;
  }

  protected synthesize(count: number): JsonRecord[] {
    const f = this.faker;
    const bank = getTemplateBank().calendar;

    return Array.from({ length: count }, () => {
      const category = f.helpers.weightedArrayElement(CATEGORY_WEIGHTS);
      const titles = bank.titles[category] ?? [`${category[0].toUpperCase()}${category.slice(1)} Event`];
      const title = f.helpers.arrayElement(titles);
      const durationHours = this.eventDuration(category);
      const { start, end } = this.fitInterval(this.eventStart(category), durationHours * HOUR_MS);
      const [createdDate, modifiedDate] = this.orderedTimestamps();

      const event: JsonRecord = {
        id: this.nextId(),
        title,
        description: fillTemplate(bank.descriptions[category] ?? '{title}', {
          title: category === 'work' ? title.toLowerCase() : title,
        }),
        start_datetime: start.toISOString(),
        end_datetime: end.toISOString(),
        all_day: false,
        location: this.eventLocation(category),
        attendees: this.eventAttendees(category),
        calendar_name: bank.calendar_names[category] ?? 'Personal',
        category,
        priority: category === 'work'
          ? f.helpers.arrayElement(['normal', 'high'])
          : f.helpers.arrayElement(['low', 'normal']),
        reminder: {
          enabled: true,
          minutes_before: category === 'work'
            ? f.helpers.arrayElement([15, 30])
            : f.helpers.arrayElement([15, 60, 1440]),
        },
        created_date: createdDate.toISOString(),
        modified_date: modifiedDate.toISOString(),
      };

      if (f.datatype.boolean({ probability: 0.2 })) {
        event.recurrence = category === 'work'
          ? { frequency: 'weekly', interval: 1, days_of_week: [...WEEKDAYS], end_date: toDateString(this.windowEnd) }
          : { frequency: f.helpers.arrayElement(['weekly', 'monthly']), interval: 1, end_date: toDateString(this.windowEnd) };
      }
      return event;
    });
  }

  private eventStart(category: EventCategory): Date {
    const f = this.faker;
    let day = startOfDayUTC(this.randomDate());
    let hour: number;
    let minute: number;

    if (category === 'work') {
      hour = f.number.int({ min: 9, max: 17 });
      minute = f.helpers.arrayElement(QUARTER_HOURS);
    } else if (category === 'social') {
      if (f.datatype.boolean({ probability: 0.7 })) {
        hour = f.number.int({ min: 18, max: 22 });
      } else {
        hour = f.number.int({ min: 12, max: 18 });
        day = this.weekendDay() ?? day;
      }
      minute = f.helpers.arrayElement([0, 30]);
    } else {
      hour = f.number.int({ min: 8, max: 20 });
      minute = f.helpers.arrayElement(QUARTER_HOURS);
    }

    return new Date(day.getTime() + hour * HOUR_MS + minute * 60_000);
  }

  /** A Saturday or Sunday inside the window, when there is one. */
  private weekendDay(): Date | null {
    const days: Date[] = [];
    for (
      let t = startOfDayUTC(this.windowStart).getTime();
      t <= this.windowEnd.getTime();
      t += DAY_MS
    ) {
      const weekday = new Date(t).getUTCDay();
      if (weekday === 0 || weekday === 6) days.push(new Date(t));
    }
    return days.length > 0 ? this.faker.helpers.arrayElement(days) : null;
  }

  private eventDuration(category: EventCategory): number {
    const f = this.faker;
    if (category === 'work') return f.helpers.arrayElement([0.5, 1, 1.5, 2]);
    if (category === 'social') return f.helpers.arrayElement([2, 3, 4]);
    return f.helpers.arrayElement([0.5, 1, 1.5]);
  }

  private eventLocation(category: EventCategory): JsonRecord {
    const f = this.faker;
    if (category === 'work') {
      return { name: `Office - ${f.company.name()}`, latitude: 37.7749, longitude: -122.4194 };
    }
    if (category === 'social') {
      return { name: `${f.company.name()} Restaurant`, latitude: 37.7849, longitude: -122.4094 };
    }
    return { name: `${f.location.streetAddress()}, ${f.location.city()}` };
  }

  private eventAttendees(category: EventCategory): JsonRecord[] {
    const f = this.faker;
    let attendeeCount: number;
    if (category === 'work') {
      attendeeCount = f.number.int({ min: 2, max: 6 });
    } else if (category === 'social') {
      attendeeCount = f.number.int({ min: 1, max: 4 });
    } else {
      return [];
    }

    return Array.from({ length: attendeeCount }, () => {
      const firstName = f.person.firstName();
      const lastName = f.person.lastName();
      return {
        name: `${firstName} ${lastName}`,
        email: f.internet.email({ firstName, lastName }).toLowerCase(),
        status: f.helpers.arrayElement(['accepted', 'pending', 'tentative']),
      };
    });
  }
}
