import { Faker, base, en } from '@faker-js/faker';
import type { GenerationConfig } from '../lib/config.js';
import { dataKeyFor } from '../lib/apps.js';
import { extractJsonObject, isRecord } from '../lib/json-extract.js';
import rootLogger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import type { TextGenerator } from '../lib/model-client.js';
import type { AppPayload, JsonRecord } from '../agents/types.js';
import type { AppGenerator, GenerationRequest, GeneratorContext } from './types.js';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const HOUR_MS = 60 * 60 * 1000;
export const MINUTE_MS = 60 * 1000;

const BACKFILLED_TIMESTAMP_FIELDS = ['created_date', 'timestamp', 'start_datetime'];

function stableHash(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (hash * 31 + value.charCodeAt(i)) | 0;
  }
  return Math.abs(hash);
}

export function startOfDayUTC(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Shared generate/parse/clean/fallback loop. Subclasses describe their JSON
 * shape and synthesize fallback records; everything else lives here.
 *
 * Every timestamp and date is computed in UTC.
 */
export abstract class BaseGenerator implements AppGenerator {
  abstract readonly appName: string;
  /** Prefix for generated identifiers. */
  protected abstract readonly idPrefix: string;
  protected readonly idField: string = 'id';

  protected readonly config: GenerationConfig;
  protected readonly model: TextGenerator;
  protected readonly faker: Faker;
  private readonly baseLogger: Logger;
  private idSequence = 0;

  constructor(context: GeneratorContext) {
    this.config = context.config;
    this.model = context.model;
    this.baseLogger = context.logger ?? rootLogger;
    this.faker = new Faker({ locale: [en, base] });
  }

  get dataKey(): string {
    return dataKeyFor(this.appName);
  }

  private appLogger: Logger | null = null;

  protected get log(): Logger {
    if (!this.appLogger) {
      this.appLogger = this.baseLogger.child({ app: this.appName });
    }
    return this.appLogger;
  }

  protected get windowStart(): Date {
    return this.config.start_date;
  }

  protected get windowEnd(): Date {
    return this.config.end_date;
  }

  /** JSON shape and app-specific guidance appended to the shared prompt. */
  protected abstract instructions(): string;

  /** Fallback records; must return exactly `count` items. */
  protected abstract synthesize(count: number, request: GenerationRequest): JsonRecord[];

  async generate(request: GenerationRequest): Promise<AppPayload> {
    const { count } = request;
    if (count <= 0) {
      return { [this.dataKey]: [] };
    }

    // Reseed per call so a seeded run yields the same records however many
    // times the generator has been used before.
    if (this.config.seed !== undefined) {
      this.faker.seed([this.config.seed, stableHash(this.appName)]);
      this.idSequence = 0;
    }

    this.log.info({ count }, `Generating ${count} ${this.appName} records`);

    let records: JsonRecord[];
    try {
      const response = await this.model.generate(this.buildPrompt(request), {
        temperature: this.config.temperature,
        maxTokens: this.config.max_tokens,
      });
      records = this.parseRecords(response);
    } catch (err) {
      this.log.error(
        { error: err instanceof Error ? err.message : String(err), useFallback: this.config.use_fallback },
        `${this.appName} generation failed`,
      );
      if (!this.config.use_fallback) {
        return { [this.dataKey]: [] };
      }
      return { [this.dataKey]: this.finalize(this.synthesize(count, request)) };
    }

    if (records.length < count && this.config.use_fallback) {
      const shortfall = count - records.length;
      this.log.info({ parsed: records.length, shortfall }, 'Filling shortfall with synthesized records');
      records = records.concat(this.synthesize(shortfall, request));
    }

    return { [this.dataKey]: this.finalize(records.slice(0, count)) };
  }

  buildPrompt(request: GenerationRequest): string {
    const eventsText = request.events.map((e) => `- ${e}`).join('\n');
    return `
Generate realistic ${this.appName} data for the following user profile and events.

USER PROFILE:
${JSON.stringify(request.profile, null, 2)}

EVENTS:
${eventsText}

ANALYSIS:
${JSON.stringify(request.analysis, null, 2)}

TIME PERIOD: ${toDateString(this.windowStart)} to ${toDateString(this.windowEnd)}

Generate ${request.count} realistic ${this.appName} entries that:
1. Reflect the user's personality and lifestyle
2. Connect logically to the provided events
3. Show natural patterns and relationships
4. Include appropriate timestamps within the time period
5. Feel authentic and human-like

${this.instructions().trim()}
`;
  }

  /** Object records under the data key, or an empty list on any mismatch. */
  protected parseRecords(response: string): JsonRecord[] {
    const parsed = extractJsonObject(response);
    if (!parsed) return [];

    const collection = parsed[this.dataKey];
    if (!Array.isArray(collection)) {
      this.log.warn({ dataKey: this.dataKey }, 'Model response is missing the data array');
      return [];
    }
    return collection.filter(isRecord);
  }

  /**
   * Assigns identifiers that are missing, empty or already taken, and
   * backfills present-but-empty timestamp fields.
   */
  protected finalize(records: JsonRecord[]): JsonRecord[] {
    const seen = new Set<string>();
    return records.map((record) => {
      const cleaned: JsonRecord = { ...record };
      const current = cleaned[this.idField];
      const id = typeof current === 'number' ? String(current) : current;
      if (typeof id !== 'string' || !id.trim() || seen.has(id)) {
        cleaned[this.idField] = this.nextId();
      } else {
        cleaned[this.idField] = id;
      }
      seen.add(String(cleaned[this.idField]));

      for (const field of BACKFILLED_TIMESTAMP_FIELDS) {
        if (field in cleaned && isBlank(cleaned[field])) {
          cleaned[field] = this.randomTimestamp();
        }
      }
      return cleaned;
    });
  }

  protected nextId(): string {
    this.idSequence += 1;
    return `${this.idPrefix}_${this.faker.string.alphanumeric({ length: 8, casing: 'lower' })}_${this.idSequence}`;
  }

  // ─── Time helpers ──────────────────────────────────────────────────

  protected randomDate(): Date {
    return this.faker.date.between({ from: this.windowStart, to: this.windowEnd });
  }

  protected randomTimestamp(): string {
    return this.randomDate().toISOString();
  }

  protected clampToWindow(date: Date): Date {
    const time = Math.min(Math.max(date.getTime(), this.windowStart.getTime()), this.windowEnd.getTime());
    return new Date(time);
  }

  /**
   * Moves an interval inside the window by whole days, keeping its time of
   * day, then clamps whatever still sticks out.
   */
  protected fitInterval(start: Date, durationMs: number): { start: Date; end: Date } {
    const windowStart = this.windowStart.getTime();
    const windowEnd = this.windowEnd.getTime();
    let startMs = start.getTime();

    while (startMs + durationMs > windowEnd && startMs - DAY_MS >= windowStart) {
      startMs -= DAY_MS;
    }
    while (startMs < windowStart && startMs + DAY_MS + durationMs <= windowEnd) {
      startMs += DAY_MS;
    }

    const clampedStart = this.clampToWindow(new Date(startMs));
    const clampedEnd = this.clampToWindow(new Date(clampedStart.getTime() + durationMs));
    return { start: clampedStart, end: clampedEnd };
  }

  /** Two timestamps in the window, ordered. */
  protected orderedTimestamps(): [Date, Date] {
    const a = this.randomDate();
    const b = this.randomDate();
    return a.getTime() <= b.getTime() ? [a, b] : [b, a];
  }
}
