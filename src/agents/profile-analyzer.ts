/**
 * Profile Analyzer
 *
 * Turns the caller's profile and life events into the structured facts every
 * generator shares. One model call; a fixed stub stands in when the response
 * cannot be parsed.
 */

import { extractJsonObject, isRecord } from '../lib/json-extract.js';
import type { GenerationConfig } from '../lib/config.js';
import type { TextGenerator } from '../lib/model-client.js';
import { toDateString } from '../generators/base.js';
import type { AnalysisRecord, UserIdentity, UserProfile } from './types.js';

export interface ProfileAnalyzerInput {
  profile: UserProfile;
  events: string[];
  config: GenerationConfig;
}

export function analysisStub(): AnalysisRecord {
  return {
    user_identity: { first_name: 'Alex', middle_name: null, last_name: 'Smith', gender: 'non-binary' },
    user_characteristics: { lifestyle: 'moderate technology user' },
    event_analysis: { event_types: ['personal', 'work'] },
    app_usage_patterns: {},
    data_relationships: { cross_app_connections: 'basic connections' },
  };
}

export function buildAnalysisPrompt(input: ProfileAnalyzerInput): string {
  const eventsText = input.events.map((e) => `- ${e}`).join('\n');
  return `
Analyze the following user profile and events to inform realistic phone app data generation.

USER PROFILE:
${JSON.stringify(input.profile, null, 2)}

EVENTS:
${eventsText}

TIME PERIOD: ${toDateString(input.config.start_date)} to ${toDateString(input.config.end_date)}

Please provide a comprehensive analysis in JSON format with the following structure:
{
    "user_identity": {
        "first_name": "realistic first name based on age/location/profile",
        "middle_name": "realistic middle name (can be null)",
        "last_name": "realistic last name",
        "gender": "male|female|non-binary"
    },
    "user_characteristics": {
        "lifestyle": "brief description",
        "communication_patterns": "how they likely communicate",
        "technology_usage": "their relationship with technology",
        "social_connections": "types of relationships they maintain",
        "professional_context": "work-related patterns"
    },
    "event_analysis": {
        "event_types": ["list of event categories"],
        "recurring_patterns": ["weekly meetings", "monthly events"],
        "seasonal_activities": ["events tied to specific times"],
        "social_implications": ["how events affect relationships"]
    },
    "app_usage_patterns": {
        "contacts": "expected contact management behavior",
        "calendar": "scheduling and event management style",
        "sms": "texting habits and communication style",
        "emails": "email usage patterns and formality",
        "reminders": "task management and reminder preferences",
        "notes": "note-taking habits and organization",
        "wallet": "digital payment and pass usage",
        "alarms": "wake-up and routine alarm habits"
    },
    "data_relationships": {
        "cross_app_connections": "how data should connect across apps",
        "event_triggers": "what events should trigger what data",
        "timeline_coherence": "how to maintain temporal consistency"
    }
}

Ensure the analysis is detailed and considers realistic human behavior patterns.
`;
}

/**
 * Run the analyzer. Model-call failures propagate; the analysis stage
 * catches them and falls back to the stub.
 */
export async function runProfileAnalyzer(
  input: ProfileAnalyzerInput,
  model: TextGenerator,
): Promise<AnalysisRecord> {
  const response = await model.generate(buildAnalysisPrompt(input), { temperature: 0.3, maxTokens: 2000 });

  const parsed = extractJsonObject(response);
  if (!parsed) {
    return analysisStub();
  }
  return normalizeAnalysis(parsed);
}

// ─── Normalization helpers ───────────────────────────────────────────

export function normalizeAnalysis(raw: Record<string, unknown>): AnalysisRecord {
  const stub = analysisStub();
  return {
    user_identity: normalizeIdentity(raw.user_identity, stub.user_identity),
    user_characteristics: isRecord(raw.user_characteristics) ? raw.user_characteristics : stub.user_characteristics,
    event_analysis: isRecord(raw.event_analysis) ? raw.event_analysis : stub.event_analysis,
    app_usage_patterns: isRecord(raw.app_usage_patterns) ? raw.app_usage_patterns : stub.app_usage_patterns,
    data_relationships: isRecord(raw.data_relationships) ? raw.data_relationships : stub.data_relationships,
  };
}

function normalizeIdentity(raw: unknown, fallback: UserIdentity): UserIdentity {
  if (!isRecord(raw)) return fallback;
  const middle = sanitizeString(raw.middle_name, 100);
  return {
    first_name: sanitizeString(raw.first_name, 100) || fallback.first_name,
    middle_name: middle || null,
    last_name: sanitizeString(raw.last_name, 100) || fallback.last_name,
    gender: sanitizeString(raw.gender, 50) || fallback.gender,
  };
}

function sanitizeString(value: unknown, maxLen: number): string {
  if (typeof value !== 'string') return '';
  return value.trim().slice(0, maxLen);
}
