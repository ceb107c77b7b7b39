import type { GenerationConfig } from '../lib/config.js';
import type { Logger } from '../lib/logger.js';
import type { TextGenerator } from '../lib/model-client.js';
import type { AnalysisRecord, AppPayload, UserProfile } from '../agents/types.js';

export interface GenerationRequest {
  profile: UserProfile;
  events: string[];
  analysis: AnalysisRecord;
  count: number;
}

/** Produces one app's record collection for a run. */
export interface AppGenerator {
  readonly appName: string;
  readonly dataKey: string;
  generate(request: GenerationRequest): Promise<AppPayload>;
}

export interface GeneratorContext {
  config: GenerationConfig;
  model: TextGenerator;
  logger?: Logger;
}

export type GeneratorConstructor = new (context: GeneratorContext) => AppGenerator;
