import { Hono } from 'hono';
import { z } from 'zod';
import { PersonaAgent } from '../agents/persona-agent.js';
import type { PersonaWorkflowOptions } from '../agents/workflow.js';
import { GenerationConfigInputSchema } from '../lib/config.js';
import { ConfigurationError } from '../lib/errors.js';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { LLM_MIN_INTERVAL_MS } from '../lib/llm.js';
import logger from '../lib/logger.js';
import { RequestThrottle } from '../lib/throttle.js';
import { generatorRegistry } from '../generators/index.js';

const MAX_GENERATE_BODY_BYTES = 200_000;

export const generateRequestSchema = z.object({
  user_profile: z.record(z.unknown()).refine((p) => Object.keys(p).length > 0, {
    message: 'user_profile cannot be empty',
  }),
  events: z.array(z.string().trim().min(1).max(1000)).min(1).max(200),
  config: GenerationConfigInputSchema.optional(),
});

export type GenerateRouteOptions = PersonaWorkflowOptions;

/**
 * Generation routes. One throttle is shared by every request served by this
 * router so concurrent runs still space their model calls.
 */
export function createGenerateRoutes(options: GenerateRouteOptions = {}): Hono {
  const routes = new Hono();
  const registry = options.registry ?? generatorRegistry;
  const throttle = options.throttle ?? new RequestThrottle({ minIntervalMs: LLM_MIN_INTERVAL_MS });

  routes.get('/apps', (c) => c.json({ apps: registry.describe() }));

  routes.post('/generate', async (c) => {
    const body = await parseJsonBodyWithLimit(c, MAX_GENERATE_BODY_BYTES);
    if (!body.ok) return body.response;

    const parsed = generateRequestSchema.safeParse(body.data);
    if (!parsed.success) {
      return c.json({
        error: 'Invalid request',
        issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      }, 400);
    }

    let agent: PersonaAgent;
    try {
      agent = new PersonaAgent(parsed.data.config ?? {}, { ...options, throttle });
    } catch (err) {
      if (err instanceof ConfigurationError) {
        logger.warn({ issues: err.issues }, 'Rejected generation request with invalid configuration');
        return c.json({ error: 'Invalid configuration', issues: err.issues }, 400);
      }
      throw err;
    }

    const result = await agent.generate(parsed.data.user_profile, parsed.data.events);
    return c.json(result, result.success ? 200 : 500);
  });

  return routes;
}
