import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import logger from './lib/logger.js';

export { PersonaAgent, validateInputs } from './agents/persona-agent.js';
export { PersonaWorkflow, nextStage, shouldRegenerate } from './agents/workflow.js';
export type { WorkflowStep, PersonaWorkflowOptions } from './agents/workflow.js';
export type * from './agents/types.js';
export { createConfig, validateConfiguration, configToJSON, DEFAULT_DATA_VOLUME } from './lib/config.js';
export type { GenerationConfig, GenerationConfigInput } from './lib/config.js';
export { ConfigurationError } from './lib/errors.js';
export { ModelClient } from './lib/model-client.js';
export type { TextGenerator, GenerateOptions } from './lib/model-client.js';
export { RequestThrottle } from './lib/throttle.js';
export { SchemaValidator } from './lib/validation.js';
export { FileSchemaStore, MemorySchemaStore } from './lib/schema-store.js';
export type { SchemaStore } from './lib/schema-store.js';
export { FileOutputPackager } from './lib/output-manager.js';
export type { OutputPackager, OutputBundle } from './lib/output-manager.js';
export {
  BaseGenerator,
  GeneratorFactory,
  GeneratorRegistry,
  generatorRegistry,
  registerGenerator,
  getAlarmTemplates,
} from './generators/index.js';
export type { AppGenerator, GenerationRequest, GeneratorContext } from './generators/index.js';
export { createApp };

const app = createApp();
let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

const port = parseInt(process.env.PORT ?? '3001');

export function startServer() {
  if (server) return server;

  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
