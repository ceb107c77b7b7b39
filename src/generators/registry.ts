/**
 * Generator Registry: maps app names to generator constructors.
 *
 * Built-in generators register themselves from ./index.ts; additional apps
 * can be registered at any time without touching the generation node.
 */

import { dataKeyFor } from '../lib/apps.js';
import type { AppGenerator, GeneratorConstructor, GeneratorContext } from './types.js';

export interface GeneratorDescription {
  app_name: string;
  data_key: string;
}

export class GeneratorRegistry {
  private readonly generators = new Map<string, GeneratorConstructor>();

  /** Register a constructor. Re-registering an app requires `replace`. */
  register(appName: string, ctor: GeneratorConstructor, options?: { replace?: boolean }): void {
    if (this.generators.has(appName) && !options?.replace) {
      throw new Error(`Generator already registered: ${appName}`);
    }
    this.generators.set(appName, ctor);
  }

  get(appName: string): GeneratorConstructor | undefined {
    return this.generators.get(appName);
  }

  has(appName: string): boolean {
    return this.generators.has(appName);
  }

  /** Registered app names in registration order. */
  list(): string[] {
    return [...this.generators.keys()];
  }

  describe(): GeneratorDescription[] {
    return this.list().map((appName) => ({ app_name: appName, data_key: dataKeyFor(appName) }));
  }

  unregister(appName: string): boolean {
    return this.generators.delete(appName);
  }

  get size(): number {
    return this.generators.size;
  }
}

/** Singleton registry shared across the application. */
export const generatorRegistry = new GeneratorRegistry();

export function registerGenerator(appName: string, ctor: GeneratorConstructor): void {
  generatorRegistry.register(appName, ctor);
}

/**
 * Creates and caches one generator instance per app for a run's context.
 */
export class GeneratorFactory {
  private readonly instances = new Map<string, AppGenerator>();

  constructor(
    private readonly context: GeneratorContext,
    private readonly registry: GeneratorRegistry = generatorRegistry,
  ) {}

  getGenerator(appName: string): AppGenerator {
    const cached = this.instances.get(appName);
    if (cached) return cached;

    const ctor = this.registry.get(appName);
    if (!ctor) {
      throw new Error(`No generator available for app: ${appName}`);
    }
    const generator = new ctor(this.context);
    this.instances.set(appName, generator);
    return generator;
  }

  /** Late registration; replaces an existing app's generator. */
  registerGenerator(appName: string, ctor: GeneratorConstructor): void {
    this.registry.register(appName, ctor, { replace: true });
    this.instances.delete(appName);
  }
}

