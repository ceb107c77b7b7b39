/**
 * Raised while building a GenerationConfig or wiring a run. Never caught by
 * the workflow: a bad configuration must fail before any stage starts.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
