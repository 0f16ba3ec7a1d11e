export class ConfigurationError extends Error {
  readonly variables: string[];

  constructor(message: string, variables: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.variables = variables;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
