/**
 * A configuration file exists but cannot be used.
 */
export class ConfigError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
    this.path = path;
  }
}

export function isBrokenPipe(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EPIPE';
}
