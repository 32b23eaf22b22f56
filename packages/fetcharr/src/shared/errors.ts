/**
 * Error taxonomy shared by the engine and its collaborators.
 */

/** An element was not found or not clickable within its bounded wait. Recovered inside the cascade. */
export class SurfaceMissError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SurfaceMissError';
  }
}

/** The browser session is gone (closed target, lost protocol connection). */
export class SurfaceFaultError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SurfaceFaultError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
