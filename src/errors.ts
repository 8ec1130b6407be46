/**
 * Raised when the session cannot start with the settings it was given,
 * e.g. monitor dimensions that could not be detected and were not supplied.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown from any polling point when the quit key is pressed.
 * Unwinds the running trial without producing an outcome.
 */
export class QuitSignal extends Error {
  constructor(public readonly key: string) {
    super(`Quit requested with key '${key}'`);
    this.name = 'QuitSignal';
  }
}

export function isQuitSignal(error: unknown): error is QuitSignal {
  return error instanceof QuitSignal;
}
