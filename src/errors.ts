export class LogGateError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LogGateError';
    this.code = code;
  }
}

/** The environment collaborator could not resolve a variable. */
export class EnvLookupError extends LogGateError {
  readonly variable: string;

  constructor(variable: string, options?: ErrorOptions) {
    super(`environment variable "${variable}" could not be read`, 'ENV_LOOKUP', options);
    this.name = 'EnvLookupError';
    this.variable = variable;
  }
}

/** A logger is already installed in the target registry. */
export class AlreadyInstalledError extends LogGateError {
  constructor(options?: ErrorOptions) {
    super('a logger has already been installed', 'ALREADY_INSTALLED', options);
    this.name = 'AlreadyInstalledError';
  }
}
