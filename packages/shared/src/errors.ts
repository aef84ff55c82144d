export type ReadygateErrorCode = 'CONFIG_INVALID' | 'TOOLING_UNAVAILABLE';

export class ReadygateError extends Error {
  readonly code: ReadygateErrorCode;

  constructor(code: ReadygateErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends ReadygateError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIG_INVALID', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

/** Raised before polling starts when the host cannot open the sockets a protocol needs. */
export class ToolingUnavailableError extends ReadygateError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super('TOOLING_UNAVAILABLE', `required socket support is unavailable: ${missing.join(', ')}`);
    this.missing = missing;
  }
}
