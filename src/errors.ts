export class DatabaseUnavailableError extends Error {
  readonly dbPath: string;

  constructor(dbPath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot open database at ${dbPath}: ${reason}`, { cause });
    this.name = 'DatabaseUnavailableError';
    this.dbPath = dbPath;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
