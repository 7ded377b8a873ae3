export class LinkwatchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "LinkwatchError";
  }
}

export class ConfigError extends LinkwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", details);
    this.name = "ConfigError";
  }
}

export class UnknownSettingError extends LinkwatchError {
  constructor(public readonly key: string) {
    super(`Unknown setting: ${key}`, "UNKNOWN_SETTING", { key });
    this.name = "UnknownSettingError";
  }
}

export class BrowserSessionError extends LinkwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "BROWSER_SESSION_ERROR", details);
    this.name = "BrowserSessionError";
  }
}

export class HistoryStoreError extends LinkwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "HISTORY_STORE_ERROR", details);
    this.name = "HistoryStoreError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
