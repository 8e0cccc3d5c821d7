export class UnknownDeviceTypeError extends Error {
  constructor(public readonly deviceType: string) {
    super(`Unknown device type: ${deviceType}`);
    this.name = 'UnknownDeviceTypeError';
  }
}

/** Raised when a settings or status file exists but cannot be parsed. */
export class SettingsFileError extends Error {
  constructor(public readonly filePath: string, cause: unknown) {
    super(`Cannot read ${filePath}: ${errorMessage(cause)}`, { cause });
    this.name = 'SettingsFileError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
