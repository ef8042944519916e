/**
 * Config Error Types
 */

export type ConfigErrorCode = 'READ_FAILED' | 'PARSE_FAILED';

/**
 * Config file exists but could not be read or parsed.
 * Missing files are not an error - defaults are used.
 */
export class ConfigError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    public readonly code: ConfigErrorCode
  ) {
    super(`Config ${filePath}: ${message}`);
    this.name = 'ConfigError';
  }
}
