import { BaseError } from './base.error';

/**
 * Configuration file does not exist
 */
export class ConfigurationNotFoundError extends BaseError {
  public readonly code = 'CONFIGURATION_NOT_FOUND';
  public readonly recoverable = false;
  public readonly configPath: string;

  constructor(configPath: string) {
    super(
      `Configuration file not found: ${configPath}`,
      undefined,
      'Run "gitchore setup" to create it',
    );
    this.configPath = configPath;
  }
}

/**
 * One or more required keys are absent or blank
 */
export class MissingConfigurationError extends BaseError {
  public readonly code = 'MISSING_CONFIGURATION';
  public readonly recoverable = false;
  public readonly missingKeys: string[];

  constructor(missingKeys: string[]) {
    super(
      `Missing required configuration: ${missingKeys.join(', ')}`,
      undefined,
      'Add the missing keys to your .env file or run "gitchore setup"',
    );
    this.missingKeys = [...missingKeys];
  }
}

/**
 * A key is present but its value cannot be used
 */
export class InvalidConfigurationError extends BaseError {
  public readonly code = 'INVALID_CONFIGURATION';
  public readonly recoverable = false;
}
