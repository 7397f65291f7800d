import path from 'path';
import dotenv from 'dotenv';
import type { ZodIssue } from 'zod';
import {
  RepoConfig,
  CONFIG_KEYS,
  REQUIRED_CONFIG_KEYS,
  DEFAULT_PATHS,
} from '../types/config.types';
import { EnvFileSchema } from '../types/config.schema';
import { FileSystemService } from './filesystem.service';
import {
  ConfigurationNotFoundError,
  InvalidConfigurationError,
  MissingConfigurationError,
} from '../errors/config.error';
import { logger } from '../utils/logger.service';

/**
 * Answers collected by the setup wizard
 */
export interface SetupAnswers {
  username: string;
  token: string;
  repository: string;
  localPath: string;
  commitMessage: string;
}

/**
 * Owner-only read/write; the file holds an access token
 */
const CONFIG_FILE_MODE = 0o600;

/**
 * Loads and writes the .env configuration file
 */
export class ConfigManager {
  private readonly configPath: string;
  private readonly fileSystem: FileSystemService;

  constructor(workingDir: string, fileSystem?: FileSystemService, configFile: string = DEFAULT_PATHS.config) {
    this.configPath = path.resolve(workingDir, configFile);
    this.fileSystem = fileSystem || new FileSystemService();
  }

  /**
   * Load, validate and freeze the configuration. The token is registered
   * with the logger so it is masked wherever it shows up in output.
   */
  public async load(): Promise<RepoConfig> {
    if (!(await this.exists())) {
      throw new ConfigurationNotFoundError(this.configPath);
    }

    const content = await this.fileSystem.readFile(this.configPath);
    const config = ConfigManager.parse(content, path.dirname(this.configPath));
    logger.addSecret(config.token);
    return config;
  }

  /**
   * Build a configuration value from .env text. Relative LOCAL_REPO_PATH
   * values resolve against `baseDir`.
   */
  public static parse(content: string, baseDir: string): RepoConfig {
    const raw = dotenv.parse(content);

    const missingKeys = REQUIRED_CONFIG_KEYS.filter(key => (raw[key] ?? '').trim() === '');
    if (missingKeys.length > 0) {
      throw new MissingConfigurationError(missingKeys);
    }

    const result = EnvFileSchema.safeParse(raw);
    if (!result.success) {
      throw new InvalidConfigurationError(
        'Configuration data is invalid',
        result.error.issues.map((issue: ZodIssue) => `${issue.path.join('.')}: ${issue.message}`).join('\n'),
      );
    }

    const env = result.data;
    const config: RepoConfig = {
      username: env[CONFIG_KEYS.username],
      token: env[CONFIG_KEYS.token],
      repository: env[CONFIG_KEYS.repository],
      localPath: path.resolve(baseDir, env[CONFIG_KEYS.localPath]),
      commitMessage: env[CONFIG_KEYS.commitMessage],
      pushPatterns: Object.freeze([...env[CONFIG_KEYS.pushPatterns]]),
      remote: env[CONFIG_KEYS.remote],
      emptyCommitPolicy: env[CONFIG_KEYS.emptyCommitPolicy],
      docs: Object.freeze({
        directory: env[CONFIG_KEYS.docsDirectory],
        compiler: env[CONFIG_KEYS.docsCompiler],
        passes: env[CONFIG_KEYS.docsPasses],
      }),
      commandTimeoutMs: env[CONFIG_KEYS.commandTimeoutMs],
      historyLimit: env[CONFIG_KEYS.historyLimit],
    };

    return Object.freeze(config);
  }

  /**
   * Write a fresh configuration file from wizard answers
   */
  public async create(answers: SetupAnswers): Promise<string> {
    await this.fileSystem.writeFile(this.configPath, ConfigManager.render(answers), CONFIG_FILE_MODE);
    return this.configPath;
  }

  public static render(answers: SetupAnswers): string {
    return [
      '# gitchore configuration',
      '# Created by "gitchore setup"',
      '',
      '# REQUIRED - GitHub credentials',
      `${CONFIG_KEYS.username}=${answers.username}`,
      `${CONFIG_KEYS.token}=${answers.token}`,
      `${CONFIG_KEYS.repository}=${answers.repository}`,
      `${CONFIG_KEYS.localPath}=${answers.localPath}`,
      '',
      '# OPTIONAL',
      `${CONFIG_KEYS.commitMessage}=${answers.commitMessage}`,
      '',
      '# ============================================',
      '# SECURITY WARNING:',
      '# This file contains your GitHub token!',
      '# NEVER commit it to version control.',
      '# ============================================',
      '',
    ].join('\n');
  }

  /**
   * Check if configuration exists
   */
  public async exists(): Promise<boolean> {
    return await this.fileSystem.isFile(this.configPath);
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Human-readable summary with the token masked
   */
  public static describe(config: RepoConfig): string[] {
    return [
      `User: ${config.username}`,
      `Token: ${maskSecret(config.token)}`,
      `Repository: ${config.repository}`,
      `Local path: ${config.localPath}`,
      `Remote: ${config.remote}`,
      `Patterns: ${config.pushPatterns.join(', ')}`,
      `Empty commit policy: ${config.emptyCommitPolicy}`,
    ];
  }
}

/**
 * Keep the last four characters of long secrets, hide the rest
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return '********';
  }
  return `********${secret.slice(-4)}`;
}
