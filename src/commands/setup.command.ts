import chalk from 'chalk';
import { CommandOptions, CommandResult, DEFAULT_SETTINGS } from '../types/config.types';
import { ConfigManager, SetupAnswers } from '../core/config.manager';
import { CommandRunner } from '../core/command.runner';
import { GitHubService } from '../core/github.service';
import { BaseError } from '../errors/base.error';
import { ErrorHandler } from '../errors/error.handler';
import { InvalidInputError } from '../errors/git.error';
import { ClackPrompter, Prompter } from '../utils/prompter';
import { logger } from '../utils/logger.service';

const DEFAULT_REPOSITORY = 'technical-docs';

export interface SetupCommandOptions extends CommandOptions {
  /** Check the token against the GitHub API after writing the file */
  verify?: boolean;
}

export interface SetupResult {
  configPath: string;
  gitVersion: string;
  verifiedLogin?: string;
}

/**
 * Interactive wizard that writes the .env configuration file
 */
export class SetupCommand {
  private readonly configManager: ConfigManager;
  private readonly prompter: Prompter;
  private readonly runner: CommandRunner;

  constructor(workingDir?: string, prompter?: Prompter, configFile?: string, runner?: CommandRunner) {
    this.configManager = new ConfigManager(workingDir || process.cwd(), undefined, configFile);
    this.prompter = prompter || new ClackPrompter();
    this.runner = runner || new CommandRunner();
  }

  public async execute(options: SetupCommandOptions = {}): Promise<CommandResult<SetupResult>> {
    try {
      logger.section('gitchore - Setup');

      logger.info('\nChecking requirements...');
      const gitVersion = (await this.runner.run('git', ['--version'])).stdout.trim();
      logger.success(gitVersion);

      if (await this.configManager.exists()) {
        logger.info(`Configuration exists: ${this.configManager.getConfigPath()}`);
        const overwrite = await this.prompter.confirm('Overwrite?', false);
        if (!overwrite) {
          return { success: true, message: 'Kept existing configuration', exitCode: 0 };
        }
      }

      logger.info('\nEnter your GitHub credentials');
      logger.info(chalk.gray('(Create a token at https://github.com/settings/tokens)'));
      const answers = await this.ask();
      if (answers === null) {
        return { success: false, message: 'Setup cancelled', exitCode: 0 };
      }

      logger.addSecret(answers.token);
      const configPath = await this.configManager.create(answers);
      logger.success(`Configuration written to ${configPath}`);

      const result: SetupResult = { configPath, gitVersion };
      if (options.verify !== false) {
        result.verifiedLogin = await this.verifyToken(answers);
      }

      this.printNextSteps();
      return { success: true, message: 'Setup complete', data: result, exitCode: 0 };
    } catch (error) {
      return ErrorHandler.toResult(error, 'Setup failed');
    }
  }

  /**
   * Collect answers; null when the user cancels a prompt
   */
  private async ask(): Promise<SetupAnswers | null> {
    const username = await this.prompter.text('GitHub username');
    if (username === null) {
      return null;
    }
    if (!username) {
      throw new InvalidInputError('Username cannot be empty');
    }

    const token = await this.prompter.secret('GitHub token (personal access token)');
    if (token === null) {
      return null;
    }
    if (!token) {
      throw new InvalidInputError('Token cannot be empty');
    }

    const repository = await this.prompter.text('Repository name', { defaultValue: DEFAULT_REPOSITORY });
    if (repository === null) {
      return null;
    }
    const repositoryName = repository || DEFAULT_REPOSITORY;

    const localPath = await this.prompter.text('Local repository path', { defaultValue: `./${repositoryName}` });
    if (localPath === null) {
      return null;
    }

    const commitMessage = await this.prompter.text('Default commit message', {
      defaultValue: DEFAULT_SETTINGS.commitMessage,
    });
    if (commitMessage === null) {
      return null;
    }

    return {
      username,
      token,
      repository: repositoryName,
      localPath: localPath || `./${repositoryName}`,
      commitMessage: commitMessage || DEFAULT_SETTINGS.commitMessage,
    };
  }

  /**
   * A rejected token is reported but does not undo the written file
   */
  private async verifyToken(answers: SetupAnswers): Promise<string | undefined> {
    try {
      const user = await new GitHubService(answers.token, answers.username, answers.repository).getAuthenticatedUser();
      logger.success(`Token belongs to ${user.login}`);
      return user.login;
    } catch (error) {
      logger.warn(`Could not verify token: ${BaseError.messageOf(error)}`);
      return undefined;
    }
  }

  private printNextSteps(): void {
    logger.section('SETUP COMPLETE');
    logger.info('Next steps:');
    logger.info('  gitchore monitor   Check repository status');
    logger.info('  gitchore manage    Interactive menu');
    logger.info('  gitchore push      Stage, commit and push');
    logger.info('  gitchore docs      Build LaTeX documents and push the PDFs');
  }
}
