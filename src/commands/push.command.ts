import chalk from 'chalk';
import { CommandOptions, CommandResult, RepoConfig } from '../types/config.types';
import { ConfigManager } from '../core/config.manager';
import { GitService } from '../core/git.service';
import { PushSummary, PushWorkflow } from '../core/push.workflow';
import { ErrorHandler } from '../errors/error.handler';
import { logger } from '../utils/logger.service';

export interface PushCommandOptions extends CommandOptions {
  message?: string;
  tag?: string;
  tagMessage?: string;
  /** false stops after commit and tag */
  push?: boolean;
}

/**
 * Stage files matching the configured patterns, commit, tag and push
 */
export class PushCommand {
  private readonly configManager: ConfigManager;

  constructor(workingDir?: string, configFile?: string) {
    this.configManager = new ConfigManager(workingDir || process.cwd(), undefined, configFile);
  }

  /**
   * Execute the push workflow
   */
  public async execute(options: PushCommandOptions = {}): Promise<CommandResult<PushSummary>> {
    try {
      const config = await this.configManager.load();
      if (options.verbose) {
        ConfigManager.describe(config).forEach(line => logger.debug(line));
      }

      logger.section('Pushing to GitHub');
      const workflow = new PushWorkflow(config, createGitService(config));
      const summary = await workflow.run({
        message: options.message,
        tagName: options.tag,
        tagMessage: options.tagMessage,
        skipPush: options.push === false,
      });

      this.displaySummary(summary);

      return {
        success: true,
        message: summaryMessage(summary),
        data: summary,
        exitCode: 0,
      };
    } catch (error) {
      return ErrorHandler.toResult(error, 'Push workflow failed');
    }
  }

  private displaySummary(summary: PushSummary): void {
    if (summary.status === 'nothing-to-commit') {
      return;
    }

    logger.info(chalk.bold('\nSummary:'));
    logger.info(`  Files: ${summary.stagedFiles.length}`);
    for (const file of summary.stagedFiles) {
      logger.info(`    ${chalk.green('+')} ${file}`);
    }
    if (summary.commit) {
      logger.info(`  Commit: ${summary.commit.hash} on ${summary.branch ?? summary.commit.branch}`);
      logger.info(
        `  Changes: ${summary.commit.changes} file(s), +${summary.commit.insertions} -${summary.commit.deletions}`,
      );
    }
    if (summary.tag) {
      logger.info(`  Tag: ${summary.tag}`);
    }
  }
}

/**
 * GitService for the configured working tree, authenticated for pushes
 */
export function createGitService(config: RepoConfig): GitService {
  return new GitService(config.localPath, {
    timeoutMs: config.commandTimeoutMs,
    credentials: { username: config.username, token: config.token },
  });
}

export function summaryMessage(summary: PushSummary): string {
  const count = summary.stagedFiles.length;
  switch (summary.status) {
    case 'nothing-to-commit':
      return 'Nothing to commit';
    case 'committed':
      return `Committed ${count} file(s) to ${summary.branch ?? 'current branch'}`;
    case 'pushed':
      return `Pushed ${count} file(s) to ${summary.remote}/${summary.branch ?? 'current branch'}`;
  }
}
