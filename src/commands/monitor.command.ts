import * as path from 'path';
import { CommandOptions, CommandResult, DEFAULT_PATHS, RepoConfig } from '../types/config.types';
import { ConfigManager } from '../core/config.manager';
import { FileSystemService } from '../core/filesystem.service';
import { GitService } from '../core/git.service';
import { GitHubService } from '../core/github.service';
import { StatusReport, StatusService } from '../core/status.service';
import { ErrorHandler } from '../errors/error.handler';
import { resolveGitHubSlug } from '../utils/git.parsers';
import { renderStatusJson, renderStatusText } from '../utils/status.renderer';
import { logger } from '../utils/logger.service';

export interface MonitorCommandOptions extends CommandOptions {
  /** Print the structured export instead of the text report */
  json?: boolean;
  /** true writes to the default file name */
  exportJson?: string | boolean;
  exportText?: string | boolean;
  /** Include repository metadata from the GitHub API */
  remote?: boolean;
}

export interface MonitorResult {
  report: StatusReport;
  exported: string[];
}

/**
 * Read-only repository status report
 */
export class MonitorCommand {
  private readonly workingDir: string;
  private readonly fileSystem: FileSystemService;
  private readonly configManager: ConfigManager;

  constructor(workingDir?: string, configFile?: string) {
    this.workingDir = workingDir || process.cwd();
    this.fileSystem = new FileSystemService();
    this.configManager = new ConfigManager(this.workingDir, this.fileSystem, configFile);
  }

  public async execute(options: MonitorCommandOptions = {}): Promise<CommandResult<MonitorResult>> {
    try {
      const config = await this.configManager.load();
      const report = await this.collect(config, options.remote === true);

      logger.info(options.json ? renderStatusJson(report) : renderStatusText(report));

      const exported: string[] = [];
      const jsonTarget = exportTarget(options.exportJson, DEFAULT_PATHS.statusJson);
      if (jsonTarget) {
        exported.push(await this.write(jsonTarget, renderStatusJson(report)));
      }
      const textTarget = exportTarget(options.exportText, DEFAULT_PATHS.statusText);
      if (textTarget) {
        exported.push(await this.write(textTarget, renderStatusText(report)));
      }

      return {
        success: true,
        message: exported.length > 0 ? `Exported to ${exported.join(', ')}` : undefined,
        data: { report, exported },
        exitCode: 0,
      };
    } catch (error) {
      return ErrorHandler.toResult(error, 'Failed to collect repository status');
    }
  }

  /**
   * Gather the status report, optionally enriched with GitHub metadata
   */
  public async collect(config: RepoConfig, includeRemote: boolean): Promise<StatusReport> {
    const git = new GitService(config.localPath, { timeoutMs: config.commandTimeoutMs });
    const report = await new StatusService(git).collect({
      remote: config.remote,
      historyLimit: config.historyLimit,
    });

    if (includeRemote) {
      const slug = resolveGitHubSlug(report.repository.remoteUrl, {
        owner: config.username,
        repo: config.repository,
      });
      const github = new GitHubService(config.token, slug.owner, slug.repo, {
        timeoutMs: config.commandTimeoutMs,
      });
      report.github = await github.getRepository();
    }

    return report;
  }

  private async write(target: string, content: string): Promise<string> {
    const filePath = path.resolve(this.workingDir, target);
    await this.fileSystem.writeFile(filePath, content);
    logger.debug(`Wrote ${filePath}`);
    return filePath;
  }
}

function exportTarget(option: string | boolean | undefined, fallback: string): string | null {
  if (option === undefined || option === false) {
    return null;
  }
  return option === true ? fallback : option;
}
