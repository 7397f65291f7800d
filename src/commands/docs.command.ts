import * as path from 'path';
import { CommandOptions, CommandResult } from '../types/config.types';
import { ConfigManager } from '../core/config.manager';
import { CommandRunner } from '../core/command.runner';
import { DocumentBuilder, BuiltDocument } from '../core/document.builder';
import { FileSystemService } from '../core/filesystem.service';
import { PushSummary, PushWorkflow } from '../core/push.workflow';
import { ErrorHandler } from '../errors/error.handler';
import { formatMegabytes } from '../utils/latex.parsers';
import { logger } from '../utils/logger.service';
import { createGitService, summaryMessage } from './push.command';

export interface DocsCommandOptions extends CommandOptions {
  message?: string;
  /** false builds without committing or pushing */
  push?: boolean;
}

export interface DocsResult {
  built: BuiltDocument[];
  push?: PushSummary;
}

/**
 * Compile LaTeX sources to PDF, then push the PDFs
 */
export class DocsCommand {
  private readonly fileSystem: FileSystemService;
  private readonly configManager: ConfigManager;

  constructor(workingDir?: string, configFile?: string) {
    this.fileSystem = new FileSystemService();
    this.configManager = new ConfigManager(workingDir || process.cwd(), this.fileSystem, configFile);
  }

  public async execute(options: DocsCommandOptions = {}): Promise<CommandResult<DocsResult>> {
    try {
      const config = await this.configManager.load();
      const builder = new DocumentBuilder(
        config.docs,
        new CommandRunner(config.commandTimeoutMs),
        this.fileSystem,
      );

      // Git and the repository are checked before anything is compiled or cleaned
      const pushing = options.push !== false;
      const git = pushing ? createGitService(config) : null;
      if (git) {
        await git.ensureGitAvailable();
        await git.ensureRepository();
      }

      logger.section('Building Documentation');
      const built = await builder.buildAll(config.localPath);
      this.displayBuildReport(built);

      if (!git) {
        return {
          success: true,
          message: `Built ${built.length} PDF(s)`,
          data: { built },
          exitCode: 0,
        };
      }

      logger.section('Pushing to GitHub');
      const workflow = new PushWorkflow(config, git);
      const summary = await workflow.run({
        message: options.message ?? `Auto-build: Generated ${built.length} PDF(s)`,
        extraPaths: built.map(document => toRepositoryPath(config.localPath, document.pdf)),
      });

      return {
        success: true,
        message: `Built ${built.length} PDF(s); ${summaryMessage(summary)}`,
        data: { built, push: summary },
        exitCode: 0,
      };
    } catch (error) {
      return ErrorHandler.toResult(error, 'Documentation pipeline failed');
    }
  }

  private displayBuildReport(built: BuiltDocument[]): void {
    logger.section('Build Report');
    let totalBytes = 0;
    for (const document of built) {
      totalBytes += document.sizeBytes;
      logger.info(`  - ${path.basename(document.pdf)}`);
      logger.info(`    Size: ${formatMegabytes(document.sizeBytes)}`);
    }
    logger.info(`\nTotal: ${formatMegabytes(totalBytes)} | ${built.length} file(s)`);
  }
}

/**
 * Repository-relative path with forward slashes, as git expects in pathspecs
 */
export function toRepositoryPath(repositoryPath: string, filePath: string): string {
  return path.relative(repositoryPath, filePath).split(path.sep).join('/');
}
