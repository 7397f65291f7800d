import { RepoConfig } from '../types/config.types';
import { CommitSummary } from '../types/git.types';
import { GitService } from './git.service';
import { Workflow, WorkflowReport } from './workflow';
import { NothingToCommitError, TagAlreadyExistsError } from '../errors/git.error';
import { InputValidator } from '../utils/input.validator';
import { logger } from '../utils/logger.service';

export interface PushRequest {
  /** Overrides the configured default commit message */
  message?: string;
  tagName?: string;
  tagMessage?: string;
  /** Overrides the configured push patterns */
  patterns?: readonly string[];
  /** Paths staged in addition to pattern matches (e.g. freshly built PDFs) */
  extraPaths?: readonly string[];
  /** Stop after committing and tagging */
  skipPush?: boolean;
}

export type PushStatus = 'pushed' | 'committed' | 'nothing-to-commit';

export interface PushSummary {
  status: PushStatus;
  stagedFiles: string[];
  commit?: CommitSummary;
  branch?: string;
  remote: string;
  tag?: string;
  report: WorkflowReport;
}

interface PushContext {
  request: PushRequest;
  stagedFiles: string[];
  status: PushStatus;
  commit?: CommitSummary;
  branch?: string;
  tag?: string;
}

/**
 * stage → commit → tag → push over one working tree
 */
export class PushWorkflow {
  private readonly config: RepoConfig;
  private readonly git: GitService;

  constructor(config: RepoConfig, git: GitService) {
    this.config = config;
    this.git = git;
  }

  public async run(request: PushRequest = {}): Promise<PushSummary> {
    const context: PushContext = { request, stagedFiles: [], status: 'nothing-to-commit' };
    const report = await this.build().run(context);

    return {
      status: context.status,
      stagedFiles: context.stagedFiles,
      commit: context.commit,
      branch: context.branch,
      remote: this.config.remote,
      tag: context.tag,
      report,
    };
  }

  private build(): Workflow<PushContext> {
    return new Workflow<PushContext>('push')
      .step('Verify repository', async context => {
        await this.git.ensureGitAvailable();
        await this.git.ensureRepository();
        // A taken tag name fails here, before anything is staged or committed
        if (context.request.tagName !== undefined) {
          await this.assertTagAvailable(context.request.tagName);
        }
      })
      .step('Stage matching files', async context => {
        context.stagedFiles = await this.stage(context.request);
      })
      .step('Check staged changes', async context => {
        if (context.stagedFiles.length > 0) {
          return 'continue';
        }
        if (this.config.emptyCommitPolicy === 'fail') {
          throw new NothingToCommitError('Nothing to commit: no changed file matches the configured patterns');
        }
        logger.info('Nothing to commit; working tree has no matching changes');
        context.status = 'nothing-to-commit';
        return 'halt';
      })
      .step('Commit', async context => {
        const message = InputValidator.validateCommitMessage(context.request.message ?? this.config.commitMessage);
        context.commit = await this.git.commit(message);
        context.branch = context.commit.branch || (await this.git.getCurrentBranch());
        context.status = 'committed';
        logger.info(`  Committed ${shortHash(context.commit.hash)}: ${message}`);
      })
      .step('Tag', async context => {
        if (context.request.tagName === undefined) {
          return;
        }
        context.tag = await this.tag(context.request.tagName, context.request.tagMessage ?? context.request.message);
      })
      .step('Push', async context => {
        if (context.request.skipPush) {
          logger.info('  Push skipped');
          return;
        }
        const branch = context.branch ?? (await this.git.getCurrentBranch());
        await this.git.push(this.config.remote, branch, context.tag);
        context.status = 'pushed';
        logger.info(`  Pushed ${branch}${context.tag ? ` and tag ${context.tag}` : ''} to ${this.config.remote}`);
      });
  }

  /**
   * Stage pattern matches plus extra paths; returns what the index now holds
   */
  public async stage(request: PushRequest = {}): Promise<string[]> {
    const patterns = request.patterns ?? this.config.pushPatterns;
    const matches = await this.git.listChangedFiles(patterns);
    const toStage = [...new Set([...matches, ...(request.extraPaths ?? [])])];

    logger.debug(`Patterns: ${patterns.join(', ')}`);
    if (toStage.length > 0) {
      await this.git.stageFiles(toStage);
    }

    const staged = await this.git.getStagedFiles();
    logger.info(`  Staged ${staged.length} file(s)`);
    for (const file of staged) {
      logger.debug(`    + ${file}`);
    }
    return staged;
  }

  /**
   * Create an annotated tag, refusing names that already exist
   */
  public async tag(tagName: string, message?: string): Promise<string> {
    const name = await this.assertTagAvailable(tagName);
    await this.git.createAnnotatedTag(name, message?.trim() || `Release ${name}`);
    logger.info(`  Tagged ${name}`);
    return name;
  }

  private async assertTagAvailable(tagName: string): Promise<string> {
    const name = InputValidator.validateRefName(tagName, 'tag');
    if (await this.git.tagExists(name)) {
      throw new TagAlreadyExistsError(name);
    }
    return name;
  }
}

function shortHash(hash: string): string {
  return hash.slice(0, 7);
}
