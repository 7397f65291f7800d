import chalk from 'chalk';
import { CommandOptions, CommandResult, RepoConfig } from '../types/config.types';
import { ConfigManager } from '../core/config.manager';
import { GitService } from '../core/git.service';
import { GitHubService } from '../core/github.service';
import { PushWorkflow } from '../core/push.workflow';
import { StatusService } from '../core/status.service';
import { ErrorHandler } from '../errors/error.handler';
import { InputValidator } from '../utils/input.validator';
import { commitSubject, resolveGitHubSlug } from '../utils/git.parsers';
import { renderStatusText } from '../utils/status.renderer';
import { ClackPrompter, Prompter } from '../utils/prompter';
import { logger } from '../utils/logger.service';
import { createGitService, summaryMessage } from './push.command';

export type MenuAction =
  | 'status'
  | 'history'
  | 'stage'
  | 'commit'
  | 'push'
  | 'pull'
  | 'createBranch'
  | 'switchBranch'
  | 'createTag'
  | 'listBranches'
  | 'completeWorkflow'
  | 'remoteInfo'
  | 'exit';

export interface MenuItem {
  key: string;
  action: MenuAction;
  label: string;
}

export const MENU_ITEMS: readonly MenuItem[] = [
  { key: '1', action: 'status', label: 'View Status' },
  { key: '2', action: 'history', label: 'View History' },
  { key: '3', action: 'stage', label: 'Stage Files' },
  { key: '4', action: 'commit', label: 'Commit' },
  { key: '5', action: 'push', label: 'Push' },
  { key: '6', action: 'pull', label: 'Pull' },
  { key: '7', action: 'createBranch', label: 'Create Branch' },
  { key: '8', action: 'switchBranch', label: 'Switch Branch' },
  { key: '9', action: 'createTag', label: 'Create Tag' },
  { key: '10', action: 'listBranches', label: 'List Branches' },
  { key: '11', action: 'completeWorkflow', label: 'Complete Workflow' },
  { key: '12', action: 'remoteInfo', label: 'Remote Repository Info' },
  { key: '0', action: 'exit', label: 'Exit' },
];

/**
 * Returned by a handler whose prompt was cancelled; ends the session
 */
const CANCELLED = Symbol('cancelled');

type ActionHandler = () => Promise<typeof CANCELLED | void>;

export interface ManageResult {
  actionsRun: number;
  failures: number;
}

/**
 * Map a typed selection to its menu action, or null when it is not on the menu
 */
export function parseMenuSelection(input: string): MenuAction | null {
  const trimmed = input.trim();
  const item = MENU_ITEMS.find(candidate => candidate.key === trimmed);
  return item ? item.action : null;
}

/**
 * Interactive menu over the push, status and branch workflows
 */
export class ManageCommand {
  private readonly configManager: ConfigManager;
  private readonly prompter: Prompter;

  constructor(workingDir?: string, prompter?: Prompter, configFile?: string) {
    this.configManager = new ConfigManager(workingDir || process.cwd(), undefined, configFile);
    this.prompter = prompter || new ClackPrompter();
  }

  public async execute(_options: CommandOptions = {}): Promise<CommandResult<ManageResult>> {
    try {
      const config = await this.configManager.load();
      const git = createGitService(config);
      await git.ensureRepository();
      logger.success(`Connected to ${config.localPath}`);

      const handlers = this.createHandlers(config, git);
      const result: ManageResult = { actionsRun: 0, failures: 0 };

      for (;;) {
        this.displayMenu();
        const input = await this.prompter.text('Option');
        if (input === null) {
          break;
        }

        const action = parseMenuSelection(input);
        if (action === null) {
          logger.warn(`Invalid option: ${input || '(empty)'}`);
          continue;
        }
        if (action === 'exit') {
          break;
        }

        result.actionsRun++;
        try {
          if ((await handlers[action]()) === CANCELLED) {
            break;
          }
        } catch (error) {
          result.failures++;
          ErrorHandler.handle(error, labelOf(action));
        }
      }

      return {
        success: true,
        message: 'Goodbye',
        data: result,
        exitCode: 0,
      };
    } catch (error) {
      return ErrorHandler.toResult(error, 'Repository manager failed');
    }
  }

  private displayMenu(): void {
    logger.section('GitHub Repository Manager');
    for (const item of MENU_ITEMS) {
      logger.info(`${item.key.padStart(2)}. ${item.label}`);
    }
  }

  /**
   * One handler per menu action; the Record type keeps the table exhaustive
   */
  private createHandlers(config: RepoConfig, git: GitService): Record<Exclude<MenuAction, 'exit'>, ActionHandler> {
    const workflow = new PushWorkflow(config, git);

    return {
      status: async () => {
        const report = await new StatusService(git).collect({
          remote: config.remote,
          historyLimit: config.historyLimit,
        });
        logger.info(renderStatusText(report));
      },

      history: async () => {
        const commits = await git.getLog(config.historyLimit);
        if (commits.length === 0) {
          logger.info('No commits yet');
        }
        commits.forEach((commit, index) => {
          logger.info(`${index + 1}. ${commit.shortHash} - ${commitSubject(commit.message, 50)}`);
        });
      },

      stage: async () => {
        const staged = await workflow.stage();
        logger.success(`${staged.length} file(s) staged`);
      },

      commit: async () => {
        const staged = await git.getStagedFiles();
        if (staged.length === 0) {
          logger.warn('Nothing staged; stage files first');
          return;
        }
        const message = await this.prompter.text('Commit message', { defaultValue: config.commitMessage });
        if (message === null) {
          return CANCELLED;
        }
        const commit = await git.commit(InputValidator.validateCommitMessage(message));
        logger.success(`Committed ${commit.hash.slice(0, 7)}`);
      },

      push: async () => {
        const branch = await git.getCurrentBranch();
        await git.push(config.remote, branch);
        logger.success(`Pushed ${branch} to ${config.remote}`);
      },

      pull: async () => {
        const branch = await git.getCurrentBranch();
        const pulled = await git.pull(config.remote, branch);
        logger.success(`Pulled ${branch}: ${pulled.changes} file(s) changed`);
      },

      createBranch: async () => {
        const name = await this.prompter.text('Branch name');
        if (name === null) {
          return CANCELLED;
        }
        const branch = InputValidator.validateRefName(name, 'branch');
        await git.createBranch(branch);
        logger.success(`Branch created: ${branch}`);
      },

      switchBranch: async () => {
        const name = await this.prompter.text('Branch name');
        if (name === null) {
          return CANCELLED;
        }
        const branch = InputValidator.validateRefName(name, 'branch');
        await git.switchBranch(branch);
        logger.success(`Switched to ${branch}`);
      },

      createTag: async () => {
        const name = await this.prompter.text('Tag name');
        if (name === null) {
          return CANCELLED;
        }
        const tag = await workflow.tag(name);
        logger.success(`Tag created: ${tag}`);
        const confirmed = await this.prompter.confirm('Push tag?');
        if (confirmed === null) {
          return CANCELLED;
        }
        if (confirmed) {
          await git.pushTag(config.remote, tag);
          logger.success('Tag pushed');
        }
      },

      listBranches: async () => {
        const { branches } = await git.getBranches();
        for (const branch of branches) {
          logger.info(`  ${branch.name}${branch.current ? chalk.green(' (current)') : ''}`);
        }
      },

      completeWorkflow: async () => {
        const message = await this.prompter.text('Commit message', { defaultValue: config.commitMessage });
        if (message === null) {
          return CANCELLED;
        }
        const summary = await workflow.run({ message });
        logger.success(summaryMessage(summary));
      },

      remoteInfo: async () => {
        const slug = resolveGitHubSlug(await git.getRemoteUrl(config.remote), {
          owner: config.username,
          repo: config.repository,
        });
        const info = await new GitHubService(config.token, slug.owner, slug.repo, {
          timeoutMs: config.commandTimeoutMs,
        }).getRepository();
        logger.info(`Repository: ${info.fullName} (${info.visibility})`);
        logger.info(`Default branch: ${info.defaultBranch}`);
        logger.info(`URL: ${info.htmlUrl}`);
        logger.info(`Last push: ${info.pushedAt ?? 'never'}`);
        logger.info(`Open issues: ${info.openIssues} | Stars: ${info.stars}`);
      },
    };
  }
}

function labelOf(action: MenuAction): string {
  const item = MENU_ITEMS.find(candidate => candidate.action === action);
  return item ? item.label : action;
}
