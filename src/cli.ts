#!/usr/bin/env node

import { Command } from 'commander';
import { readJsonSync } from 'fs-extra';
import { join } from 'path';
import { z } from 'zod';
import { PushCommand } from './commands/push.command';
import { ManageCommand } from './commands/manage.command';
import { MonitorCommand } from './commands/monitor.command';
import { DocsCommand } from './commands/docs.command';
import { SetupCommand } from './commands/setup.command';
import { ErrorHandler } from './errors/error.handler';
import { logger, LogLevel } from './utils/logger.service';
import { CommandResult, FALLBACK_VERSION } from './types/config.types';

interface GlobalOptions {
  verbose?: boolean;
  env?: string;
}

interface PushCliOptions {
  message?: string;
  tag?: string;
  tagMessage?: string;
  push: boolean;
}

interface MonitorCliOptions {
  json?: boolean;
  exportJson?: string | boolean;
  exportText?: string | boolean;
  remote?: boolean;
}

interface DocsCliOptions {
  message?: string;
  push: boolean;
}

interface SetupCliOptions {
  verify: boolean;
}

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const parsed = PackageJsonSchema.safeParse(readJsonSync(join(__dirname, '..', 'package.json')));
    if (parsed.success) {
      return parsed.data.version;
    }
  } catch {
    logger.debug('Could not read package.json for version, using fallback');
  }
  return FALLBACK_VERSION;
}

/**
 * Build the command-line program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('gitchore')
    .description('Automate git and GitHub maintenance: stage, commit, tag, push, monitor and build docs')
    .version(readVersion(), '-v, -V, --version', 'Output the current version')
    .option('--verbose', 'Show verbose output')
    .option('--env <path>', 'Configuration file to load', '.env')
    .on('option:verbose', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.debug('Verbose mode enabled');
    });

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .command('push')
    .description('Stage files matching the configured patterns, commit, tag and push')
    .option('-m, --message <message>', 'Commit message (defaults to COMMIT_MESSAGE)')
    .option('-t, --tag <name>', 'Create an annotated tag and push it')
    .option('--tag-message <message>', 'Annotation for the tag')
    .option('--no-push', 'Commit and tag without pushing')
    .action(async (options: PushCliOptions) => {
      const { verbose, env } = globals();
      const result = await new PushCommand(process.cwd(), env).execute({
        verbose,
        message: options.message,
        tag: options.tag,
        tagMessage: options.tagMessage,
        push: options.push,
      });
      finish(result, 'push');
    });

  program
    .command('manage')
    .description('Interactive menu of repository operations')
    .action(async () => {
      const { verbose, env } = globals();
      const result = await new ManageCommand(process.cwd(), undefined, env).execute({ verbose });
      finish(result, 'manage');
    });

  program
    .command('monitor')
    .description('Show a read-only repository status report')
    .option('--json', 'Print the structured export instead of the text report')
    .option('--export-json [file]', 'Write the structured export to a file')
    .option('--export-text [file]', 'Write the text report to a file')
    .option('--remote', 'Include repository metadata from the GitHub API')
    .action(async (options: MonitorCliOptions) => {
      const { verbose, env } = globals();
      const result = await new MonitorCommand(process.cwd(), env).execute({ verbose, ...options });
      finish(result, 'monitor');
    });

  program
    .command('docs')
    .description('Compile LaTeX documents to PDF and push them')
    .option('-m, --message <message>', 'Commit message for the generated PDFs')
    .option('--no-push', 'Build without committing or pushing')
    .action(async (options: DocsCliOptions) => {
      const { verbose, env } = globals();
      const result = await new DocsCommand(process.cwd(), env).execute({
        verbose,
        message: options.message,
        push: options.push,
      });
      finish(result, 'docs');
    });

  program
    .command('setup')
    .description('Create the .env configuration file')
    .option('--no-verify', 'Skip checking the token against the GitHub API')
    .action(async (options: SetupCliOptions) => {
      const { verbose, env } = globals();
      const result = await new SetupCommand(process.cwd(), undefined, env).execute({
        verbose,
        verify: options.verify,
      });
      finish(result, 'setup');
    });

  program.exitOverride(err => {
    if (err.code === 'commander.version' || err.code === 'commander.helpDisplayed') {
      process.exit(0);
    }
    process.exit(1);
  });

  return program;
}

/**
 * Report a command outcome and set the process exit status
 */
export function finish(result: CommandResult, command: string): void {
  if (result.success) {
    if (result.message) {
      logger.success(result.message);
    }
    return;
  }

  if (result.error) {
    ErrorHandler.handle(result.error, command);
  } else if (result.message && result.exitCode === 0) {
    logger.warn(result.message);
  } else if (result.message) {
    logger.error(result.message);
  }
  process.exit(result.exitCode);
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch(error => {
    process.exit(ErrorHandler.handle(error));
  });
}
