/**
 * gitchore
 *
 * Automates repetitive repository maintenance on top of git and the GitHub
 * REST API: pattern staging, commit, tag and push workflows, an interactive
 * menu, a read-only status monitor and a LaTeX build-and-push pipeline.
 */

export * from './cli';
export * from './commands/push.command';
export * from './commands/manage.command';
export * from './commands/monitor.command';
export * from './commands/docs.command';
export * from './commands/setup.command';
export * from './core/config.manager';
export * from './core/command.runner';
export * from './core/document.builder';
export * from './core/filesystem.service';
export * from './core/git.service';
export * from './core/github.service';
export * from './core/push.workflow';
export * from './core/status.service';
export * from './core/workflow';
export * from './types/config.types';
export * from './types/config.schema';
export * from './types/git.types';
export * from './errors/base.error';
export * from './errors/config.error';
export * from './errors/document.error';
export * from './errors/error.handler';
export * from './errors/filesystem.error';
export * from './errors/git.error';
export * from './errors/github.error';
export * from './errors/tool.error';
export * from './utils/git.parsers';
export * from './utils/input.validator';
export * from './utils/latex.parsers';
export * from './utils/prompter';
export * from './utils/status.renderer';
