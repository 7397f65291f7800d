import chalk from 'chalk';
import { logger } from '../utils/logger.service';

/**
 * `halt` ends the workflow successfully without running later steps
 */
export type StepOutcome = 'continue' | 'halt';

export interface WorkflowStep<TContext> {
  name: string;
  run(context: TContext): Promise<StepOutcome | void>;
}

export type StepStatus = 'passed' | 'halted' | 'failed' | 'skipped';

export interface StepRecord {
  name: string;
  status: StepStatus;
  elapsedMs: number;
}

export interface WorkflowReport {
  workflow: string;
  steps: StepRecord[];
  halted: boolean;
}

/**
 * Linear sequence of steps with abort-on-first-failure semantics.
 * Steps that already ran are not undone when a later one fails.
 */
export class Workflow<TContext> {
  private readonly name: string;
  private readonly steps: Array<WorkflowStep<TContext>> = [];

  constructor(name: string) {
    this.name = name;
  }

  public step(name: string, run: WorkflowStep<TContext>['run']): this {
    this.steps.push({ name, run });
    return this;
  }

  /**
   * Run every step in order. The first error is rethrown unchanged after the
   * remaining steps are reported as skipped.
   */
  public async run(context: TContext): Promise<WorkflowReport> {
    const records: StepRecord[] = [];
    const total = this.steps.length;

    for (const [index, step] of this.steps.entries()) {
      logger.step(index + 1, total, step.name);
      const startedAt = Date.now();

      let outcome: StepOutcome | void;
      try {
        outcome = await step.run(context);
      } catch (error) {
        records.push({ name: step.name, status: 'failed', elapsedMs: Date.now() - startedAt });
        const skipped = this.steps.slice(index + 1).map(remaining => remaining.name);
        logger.info(chalk.red(`  ✗ ${step.name} failed`));
        if (skipped.length > 0) {
          logger.debug(`Skipped: ${skipped.join(', ')}`);
        }
        throw error;
      }

      const elapsedMs = Date.now() - startedAt;
      if (outcome === 'halt') {
        records.push({ name: step.name, status: 'halted', elapsedMs });
        for (const remaining of this.steps.slice(index + 1)) {
          records.push({ name: remaining.name, status: 'skipped', elapsedMs: 0 });
        }
        logger.debug(`${this.name}: halted after "${step.name}"`);
        return { workflow: this.name, steps: records, halted: true };
      }

      records.push({ name: step.name, status: 'passed', elapsedMs });
      logger.debug(`  ✓ ${step.name} (${elapsedMs}ms)`);
    }

    return { workflow: this.name, steps: records, halted: false };
  }
}
