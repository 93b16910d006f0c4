import { default as chalk } from 'chalk';

import { LogHandler, statusSymbols } from '../../models';
import { formatIdentity, SyncPlan, SyncRunResult, SyncTaskOutcome, TreeLine } from './engine';

export function formatOutcome(task: SyncTaskOutcome): string {
  const label = `${formatIdentity(task.identity, task.name)}${task.implicit ? chalk.gray(' (dependency)') : ''}`;
  switch (task.state) {
    case 'Synced':
      return `${chalk.green(statusSymbols.ok)} ${label}${task.attempts > 1 ? chalk.gray(` after ${task.attempts} attempts`) : ''}`;
    case 'Failed':
      return `${chalk.red(statusSymbols.error)} ${label}: ${chalk.red(`${task.error ?? 'Unexpected'}${task.message ? ` ${task.message}` : ''}`)}`;
    default:
      return `${chalk.yellow(statusSymbols.skipped)} ${label}: ${chalk.yellow(describeSkip(task))}`;
  }
}

function describeSkip(task: SyncTaskOutcome): string {
  switch (task.skipReason) {
    case 'dependency-failed':
      return task.causedBy
        ? `skipped, ${formatIdentity(task.causedBy)} failed${task.error ? ` (${task.error})` : ''}`
        : 'skipped, a linked model failed';
    case 'halted':
      return 'skipped, gateway unavailable';
    default:
      return 'skipped, run cancelled';
  }
}

export function formatSummary(result: SyncRunResult): string {
  const counts: Array<string> = [];
  if (result.stats.synced > 0) {
    counts.push(chalk`{green ${result.stats.synced} synced}`);
  }
  if (result.stats.failed > 0) {
    counts.push(chalk`{red ${result.stats.failed} failed}`);
  }
  if (result.stats.skipped > 0) {
    counts.push(chalk`{yellow ${result.stats.skipped} skipped}`);
  }
  const suffix = result.status === 'completed' ? '' : chalk.red(` - run ${result.status}`);
  return chalk`{bold ${result.tasks.length}} models processed (${counts.join(', ')})${suffix}`;
}

export function reportResult(result: SyncRunResult, output: LogHandler): void {
  for (const task of result.tasks) {
    output.info(formatOutcome(task));
  }
  output.info('---------------------');
  output.info(formatSummary(result));
  if (result.haltedBy) {
    output.error(chalk.red(`Gateway unavailable: ${result.haltedBy.message}`));
  }
}

export function formatPlan(plan: SyncPlan): Array<string> {
  const lines = plan.entries.map((entry, index) => {
    let line = `${index + 1}. ${formatIdentity(entry.identity, entry.name)}`;
    if (entry.implicit) {
      line += chalk.gray(' (dependency)');
    }
    if (entry.discoveryError) {
      line += chalk.red(` unreachable: ${entry.discoveryError.kind}`);
    }
    return line;
  });
  lines.push(
    chalk`{bold ${plan.stats.totalModels}} models in sync order (${plan.stats.requestedModels} selected, ${plan.stats.implicitModels} dependencies)`
  );
  return lines;
}

export function formatTreeLine(line: TreeLine): string {
  let text = `${'  '.repeat(line.depth)}${formatIdentity(line.identity, line.name)}`;
  if (line.cyclic) {
    text += chalk.yellow(' ↺ circular link');
  } else if (line.failed) {
    text += chalk.red(' (unreachable)');
  }
  return text;
}
