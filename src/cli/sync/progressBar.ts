import cliProgress from 'cli-progress';
import chalk from 'chalk';

import { statusSymbols } from '../../models';
import { IdentityKey, isTerminalState, TransitionEvent } from './engine';

export interface ProgressStats {
  synced: number;
  failed: number;
  skipped: number;
}

export interface ProgressConfig {
  /** Keys of the models the user selected, not those pulled in as dependencies. */
  requestedKeys: ReadonlySet<IdentityKey>;
}

/**
 * Progress bar over the models the user selected. Dependencies synced along the way
 * only show up in the stats: selecting one model that links three others reads 1/1,
 * not 4/4.
 */
export class SyncProgressBar {
  private bar: cliProgress.SingleBar | null = null;
  private stats: ProgressStats = { synced: 0, failed: 0, skipped: 0 };
  private requestedCompleted = 0;
  private readonly settled = new Set<IdentityKey>();

  constructor(
    private readonly config: ProgressConfig,
    private readonly enabled: boolean
  ) {}

  start() {
    if (!this.enabled) return;

    const total = this.config.requestedKeys.size;
    this.bar = new cliProgress.SingleBar({
      format: 'Syncing... {bar} {percentage}% | {requested}/{totalRequested} models | {stats}',
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: false,
    });

    this.bar.start(total, 0, {
      requested: 0,
      totalRequested: total,
      stats: chalk.gray('starting...'),
    });
  }

  update(event: TransitionEvent) {
    if (!isTerminalState(event.to) || this.settled.has(event.key)) {
      return;
    }
    this.settled.add(event.key);
    if (event.to === 'Synced') this.stats.synced++;
    else if (event.to === 'Failed') this.stats.failed++;
    else this.stats.skipped++;

    if (this.config.requestedKeys.has(event.key)) {
      this.requestedCompleted++;
    }
    this.bar?.update(this.requestedCompleted, {
      requested: this.requestedCompleted,
      stats: this.formatStats(),
    });
  }

  stop() {
    if (this.bar) {
      this.bar.stop();
    }
  }

  getStats(): ProgressStats {
    return { ...this.stats };
  }

  getRequestedCompleted(): number {
    return this.requestedCompleted;
  }

  private formatStats(): string {
    const parts: string[] = [];
    if (this.stats.synced > 0) parts.push(chalk.green(`${this.stats.synced} ${statusSymbols.ok}`));
    if (this.stats.failed > 0) parts.push(chalk.red(`${this.stats.failed} ${statusSymbols.error}`));
    if (this.stats.skipped > 0) parts.push(chalk.yellow(`${this.stats.skipped} ${statusSymbols.skipped}`));
    return parts.join(' ') || chalk.gray('starting...');
  }
}

export interface ProgressBarOptions {
  json?: boolean;
  jsonl?: boolean;
  verbose?: boolean;
  silent?: boolean;
}

export function shouldShowProgressBar(options: ProgressBarOptions, isTTY = process.stdout.isTTY === true): boolean {
  if (options.json || options.jsonl || options.silent || options.verbose) return false;
  return isTTY;
}
