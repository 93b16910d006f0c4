import { log } from '../io';
import * as models from '../models';

export function initCliProvider(): void {
  initFixStatusSymbols();
}

function initFixStatusSymbols() {
  if (process.platform === 'win32') {
    // https://github.com/nodejs/node-v0.x-archive/issues/7940
    models.statusSymbols.ok = '[x]';
    models.statusSymbols.error = '[-]';
    models.statusSymbols.skipped = '[*]';
  }
}

export interface LibraryLogOptions {
  level: models.LogLevel | undefined;
  /** Holds messages back until the caller flushes, e.g. while a progress bar is drawn. */
  collect?: boolean;
}

/** Points the library logger at the level chosen on the command line. */
export function initLibraryLogger(options: LibraryLogOptions): void {
  log.options.level = options.level ?? models.LogLevel.warn;
  log.options.noTrace = options.level !== models.LogLevel.trace;
  if (options.collect) {
    log.collectMessages();
  }
}
