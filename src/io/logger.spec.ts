import { LogLevel } from '../models';
import { Logger } from './logger';

describe('Logger', () => {
  function createLogger(level?: LogLevel) {
    const messages: Array<[LogLevel, unknown[]]> = [];
    const logger = new Logger({ level, logMethod: (messageLevel, ...params) => messages.push([messageLevel, params]) });
    return { logger, messages };
  }

  it('drops messages below the level', () => {
    const { logger, messages } = createLogger(LogLevel.warn);

    logger.debug('hidden');
    logger.warn('careful');
    logger.info('shown');
    logger.error('broken', 42);

    expect(messages).toEqual([
      [LogLevel.warn, ['careful']],
      [LogLevel.info, ['shown']],
      [LogLevel.error, ['broken', 42]],
    ]);
  });

  it('holds collected messages back until flushed', () => {
    const { logger, messages } = createLogger();
    logger.collectMessages();

    logger.info('one');
    logger.trace('two');
    expect(messages).toEqual([]);

    logger.flush();
    logger.info('three');
    expect(messages.map(([, params]) => params[0])).toEqual(['one', 'two']);

    logger.flush();
    expect(messages.map(([, params]) => params[0])).toEqual(['one', 'two', 'three']);
  });
});
