export * from './logHandler';
export * from './statusSymbols';
