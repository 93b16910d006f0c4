export * from './cli/sync/engine';
export { CatalogGateway, type CatalogModel, parseCatalog } from './cli/sync/catalogGateway';
export { Logger, type LoggerOptions, log } from './io';
export { LogLevel, type LogHandler } from './models';
