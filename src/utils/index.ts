export * from './fsUtils';
export * from './objectUtils';
export * from './promiseUtils';
export * from './stringUtils';
