export * from './log-file';
