export * from './loader';
export * from './build';
