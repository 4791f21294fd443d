export * from './types';
export * from './job';
export * from './pool';
export * from './namer';
export * from './copier';
export * from './status';
export * from './pipeline';
