export const name = '@drivesort/core';

export * from './categories';
export * from './scanner';
export * from './aggregate';
export * from './export';
export * from './archive';
export * from './config';
export * from './report';
