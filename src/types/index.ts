export * from './common';
export * from './cash';
export * from './message';
export * from './storage';
