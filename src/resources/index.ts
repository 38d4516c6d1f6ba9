export * from './cash';
export * from './messages';
export * from './storage';
