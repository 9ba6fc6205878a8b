export * from './kinds';
export * from './errors';
export * from './days';
export * from './layout';
export * from './logger';
