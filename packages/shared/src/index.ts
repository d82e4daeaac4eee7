export * from './commission';
export * from './errors';
export * from './logger';
export * from './types';
