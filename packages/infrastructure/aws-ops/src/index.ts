export * from './types';
export * from './retry';
export * from './session';
export * from './regions';
export * from './subnets';
export * from './inventory';
export * from './metrics';
export * from './clients';
