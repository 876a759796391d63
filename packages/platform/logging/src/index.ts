export * from './logger';
export * from './console-sink';
