export * from './definitions';
export * from './render';
