export * from './region-resolver';
export * from './describe';
export * from './enumerator';
export * from './aggregator';
export * from './collector';
export * from './assembler';
export * from './run';
