export * from './common';
export * from './config';
export * from './data-sources';
export * from './instructions';
export * from './benchmarks';
export * from './space-export';
