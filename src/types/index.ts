export * from './space';
export * from './space-export';
