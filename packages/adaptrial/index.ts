export * from './src/data-collector';
export * from './src/experiment';
export * from './src/persistence';
export * from './src/psychometric';
export * from './src/response-source';
export * from './src/staircase';
export * from './src/trial-iterator';
export * from './src/trial-sequence';
export { EventEmitter } from './src/util';
export type * from './types';
export { seed } from '@adaptrial/shared/utils';
