export * from './types';
export * from './template';
export * from './system';
export * from './principles';
