export * from './types';
export * from './lines';
export * from './matcher';
export * from './resolver';
export * from './runner';
