export * from './types';
export * from './similarity';
export * from './matcher';
