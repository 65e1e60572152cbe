export * from './types';
export * from './patterns';
export * from './filenameParser';
