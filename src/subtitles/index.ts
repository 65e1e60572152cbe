export * from './types';
export * from './errors';
export * from './format';
export * from './assDocument';
export * from './srtParser';
export * from './tempWorkspace';
export * from './timingShift';
export * from './resample';
