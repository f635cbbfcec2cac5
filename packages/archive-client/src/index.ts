export * from './client';
export * from './errors';
export * from './fromConfig';
export * from './types';
