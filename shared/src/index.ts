export * from './types';
export * from './http-client';
