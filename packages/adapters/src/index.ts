export * from './logger';
export * from './source';
