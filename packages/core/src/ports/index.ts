export * from './logger';
export * from './event-source';
