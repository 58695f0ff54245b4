export * from './emitter';
export * from './fake';
