export * from './events/signal';
export * from './events/matching';
export * from './events/oneShotWaiter';
export * from './events/streamingWaiter';
export * from './events/eventManager';
export * from './inbound/eventSourceBridge';
