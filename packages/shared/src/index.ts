export * from './triggerResult';
export * from './triggerResultSchemas';
