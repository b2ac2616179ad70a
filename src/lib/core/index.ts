export * from './errors';
export * from './CoderEventBus';
