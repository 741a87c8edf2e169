export * from './errors';
export * from './variant';
export * from './artifact';
export * from './job';
export * from './manifest';
export * from './events';
