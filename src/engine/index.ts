export * from './stable-json';
export * from './state-machine';
export * from './resolver';
export * from './cache';
export * from './scheduler';
export * from './signer';
export * from './manifest';
export * from './release-publisher';
export * from './verify';
export * from './pipeline';
export * from './report';
export * from './preflight';
