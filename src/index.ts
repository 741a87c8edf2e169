/**
 * variant-release: parallel variant builds and idempotent, verifiable
 * release publication.
 *
 * Public exports for programmatic use. The command line lives in ./cli.
 */

export * from './domain';
export * from './engine';
export * from './storage';
export * from './toolchain';
export * from './events/publisher';
export { createApp } from './server';
export type { AppContext } from './server';
export * from './config';
export * from './context';
export * from './logger';
