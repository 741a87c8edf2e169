export * from './toolchain';
export * from './process-toolchain';
