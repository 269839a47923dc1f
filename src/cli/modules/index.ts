/**
 * @file CLI: module re-exports
 *
 * Centralized re-export of the pieces the executor is assembled from. Keep this
 * file as a thin re-export layer.
 */

export * from './command-template/command-template.ts';
export * from './doc-toolchain/doc-toolchain.ts';
export * from './host-platform/host-platform.ts';
export * from './process-manager/process-manager.ts';
export * from './result-builder/result-builder.ts';
export * from './toolchain/shell-toolchain.ts';
export * from './types.ts';
