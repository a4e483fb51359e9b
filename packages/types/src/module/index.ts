/**
 * Module system type exports.
 *
 * Lifecycle contract for the components the entry point initializes and runs.
 */

export type { IModule } from './IModule.js';
export type { IModuleMetadata } from './IModuleMetadata.js';
