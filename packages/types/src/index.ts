/**
 * Shared contracts for the threadlog interpreter.
 *
 * Type-only package: nothing here exists at runtime, so consumers import it
 * with `import type`.
 */

export type {
    BlogDocumentKind,
    IBlogDocumentBase,
    IPostDocument,
    ICommentDocument,
    BlogDocument,
    IDocumentStore,
    IDocumentQueryOptions,
    DocumentMutator
} from './blog/index.js';

export type { ILogger, LogContext } from './logging/index.js';

export type { IModule, IModuleMetadata } from './module/index.js';
