export type {
    BlogDocumentKind,
    IBlogDocumentBase,
    IPostDocument,
    ICommentDocument,
    BlogDocument
} from './IBlogDocument.js';

export type { IDocumentStore, IDocumentQueryOptions, DocumentMutator } from './IDocumentStore.js';
