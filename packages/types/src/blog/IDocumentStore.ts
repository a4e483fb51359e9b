import type { BlogDocument, BlogDocumentKind, ICommentDocument } from './IBlogDocument.js';

/**
 * Query options for kind scans.
 *
 * Without a sort the documents come back in insertion order. With a sort,
 * documents sharing a timestamp keep their insertion order.
 */
export interface IDocumentQueryOptions {
    sort?: { timestamp: 1 | -1 };
}

/**
 * Replaces a stored document with a new version.
 *
 * Receives a copy of the stored document and returns the version to store.
 */
export type DocumentMutator = (document: BlogDocument) => BlogDocument;

/**
 * Storage contract used by the command processor.
 *
 * The processor never knows which backend is active. The MongoDB and
 * in-memory implementations must be indistinguishable through this
 * interface: same ordering, same first-match lookups, and documents returned
 * as copies that callers may freely modify.
 *
 * @example
 * ```typescript
 * await store.insert(post);
 * const target = await store.findByPermalink('blog1.Hello_World');
 * await store.update('blog1.Hello_World', document => ({ ...document, body: '**post deleted**' }));
 * ```
 */
export interface IDocumentStore {
    /**
     * Human-readable backend name for diagnostics.
     *
     * @example 'memory', 'mongodb'
     */
    readonly backend: string;

    /**
     * Persist a new document.
     *
     * No uniqueness check is applied to the permalink.
     */
    insert(document: BlogDocument): Promise<void>;

    /**
     * Find a document by exact permalink across all blogs.
     *
     * @returns The first inserted match, or null when none exists
     */
    findByPermalink(permalink: string): Promise<BlogDocument | null>;

    /**
     * List every document of one kind in one blog.
     */
    findByBlogAndKind(blogName: string, kind: BlogDocumentKind, options?: IDocumentQueryOptions): Promise<BlogDocument[]>;

    /**
     * List the direct replies to a permalink within one blog, in insertion order.
     */
    findByParent(blogName: string, parentPermalink: string): Promise<ICommentDocument[]>;

    /**
     * Replace the first document with the given permalink by the mutator's result.
     *
     * @returns The stored version after the update, or null when no document matched
     */
    update(permalink: string, mutator: DocumentMutator): Promise<BlogDocument | null>;

    /**
     * Release backend resources. The store must not be used afterwards.
     */
    close(): Promise<void>;
}
