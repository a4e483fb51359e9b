import type {
    BlogDocument,
    BlogDocumentKind,
    ICommentDocument,
    IDocumentQueryOptions,
    IDocumentStore,
    DocumentMutator
} from '@threadlog/types';
import { applyQuerySort, cloneDocument, hasKind, isComment } from './document-copy.js';

/**
 * In-memory {@link IDocumentStore}.
 *
 * Keeps every document of every blog in one array in insertion order, which
 * is the order all scans and first-match lookups follow. Used when MongoDB is
 * disabled or unreachable, and by the test suite.
 *
 * Lives for the lifetime of the instance; nothing is shared between instances.
 */
export class MemoryDocumentStore implements IDocumentStore {
    readonly backend = 'memory';

    private readonly documents: BlogDocument[] = [];

    async insert(document: BlogDocument): Promise<void> {
        this.documents.push(cloneDocument(document));
    }

    async findByPermalink(permalink: string): Promise<BlogDocument | null> {
        const found = this.documents.find(document => document.permalink === permalink);
        return found ? cloneDocument(found) : null;
    }

    async findByBlogAndKind(blogName: string, kind: BlogDocumentKind, options?: IDocumentQueryOptions): Promise<BlogDocument[]> {
        const matches = this.documents
            .filter(document => document.blogName === blogName)
            .filter(hasKind(kind))
            .map(cloneDocument);

        return applyQuerySort(matches, options);
    }

    async findByParent(blogName: string, parentPermalink: string): Promise<ICommentDocument[]> {
        return this.documents
            .filter(isComment)
            .filter(comment => comment.blogName === blogName && comment.parentPermalink === parentPermalink)
            .map(comment => ({ ...comment }));
    }

    async update(permalink: string, mutator: DocumentMutator): Promise<BlogDocument | null> {
        const index = this.documents.findIndex(document => document.permalink === permalink);
        if (index === -1) {
            return null;
        }

        const next = cloneDocument(mutator(cloneDocument(this.documents[index])));
        this.documents[index] = next;

        return cloneDocument(next);
    }

    async close(): Promise<void> {
        this.documents.length = 0;
    }

    /**
     * Number of stored documents across all blogs.
     */
    get size(): number {
        return this.documents.length;
    }
}
