import type { BlogDocument, BlogDocumentKind, ICommentDocument, IDocumentQueryOptions } from '@threadlog/types';
import { compareTimestamps } from '../blog/services/thread-assembler.js';

/**
 * Copy a document so callers never share arrays or objects with the store.
 */
export function cloneDocument(document: BlogDocument): BlogDocument {
    if (document.kind === 'post') {
        return { ...document, tags: [...document.tags] };
    }
    return { ...document };
}

export function isComment(document: BlogDocument): document is ICommentDocument {
    return document.kind === 'comment';
}

export function hasKind(kind: BlogDocumentKind): (document: BlogDocument) => boolean {
    return document => document.kind === kind;
}

/**
 * Apply the optional timestamp sort of a kind scan.
 *
 * The input must be in insertion order; the sort is stable so ties keep it.
 */
export function applyQuerySort(documents: BlogDocument[], options?: IDocumentQueryOptions): BlogDocument[] {
    const direction = options?.sort?.timestamp;
    if (direction === undefined) {
        return documents;
    }

    return documents.sort((left, right) => direction * compareTimestamps(left.timestamp, right.timestamp));
}
