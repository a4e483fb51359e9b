import type { BlogDocumentKind } from '@threadlog/types';

/**
 * Replace every maximal run of characters outside [0-9a-zA-Z] with one underscore.
 *
 * @example
 * ```typescript
 * sanitizeTitle('Hello, World!'); // 'Hello_World_'
 * ```
 */
export function sanitizeTitle(title: string): string {
    return title.replace(/[^0-9a-zA-Z]+/g, '_');
}

/**
 * Derive the permalink of a post from its blog and title.
 *
 * @example
 * ```typescript
 * derivePostPermalink('blog1', 'Hello World'); // 'blog1.Hello_World'
 * ```
 */
export function derivePostPermalink(blogName: string, title: string): string {
    return `${blogName}.${sanitizeTitle(title)}`;
}

/**
 * Body text stored in place of a soft-deleted document's content.
 */
export function deletionMarker(kind: BlogDocumentKind): string {
    return `**${kind} deleted**`;
}
