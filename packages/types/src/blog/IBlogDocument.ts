/**
 * Discriminator for the two document kinds stored by the interpreter.
 *
 * The value doubles as the word used in the soft-deletion marker
 * (`**post deleted**`, `**comment deleted**`).
 */
export type BlogDocumentKind = 'post' | 'comment';

/**
 * Fields shared by posts and comments.
 */
export interface IBlogDocumentBase {
    /** Owning blog; every query is partitioned by it */
    blogName: string;

    /** Author */
    userName: string;

    /** Content; replaced by the deletion marker on soft delete */
    body: string;

    /** Identifier used by replies and deletes */
    permalink: string;

    /** Opaque token; lexicographic order defines chronology */
    timestamp: string;

    /** Set by a delete command */
    deletedBy?: string;

    /** Set by a delete command */
    deletedAt?: string;
}

/**
 * Top-level entry of a blog.
 *
 * The permalink is derived from the blog name and the title, so two posts
 * with the same title in the same blog share a permalink.
 */
export interface IPostDocument extends IBlogDocumentBase {
    kind: 'post';
    title: string;
    tags: string[];
}

/**
 * Reply to a post or to another comment.
 *
 * The permalink equals the comment's timestamp, which is what lets later
 * replies address an earlier comment.
 */
export interface ICommentDocument extends IBlogDocumentBase {
    kind: 'comment';
    parentPermalink: string;
}

export type BlogDocument = IPostDocument | ICommentDocument;
