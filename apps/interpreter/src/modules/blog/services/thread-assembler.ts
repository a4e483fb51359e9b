import type { BlogDocument, ICommentDocument, IPostDocument } from '@threadlog/types';

/**
 * A blog's documents arranged for display.
 */
export interface IAssembledThread {
    /** Most recent first; equal timestamps keep insertion order */
    posts: IPostDocument[];

    /** Every comment, oldest first; equal timestamps keep insertion order */
    comments: ICommentDocument[];

    /**
     * Replies keyed by the permalink they answer, each list oldest first.
     *
     * Post permalinks and comment permalinks share the key space, so the
     * replies to a comment are found under the comment's own permalink.
     */
    childrenByParent: Map<string, ICommentDocument[]>;
}

/**
 * Lexicographic comparison of opaque timestamp tokens.
 */
export function compareTimestamps(left: string, right: string): number {
    if (left < right) {
        return -1;
    }
    return left > right ? 1 : 0;
}

/**
 * Arrange a blog's documents into ordered posts and a parent-keyed reply map.
 *
 * Input order is treated as insertion order; `Array.prototype.sort` is stable,
 * so ties on timestamp keep it.
 *
 * @param documents - Posts and comments of one blog, in insertion order
 */
export function assembleThread(documents: readonly BlogDocument[]): IAssembledThread {
    const posts: IPostDocument[] = [];
    const comments: ICommentDocument[] = [];

    for (const document of documents) {
        if (document.kind === 'post') {
            posts.push(document);
        } else {
            comments.push(document);
        }
    }

    posts.sort((left, right) => compareTimestamps(right.timestamp, left.timestamp));
    comments.sort((left, right) => compareTimestamps(left.timestamp, right.timestamp));

    const childrenByParent = new Map<string, ICommentDocument[]>();
    for (const comment of comments) {
        const siblings = childrenByParent.get(comment.parentPermalink);
        if (siblings) {
            siblings.push(comment);
        } else {
            childrenByParent.set(comment.parentPermalink, [comment]);
        }
    }

    return { posts, comments, childrenByParent };
}

/**
 * A comment together with the replies rendered beneath it.
 */
export interface IReplyNode {
    comment: ICommentDocument;
    replies: IReplyNode[];
}

/**
 * Direct replies to a permalink, or an empty list when there are none.
 */
export function repliesTo(thread: IAssembledThread, permalink: string): readonly ICommentDocument[] {
    return thread.childrenByParent.get(permalink) ?? [];
}

/**
 * Build the full reply tree under a permalink.
 *
 * Recursion stops at permalinks with no recorded replies. Comment permalinks
 * are timestamps, so two comments can share one; a comment already on the
 * current path is not entered again.
 *
 * @param thread - Assembled blog thread
 * @param permalink - Post or comment permalink to start from
 */
export function buildReplyTree(
    thread: IAssembledThread,
    permalink: string,
    ancestors: Set<ICommentDocument> = new Set()
): IReplyNode[] {
    const nodes: IReplyNode[] = [];

    for (const comment of repliesTo(thread, permalink)) {
        if (ancestors.has(comment)) {
            continue;
        }

        ancestors.add(comment);
        nodes.push({ comment, replies: buildReplyTree(thread, comment.permalink, ancestors) });
        ancestors.delete(comment);
    }

    return nodes;
}
