import type { ICommentDocument, IPostDocument } from '@threadlog/types';
import { compareTimestamps, repliesTo, type IAssembledThread, type IReplyNode } from './thread-assembler.js';

/**
 * A post that matched a search, with its matching descendants.
 */
export interface IPostMatch {
    kind: 'post';
    post: IPostDocument;
    replies: IReplyNode[];
}

/**
 * A matching comment shown on its own, outside any matching post.
 */
export interface IStandaloneCommentMatch {
    kind: 'comment';
    comment: ICommentDocument;
}

export type SearchMatch = IPostMatch | IStandaloneCommentMatch;

/**
 * Outcome of a search over one blog.
 */
export interface ISearchResult {
    /**
     * Matching posts and standalone comments, newest first.
     *
     * On equal timestamps posts come before comments, and each kind keeps its
     * insertion order.
     */
    matches: SearchMatch[];
}

/**
 * A post matches when the term occurs in its body or in one of its tags.
 */
export function postMatches(post: IPostDocument, term: string): boolean {
    return post.body.includes(term) || post.tags.some(tag => tag.includes(term));
}

export function commentMatches(comment: ICommentDocument, term: string): boolean {
    return comment.body.includes(term);
}

/**
 * Select the posts and comments of an assembled thread that contain a term.
 *
 * Matching is a case-sensitive substring test and runs in two independent
 * passes:
 *
 * 1. Posts are kept only when they match themselves. Under each kept post the
 *    reply tree is pruned to matching comments; a non-matching comment is
 *    dropped and its matching descendants take its place.
 * 2. Matching comments not placed under a kept post are returned on their own.
 *
 * Both kinds are then merged into one list ordered by timestamp, newest
 * first. A post whose only matches are in its comments is never shown.
 *
 * @param thread - Assembled blog thread
 * @param term - Substring to look for
 */
export function searchThread(thread: IAssembledThread, term: string): ISearchResult {
    const attached = new Set<ICommentDocument>();

    const posts = thread.posts
        .filter(post => postMatches(post, term))
        .map((post): IPostMatch => ({
            kind: 'post',
            post,
            replies: collectMatchingReplies(thread, post.permalink, term, attached, new Set())
        }));

    const standaloneComments = thread.comments
        .filter(comment => commentMatches(comment, term) && !attached.has(comment))
        .map((comment): IStandaloneCommentMatch => ({ kind: 'comment', comment }));

    // Posts arrive newest first and comments oldest first; the stable sort keeps insertion order on ties
    const matches: SearchMatch[] = [...posts, ...standaloneComments].sort((left, right) =>
        compareTimestamps(matchTimestamp(right), matchTimestamp(left))
    );

    return { matches };
}

function matchTimestamp(match: SearchMatch): string {
    return match.kind === 'post' ? match.post.timestamp : match.comment.timestamp;
}

function collectMatchingReplies(
    thread: IAssembledThread,
    permalink: string,
    term: string,
    attached: Set<ICommentDocument>,
    ancestors: Set<ICommentDocument>
): IReplyNode[] {
    const nodes: IReplyNode[] = [];

    for (const comment of repliesTo(thread, permalink)) {
        if (ancestors.has(comment)) {
            continue;
        }

        ancestors.add(comment);
        const replies = collectMatchingReplies(thread, comment.permalink, term, attached, ancestors);
        ancestors.delete(comment);

        if (commentMatches(comment, term)) {
            attached.add(comment);
            nodes.push({ comment, replies });
        } else {
            nodes.push(...replies);
        }
    }

    return nodes;
}
