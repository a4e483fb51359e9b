import type { BlogDocument, ICommentDocument, IPostDocument } from '@threadlog/types';
import { deletionMarker } from '../permalink.js';
import { buildReplyTree, type IAssembledThread, type IReplyNode } from './thread-assembler.js';
import type { ISearchResult } from './thread-search.js';

const BLOCK_MARKER = '- - - -';
const INDENT_UNIT = '  ';

/**
 * Render the full view of a blog, as printed by `show`.
 *
 * Output layout (`\t` is a tab):
 *
 * ```
 * in blog1:
 *
 *   - - - -
 * \ttitle: Hello World
 * \tuserName: alice
 * \ttimestamp: 1000
 * \tpermalink: blog1.Hello_World
 * \tbody:
 * \t  First post
 *
 *       - - - -
 *   \tuserName: bob
 *   ...
 * ```
 *
 * @returns Output lines without trailing newlines
 */
export function renderBlog(blogName: string, thread: IAssembledThread): string[] {
    const lines = renderHeader(blogName);

    for (const post of thread.posts) {
        lines.push(...renderPost(post, buildReplyTree(thread, post.permalink)));
    }

    return lines;
}

/**
 * Render the result of a `find`: matching posts with their matching replies
 * and matching comments that stand on their own, in result order.
 */
export function renderSearchResult(blogName: string, result: ISearchResult): string[] {
    const lines = renderHeader(blogName);

    for (const match of result.matches) {
        if (match.kind === 'post') {
            lines.push(...renderPost(match.post, match.replies));
        } else {
            lines.push(...renderStandaloneComment(match.comment));
        }
    }

    return lines;
}

function renderHeader(blogName: string): string[] {
    return [`in ${blogName}:`, ''];
}

function renderPost(post: IPostDocument, replies: readonly IReplyNode[]): string[] {
    const lines = [`${INDENT_UNIT}${BLOCK_MARKER}`, `\ttitle: ${post.title}`, `\tuserName: ${post.userName}`];

    if (post.tags.length > 0) {
        lines.push(`\ttags: ${post.tags.join(', ')}`);
    }

    lines.push(
        `\ttimestamp: ${post.timestamp}`,
        `\tpermalink: ${post.permalink}`,
        '\tbody:',
        `\t  ${displayBody(post)}`
    );

    for (const reply of replies) {
        lines.push(...renderReply(reply, 1));
    }

    lines.push('');
    return lines;
}

/**
 * Render a comment block and, recursively, its replies one level deeper.
 */
function renderReply(node: IReplyNode, depth: number): string[] {
    const indent = INDENT_UNIT.repeat(depth);
    const { comment } = node;

    const lines = [
        '',
        `${indent}    ${BLOCK_MARKER}`,
        `${indent}\tuserName: ${comment.userName}`,
        `${indent}\tpermalink: ${comment.permalink}`,
        `${indent}\tcomment:`,
        `${indent}\t  ${displayBody(comment)}`
    ];

    for (const reply of node.replies) {
        lines.push(...renderReply(reply, depth + 1));
    }

    return lines;
}

function renderStandaloneComment(comment: ICommentDocument): string[] {
    return [
        `${INDENT_UNIT}${BLOCK_MARKER}`,
        `\tuserName: ${comment.userName}`,
        `\tpermalink: ${comment.permalink}`,
        '\tcomment:',
        `\t  ${displayBody(comment)}`,
        ''
    ];
}

function displayBody(document: BlogDocument): string {
    return document.deletedBy === undefined ? document.body : deletionMarker(document.kind);
}
