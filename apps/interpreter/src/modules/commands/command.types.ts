/**
 * Structured commands produced by the line parser.
 *
 * One variant per protocol keyword, discriminated by `type`:
 *
 * ```
 * post <blog> "<user>" "<title>" "<body>" "<tags-csv-or-empty>" <timestamp>
 * comment <blog> <permalink> "<user>" "<body>" <timestamp>
 * delete <blog> <permalink> <user> <timestamp>
 * show <blog>
 * find <blog> "<search-term>"
 * ```
 */

export interface IPostCommand {
    type: 'post';
    blogName: string;
    userName: string;
    title: string;
    body: string;
    tags: string[];
    timestamp: string;
}

export interface ICommentCommand {
    type: 'comment';
    blogName: string;
    /** Permalink of the post or comment being replied to */
    targetPermalink: string;
    userName: string;
    body: string;
    timestamp: string;
}

export interface IDeleteCommand {
    type: 'delete';
    blogName: string;
    targetPermalink: string;
    userName: string;
    timestamp: string;
}

export interface IShowCommand {
    type: 'show';
    blogName: string;
}

export interface IFindCommand {
    type: 'find';
    blogName: string;
    searchTerm: string;
}

export type BlogCommand = IPostCommand | ICommentCommand | IDeleteCommand | IShowCommand | IFindCommand;

export type CommandKeyword = BlogCommand['type'];

export const COMMAND_KEYWORDS: readonly CommandKeyword[] = ['post', 'comment', 'delete', 'show', 'find'];
