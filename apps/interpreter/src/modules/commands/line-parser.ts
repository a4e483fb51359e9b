import { MalformedCommandError, UnknownCommandError } from '../../lib/errors.js';
import { COMMAND_KEYWORDS } from './command.types.js';
import type {
    BlogCommand,
    CommandKeyword,
    ICommentCommand,
    IDeleteCommand,
    IFindCommand,
    IPostCommand,
    IShowCommand
} from './command.types.js';
import { extractQuoted, splitFields } from './quoted-string.js';

/**
 * Parse one raw input line into a structured command.
 *
 * The first whitespace-delimited field is the keyword, matched without regard
 * to case. Free-text fields are double-quoted and consumed left to right; the
 * timestamp of `post` and `comment` is whatever follows the last quoted field.
 *
 * @param line - Raw input line, with or without its trailing newline
 * @returns The parsed command, or null for a blank line
 * @throws {UnknownCommandError} When the keyword is not part of the protocol
 * @throws {MalformedCommandError} When a field is missing or not quoted where required
 *
 * @example
 * ```typescript
 * parseCommandLine('post blog1 "alice" "Hello World" "First post" "" 1000');
 * // { type: 'post', blogName: 'blog1', userName: 'alice', title: 'Hello World',
 * //   body: 'First post', tags: [], timestamp: '1000' }
 * ```
 */
export function parseCommandLine(line: string): BlogCommand | null {
    const head = splitFields(line, 1);
    if (!head) {
        return null;
    }

    const [rawKeyword = '', args = ''] = head;
    const keyword = rawKeyword.toLowerCase();

    if (!isCommandKeyword(keyword)) {
        throw new UnknownCommandError(keyword);
    }

    switch (keyword) {
        case 'post':
            return parsePost(args);
        case 'comment':
            return parseComment(args);
        case 'delete':
            return parseDelete(args);
        case 'show':
            return parseShow(args);
        case 'find':
            return parseFind(args);
    }
}

function isCommandKeyword(value: string): value is CommandKeyword {
    return COMMAND_KEYWORDS.some(keyword => keyword === value);
}

function parsePost(args: string): IPostCommand {
    const [blogName, afterBlog] = requireFields(args, 1, 'post', 'blog name');
    const [userName, afterUser] = requireQuoted(afterBlog, 'post', 'user');
    const [title, afterTitle] = requireQuoted(afterUser, 'post', 'title');
    const [body, afterBody] = requireQuoted(afterTitle, 'post', 'body');
    const [tagList, timestamp] = requireQuoted(afterBody, 'post', 'tags');

    return {
        type: 'post',
        blogName,
        userName,
        title,
        body,
        tags: splitTags(tagList),
        timestamp: requireTimestamp(timestamp, 'post')
    };
}

function parseComment(args: string): ICommentCommand {
    const [blogName, targetPermalink, afterTarget] = requireFields(args, 2, 'comment', 'blog name and permalink');
    const [userName, afterUser] = requireQuoted(afterTarget, 'comment', 'user');
    const [body, timestamp] = requireQuoted(afterUser, 'comment', 'body');

    return {
        type: 'comment',
        blogName,
        targetPermalink,
        userName,
        body,
        timestamp: requireTimestamp(timestamp, 'comment')
    };
}

function parseDelete(args: string): IDeleteCommand {
    const [blogName, targetPermalink, userName, timestamp] = requireFields(args, 3, 'delete', 'blog name, permalink and user');

    return {
        type: 'delete',
        blogName,
        targetPermalink,
        userName,
        timestamp: requireTimestamp(timestamp, 'delete')
    };
}

function parseShow(args: string): IShowCommand {
    const blogName = args.trim();
    if (!blogName) {
        throw new MalformedCommandError('Invalid show command format: missing blog name', { keyword: 'show' });
    }

    return { type: 'show', blogName };
}

function parseFind(args: string): IFindCommand {
    const [blogName, afterBlog] = requireFields(args, 1, 'find', 'blog name');
    const [searchTerm] = requireQuoted(afterBlog, 'find', 'search term');

    return { type: 'find', blogName, searchTerm };
}

/**
 * Split `count` plain fields and return them with the remainder as the last element.
 */
function requireFields(args: string, count: number, keyword: CommandKeyword, description: string): string[] {
    const fields = splitFields(args, count);
    if (!fields) {
        throw new MalformedCommandError(`Invalid ${keyword} command format: missing ${description}`, { keyword });
    }
    return fields;
}

function requireQuoted(text: string, keyword: CommandKeyword, field: string): [string, string] {
    const extraction = extractQuoted(text);
    if (!extraction.found) {
        throw new MalformedCommandError(`Invalid ${keyword} command format: missing quoted ${field}`, { keyword, field });
    }
    return [extraction.value, extraction.rest];
}

function requireTimestamp(timestamp: string, keyword: CommandKeyword): string {
    const trimmed = timestamp.trim();
    if (!trimmed) {
        throw new MalformedCommandError(`Invalid ${keyword} command format: missing timestamp`, { keyword });
    }
    return trimmed;
}

/**
 * Split a tag list on commas and trim each entry.
 *
 * Only an empty field means no tags; empty entries inside a list are kept.
 */
function splitTags(tagList: string): string[] {
    if (tagList === '') {
        return [];
    }

    return tagList.split(',').map(tag => tag.trim());
}
