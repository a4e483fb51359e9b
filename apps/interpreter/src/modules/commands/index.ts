/**
 * Command protocol public API.
 */

export { parseCommandLine } from './line-parser.js';
export { extractQuoted, splitFields } from './quoted-string.js';
export type { IQuotedExtraction } from './quoted-string.js';
export { COMMAND_KEYWORDS } from './command.types.js';
export type {
    BlogCommand,
    CommandKeyword,
    IPostCommand,
    ICommentCommand,
    IDeleteCommand,
    IShowCommand,
    IFindCommand
} from './command.types.js';
