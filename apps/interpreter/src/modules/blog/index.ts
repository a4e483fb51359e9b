/**
 * Blog module public API.
 *
 * Exports the command processor and the pure thread functions it is built on.
 */

export { CommandProcessor } from './services/command-processor.service.js';
export { assembleThread, buildReplyTree, compareTimestamps, repliesTo } from './services/thread-assembler.js';
export type { IAssembledThread, IReplyNode } from './services/thread-assembler.js';
export { searchThread, postMatches, commentMatches } from './services/thread-search.js';
export type { ISearchResult, IPostMatch, IStandaloneCommentMatch, SearchMatch } from './services/thread-search.js';
export { renderBlog, renderSearchResult } from './services/thread-renderer.js';
export { derivePostPermalink, sanitizeTitle, deletionMarker } from './permalink.js';
