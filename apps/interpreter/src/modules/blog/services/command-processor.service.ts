import type { BlogDocument, ICommentDocument, IDocumentStore, ILogger, IPostDocument } from '@threadlog/types';
import { UnresolvedReferenceError } from '../../../lib/errors.js';
import type {
    BlogCommand,
    ICommentCommand,
    IDeleteCommand,
    IFindCommand,
    IPostCommand,
    IShowCommand
} from '../../commands/index.js';
import { deletionMarker, derivePostPermalink } from '../permalink.js';
import { assembleThread, type IAssembledThread } from './thread-assembler.js';
import { renderBlog, renderSearchResult } from './thread-renderer.js';
import { searchThread } from './thread-search.js';

/**
 * Applies parsed commands to a document store.
 *
 * Mutating commands (`post`, `comment`, `delete`) return no output lines and
 * log at debug level. Read commands (`show`, `find`) return the rendered view.
 * A command that names a missing permalink throws before touching the store,
 * so a rejected command never leaves a partial document behind.
 *
 * The processor only talks to {@link IDocumentStore}; it does not know
 * whether MongoDB or the in-memory store is active.
 *
 * @example
 * ```typescript
 * const processor = new CommandProcessor(new MemoryDocumentStore(), logger);
 * await processor.execute(parseCommandLine('post blog1 "alice" "Hi" "Body" "" 1000'));
 * const lines = await processor.execute({ type: 'show', blogName: 'blog1' });
 * ```
 */
export class CommandProcessor {
    constructor(
        private readonly store: IDocumentStore,
        private readonly logger: ILogger
    ) {}

    /**
     * Execute one command.
     *
     * @returns Lines to print on standard output (empty for mutating commands)
     * @throws {UnresolvedReferenceError} When `comment` or `delete` targets an unknown permalink
     */
    async execute(command: BlogCommand): Promise<string[]> {
        switch (command.type) {
            case 'post':
                await this.createPost(command);
                return [];
            case 'comment':
                await this.addComment(command);
                return [];
            case 'delete':
                await this.deleteDocument(command);
                return [];
            case 'show':
                return this.show(command);
            case 'find':
                return this.find(command);
        }
    }

    private async createPost(command: IPostCommand): Promise<IPostDocument> {
        const post: IPostDocument = {
            kind: 'post',
            blogName: command.blogName,
            userName: command.userName,
            title: command.title,
            body: command.body,
            tags: [...command.tags],
            permalink: derivePostPermalink(command.blogName, command.title),
            timestamp: command.timestamp
        };

        await this.store.insert(post);
        this.logger.debug({ blogName: post.blogName, permalink: post.permalink }, 'Post created');

        return post;
    }

    private async addComment(command: ICommentCommand): Promise<ICommentDocument> {
        const target = await this.store.findByPermalink(command.targetPermalink);
        if (!target) {
            throw new UnresolvedReferenceError(command.targetPermalink, { command: 'comment', blogName: command.blogName });
        }

        const comment: ICommentDocument = {
            kind: 'comment',
            blogName: command.blogName,
            userName: command.userName,
            body: command.body,
            // Timestamps double as comment identifiers so later replies can address this comment
            permalink: command.timestamp,
            parentPermalink: target.permalink,
            timestamp: command.timestamp
        };

        await this.store.insert(comment);
        this.logger.debug(
            { blogName: comment.blogName, permalink: comment.permalink, parentPermalink: comment.parentPermalink },
            'Comment added'
        );

        return comment;
    }

    /**
     * Soft-delete the first document carrying the permalink.
     *
     * Deleting an already deleted document applies the marker again and
     * overwrites deletedBy/deletedAt with the new values.
     */
    private async deleteDocument(command: IDeleteCommand): Promise<BlogDocument> {
        const updated = await this.store.update(command.targetPermalink, document => ({
            ...document,
            body: deletionMarker(document.kind),
            deletedBy: command.userName,
            deletedAt: command.timestamp
        }));

        if (!updated) {
            throw new UnresolvedReferenceError(command.targetPermalink, { command: 'delete', blogName: command.blogName });
        }

        this.logger.debug({ permalink: updated.permalink, kind: updated.kind, deletedBy: command.userName }, 'Document deleted');
        return updated;
    }

    private async show(command: IShowCommand): Promise<string[]> {
        const thread = await this.loadThread(command.blogName);
        return renderBlog(command.blogName, thread);
    }

    private async find(command: IFindCommand): Promise<string[]> {
        const thread = await this.loadThread(command.blogName);
        const result = searchThread(thread, command.searchTerm);

        this.logger.debug(
            {
                blogName: command.blogName,
                searchTerm: command.searchTerm,
                posts: result.matches.filter(match => match.kind === 'post').length,
                standaloneComments: result.matches.filter(match => match.kind === 'comment').length
            },
            'Search completed'
        );

        return renderSearchResult(command.blogName, result);
    }

    private async loadThread(blogName: string): Promise<IAssembledThread> {
        const posts = await this.store.findByBlogAndKind(blogName, 'post', { sort: { timestamp: -1 } });
        const comments = await this.store.findByBlogAndKind(blogName, 'comment', { sort: { timestamp: 1 } });

        return assembleThread([...posts, ...comments]);
    }
}
