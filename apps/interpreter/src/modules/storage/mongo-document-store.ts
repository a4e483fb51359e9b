import type { Model } from 'mongoose';
import type {
    BlogDocument,
    BlogDocumentKind,
    IBlogDocumentBase,
    ICommentDocument,
    IDocumentQueryOptions,
    IDocumentStore,
    DocumentMutator
} from '@threadlog/types';
import {
    BlogDocumentModel,
    type IBlogDocumentRecord,
    type StoredBlogDocumentRecord
} from '../../database/models/blog-document-model.js';
import { cloneDocument, isComment } from './document-copy.js';

/**
 * MongoDB-backed {@link IDocumentStore}.
 *
 * All posts and comments live in the `blogs` collection. MongoDB gives no
 * natural order, so every query sorts on `_id` (monotonic per client) to
 * reproduce insertion order, either alone or as the tie breaker after the
 * timestamp.
 *
 * Reads use `.lean()` and are mapped back to the domain union, so callers get
 * plain objects they can modify freely.
 *
 * @example
 * ```typescript
 * await connectDatabase(env);
 * const store = new MongoDocumentStore();
 * await store.insert(post);
 * ```
 */
export class MongoDocumentStore implements IDocumentStore {
    readonly backend = 'mongodb';

    /**
     * @param model - Mongoose model bound to the `blogs` collection
     */
    constructor(private readonly model: Model<IBlogDocumentRecord> = BlogDocumentModel) {}

    async insert(document: BlogDocument): Promise<void> {
        await this.model.create(toRecord(document));
    }

    async findByPermalink(permalink: string): Promise<BlogDocument | null> {
        const record = await this.findFirstRecord(permalink);
        return record ? toBlogDocument(record) : null;
    }

    async findByBlogAndKind(blogName: string, kind: BlogDocumentKind, options?: IDocumentQueryOptions): Promise<BlogDocument[]> {
        const sort: Record<string, 1 | -1> = options?.sort
            ? { timestamp: options.sort.timestamp, _id: 1 }
            : { _id: 1 };

        const records = await this.model
            .find({ blogName, kind })
            .sort(sort)
            .lean<StoredBlogDocumentRecord[]>()
            .exec();

        return records.map(toBlogDocument);
    }

    async findByParent(blogName: string, parentPermalink: string): Promise<ICommentDocument[]> {
        const records = await this.model
            .find({ blogName, kind: 'comment', parentPermalink })
            .sort({ _id: 1 })
            .lean<StoredBlogDocumentRecord[]>()
            .exec();

        return records.map(toBlogDocument).filter(isComment);
    }

    /**
     * Replace the first matching record by the mutator's result.
     *
     * Matching by `_id` rather than by permalink keeps later duplicates of
     * the same permalink untouched.
     */
    async update(permalink: string, mutator: DocumentMutator): Promise<BlogDocument | null> {
        const record = await this.findFirstRecord(permalink);
        if (!record) {
            return null;
        }

        const next = mutator(toBlogDocument(record));
        await this.model.replaceOne({ _id: record._id }, toRecord(next)).exec();

        return cloneDocument(next);
    }

    async close(): Promise<void> {
        await this.model.db.close();
    }

    private findFirstRecord(permalink: string): Promise<StoredBlogDocumentRecord | null> {
        return this.model
            .findOne({ permalink })
            .sort({ _id: 1 })
            .lean<StoredBlogDocumentRecord | null>()
            .exec();
    }
}

/**
 * Flatten a domain document into the stored record shape.
 */
export function toRecord(document: BlogDocument): IBlogDocumentRecord {
    const record: IBlogDocumentRecord = {
        kind: document.kind,
        blogName: document.blogName,
        userName: document.userName,
        body: document.body,
        permalink: document.permalink,
        timestamp: document.timestamp
    };

    if (document.kind === 'post') {
        record.title = document.title;
        record.tags = [...document.tags];
    } else {
        record.parentPermalink = document.parentPermalink;
    }

    if (document.deletedBy !== undefined) {
        record.deletedBy = document.deletedBy;
    }
    if (document.deletedAt !== undefined) {
        record.deletedAt = document.deletedAt;
    }

    return record;
}

/**
 * Map a stored record back to the domain union.
 *
 * Missing kind-specific fields (records written by other tools) read as
 * empty values.
 */
export function toBlogDocument(record: IBlogDocumentRecord): BlogDocument {
    const base: IBlogDocumentBase = {
        blogName: record.blogName,
        userName: record.userName ?? '',
        body: record.body ?? '',
        permalink: record.permalink,
        timestamp: record.timestamp
    };

    if (typeof record.deletedBy === 'string') {
        base.deletedBy = record.deletedBy;
    }
    if (typeof record.deletedAt === 'string') {
        base.deletedAt = record.deletedAt;
    }

    if (record.kind === 'post') {
        return { ...base, kind: 'post', title: record.title ?? '', tags: [...(record.tags ?? [])] };
    }

    return { ...base, kind: 'comment', parentPermalink: record.parentPermalink ?? '' };
}
