import { Schema, model, type Types } from 'mongoose';
import type { BlogDocumentKind } from '@threadlog/types';

/**
 * Shape of a post or comment as stored in the `blogs` collection.
 *
 * Posts and comments share one collection, like the domain union they come
 * from; kind-specific fields are optional at the storage level and checked
 * when a record is mapped back to a domain document.
 */
export interface IBlogDocumentRecord {
    kind: BlogDocumentKind;
    blogName: string;
    userName: string;
    body: string;
    permalink: string;
    timestamp: string;
    title?: string;
    tags?: string[];
    parentPermalink?: string;
    deletedBy?: string;
    deletedAt?: string;
}

/**
 * Record as read back with `.lean()`, including the ObjectId used as the
 * insertion-order tie breaker.
 */
export type StoredBlogDocumentRecord = IBlogDocumentRecord & { _id: Types.ObjectId };

const BlogDocumentSchema = new Schema<IBlogDocumentRecord>({
    kind: { type: String, required: true, enum: ['post', 'comment'] },
    blogName: { type: String, required: true },
    // Quoted fields may be empty, which `required` would reject
    userName: { type: String, default: '' },
    body: { type: String, default: '' },
    permalink: { type: String, required: true, index: true },
    timestamp: { type: String, required: true },
    title: String,
    tags: { type: [String], default: undefined },
    parentPermalink: String,
    deletedBy: String,
    deletedAt: String
}, { versionKey: false, collection: 'blogs' });

BlogDocumentSchema.index({ blogName: 1, kind: 1, timestamp: -1 });
BlogDocumentSchema.index({ blogName: 1, parentPermalink: 1 });

export const BlogDocumentModel = model<IBlogDocumentRecord>('BlogDocument', BlogDocumentSchema);
