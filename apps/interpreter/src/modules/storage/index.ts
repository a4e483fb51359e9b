/**
 * Document store implementations.
 */

export { MemoryDocumentStore } from './memory-document-store.js';
export { MongoDocumentStore, toBlogDocument, toRecord } from './mongo-document-store.js';
export { cloneDocument } from './document-copy.js';
