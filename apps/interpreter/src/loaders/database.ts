import mongoose from 'mongoose';
import type { IDocumentStore, ILogger } from '@threadlog/types';
import type { EnvConfig } from '../config/env.js';
import { BackendUnavailableError } from '../lib/errors.js';
import { MemoryDocumentStore, MongoDocumentStore } from '../modules/storage/index.js';

type DatabaseSettings = Pick<
    EnvConfig,
    'STORE_BACKEND' | 'MONGODB_URI' | 'MONGODB_DATABASE' | 'MONGODB_SERVER_SELECTION_TIMEOUT_MS'
>;

export async function connectDatabase(settings: DatabaseSettings): Promise<void> {
    await mongoose.connect(settings.MONGODB_URI, {
        dbName: settings.MONGODB_DATABASE,
        maxPoolSize: 5,
        serverSelectionTimeoutMS: settings.MONGODB_SERVER_SELECTION_TIMEOUT_MS
    });
}

export async function disconnectDatabase(): Promise<void> {
    await mongoose.disconnect();
}

/**
 * Select the document store once at startup.
 *
 * With `STORE_BACKEND=memory` no connection is attempted. Otherwise MongoDB
 * is tried first; when it cannot be reached within the server selection
 * timeout a warning is logged and the in-memory store is returned, so the
 * interpreter always starts.
 *
 * @param settings - Backend selection and connection settings
 * @param logger - Diagnostics logger
 */
export async function createDocumentStore(settings: DatabaseSettings, logger: ILogger): Promise<IDocumentStore> {
    if (settings.STORE_BACKEND === 'memory') {
        logger.info('Running in memory-only mode');
        return new MemoryDocumentStore();
    }

    try {
        await connectDatabase(settings);
    } catch (error) {
        const failure = new BackendUnavailableError('Could not connect to MongoDB', {
            database: settings.MONGODB_DATABASE,
            reason: error instanceof Error ? error.message : String(error)
        });

        logger.warn({ code: failure.code, details: failure.details }, `${failure.message}, running in memory-only mode`);
        await disconnectDatabase();

        return new MemoryDocumentStore();
    }

    logger.info({ database: settings.MONGODB_DATABASE }, 'Connected to MongoDB');
    return new MongoDocumentStore();
}
