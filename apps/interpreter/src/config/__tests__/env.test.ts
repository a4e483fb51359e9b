import { describe, it, expect } from 'vitest';
import { EnvValidationError, parseEnv } from '../env.js';

describe('parseEnv', () => {
    it('applies defaults to an empty environment', () => {
        expect(parseEnv({})).toEqual({
            NODE_ENV: 'development',
            STORE_BACKEND: 'mongodb',
            MONGODB_URI: 'mongodb://localhost:27017/',
            MONGODB_DATABASE: 'blogdb',
            MONGODB_SERVER_SELECTION_TIMEOUT_MS: 2000,
            LOG_LEVEL: 'info',
            LOG_FORMAT: 'pretty'
        });
    });

    it('coerces the server selection timeout to a number', () => {
        expect(parseEnv({ MONGODB_SERVER_SELECTION_TIMEOUT_MS: '500' }).MONGODB_SERVER_SELECTION_TIMEOUT_MS).toBe(500);
    });

    it('accepts the memory backend', () => {
        expect(parseEnv({ STORE_BACKEND: 'memory' }).STORE_BACKEND).toBe('memory');
    });

    it('reports the fields that fail validation', () => {
        let failure: unknown;
        try {
            parseEnv({ STORE_BACKEND: 'sqlite', LOG_LEVEL: 'verbose' });
        } catch (error) {
            failure = error;
        }

        expect(failure).toBeInstanceOf(EnvValidationError);
        if (failure instanceof EnvValidationError) {
            expect(Object.keys(failure.fieldErrors).sort()).toEqual(['LOG_LEVEL', 'STORE_BACKEND']);
        }
    });
});
