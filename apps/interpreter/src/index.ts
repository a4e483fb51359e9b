#!/usr/bin/env node
/**
 * @fileoverview Interpreter entry point.
 *
 * Startup sequence: configuration → logger → document store → interpreter
 * module init → run until the input ends → release the store.
 *
 * Commands are read from the file named by the first command-line argument,
 * or from standard input when none is given. Rendered views go to standard
 * output; diagnostics go to standard error.
 *
 * @module index
 */

import { createReadStream } from 'node:fs';
import type { Readable } from 'node:stream';
import { EnvValidationError, parseEnv, type EnvConfig } from './config/env.js';
import { createLogger, PinoLogger } from './lib/logger.js';
import { createDocumentStore } from './loaders/database.js';
import { InterpreterModule } from './modules/interpreter/index.js';

async function bootstrap(): Promise<void> {
    const env = loadEnv();
    if (!env) {
        process.exitCode = 1;
        return;
    }

    const logger = new PinoLogger(createLogger(env));

    try {
        const store = await createDocumentStore(env, logger);
        const interpreter = new InterpreterModule();

        await interpreter.init({
            store,
            logger,
            input: openInput(process.argv[2]),
            output: process.stdout
        });

        try {
            await interpreter.run();
        } finally {
            await store.close();
        }
    } catch (error) {
        logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Interpreter stopped');
        process.exitCode = 1;
    } finally {
        await logger.flush();
    }
}

/**
 * Parse the environment, printing the field errors when it is invalid.
 *
 * The logger is configured from the environment, so this is the one place
 * that reports through the console.
 */
function loadEnv(): EnvConfig | null {
    try {
        return parseEnv();
    } catch (error) {
        const fieldErrors = error instanceof EnvValidationError ? error.fieldErrors : undefined;
        console.error('Invalid environment configuration:', fieldErrors ?? error);
        return null;
    }
}

function openInput(path: string | undefined): Readable {
    return path ? createReadStream(path, { encoding: 'utf8' }) : process.stdin;
}

void bootstrap();
