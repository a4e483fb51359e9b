/**
 * Interpreter module implementation.
 *
 * Owns the read-eval-print loop of threadlog: every input line is parsed,
 * executed against the document store and its output written before the next
 * line is read.
 *
 * ## Design Decisions
 *
 * **Line isolation**: a failing line is reported on the diagnostics logger and
 * skipped. Parse errors, unresolved permalinks and unexpected store failures
 * never end the run.
 *
 * **Strict sequencing**: lines are awaited one at a time, so a `show` always
 * sees every mutation from earlier lines.
 *
 * **Separate streams**: rendered views go to the output stream; diagnostics go
 * to the logger only.
 */

import { once } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { IDocumentStore, ILogger, IModule, IModuleMetadata } from '@threadlog/types';
import { ThreadlogError } from '../../lib/errors.js';
import { parseCommandLine } from '../commands/index.js';
import { CommandProcessor } from '../blog/index.js';

/**
 * Dependencies required by the interpreter module.
 */
export interface IInterpreterModuleDependencies {
    /**
     * Active document store, selected at startup.
     */
    store: IDocumentStore;

    /**
     * Diagnostics logger (standard error in production).
     */
    logger: ILogger;

    /**
     * Command source, one command per line.
     */
    input: Readable;

    /**
     * Destination for rendered views.
     */
    output: Writable;
}

/**
 * Counters reported when the input is exhausted.
 */
export interface IInterpreterRunSummary {
    lines: number;
    executed: number;
    rejected: number;
    failed: number;
}

interface IInterpreterContext {
    input: Readable;
    output: Writable;
    logger: ILogger;
    processor: CommandProcessor;
}

/**
 * Outcome of a single line.
 */
export type LineOutcome = 'blank' | 'executed' | 'rejected' | 'failed';

export class InterpreterModule implements IModule<IInterpreterModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'interpreter',
        name: 'Interpreter',
        version: '1.0.0',
        description: 'Line-oriented command loop for posts and threaded comments'
    };

    private context?: IInterpreterContext;

    private summary: IInterpreterRunSummary = { lines: 0, executed: 0, rejected: 0, failed: 0 };

    /**
     * Store dependencies and create the command processor.
     */
    async init(dependencies: IInterpreterModuleDependencies): Promise<void> {
        const logger = dependencies.logger.child({ module: this.metadata.id });

        this.context = {
            input: dependencies.input,
            output: dependencies.output,
            logger,
            processor: new CommandProcessor(dependencies.store, logger)
        };

        logger.debug({ backend: dependencies.store.backend }, 'Interpreter module initialized');
    }

    /**
     * Consume the input stream until it ends.
     *
     * @throws {Error} If called before init()
     */
    async run(): Promise<void> {
        const { input, logger } = this.requireContext();
        const lines = createInterface({ input, crlfDelay: Infinity });

        for await (const line of lines) {
            await this.processLine(line);
        }

        logger.debug({ ...this.summary }, 'Input exhausted');
    }

    /**
     * Parse, execute and print one line.
     *
     * Every command failure is logged and counted instead of thrown.
     *
     * @throws {Error} If called before init()
     */
    async processLine(line: string): Promise<LineOutcome> {
        const { output, logger, processor } = this.requireContext();

        this.summary.lines++;
        const lineNumber = this.summary.lines;

        try {
            const command = parseCommandLine(line);
            if (!command) {
                return 'blank';
            }

            const rendered = await processor.execute(command);
            for (const outputLine of rendered) {
                if (!output.write(`${outputLine}\n`)) {
                    await once(output, 'drain');
                }
            }

            this.summary.executed++;
            return 'executed';
        } catch (error) {
            if (error instanceof ThreadlogError) {
                this.summary.rejected++;
                logger.warn({ line: lineNumber, code: error.code, details: error.details }, error.message);
                return 'rejected';
            }

            this.summary.failed++;
            logger.error(
                {
                    line: lineNumber,
                    error: error instanceof Error ? error.message : String(error),
                    stack: error instanceof Error ? error.stack : undefined
                },
                'Command failed'
            );
            return 'failed';
        }
    }

    /**
     * Counters for the lines processed so far.
     */
    getSummary(): IInterpreterRunSummary {
        return { ...this.summary };
    }

    private requireContext(): IInterpreterContext {
        if (!this.context) {
            throw new Error('InterpreterModule not initialized - call init() first');
        }
        return this.context;
    }
}
