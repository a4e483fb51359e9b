import { describe, it, expect, beforeEach } from 'vitest';
import { Readable, Writable } from 'node:stream';
import type { BlogDocument } from '@threadlog/types';
import { InterpreterModule } from '../InterpreterModule.js';
import { MemoryDocumentStore } from '../../storage/memory-document-store.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';

/**
 * Writable that keeps everything written to it.
 */
class CapturingWritable extends Writable {
    text = '';

    override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        this.text += chunk.toString();
        callback();
    }
}

/**
 * Writable that accepts one chunk at a time and completes each write on a later tick.
 */
class SlowWritable extends Writable {
    text = '';

    constructor() {
        super({ highWaterMark: 1 });
    }

    override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        setImmediate(() => {
            this.text += chunk.toString();
            callback();
        });
    }
}

class FailingStore extends MemoryDocumentStore {
    override async findByBlogAndKind(): Promise<BlogDocument[]> {
        throw new Error('disk on fire');
    }
}

describe('InterpreterModule', () => {
    let logger: MockLogger;
    let output: CapturingWritable;

    beforeEach(() => {
        logger = new MockLogger();
        output = new CapturingWritable();
    });

    it('runs every line, prints views and reports rejected lines', async () => {
        const input = Readable.from([
            [
                'post blog1 "alice" "Hello World" "First post" "" 1000',
                '',
                'comment blog1 blog1.Hello_World "bob" "Nice!" 1001',
                'publish blog1',
                'comment blog1 missing "bob" "x" 1002',
                'post blog1 alice',
                'show blog1'
            ].join('\n')
        ]);

        const interpreter = new InterpreterModule();
        await interpreter.init({ store: new MemoryDocumentStore(), logger, input, output });
        await interpreter.run();

        expect(output.text).toBe(
            [
                'in blog1:',
                '',
                '  - - - -',
                '\ttitle: Hello World',
                '\tuserName: alice',
                '\ttimestamp: 1000',
                '\tpermalink: blog1.Hello_World',
                '\tbody:',
                '\t  First post',
                '',
                '      - - - -',
                '  \tuserName: bob',
                '  \tpermalink: 1001',
                '  \tcomment:',
                '  \t  Nice!',
                ''
            ].join('\n') + '\n'
        );

        expect(logger.messages('warn')).toEqual([
            'Unknown command: publish',
            'No post or comment found with permalink: missing',
            'Invalid post command format: missing quoted user'
        ]);
        expect(logger.entries('warn')[1]?.context).toMatchObject({
            module: 'interpreter',
            line: 5,
            code: 'UNRESOLVED_REFERENCE'
        });
        expect(interpreter.getSummary()).toEqual({ lines: 7, executed: 3, rejected: 3, failed: 0 });
    });

    it('handles CRLF line endings', async () => {
        const input = Readable.from(['post b "u" "T" "B" "" 1\r\nshow b\r\n']);

        const interpreter = new InterpreterModule();
        await interpreter.init({ store: new MemoryDocumentStore(), logger, input, output });
        await interpreter.run();

        expect(output.text.split('\n').slice(0, 3)).toEqual(['in b:', '', '  - - - -']);
        expect(interpreter.getSummary()).toEqual({ lines: 2, executed: 2, rejected: 0, failed: 0 });
    });

    it('logs unexpected store failures and keeps going', async () => {
        const interpreter = new InterpreterModule();
        await interpreter.init({ store: new FailingStore(), logger, input: Readable.from([]), output });

        expect(await interpreter.processLine('show blog1')).toBe('failed');
        expect(await interpreter.processLine('post blog1 "alice" "T" "B" "" 1')).toBe('executed');

        expect(logger.messages('error')).toEqual(['Command failed']);
        expect(logger.entries('error')[0]?.context).toMatchObject({ line: 1, error: 'disk on fire' });
        expect(output.text).toBe('');
    });

    it('waits for a slow output to drain before finishing a line', async () => {
        const slow = new SlowWritable();
        const interpreter = new InterpreterModule();
        await interpreter.init({ store: new MemoryDocumentStore(), logger, input: Readable.from([]), output: slow });

        await interpreter.processLine('post b "u" "T" "B" "" 1');
        await interpreter.processLine('show b');

        expect(slow.writableLength).toBe(0);
        expect(slow.text.split('\n').slice(0, 4)).toEqual(['in b:', '', '  - - - -', '\ttitle: T']);
    });

    it('reports blank lines without executing anything', async () => {
        const interpreter = new InterpreterModule();
        await interpreter.init({ store: new MemoryDocumentStore(), logger, input: Readable.from([]), output });

        expect(await interpreter.processLine('   ')).toBe('blank');
        expect(interpreter.getSummary()).toEqual({ lines: 1, executed: 0, rejected: 0, failed: 0 });
    });

    it('refuses to process lines before init', async () => {
        await expect(new InterpreterModule().processLine('show blog1')).rejects.toThrow(
            'InterpreterModule not initialized - call init() first'
        );
    });
});
