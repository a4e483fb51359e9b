/**
 * Result of consuming a leading double-quoted segment.
 */
export interface IQuotedExtraction {
    /** Unescaped content between the quotes, or '' when nothing was consumed */
    value: string;

    /** Trimmed text after the closing quote, or the trimmed input when nothing was consumed */
    rest: string;

    /** Whether a complete quoted segment was found at the start of the text */
    found: boolean;
}

// Opening quote, then any run of non-quote/non-backslash characters or backslash escapes, then the closing quote
const LEADING_QUOTED = /^"((?:[^"\\]|\\.)*)"([\s\S]*)$/;

/**
 * Consume a leading double-quoted segment from a command fragment.
 *
 * Inside the quotes `\"` stands for a literal quote and `\\` for a literal
 * backslash; any other backslash is kept as written.
 *
 * @example
 * ```typescript
 * extractQuoted('"alice" "Hello" 1000');
 * // { value: 'alice', rest: '"Hello" 1000', found: true }
 *
 * extractQuoted('alice 1000');
 * // { value: '', rest: 'alice 1000', found: false }
 * ```
 */
export function extractQuoted(text: string): IQuotedExtraction {
    const trimmed = text.trim();
    const match = LEADING_QUOTED.exec(trimmed);

    if (!match) {
        return { value: '', rest: trimmed, found: false };
    }

    const [, content = '', remainder = ''] = match;

    return {
        value: content.replace(/\\(["\\])/g, '$1'),
        rest: remainder.trim(),
        found: true
    };
}

/**
 * Split off a fixed number of whitespace-delimited fields.
 *
 * Returns `count` fields followed by the trimmed remainder of the text (which
 * may be empty). Returns null when the text holds fewer than `count` fields.
 *
 * @example
 * ```typescript
 * splitFields('blog1 blog1.Hello "bob" "Hi" 1001', 2);
 * // ['blog1', 'blog1.Hello', '"bob" "Hi" 1001']
 * ```
 */
export function splitFields(text: string, count: number): string[] | null {
    const fields: string[] = [];
    let rest = text.trim();

    for (let index = 0; index < count; index++) {
        if (!rest) {
            return null;
        }

        const match = /^(\S+)\s*([\s\S]*)$/.exec(rest);
        if (!match) {
            return null;
        }

        fields.push(match[1] ?? '');
        rest = match[2] ?? '';
    }

    fields.push(rest.trim());
    return fields;
}
