import { describe, it, expect } from 'vitest';
import { assembleThread } from '../services/thread-assembler.js';
import { renderBlog, renderSearchResult } from '../services/thread-renderer.js';
import { searchThread } from '../services/thread-search.js';
import { buildComment, buildPost } from '../../../tests/vitest/helpers/documents.js';

describe('renderBlog', () => {
    it('prints only the header for an empty blog', () => {
        expect(renderBlog('empty', assembleThread([]))).toEqual(['in empty:', '']);
    });

    it('prints a post with nested replies indented per level', () => {
        const thread = assembleThread([
            buildPost(),
            buildComment({ timestamp: '1001' }),
            buildComment({ timestamp: '1002', parentPermalink: '1001', userName: 'alice', body: 'Thanks' })
        ]);

        expect(renderBlog('blog1', thread)).toEqual([
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
            '',
            '        - - - -',
            '    \tuserName: alice',
            '    \tpermalink: 1002',
            '    \tcomment:',
            '    \t  Thanks',
            ''
        ]);
    });

    it('prints tags joined by comma and space between userName and timestamp', () => {
        const thread = assembleThread([buildPost({ tags: ['news', 'intro'] })]);

        expect(renderBlog('blog1', thread).slice(3, 7)).toEqual([
            '\ttitle: Hello World',
            '\tuserName: alice',
            '\ttags: news, intro',
            '\ttimestamp: 1000'
        ]);
    });

    it('prints the deletion marker in place of a deleted body', () => {
        const thread = assembleThread([
            buildPost({ body: 'original text', deletedBy: 'alice', deletedAt: '1003' })
        ]);

        expect(renderBlog('blog1', thread)[8]).toBe('\t  **post deleted**');
    });
});

describe('renderSearchResult', () => {
    it('prints matching posts and standalone comments newest first', () => {
        const thread = assembleThread([
            buildPost({ body: 'hello there' }),
            buildPost({ title: 'Other', body: 'nothing', timestamp: '0900' }),
            buildComment({ timestamp: '1001', body: 'hello back' }),
            buildComment({ timestamp: '1002', parentPermalink: 'blog1.Other', userName: 'carol', body: 'hello again' })
        ]);

        expect(renderSearchResult('blog1', searchThread(thread, 'hello'))).toEqual([
            'in blog1:',
            '',
            '  - - - -',
            '\tuserName: carol',
            '\tpermalink: 1002',
            '\tcomment:',
            '\t  hello again',
            '',
            '  - - - -',
            '\ttitle: Hello World',
            '\tuserName: alice',
            '\ttimestamp: 1000',
            '\tpermalink: blog1.Hello_World',
            '\tbody:',
            '\t  hello there',
            '',
            '      - - - -',
            '  \tuserName: bob',
            '  \tpermalink: 1001',
            '  \tcomment:',
            '  \t  hello back',
            ''
        ]);
    });
});
