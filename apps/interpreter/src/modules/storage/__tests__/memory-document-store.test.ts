import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryDocumentStore } from '../memory-document-store.js';
import { buildComment, buildPost } from '../../../tests/vitest/helpers/documents.js';

describe('MemoryDocumentStore', () => {
    let store: MemoryDocumentStore;

    beforeEach(() => {
        store = new MemoryDocumentStore();
    });

    it('reports its backend name', () => {
        expect(store.backend).toBe('memory');
    });

    describe('findByPermalink', () => {
        it('returns null for an unknown permalink', async () => {
            expect(await store.findByPermalink('missing')).toBeNull();
        });

        it('returns the first inserted document when permalinks collide', async () => {
            await store.insert(buildPost({ title: 'Same', body: 'first' }));
            await store.insert(buildPost({ title: 'Same', body: 'second' }));

            expect((await store.findByPermalink('blog1.Same'))?.body).toBe('first');
        });

        it('looks across blogs', async () => {
            await store.insert(buildPost({ blogName: 'other' }));
            expect((await store.findByPermalink('other.Hello_World'))?.blogName).toBe('other');
        });
    });

    describe('findByBlogAndKind', () => {
        beforeEach(async () => {
            await store.insert(buildPost({ title: 'A', timestamp: '2' }));
            await store.insert(buildComment({ timestamp: '5' }));
            await store.insert(buildPost({ title: 'B', timestamp: '3' }));
            await store.insert(buildPost({ title: 'C', timestamp: '2' }));
            await store.insert(buildPost({ blogName: 'blog2', title: 'D', timestamp: '9' }));
        });

        it('returns documents of one kind and blog in insertion order', async () => {
            const posts = await store.findByBlogAndKind('blog1', 'post');
            expect(posts.map(post => post.permalink)).toEqual(['blog1.A', 'blog1.B', 'blog1.C']);
        });

        it('sorts by timestamp descending and keeps insertion order on ties', async () => {
            const posts = await store.findByBlogAndKind('blog1', 'post', { sort: { timestamp: -1 } });
            expect(posts.map(post => post.permalink)).toEqual(['blog1.B', 'blog1.A', 'blog1.C']);
        });

        it('sorts by timestamp ascending', async () => {
            const posts = await store.findByBlogAndKind('blog1', 'post', { sort: { timestamp: 1 } });
            expect(posts.map(post => post.permalink)).toEqual(['blog1.A', 'blog1.C', 'blog1.B']);
        });

        it('returns an empty list for an unknown blog', async () => {
            expect(await store.findByBlogAndKind('nowhere', 'comment')).toEqual([]);
        });
    });

    describe('findByParent', () => {
        it('returns direct replies within the blog in insertion order', async () => {
            await store.insert(buildComment({ timestamp: '1003' }));
            await store.insert(buildComment({ timestamp: '1001' }));
            await store.insert(buildComment({ timestamp: '1002', parentPermalink: '1001' }));
            await store.insert(buildComment({ blogName: 'blog2', timestamp: '1004' }));

            const replies = await store.findByParent('blog1', 'blog1.Hello_World');
            expect(replies.map(reply => reply.permalink)).toEqual(['1003', '1001']);
        });
    });

    describe('update', () => {
        it('replaces only the first matching document', async () => {
            await store.insert(buildPost({ title: 'Same', body: 'first' }));
            await store.insert(buildPost({ title: 'Same', body: 'second' }));

            const updated = await store.update('blog1.Same', document => ({ ...document, body: 'changed' }));

            expect(updated?.body).toBe('changed');
            const bodies = (await store.findByBlogAndKind('blog1', 'post')).map(post => post.body);
            expect(bodies).toEqual(['changed', 'second']);
        });

        it('returns null and does not call the mutator for an unknown permalink', async () => {
            let called = false;
            const updated = await store.update('missing', document => {
                called = true;
                return document;
            });

            expect(updated).toBeNull();
            expect(called).toBe(false);
        });
    });

    it('does not share objects with callers', async () => {
        const post = buildPost({ tags: ['a'] });
        await store.insert(post);
        post.tags.push('b');

        const found = await store.findByPermalink('blog1.Hello_World');
        expect(found).toMatchObject({ tags: ['a'] });

        if (found?.kind === 'post') {
            found.tags.push('c');
        }
        expect(await store.findByPermalink('blog1.Hello_World')).toMatchObject({ tags: ['a'] });
    });

    it('drops every document on close', async () => {
        await store.insert(buildPost());
        await store.close();
        expect(store.size).toBe(0);
    });
});
