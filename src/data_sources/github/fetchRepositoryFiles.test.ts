import { describe, it, expect, vi, beforeEach } from 'vitest';
import { crawlRepository } from './fetchRepositoryFiles.js';
import { createFailurePolicy } from '../../pipeline/failurePolicy.js';
import { FakeGitHubSource, directoryEntry, fileEntry } from '../../testing/fakes.js';

const ref = { owner: 'acme', name: 'widget' };

describe('crawlRepository', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    it('walks directories depth-first in listing order', async () => {
        const source = new FakeGitHubSource({
            directories: {
                '': [fileEntry('README.md'), directoryEntry('src'), fileEntry('package.json')],
                src: [directoryEntry('src/lib'), fileEntry('src/index.ts')],
                'src/lib': [fileEntry('src/lib/util.ts')],
            },
        });

        const files = await crawlRepository(source, ref, createFailurePolicy());

        expect(files.map((f) => f.path)).toEqual(['README.md', 'src/lib/util.ts', 'src/index.ts', 'package.json']);
        expect(source.listedPaths).toEqual(['', 'src', 'src/lib']);
    });

    it('keeps sibling subtrees when one listing fails', async () => {
        const source = new FakeGitHubSource({
            directories: {
                '': [directoryEntry('broken'), directoryEntry('docs'), fileEntry('main.py')],
                broken: new Error('Not Found'),
                docs: [fileEntry('docs/guide.md')],
            },
        });
        const policy = createFailurePolicy();

        const files = await crawlRepository(source, ref, policy);

        expect(files.map((f) => f.path)).toEqual(['docs/guide.md', 'main.py']);
        expect(policy.degradations).toEqual([{ kind: 'listing', target: 'broken', message: 'Not Found' }]);
    });

    it('returns an empty list when the root listing fails', async () => {
        const source = new FakeGitHubSource({ directories: { '': new Error('rate limited') } });

        await expect(crawlRepository(source, ref, createFailurePolicy())).resolves.toEqual([]);
    });
});
