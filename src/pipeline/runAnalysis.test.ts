import { describe, it, expect, vi, beforeEach } from 'vitest';
import { analyzeRepository } from './runAnalysis.js';
import { createFailurePolicy } from './failurePolicy.js';
import { InvalidReferenceError, RepositoryUnavailableError } from './errors.js';
import { directoryEntry, fileEntry, FakeGitHubSource, FakeTextGenerator } from '../testing/fakes.js';
import { TOO_LARGE_PLACEHOLDER } from './steps/sampleContents.js';
import { GENERATION_ERROR_PREFIX } from '../service/analysis/generateReport.js';

const GENERATED = [
    'Code Quality: 4/5',
    'VERDICT: LEGITIMATE - working code',
    'The project is real.',
].join('\n');

function projectSource(): FakeGitHubSource {
    return new FakeGitHubSource({
        directories: {
            '': [
                fileEntry('README.md'),
                directoryEntry('src'),
                fileEntry('big.json', 600000),
                fileEntry('logo.png'),
            ],
            src: [fileEntry('src/index.ts'), fileEntry('src/token.sol')],
        },
        commits: [
            { sha: 'a1', authoredAt: '2026-09-01T10:00:00Z' },
            { sha: 'b2', authoredAt: '2026-09-01T12:00:00Z' },
            { sha: 'c3', authoredAt: '2024-01-02T00:00:00Z' },
        ],
        contributors: [{ login: 'acme', contributions: 3 }],
        issues: [],
    });
}

const now = () => new Date('2026-10-18T00:00:00Z');

describe('analyzeRepository', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    it('produces a full report for a healthy repository', async () => {
        const source = projectSource();
        const generator = new FakeTextGenerator(GENERATED);

        const { report, assessment } = await analyzeRepository('https://github.com/acme/widget', {
            source,
            generator,
            now,
        });

        expect(report.repository).toEqual({ owner: 'acme', name: 'widget' });
        expect(report.info.fullName).toBe('acme/widget');
        expect(report.structure.totalFiles).toBe(5);
        expect(report.structure.fileTypeCounts).toEqual({ '.md': 1, '.ts': 1, '.sol': 1, '.json': 1, '.png': 1 });
        expect(report.structure.directoryTree).toEqual({ children: { src: { children: {} } } });
        expect(report.activity).toEqual({
            totalCommits: 3,
            totalContributors: 1,
            totalIssues: 0,
            commitDates: ['2026-09-01', '2024-01-02'],
            commitFrequency: { '2026-09-01': 2, '2024-01-02': 1 },
            recentActivity: true,
        });
        expect(report.sampledFileCount).toBe(4);
        expect(report.rawGeneratedText).toBe(GENERATED);
        expect(assessment).toEqual({
            verdict: 'LEGITIMATE - working code',
            ratings: { 'Code Quality': '4/5' },
            narrative: 'The project is real.',
        });
    });

    it('never fetches a file larger than 500000 bytes', async () => {
        const source = projectSource();
        const generator = new FakeTextGenerator(GENERATED);

        await analyzeRepository('https://github.com/acme/widget', { source, generator, now });

        expect(source.fetchedLocators).toEqual(['raw://README.md', 'raw://src/index.ts', 'raw://src/token.sol']);
        expect(generator.requests).toHaveLength(1);
        expect(generator.requests[0].prompt).toContain(`--- big.json ---\n${TOO_LARGE_PLACEHOLDER}\n`);
    });

    it('passes the configured model to the generator', async () => {
        const generator = new FakeTextGenerator(GENERATED);

        await analyzeRepository('https://github.com/acme/widget', {
            source: projectSource(),
            generator,
            model: 'custom-model',
            now,
        });

        expect(generator.requests[0].model).toBe('custom-model');
    });

    it('treats commits older than the recency window as inactive', async () => {
        const source = new FakeGitHubSource({
            commits: [{ sha: 'c3', authoredAt: '2024-01-02T00:00:00Z' }],
        });

        const { report } = await analyzeRepository('https://github.com/acme/widget', {
            source,
            generator: new FakeTextGenerator(GENERATED),
            recentActivityDays: 30,
            now,
        });

        expect(report.activity.recentActivity).toBe(false);
    });

    it('analyzes a repository whose folders are named like object properties', async () => {
        const source = new FakeGitHubSource({
            directories: {
                '': [directoryEntry('__proto__'), directoryEntry('constructor')],
                ['__proto__']: [directoryEntry('__proto__/a')],
                '__proto__/a': [fileEntry('__proto__/a/b.js')],
                constructor: [fileEntry('constructor/main.ts')],
            },
        });

        const { report } = await analyzeRepository('https://github.com/acme/widget', {
            source,
            generator: new FakeTextGenerator(GENERATED),
            now,
        });

        expect(report.structure.totalFiles).toBe(2);
        expect(Object.keys(report.structure.directoryTree.children)).toEqual(['__proto__', 'constructor']);
        expect(report.sampledFileCount).toBe(2);
    });

    it('rejects a locator without owner and name', async () => {
        const source = projectSource();

        await expect(
            analyzeRepository('https://gitlab.com/acme/widget', { source, generator: new FakeTextGenerator(GENERATED) })
        ).rejects.toBeInstanceOf(InvalidReferenceError);
        expect(source.listedPaths).toEqual([]);
    });

    it('aborts when repository metadata cannot be fetched', async () => {
        const source = new FakeGitHubSource({
            info: Object.assign(new Error('Not Found'), { status: 404 }),
        });

        const run = analyzeRepository('https://github.com/acme/missing', {
            source,
            generator: new FakeTextGenerator(GENERATED),
        });

        await expect(run).rejects.toBeInstanceOf(RepositoryUnavailableError);
        await expect(run).rejects.toMatchObject({ message: 'Not Found', status: 404, statusCode: 502 });
        expect(source.listedPaths).toEqual([]);
    });

    it('completes with degraded sections when everything but metadata fails', async () => {
        const source = new FakeGitHubSource({
            directories: { '': new Error('API rate limit exceeded') },
            commits: new Error('boom'),
            contributors: new Error('boom'),
            issues: new Error('boom'),
        });
        const policy = createFailurePolicy();

        const { report, assessment } = await analyzeRepository('git@github.com:acme/widget.git', {
            source,
            generator: new FakeTextGenerator(new Error('model overloaded')),
            policy,
            now,
        });

        expect(report.structure).toEqual({ fileTypeCounts: {}, totalFiles: 0, directoryTree: { children: {} } });
        expect(report.activity).toEqual({
            totalCommits: 0,
            totalContributors: 0,
            totalIssues: 0,
            commitDates: [],
            commitFrequency: {},
            recentActivity: false,
        });
        expect(report.rawGeneratedText).toBe(`${GENERATION_ERROR_PREFIX}model overloaded`);
        expect(assessment.ratings).toEqual({});
        expect(assessment.verdict).toBeUndefined();
        expect(policy.degradations.map((d) => d.kind)).toEqual([
            'listing',
            'activity',
            'activity',
            'activity',
            'generation',
        ]);
    });
});
