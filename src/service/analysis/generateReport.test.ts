import { describe, it, expect, vi, beforeEach } from 'vitest';
import { generateReport, GENERATION_MAX_TOKENS, GENERATION_TEMPERATURE } from './generateReport.js';
import { SYSTEM_PROMPT } from './prompt.js';
import { createFailurePolicy } from '../../pipeline/failurePolicy.js';
import { FakeTextGenerator, repositoryInfo } from '../../testing/fakes.js';
import type { PromptInput } from './prompt.js';

const input: PromptInput = {
    info: repositoryInfo(),
    structure: { fileTypeCounts: {}, totalFiles: 0, directoryTree: { children: {} } },
    activity: {
        totalCommits: 0,
        totalContributors: 0,
        totalIssues: 0,
        commitDates: [],
        commitFrequency: {},
        recentActivity: false,
    },
    files: [],
};

describe('generateReport', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    it('makes one low-temperature call and returns the text verbatim', async () => {
        const generator = new FakeTextGenerator('  VERDICT: LEGITIMATE\n');

        const text = await generateReport(generator, input, createFailurePolicy());

        expect(text).toBe('  VERDICT: LEGITIMATE\n');
        expect(generator.requests).toHaveLength(1);
        expect(generator.requests[0]).toMatchObject({
            model: 'fake-model',
            system: SYSTEM_PROMPT,
            temperature: GENERATION_TEMPERATURE,
            maxTokens: GENERATION_MAX_TOKENS,
        });
        expect(GENERATION_TEMPERATURE).toBe(0.2);
        expect(GENERATION_MAX_TOKENS).toBe(2000);
    });

    it('uses an explicit model when given', async () => {
        const generator = new FakeTextGenerator('ok');

        await generateReport(generator, input, createFailurePolicy(), { model: 'gpt-4o' });

        expect(generator.requests[0].model).toBe('gpt-4o');
    });

    it('turns a generation failure into an error report', async () => {
        const generator = new FakeTextGenerator(new Error('insufficient_quota'));
        const policy = createFailurePolicy();

        const text = await generateReport(generator, input, policy);

        expect(text).toBe('Error analyzing code with LLM: insufficient_quota');
        expect(policy.degradations).toEqual([
            { kind: 'generation', target: 'fake:fake-model', message: 'insufficient_quota' },
        ]);
    });
});
