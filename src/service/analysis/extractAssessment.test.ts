import { describe, it, expect } from 'vitest';
import { extractAssessment, extractNarrative, extractRatings, extractVerdict } from './extractAssessment.js';

const SAMPLE = [
    '### Assessment',
    'The repository contains a README and a token contract copied from a template.',
    '',
    '#### Ratings',
    '- CODE QUALITY: 2/5',
    '- COMPLETENESS: 1/5',
    '- Security: 3/5',
    '- ORIGINALITY: 1/5',
    '- ACTIVITY: 4/5',
    '',
    'VERDICT: LARPING - the "engine" is a stub that returns hard-coded values.',
    'Final note: no tests exist.',
].join('\n');

describe('extractRatings', () => {
    it('reads all five categories case-insensitively', () => {
        expect(extractRatings(SAMPLE)).toEqual({
            'Code Quality': '2/5',
            Completeness: '1/5',
            Security: '3/5',
            Originality: '1/5',
            Activity: '4/5',
        });
    });

    it('tolerates markdown emphasis around the label', () => {
        expect(extractRatings('**CODE QUALITY:** 4/5\n**Activity**: 1/5')).toEqual({
            'Code Quality': '4/5',
            Activity: '1/5',
        });
    });

    it('leaves missing or out-of-range categories absent', () => {
        expect(extractRatings('CODE QUALITY: 3/5\nSECURITY: 7/5\nCOMPLETENESS: n/a')).toEqual({ 'Code Quality': '3/5' });
    });
});

describe('extractVerdict', () => {
    it('captures the rest of the verdict line', () => {
        expect(extractVerdict(SAMPLE)).toBe('LARPING - the "engine" is a stub that returns hard-coded values.');
    });

    it('accepts numbered and emphasised headings', () => {
        expect(extractVerdict('3. **VERDICT:** BORDERLINE - some real code.\nmore')).toBe('BORDERLINE - some real code.');
        expect(extractVerdict('## Verdict\nLEGITIMATE, actively developed.')).toBe('LEGITIMATE, actively developed.');
    });

    it('is absent when there is no verdict line', () => {
        expect(extractVerdict('The code looks fine overall.')).toBeUndefined();
        expect(extractVerdict('VERDICT:')).toBeUndefined();
    });
});

describe('extractNarrative', () => {
    it('drops ratings, the verdict line and blank lines', () => {
        expect(extractNarrative(SAMPLE)).toBe(
            [
                '### Assessment',
                'The repository contains a README and a token contract copied from a template.',
                '#### Ratings',
                'Final note: no tests exist.',
            ].join('\n')
        );
    });

    it('keeps lines that only hold a number or a rule', () => {
        expect(extractNarrative('Total supply is hard-coded to\n1000000\ntokens.\n---\n2024\n3.')).toBe(
            'Total supply is hard-coded to\n1000000\ntokens.\n---\n2024\n3.'
        );
    });

    it('drops list markers left behind only where a rating was removed', () => {
        expect(extractNarrative('1. SECURITY: 2/5\n2.\n- CODE QUALITY: 4/5 with lint warnings')).toBe(
            '2.\n-  with lint warnings'
        );
    });

    it('returns an empty narrative for an empty report', () => {
        expect(extractNarrative('')).toBe('');
    });
});

describe('extractAssessment', () => {
    it('handles the ratings-plus-verdict scenario', () => {
        const assessment = extractAssessment('Summary.\nCODE QUALITY: 3/5\nVERDICT: LARPING - no working code');

        expect(assessment.ratings).toEqual({ 'Code Quality': '3/5' });
        expect(assessment.verdict).toBe('LARPING - no working code');
        expect(assessment.narrative).toBe('Summary.');
    });

    it('degrades to an empty assessment for non-conforming text', () => {
        expect(extractAssessment('Error analyzing code with LLM: timeout')).toEqual({
            ratings: {},
            narrative: 'Error analyzing code with LLM: timeout',
        });
    });

    it('is idempotent', () => {
        expect(extractAssessment(SAMPLE)).toEqual(extractAssessment(SAMPLE));
    });
});
