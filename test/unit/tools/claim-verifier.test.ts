import { describe, it, expect, vi } from 'vitest';
import type { S2Paper } from '../../../src/clients/semantic-scholar.js';
import {
  ClaimVerifier,
  extractClaims,
  formatEvidence,
  summarizeClaims,
  verifyAllClaims,
  type Claim,
  type ClaimVerification,
} from '../../../src/tools/claim-verifier.js';
import { DEFAULT_PROMPTS } from '../../../src/prompts/store.js';
import { createDefaultPromptStore, createTestLogger, FakeTextGenerator, logMessages } from '../../helpers/index.js';

function claim(text: string): Claim {
  return { claim_text: text, claim_type: 'empirical', importance: 'high', specificity: 'specific', context: 'Results' };
}

const VERDICT = {
  status: ' supported ',
  confidence_score: '85',
  reasoning: 'Two independent studies agree.',
  supporting_evidence: 'Evidence 1',
  contradicting_evidence: '',
  limitations: 'Small samples',
};

const EVIDENCE_PAPER: S2Paper = {
  title: 'Replication of the effect',
  authors: [{ name: 'A. Author' }, { name: 'B. Author' }],
  year: 2021,
  abstract: 'We replicate it.',
  citationCount: 42,
  url: 'https://example.org/paper',
};

function setup(replies: (string | Error)[], search: () => Promise<S2Paper[]> = async () => [EVIDENCE_PAPER]) {
  const { logger, sink } = createTestLogger();
  const generator = new FakeTextGenerator(replies);
  const semanticScholar = { searchPapers: vi.fn<(query: string, limit?: number) => Promise<S2Paper[]>>(search) };
  const rateLimiter = { wait: vi.fn(async () => {}) };
  const prompts = createDefaultPromptStore();
  const verifier = new ClaimVerifier({ generator, semanticScholar, prompts, rateLimiter, logger });
  return { verifier, generator, semanticScholar, rateLimiter, prompts, logger, sink };
}

// =============================================================================
// Extraction
// =============================================================================

describe('extractClaims', () => {
  it('should send the extraction prompt with the head of the document', async () => {
    const { generator, prompts, logger } = setup([JSON.stringify([claim('The effect is large.')])]);
    const document = 'y'.repeat(13_000);

    const claims = await extractClaims(document, generator, prompts, logger);

    expect(claims).toEqual([claim('The effect is large.')]);
    expect(generator.calls[0]?.prompt).toBe(
      `${DEFAULT_PROMPTS.claim_extraction}\n\nDocument text (first 12000 characters):\n${'y'.repeat(12_000)}`
    );
    expect(generator.calls[0]?.options).toEqual({ temperature: 0.3 });
  });

  it('should drop blank claims and keep at most ten', async () => {
    const many = [claim('  '), ...Array.from({ length: 12 }, (_, i) => claim(`Claim ${i}`))];
    const { generator, prompts, logger } = setup([JSON.stringify(many)]);

    const claims = await extractClaims('doc', generator, prompts, logger);

    expect(claims).toHaveLength(10);
    expect(claims[0]?.claim_text).toBe('Claim 0');
  });

  it('should return no claims when the model fails', async () => {
    const { generator, prompts, logger, sink } = setup([new Error('quota exceeded')]);

    expect(await extractClaims('doc', generator, prompts, logger)).toEqual([]);
    expect(logMessages(sink, 'error')).toEqual(['Claim extraction failed: quota exceeded']);
  });

  it('should return no claims for a reply that is not an array', async () => {
    const { generator, prompts, logger } = setup(['{"claim_text": "single"}']);

    expect(await extractClaims('doc', generator, prompts, logger)).toEqual([]);
  });
});

// =============================================================================
// Verification
// =============================================================================

describe('formatEvidence', () => {
  it('should say when there is no evidence', () => {
    expect(formatEvidence([])).toBe('No evidence found.');
  });

  it('should list each paper', () => {
    expect(
      formatEvidence([
        { title: 'T', authors: ['A', 'B'], year: null, abstract: '', citationCount: 3, url: '' },
      ])
    ).toBe('Evidence 1:\nTitle: T\nAuthors: A, B\nYear: N/A\nCitations: 3\nAbstract: No abstract');
  });
});

describe('ClaimVerifier', () => {
  it('should judge a claim against the evidence it finds', async () => {
    const { verifier, generator, semanticScholar, rateLimiter } = setup([JSON.stringify(VERDICT)]);

    const result = await verifier.verify(claim('The effect replicates.'));

    expect(semanticScholar.searchPapers).toHaveBeenCalledWith('The effect replicates.', 5);
    expect(rateLimiter.wait).toHaveBeenCalledTimes(2);
    expect(result).toMatchObject({
      status: 'SUPPORTED',
      confidence_score: 85,
      reasoning: 'Two independent studies agree.',
      evidenceCount: 1,
    });
    expect(generator.calls[0]?.options).toEqual({ temperature: 0.2 });
    expect(generator.calls[0]?.prompt).toContain('Title: Replication of the effect\nAuthors: A. Author, B. Author');
  });

  it('should judge without evidence when the search fails', async () => {
    const { verifier, generator } = setup([JSON.stringify(VERDICT)], async () =>
      Promise.reject(new Error('HTTP 500'))
    );

    const result = await verifier.verify(claim('Claim'));

    expect(result.evidenceCount).toBe(0);
    expect(generator.calls[0]?.prompt).toContain('GATHERED EVIDENCE:\nNo evidence found.');
  });

  it('should return an error verdict when the model fails', async () => {
    const { verifier } = setup([new Error('model offline')]);

    const result = await verifier.verify(claim('Claim'));

    expect(result).toMatchObject({
      status: 'ERROR',
      confidence_score: 0,
      reasoning: 'Verification failed: model offline',
    });
  });

  it('should score an unreadable confidence as zero', async () => {
    const { verifier } = setup([JSON.stringify({ ...VERDICT, confidence_score: 'high' })]);

    const result = await verifier.verify(claim('Claim'));

    expect(result.confidence_score).toBe(0);
  });
});

describe('summarizeClaims', () => {
  it('should count each verdict once', () => {
    const statuses = ['SUPPORTED', 'PARTIALLY SUPPORTED', 'CONTRADICTED', 'NO CONSENSUS', 'INSUFFICIENT EVIDENCE', 'ERROR'];
    const results = statuses.map(
      (status): ClaimVerification => ({
        status,
        confidence_score: 50,
        reasoning: '',
        supporting_evidence: '',
        contradicting_evidence: '',
        limitations: '',
        claim: claim('c'),
        evidenceCount: 0,
      })
    );

    expect(summarizeClaims(results)).toEqual({
      supported: 1,
      partially_supported: 1,
      contradicted: 1,
      no_consensus: 1,
      insufficient_evidence: 1,
    });
  });
});

describe('verifyAllClaims', () => {
  it('should verify each extracted claim in order', async () => {
    const { verifier, generator, prompts, logger } = setup([
      JSON.stringify([claim('First'), claim('Second')]),
      JSON.stringify(VERDICT),
      JSON.stringify({ ...VERDICT, status: 'contradicted' }),
    ]);

    const report = await verifyAllClaims('doc', verifier, { generator, prompts, logger });

    expect(report.total).toBe(2);
    expect(report.results.map((r) => [r.claim.claim_text, r.status])).toEqual([
      ['First', 'SUPPORTED'],
      ['Second', 'CONTRADICTED'],
    ]);
    expect(report.summary.contradicted).toBe(1);
  });
});
