import { describe, it, expect } from 'vitest';
import type { S2Paper } from '../../../src/clients/semantic-scholar.js';
import { ClaimVerifier } from '../../../src/tools/claim-verifier.js';
import { ReferenceValidator } from '../../../src/tools/reference-validator.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import {
  createSourceVerifierTool,
  DOCUMENT_TOO_SHORT,
  renderVerificationReport,
} from '../../../src/tools/source-verifier.js';
import { createDefaultPromptStore, createTestLogger, FakeTextGenerator, logMessages } from '../../helpers/index.js';

const DOCUMENT = 'Vaccines reduce hospitalization. '.repeat(5);

const CLAIM = {
  claim_text: 'Vaccines reduce hospitalization.',
  claim_type: 'empirical',
  importance: 'high',
  specificity: 'specific',
  context: 'Abstract',
};

const EVIDENCE: S2Paper = { title: 'Cohort study', authors: [{ name: 'C. Author' }], year: 2022 };

function setup(replies: string[], referenceWait: () => Promise<void> = async () => {}) {
  const { logger, sink } = createTestLogger();
  const generator = new FakeTextGenerator(replies);
  const prompts = createDefaultPromptStore();
  const semanticScholar = {
    searchPapers: async () => [EVIDENCE],
    getPaperByDoi: async () => null,
  };
  const crossref = { getByDoi: async () => null, searchByTitle: async () => null };

  const registry = new ToolRegistry();
  registry.register(
    createSourceVerifierTool({
      generator,
      prompts,
      logger,
      referenceValidator: new ReferenceValidator({
        semanticScholar,
        crossref,
        rateLimiter: { wait: referenceWait },
        logger,
      }),
      claimVerifier: new ClaimVerifier({
        generator,
        semanticScholar,
        prompts,
        rateLimiter: { wait: async () => {} },
        logger,
      }),
    })
  );
  return { registry, generator, sink };
}

describe('renderVerificationReport', () => {
  it('should group the document length and show failed phases', () => {
    const report = renderVerificationReport({
      documentLength: 12_345,
      references: { ok: false, error: 'boom' },
    });

    expect(report).toContain('SOURCE VERIFICATION REPORT\n' + '='.repeat(80) + '\n\nDocument Length: 12,345 characters\n');
    expect(report).toContain('REFERENCE VALIDATION: ERROR\n   Error: boom\n');
    expect(report).not.toContain('CLAIM VERIFICATION');
  });
});

describe('verify_document_sources tool', () => {
  it('should reject a short document without calling the model', async () => {
    const { registry, generator } = setup([]);

    const output = await registry.dispatch('verify_document_sources', { document_text: 'too short' });

    expect(output).toBe(DOCUMENT_TOO_SHORT);
    expect(generator.calls).toHaveLength(0);
  });

  it('should run both phases and report the results', async () => {
    const { registry, generator } = setup([
      '[]',
      JSON.stringify([CLAIM]),
      JSON.stringify({ status: 'SUPPORTED', confidence_score: 90, reasoning: 'Consistent evidence.' }),
    ]);

    const output = await registry.dispatch('verify_document_sources', { document_text: DOCUMENT });

    expect(generator.calls).toHaveLength(3);
    expect(output).toContain(`Document Length: ${DOCUMENT.length} characters`);
    expect(output).toContain('Total References Analyzed: 0\n');
    expect(output).toContain(
      [
        '[1] SUPPORTED (Confidence: 90%)',
        '    Claim: Vaccines reduce hospitalization.',
        '    Type: empirical',
        '    Reasoning: Consistent evidence.',
        '    Evidence Sources: 1 research papers',
      ].join('\n')
    );
  });

  it('should skip reference validation when asked', async () => {
    const { registry, generator } = setup([JSON.stringify([])]);

    const output = await registry.dispatch('verify_document_sources', {
      document_text: DOCUMENT,
      verify_references: false,
    });

    expect(generator.calls).toHaveLength(1);
    expect(output).toContain('Total Claims Analyzed: 0\n');
    expect(output).not.toContain('REFERENCE VALIDATION');
  });

  it('should report a failed phase and keep going', async () => {
    const { registry, sink } = setup([JSON.stringify([{ doi: '10.1000/abc' }])], async () => {
      throw new Error('limiter broken');
    });

    const output = await registry.dispatch('verify_document_sources', {
      document_text: DOCUMENT,
      verify_claims: false,
    });

    expect(output).toContain('REFERENCE VALIDATION: ERROR\n   Error: limiter broken\n');
    expect(output).toContain('VERIFICATION COMPLETE');
    expect(logMessages(sink, 'error')).toEqual(['Reference validation failed: limiter broken']);
  });
});
