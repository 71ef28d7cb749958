/**
 * Claim extraction and verification
 *
 * The model picks the verifiable claims out of a document; each claim is
 * then judged against related papers from Semantic Scholar.
 */

import { z } from 'zod';
import type { RateLimiter } from '../clients/rate-limiter.js';
import { authorNames, type SemanticScholarClient } from '../clients/semantic-scholar.js';
import { errorMessage } from '../errors.js';
import type { TextGenerator } from '../llm/generator.js';
import { parseModelJson } from '../llm/json.js';
import type { StructuredLogger } from '../observability/logger.js';
import type { PromptStore } from '../prompts/store.js';

const CLAIM_SECTION_CHARS = 12_000;
export const MAX_CLAIMS = 10;
const EVIDENCE_PAPERS = 5;

// =============================================================================
// Types
// =============================================================================

const Text = z.preprocess((value) => (value === null || value === undefined ? '' : String(value)), z.string());

export const ClaimSchema = z.object({
  claim_text: Text,
  claim_type: Text,
  importance: Text,
  specificity: Text,
  context: Text,
});

export type Claim = z.infer<typeof ClaimSchema>;

export const VerdictSchema = z.object({
  status: Text,
  confidence_score: z.coerce.number().catch(0),
  reasoning: Text,
  supporting_evidence: Text,
  contradicting_evidence: Text,
  limitations: Text,
});

export type Verdict = z.infer<typeof VerdictSchema>;

export interface Evidence {
  title: string;
  authors: string[];
  year: number | null;
  abstract: string;
  citationCount: number;
  url: string;
}

export interface ClaimVerification extends Verdict {
  claim: Claim;
  evidenceCount: number;
}

export interface ClaimSummary {
  supported: number;
  partially_supported: number;
  contradicted: number;
  no_consensus: number;
  insufficient_evidence: number;
}

export interface ClaimReport {
  total: number;
  results: ClaimVerification[];
  summary: ClaimSummary;
}

// =============================================================================
// Extraction
// =============================================================================

/**
 * Ask the model for up to `maxClaims` verifiable claims. A failed call or an
 * unparseable reply yields no claims.
 */
export async function extractClaims(
  documentText: string,
  generator: TextGenerator,
  prompts: PromptStore,
  logger: StructuredLogger,
  maxClaims = MAX_CLAIMS
): Promise<Claim[]> {
  const instructions = await prompts.get('claim_extraction');
  const prompt = `${instructions}

Document text (first ${CLAIM_SECTION_CHARS} characters):
${documentText.slice(0, CLAIM_SECTION_CHARS)}`;

  let reply: string;
  try {
    reply = await generator.generate(prompt, { temperature: 0.3 });
  } catch (error) {
    logger.error(`Claim extraction failed: ${errorMessage(error)}`);
    return [];
  }

  const claims = parseModelJson(z.array(ClaimSchema), reply);
  if (!claims) {
    logger.error('Claim extraction reply was not a JSON array of claims');
    return [];
  }
  const kept = claims.filter((claim) => claim.claim_text.trim()).slice(0, maxClaims);
  logger.info(`Extracted ${kept.length} verifiable claims`);
  return kept;
}

// =============================================================================
// Verification
// =============================================================================

export function formatEvidence(evidence: Evidence[]): string {
  if (evidence.length === 0) {
    return 'No evidence found.';
  }
  return evidence
    .map(
      (paper, i) => `Evidence ${i + 1}:
Title: ${paper.title}
Authors: ${paper.authors.join(', ').slice(0, 200)}
Year: ${paper.year ?? 'N/A'}
Citations: ${paper.citationCount}
Abstract: ${(paper.abstract || 'No abstract').slice(0, 500)}`
    )
    .join('\n\n');
}

export interface ClaimVerifierDeps {
  generator: TextGenerator;
  semanticScholar: Pick<SemanticScholarClient, 'searchPapers'>;
  prompts: PromptStore;
  rateLimiter: Pick<RateLimiter, 'wait'>;
  logger: StructuredLogger;
}

export class ClaimVerifier {
  constructor(private readonly deps: ClaimVerifierDeps) {}

  async verify(claim: Claim): Promise<ClaimVerification> {
    this.deps.logger.info(`Verifying claim: '${claim.claim_text.slice(0, 80)}'`);

    await this.deps.rateLimiter.wait();
    const evidence = await this.gatherEvidence(claim.claim_text);

    await this.deps.rateLimiter.wait();
    const verdict = await this.judge(claim, evidence);

    this.deps.logger.info(`Verification complete: ${verdict.status} (${verdict.confidence_score}%)`);
    return { ...verdict, claim, evidenceCount: evidence.length };
  }

  private async gatherEvidence(claimText: string): Promise<Evidence[]> {
    try {
      const papers = await this.deps.semanticScholar.searchPapers(claimText, EVIDENCE_PAPERS);
      this.deps.logger.info(`Found ${papers.length} research papers as evidence`);
      return papers.map((paper) => ({
        title: paper.title ?? 'Unknown',
        authors: authorNames(paper),
        year: paper.year ?? null,
        abstract: paper.abstract ?? '',
        citationCount: paper.citationCount ?? 0,
        url: paper.url ?? '',
      }));
    } catch (error) {
      this.deps.logger.error(`Evidence search failed: ${errorMessage(error)}`);
      return [];
    }
  }

  private async judge(claim: Claim, evidence: Evidence[]): Promise<Verdict> {
    const errorVerdict = (reason: string): Verdict => ({
      status: 'ERROR',
      confidence_score: 0,
      reasoning: `Verification failed: ${reason}`,
      supporting_evidence: '',
      contradicting_evidence: '',
      limitations: 'Verification process encountered an error',
    });

    const instructions = await this.deps.prompts.get('claim_verification');
    const prompt = `${instructions}

CLAIM TO VERIFY:
${claim.claim_text}

Claim Type: ${claim.claim_type || 'unknown'}
Claim Context: ${claim.context || 'not specified'}

GATHERED EVIDENCE:
${formatEvidence(evidence)}

Provide your verification in JSON format.`;

    let reply: string;
    try {
      reply = await this.deps.generator.generate(prompt, { temperature: 0.2 });
    } catch (error) {
      const reason = errorMessage(error);
      this.deps.logger.error(`Claim verification failed: ${reason}`);
      return errorVerdict(reason);
    }

    const verdict = parseModelJson(VerdictSchema, reply);
    if (!verdict) {
      this.deps.logger.error('Claim verification reply was not a JSON verdict');
      return errorVerdict('unparseable verdict');
    }
    return { ...verdict, status: verdict.status.trim().toUpperCase() };
  }
}

export function summarizeClaims(results: ClaimVerification[]): ClaimSummary {
  const count = (predicate: (status: string) => boolean) => results.filter((r) => predicate(r.status)).length;
  return {
    supported: count((s) => s.includes('SUPPORTED') && !s.includes('PARTIALLY')),
    partially_supported: count((s) => s.includes('PARTIALLY')),
    contradicted: count((s) => s.includes('CONTRADICTED')),
    no_consensus: count((s) => s.includes('NO CONSENSUS')),
    insufficient_evidence: count((s) => s.includes('INSUFFICIENT')),
  };
}

/**
 * Extract the claims of a document and verify them one by one
 */
export async function verifyAllClaims(
  documentText: string,
  verifier: ClaimVerifier,
  deps: Pick<ClaimVerifierDeps, 'generator' | 'prompts' | 'logger'>
): Promise<ClaimReport> {
  const claims = await extractClaims(documentText, deps.generator, deps.prompts, deps.logger);

  const results: ClaimVerification[] = [];
  for (const [i, claim] of claims.entries()) {
    deps.logger.info(`Verifying claim ${i + 1}/${claims.length}`);
    results.push(await verifier.verify(claim));
  }

  const summary = summarizeClaims(results);
  deps.logger.info(
    `Claim verification complete: ${summary.supported} supported, ${summary.contradicted} contradicted`
  );
  return { total: claims.length, results, summary };
}
