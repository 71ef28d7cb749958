/**
 * Document Source Verification Tool
 *
 * Runs reference validation and claim verification over a document and
 * renders both into one text report. A phase that fails is reported as an
 * error section; the other phase still runs.
 */

import { z } from 'zod';
import { errorMessage } from '../errors.js';
import type { TextGenerator } from '../llm/generator.js';
import type { StructuredLogger } from '../observability/logger.js';
import type { PromptStore } from '../prompts/store.js';
import { verifyAllClaims, type ClaimReport, type ClaimVerifier } from './claim-verifier.js';
import {
  REFERENCE_STATUS_LABELS,
  validateAllReferences,
  type ReferenceReport,
  type ReferenceValidator,
} from './reference-validator.js';
import type { ToolDefinition } from './registry.js';

export const MIN_DOCUMENT_LENGTH = 100;

export const DOCUMENT_TOO_SHORT = `Error: Document is too short for verification (minimum ${MIN_DOCUMENT_LENGTH} characters)`;

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

type PhaseResult<T> = { ok: true; report: T } | { ok: false; error: string };

export interface VerificationResults {
  documentLength: number;
  references?: PhaseResult<ReferenceReport>;
  claims?: PhaseResult<ClaimReport>;
}

// =============================================================================
// Report Rendering
// =============================================================================

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function renderReferences(lines: string[], phase: PhaseResult<ReferenceReport>): void {
  if (!phase.ok) {
    lines.push('REFERENCE VALIDATION: ERROR', `   Error: ${phase.error}`, '');
    return;
  }

  const { report } = phase;
  lines.push(
    RULE,
    'REFERENCE VALIDATION RESULTS',
    RULE,
    '',
    `Total References Analyzed: ${report.total}`,
    '',
    'Summary:',
    `  Fully Verified:      ${report.summary.verified}`,
    `  With Issues:         ${report.summary.with_issues}`,
    `  Validation Failed:   ${report.summary.failed}`,
    `  Could Not Verify:    ${report.summary.unverifiable}`,
    ''
  );

  if (report.results.length === 0) {
    return;
  }
  lines.push(THIN_RULE, 'DETAILED REFERENCE ANALYSIS:', THIN_RULE, '');
  report.results.forEach((result, i) => {
    lines.push(`[${i + 1}] ${REFERENCE_STATUS_LABELS[result.status]}`);
    if (result.reference.title) {
      lines.push(`    Title: ${clip(result.reference.title, 80)}`);
    }
    if (result.reference.doi) {
      lines.push(`    DOI: ${result.reference.doi}`);
    }
    if (result.issues.length > 0) {
      lines.push('    Issues:', ...result.issues.map((issue) => `      • ${issue}`));
    }
    lines.push('');
  });
}

function renderClaims(lines: string[], phase: PhaseResult<ClaimReport>): void {
  if (!phase.ok) {
    lines.push('CLAIM VERIFICATION: ERROR', `   Error: ${phase.error}`, '');
    return;
  }

  const { report } = phase;
  lines.push(
    RULE,
    'CLAIM VERIFICATION RESULTS',
    RULE,
    '',
    `Total Claims Analyzed: ${report.total}`,
    '',
    'Summary:',
    `  Supported:              ${report.summary.supported}`,
    `  Partially Supported:    ${report.summary.partially_supported}`,
    `  Contradicted:           ${report.summary.contradicted}`,
    `  No Consensus:           ${report.summary.no_consensus}`,
    `  Insufficient Evidence:  ${report.summary.insufficient_evidence}`,
    ''
  );

  if (report.results.length === 0) {
    return;
  }
  lines.push(THIN_RULE, 'DETAILED CLAIM ANALYSIS:', THIN_RULE, '');
  report.results.forEach((result, i) => {
    lines.push(
      `[${i + 1}] ${result.status || 'UNKNOWN'} (Confidence: ${result.confidence_score}%)`,
      `    Claim: ${clip(result.claim.claim_text, 120)}`,
      `    Type: ${result.claim.claim_type || 'unknown'}`
    );
    if (result.reasoning) {
      lines.push(`    Reasoning: ${clip(result.reasoning, 200)}`);
    }
    if (result.evidenceCount > 0) {
      lines.push(`    Evidence Sources: ${result.evidenceCount} research papers`);
    }
    lines.push('');
  });
}

export function renderVerificationReport(results: VerificationResults): string {
  const lines: string[] = [
    RULE,
    'SOURCE VERIFICATION REPORT',
    RULE,
    '',
    `Document Length: ${results.documentLength.toLocaleString('en-US')} characters`,
    '',
  ];

  if (results.references) {
    renderReferences(lines, results.references);
  }
  if (results.claims) {
    renderClaims(lines, results.claims);
  }

  lines.push(
    RULE,
    'VERIFICATION COMPLETE',
    RULE,
    '',
    'Next steps:',
    '  • Review any references with validation issues',
    '  • Investigate contradicted or low-confidence claims',
    '  • Cross-reference findings with the original sources',
    ''
  );
  return lines.join('\n');
}

// =============================================================================
// Tool Definition
// =============================================================================

export const SourceVerifierInputSchema = z.object({
  document_text: z.string().describe('Full text of the document to verify'),
  verify_claims: z.boolean().default(true).describe('Fact-check the main claims against research papers'),
  verify_references: z.boolean().default(true).describe('Validate the references against academic databases'),
});

export interface SourceVerifierDeps {
  generator: TextGenerator;
  prompts: PromptStore;
  referenceValidator: ReferenceValidator;
  claimVerifier: ClaimVerifier;
  logger: StructuredLogger;
}

async function runPhase<T>(name: string, logger: StructuredLogger, phase: () => Promise<T>): Promise<PhaseResult<T>> {
  try {
    return { ok: true, report: await phase() };
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`${name} failed: ${message}`);
    return { ok: false, error: message };
  }
}

export function createSourceVerifierTool(
  deps: SourceVerifierDeps
): ToolDefinition<typeof SourceVerifierInputSchema.shape> {
  const logger = deps.logger.child('source_verifier');

  return {
    name: 'verify_document_sources',
    description:
      'Verify the sources of an academic document: validate its references (DOIs, titles, authors, years) against Semantic Scholar and CrossRef, and fact-check its main claims against published research. Returns a text report.',
    inputSchema: SourceVerifierInputSchema,
    handler: async ({ document_text, verify_claims, verify_references }) => {
      if (document_text.length < MIN_DOCUMENT_LENGTH) {
        logger.warning('Document too short for verification');
        return DOCUMENT_TOO_SHORT;
      }

      const results: VerificationResults = { documentLength: document_text.length };

      if (verify_references) {
        logger.info('Phase 1: reference validation');
        results.references = await runPhase('Reference validation', logger, () =>
          validateAllReferences(document_text, deps.generator, deps.referenceValidator, logger)
        );
      }

      if (verify_claims) {
        logger.info('Phase 2: claim verification');
        results.claims = await runPhase('Claim verification', logger, () =>
          verifyAllClaims(document_text, deps.claimVerifier, { ...deps, logger })
        );
      }

      return renderVerificationReport(results);
    },
  };
}
