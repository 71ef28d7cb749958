/**
 * Reference extraction and validation
 *
 * References are pulled from the tail of a document by the model (with a
 * DOI regex as fallback) and checked against Semantic Scholar and CrossRef.
 */

import { z } from 'zod';
import {
  crossRefAuthorNames,
  crossRefYear,
  type CrossRefClient,
  type CrossRefWork,
} from '../clients/crossref.js';
import type { RateLimiter } from '../clients/rate-limiter.js';
import { authorNames, type S2Paper, type SemanticScholarClient } from '../clients/semantic-scholar.js';
import { errorMessage } from '../errors.js';
import type { TextGenerator } from '../llm/generator.js';
import { parseModelJson } from '../llm/json.js';
import type { StructuredLogger } from '../observability/logger.js';

const REFERENCE_SECTION_CHARS = 8000;
const MAX_FALLBACK_REFERENCES = 20;
const MIN_TITLE_LENGTH = 10;
const TITLE_SIMILARITY_THRESHOLD = 0.5;

export const DOI_PATTERN = /10\.\d{4,}\/[^\s]+/g;

// =============================================================================
// Types
// =============================================================================

const Field = z.preprocess((value) => (value === null || value === undefined ? '' : String(value)), z.string());

export const ReferenceSchema = z.object({
  citation_text: Field,
  title: Field,
  authors: Field,
  year: Field,
  doi: Field,
  url: Field,
  venue: Field,
});

export type Reference = z.infer<typeof ReferenceSchema>;

export type ReferenceStatus =
  | 'verified'
  | 'doi_valid_metadata_issues'
  | 'matched_minor_issues'
  | 'failed'
  | 'unverifiable';

export const REFERENCE_STATUS_LABELS: Record<ReferenceStatus, string> = {
  verified: 'Verified',
  doi_valid_metadata_issues: 'DOI valid, metadata issues',
  matched_minor_issues: 'Matched, minor issues',
  failed: 'Validation failed',
  unverifiable: 'Could not verify',
};

export interface MatchedMetadata {
  source: 'semantic_scholar' | 'crossref';
  title: string;
  authors: string[];
  year?: number;
  doi?: string;
  url?: string;
  venue?: string;
}

export interface ReferenceValidation {
  reference: Reference;
  status: ReferenceStatus;
  matched: MatchedMetadata | null;
  issues: string[];
  doiVerified: boolean;
  metadataMatch: boolean;
}

export interface ReferenceSummary {
  verified: number;
  with_issues: number;
  failed: number;
  unverifiable: number;
}

export interface ReferenceReport {
  total: number;
  results: ReferenceValidation[];
  summary: ReferenceSummary;
}

// =============================================================================
// Extraction
// =============================================================================

function stripTrailingPunctuation(doi: string): string {
  return doi.replace(/[.,;:)\]]+$/, '');
}

/**
 * DOIs found in the tail of the document, as bare references
 */
export function extractDoiReferences(documentText: string): Reference[] {
  const tail = documentText.slice(-REFERENCE_SECTION_CHARS);
  const dois = [...tail.matchAll(DOI_PATTERN)].map((m) => stripTrailingPunctuation(m[0]));
  return dois.slice(0, MAX_FALLBACK_REFERENCES).map((doi) => ({
    citation_text: `Reference with DOI: ${doi}`,
    title: '',
    authors: '',
    year: '',
    doi,
    url: '',
    venue: '',
  }));
}

export async function extractReferences(
  documentText: string,
  generator: TextGenerator,
  logger: StructuredLogger
): Promise<Reference[]> {
  const prompt = `Extract ALL references/citations from this academic document.

For each reference, identify:
1. **citation_text**: The full citation as it appears in the document
2. **title**: Paper/book title
3. **authors**: Author names (comma-separated)
4. **year**: Publication year
5. **doi**: DOI if present (format: 10.xxxx/xxxx)
6. **url**: URL if present
7. **venue**: Journal/conference name if present

Format your response as a JSON array of objects with these fields.
If a field is not found, use empty string "".

Only extract references from the References/Bibliography section.
Do not extract in-text citations.

Document text (last ${REFERENCE_SECTION_CHARS} chars, likely containing references):
${documentText.slice(-REFERENCE_SECTION_CHARS)}`;

  try {
    const reply = await generator.generate(prompt, { temperature: 0.1 });
    const references = parseModelJson(z.array(ReferenceSchema), reply);
    if (references) {
      logger.info(`Extracted ${references.length} references`);
      return references;
    }
    logger.warning('Reference extraction reply was not a JSON array of references');
  } catch (error) {
    logger.error(`Reference extraction failed: ${errorMessage(error)}`);
  }

  const fallback = extractDoiReferences(documentText);
  logger.info(`Fallback extraction found ${fallback.length} DOIs`);
  return fallback;
}

// =============================================================================
// Metadata Comparison
// =============================================================================

function words(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter(Boolean);
}

/**
 * Shared words over the word count of the longer title
 */
export function titleSimilarity(a: string, b: string): number {
  const wordsA = words(a);
  const wordsB = words(b);
  if (wordsA.length === 0 || wordsB.length === 0) {
    return 0;
  }
  const setB = new Set(wordsB);
  const common = new Set(wordsA.filter((w) => setB.has(w)));
  return common.size / Math.max(wordsA.length, wordsB.length);
}

export function compareMetadata(reference: Reference, matched: MatchedMetadata): string[] {
  const issues: string[] = [];

  const refTitle = reference.title.trim();
  const matchedTitle = matched.title.trim();
  if (refTitle && matchedTitle) {
    const similarity = titleSimilarity(refTitle, matchedTitle);
    if (similarity < TITLE_SIMILARITY_THRESHOLD) {
      issues.push(`Title mismatch (similarity: ${Math.round(similarity * 100)}%)`);
    }
  }

  const refYear = reference.year.trim();
  if (refYear && matched.year !== undefined && refYear !== String(matched.year)) {
    issues.push(`Year mismatch: cited ${refYear}, actual ${matched.year}`);
  }

  const refAuthors = reference.authors.toLowerCase();
  const matchedAuthors = matched.authors.join(' ').toLowerCase();
  if (refAuthors && matchedAuthors) {
    const cited = refAuthors
      .split(',')
      .map((a) => a.trim())
      .filter(Boolean)
      .slice(0, 2);
    if (cited.length > 0 && !cited.some((author) => matchedAuthors.includes(author))) {
      issues.push('Author mismatch detected');
    }
  }

  return issues;
}

export function fromSemanticScholar(paper: S2Paper): MatchedMetadata {
  const matched: MatchedMetadata = {
    source: 'semantic_scholar',
    title: paper.title ?? '',
    authors: authorNames(paper),
  };
  if (paper.year !== null && paper.year !== undefined) matched.year = paper.year;
  const doi = paper.externalIds?.['DOI'];
  if (doi !== undefined) matched.doi = String(doi);
  if (paper.url) matched.url = paper.url;
  if (paper.venue) matched.venue = paper.venue;
  return matched;
}

export function fromCrossRef(work: CrossRefWork): MatchedMetadata {
  const matched: MatchedMetadata = {
    source: 'crossref',
    title: work.title?.[0] ?? '',
    authors: crossRefAuthorNames(work),
  };
  const year = crossRefYear(work);
  if (year !== undefined) matched.year = year;
  if (work.DOI) matched.doi = work.DOI;
  if (work.URL) matched.url = work.URL;
  const venue = work['container-title']?.[0];
  if (venue) matched.venue = venue;
  return matched;
}

export function determineStatus(
  result: Pick<ReferenceValidation, 'doiVerified' | 'metadataMatch' | 'matched' | 'issues'>
): ReferenceStatus {
  if (result.doiVerified) {
    return result.metadataMatch ? 'verified' : 'doi_valid_metadata_issues';
  }
  if (result.matched) {
    return 'matched_minor_issues';
  }
  return result.issues.length > 0 ? 'failed' : 'unverifiable';
}

// =============================================================================
// Validator
// =============================================================================

export interface ReferenceValidatorDeps {
  semanticScholar: Pick<SemanticScholarClient, 'getPaperByDoi'>;
  crossref: Pick<CrossRefClient, 'getByDoi' | 'searchByTitle'>;
  rateLimiter: Pick<RateLimiter, 'wait'>;
  logger: StructuredLogger;
}

export class ReferenceValidator {
  constructor(private readonly deps: ReferenceValidatorDeps) {}

  async validate(reference: Reference): Promise<ReferenceValidation> {
    const result: Omit<ReferenceValidation, 'status'> = {
      reference,
      matched: null,
      issues: [],
      doiVerified: false,
      metadataMatch: false,
    };

    const doi = reference.doi.trim();
    const title = reference.title.trim();

    if (doi) {
      await this.deps.rateLimiter.wait();
      result.matched = await this.lookupDoi(doi);
      if (result.matched) {
        result.doiVerified = true;
      } else {
        result.issues.push(`DOI not found: ${doi}`);
        this.deps.logger.warning(`DOI not found: ${doi}`);
      }
    } else if (title) {
      if (title.length < MIN_TITLE_LENGTH) {
        result.issues.push('Title too short or missing');
      } else {
        await this.deps.rateLimiter.wait();
        result.matched = await this.searchTitle(title, reference.authors.split(',')[0]?.trim());
        if (!result.matched) {
          result.issues.push('No database match found for title');
          this.deps.logger.warning(`No match found for: ${title.slice(0, 50)}`);
        }
      }
    }

    if (result.matched) {
      const metadataIssues = compareMetadata(reference, result.matched);
      result.issues.push(...metadataIssues);
      result.metadataMatch = metadataIssues.length === 0;
    }

    return { ...result, status: determineStatus(result) };
  }

  private async lookupDoi(doi: string): Promise<MatchedMetadata | null> {
    const paper = await this.attempt(`Semantic Scholar lookup of ${doi}`, () =>
      this.deps.semanticScholar.getPaperByDoi(doi)
    );
    if (paper) {
      return fromSemanticScholar(paper);
    }
    const work = await this.attempt(`CrossRef lookup of ${doi}`, () => this.deps.crossref.getByDoi(doi));
    return work ? fromCrossRef(work) : null;
  }

  private async searchTitle(title: string, author: string | undefined): Promise<MatchedMetadata | null> {
    const work = await this.attempt(`CrossRef search for '${title.slice(0, 50)}'`, () =>
      this.deps.crossref.searchByTitle(title, author || undefined)
    );
    return work ? fromCrossRef(work) : null;
  }

  /**
   * Lookup failures count as "not found"
   */
  private async attempt<T>(what: string, lookup: () => Promise<T | null>): Promise<T | null> {
    try {
      return await lookup();
    } catch (error) {
      this.deps.logger.error(`${what} failed: ${errorMessage(error)}`);
      return null;
    }
  }
}

export function summarizeReferences(results: ReferenceValidation[]): ReferenceSummary {
  const count = (...statuses: ReferenceStatus[]) => results.filter((r) => statuses.includes(r.status)).length;
  return {
    verified: count('verified'),
    with_issues: count('doi_valid_metadata_issues', 'matched_minor_issues'),
    failed: count('failed'),
    unverifiable: count('unverifiable'),
  };
}

/**
 * Extract every reference in a document and validate them one by one
 */
export async function validateAllReferences(
  documentText: string,
  generator: TextGenerator,
  validator: ReferenceValidator,
  logger: StructuredLogger
): Promise<ReferenceReport> {
  const references = await extractReferences(documentText, generator, logger);

  const results: ReferenceValidation[] = [];
  for (const [i, reference] of references.entries()) {
    logger.info(`Validating reference ${i + 1}/${references.length}`);
    results.push(await validator.validate(reference));
  }

  const summary = summarizeReferences(results);
  logger.info(
    `Reference validation complete: ${summary.verified} verified, ${summary.with_issues} with issues, ${summary.failed} failed`
  );
  return { total: references.length, results, summary };
}
