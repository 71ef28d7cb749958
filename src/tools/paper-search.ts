/**
 * Related Paper Search Tool
 *
 * Refines the user's query with the model, searches arXiv for twice the
 * wanted number of papers, and lets the model rank them by relevance.
 */

import { z } from 'zod';
import type { ArxivPaper } from '../clients/arxiv.js';
import { errorMessage } from '../errors.js';
import type { TextGenerator } from '../llm/generator.js';
import type { StructuredLogger } from '../observability/logger.js';
import type { ToolDefinition } from './registry.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_PAPER_COUNT = 5;

const SUMMARY_PREVIEW_CHARS = 300;
const RANKING_PREVIEW_CHARS = 200;
const LISTED_AUTHORS = 3;

export const NO_PAPERS_FOUND = 'No papers found for the given query.';

// =============================================================================
// Input Schema
// =============================================================================

export const PaperSearchInputSchema = z.object({
  query: z.string().min(1).describe('Topic, question or paper title to find related research for'),
});

export type PaperSearchInput = z.infer<typeof PaperSearchInputSchema>;

export interface PaperSearchDeps {
  arxiv: { search(query: string, maxResults: number): Promise<ArxivPaper[]> };
  generator: TextGenerator;
  logger: StructuredLogger;
  /** Papers in the final list (default: 5) */
  maxResults?: number;
}

// =============================================================================
// Query Refinement and Ranking
// =============================================================================

/**
 * Ask the model for a tighter arXiv query. Falls back to the original query.
 */
export async function refineQuery(
  query: string,
  generator: TextGenerator,
  logger: StructuredLogger
): Promise<string> {
  const prompt = `You are a research assistant helping to search for academic papers.

Given this user query: "${query}"

Generate a concise, effective arXiv search query that will find the most relevant papers.
Focus on key technical terms and concepts. Keep it under 10 words.

Return ONLY the refined query, nothing else.`;

  try {
    const refined = (await generator.generate(prompt, { temperature: 0.3 })).trim();
    return refined || query;
  } catch (error) {
    logger.warning(`Query refinement failed, using original: ${errorMessage(error)}`);
    return query;
  }
}

/**
 * Parse a ranking reply such as "3, 1, 5" into distinct zero-based indices
 * below `count`.
 */
export function parseRanking(reply: string, count: number): number[] {
  const indices: number[] = [];
  for (const token of reply.split(',')) {
    const trimmed = token.trim();
    if (!/^\d+$/.test(trimmed)) {
      continue;
    }
    const index = parseInt(trimmed, 10) - 1;
    if (index >= 0 && index < count && !indices.includes(index)) {
      indices.push(index);
    }
  }
  return indices;
}

/**
 * Order papers by model-judged relevance and keep `maxResults`. Papers the
 * model leaves out fill any remaining places in their original order.
 */
export async function rankPapers(
  query: string,
  papers: ArxivPaper[],
  maxResults: number,
  generator: TextGenerator,
  logger: StructuredLogger
): Promise<ArxivPaper[]> {
  if (papers.length <= maxResults) {
    return papers;
  }

  const listing = papers
    .map((paper, i) => `${i + 1}. ${paper.title}\n   ${paper.summary.slice(0, RANKING_PREVIEW_CHARS)}...`)
    .join('\n');

  const prompt = `You are a research assistant. Rank these papers by relevance to the query: "${query}"

Papers:
${listing}

Return ONLY a comma-separated list of the top ${maxResults} paper numbers in order of relevance (most relevant first).
Example: 3,1,5,2,4`;

  let reply: string;
  try {
    reply = await generator.generate(prompt, { temperature: 0.1 });
  } catch (error) {
    logger.warning(`Ranking failed, using original order: ${errorMessage(error)}`);
    return papers.slice(0, maxResults);
  }

  const ranking = parseRanking(reply, papers.length).slice(0, maxResults);
  const ranked: ArxivPaper[] = [];
  for (const index of ranking) {
    const paper = papers[index];
    if (paper) {
      ranked.push(paper);
    }
  }
  papers.forEach((paper, i) => {
    if (ranked.length < maxResults && !ranking.includes(i)) {
      ranked.push(paper);
    }
  });
  return ranked;
}

// =============================================================================
// Formatting
// =============================================================================

export function formatPapers(papers: ArxivPaper[]): string {
  const blocks = papers.map((paper, i) => {
    let authors = paper.authors.slice(0, LISTED_AUTHORS).join(', ');
    if (paper.authors.length > LISTED_AUTHORS) {
      authors += ' et al.';
    }
    return [
      `${i + 1}. **${paper.title}**`,
      `   Authors: ${authors}`,
      `   Published: ${paper.published}`,
      `   Summary: ${paper.summary.slice(0, SUMMARY_PREVIEW_CHARS)}...`,
      `   URL: ${paper.url}`,
      `   PDF: ${paper.pdfUrl}`,
    ].join('\n');
  });
  return `Found ${papers.length} relevant papers:\n\n${blocks.join('\n\n')}`;
}

// =============================================================================
// Tool Definition
// =============================================================================

export function createPaperSearchTool(deps: PaperSearchDeps): ToolDefinition<typeof PaperSearchInputSchema.shape> {
  const logger = deps.logger.child('paper_search');
  const maxResults = deps.maxResults ?? DEFAULT_PAPER_COUNT;

  return {
    name: 'retrieve_related_papers',
    description:
      'Search arXiv for research papers related to a topic or paper. Returns titles, authors, dates, summaries and links of the most relevant papers.',
    inputSchema: PaperSearchInputSchema,
    handler: async ({ query }) => {
      logger.info(`Searching arXiv for: '${query}'`);

      const refined = await refineQuery(query, deps.generator, logger);
      logger.info(`Refined query: '${refined}'`);

      const papers = await deps.arxiv.search(refined, maxResults * 2);
      if (papers.length === 0) {
        logger.warning('No papers found');
        return NO_PAPERS_FOUND;
      }

      const ranked = await rankPapers(query, papers, maxResults, deps.generator, logger);
      logger.info(`Retrieved ${ranked.length} papers`);
      return formatPapers(ranked);
    },
  };
}
