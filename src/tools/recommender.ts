/**
 * Similar Paper Recommendation Tool
 *
 * Picks a strategy from the input: a DOI or arXiv id goes straight to the
 * recommendations API, a short title is looked up first, and anything else
 * is turned into a topic query by the model.
 */

import { z } from 'zod';
import { authorNames, type S2Paper, type SemanticScholarClient } from '../clients/semantic-scholar.js';
import { errorMessage } from '../errors.js';
import type { TextGenerator } from '../llm/generator.js';
import type { StructuredLogger } from '../observability/logger.js';
import type { ToolDefinition } from './registry.js';

const MAX_TITLE_LENGTH = 200;
const CONTENT_PREVIEW_CHARS = 3000;
const LISTED_AUTHORS = 5;
const ABSTRACT_PREVIEW_CHARS = 400;

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

export const NO_RECOMMENDATIONS = `No similar papers found.

This could be because:
- The paper is very new or not yet indexed
- The search query was too specific
- The paper is in a very niche area

Try:
- Providing a DOI or arXiv ID for better results
- Using a more general description of the research area
- Checking if the paper title is spelled correctly`;

export type PaperIdentifier = { type: 'doi'; id: string } | { type: 'arxiv'; id: string };

/**
 * Find a DOI, or failing that an `arXiv:` id, in free text
 */
export function extractPaperId(text: string): PaperIdentifier | null {
  const doi = /10\.\d{4,}\/[^\s]+/.exec(text);
  if (doi) {
    return { type: 'doi', id: doi[0].replace(/[.,;:)\]]+$/, '') };
  }
  const arxiv = /arXiv:(\d{4}\.\d{4,5})/i.exec(text);
  if (arxiv?.[1]) {
    return { type: 'arxiv', id: arxiv[1] };
  }
  return null;
}

export function looksLikeTitle(text: string): boolean {
  return text.length < MAX_TITLE_LENGTH && !text.includes('\n\n');
}

// =============================================================================
// Formatting
// =============================================================================

function formatPaper(paper: S2Paper, index: number): string[] {
  const lines = [THIN_RULE, `[${index}] ${paper.title ?? 'Unknown Title'}`, ''];

  const names = authorNames(paper);
  if (names.length > 0) {
    let authors = names.slice(0, LISTED_AUTHORS).join(', ');
    if (names.length > LISTED_AUTHORS) {
      authors += `, et al. (${names.length} total authors)`;
    }
    lines.push(`Authors: ${authors}`);
  }
  if (paper.year) {
    lines.push(`Year: ${paper.year}`);
  }
  if (paper.venue) {
    lines.push(`Venue: ${paper.venue}`);
  }
  if (paper.citationCount !== null && paper.citationCount !== undefined) {
    lines.push(`Citations: ${paper.citationCount.toLocaleString('en-US')}`);
  }
  if (paper.abstract) {
    const abstract =
      paper.abstract.length > ABSTRACT_PREVIEW_CHARS
        ? `${paper.abstract.slice(0, ABSTRACT_PREVIEW_CHARS)}...`
        : paper.abstract;
    lines.push('', 'Abstract:', `   ${abstract}`);
  }

  const links: string[] = [];
  const doi = paper.externalIds?.['DOI'];
  const arxivId = paper.externalIds?.['ArXiv'];
  if (doi !== undefined) links.push(`DOI: https://doi.org/${doi}`);
  if (arxivId !== undefined) links.push(`arXiv: https://arxiv.org/abs/${arxivId}`);
  if (paper.paperId) links.push(`Semantic Scholar: https://www.semanticscholar.org/paper/${paper.paperId}`);
  if (links.length > 0) {
    lines.push('', 'Links:', ...links.map((link) => `   ${link}`));
  }

  lines.push('');
  return lines;
}

export function formatRecommendations(papers: S2Paper[]): string {
  const lines = [RULE, 'SIMILAR PAPER RECOMMENDATIONS', RULE, '', `Found ${papers.length} similar papers:`, ''];
  papers.forEach((paper, i) => lines.push(...formatPaper(paper, i + 1)));
  lines.push(RULE);
  return lines.join('\n');
}

// =============================================================================
// Recommender
// =============================================================================

export interface RecommenderDeps {
  semanticScholar: Pick<SemanticScholarClient, 'searchPapers' | 'getRecommendations'>;
  generator: TextGenerator;
  logger: StructuredLogger;
}

export class PaperRecommender {
  constructor(private readonly deps: RecommenderDeps) {}

  async byId(identifier: PaperIdentifier, limit: number): Promise<S2Paper[]> {
    const prefixed = identifier.type === 'doi' ? `DOI:${identifier.id}` : `ARXIV:${identifier.id}`;
    this.deps.logger.info(`Getting recommendations for ${prefixed}`);
    return this.attempt('Recommendation lookup', () => this.deps.semanticScholar.getRecommendations(prefixed, limit));
  }

  async byTitle(title: string, limit: number): Promise<S2Paper[]> {
    this.deps.logger.info(`Getting recommendations for title: '${title.slice(0, 50)}'`);
    return this.attempt('Title lookup', async () => {
      const [paper] = await this.deps.semanticScholar.searchPapers(title, 1);
      if (!paper?.paperId) {
        this.deps.logger.warning('Paper not found by title');
        return [];
      }
      this.deps.logger.info(`Found paper: ${paper.title ?? 'Unknown'}`);
      return this.deps.semanticScholar.getRecommendations(paper.paperId, limit);
    });
  }

  async byContent(content: string, limit: number): Promise<S2Paper[]> {
    const prompt = `Analyze this research paper and extract the key topics, methods, and research areas.
Generate a focused search query (5-10 words) that would find similar papers.

Paper content (first ${CONTENT_PREVIEW_CHARS} chars):
${content.slice(0, CONTENT_PREVIEW_CHARS)}

Provide only the search query, no explanation.`;

    return this.attempt('Content-based search', async () => {
      const reply = await this.deps.generator.generate(prompt, { temperature: 0.3 });
      const query = reply.trim().replace(/^"+|"+$/g, '');
      this.deps.logger.info(`Generated search query: '${query}'`);
      return query ? this.deps.semanticScholar.searchPapers(query, limit) : [];
    });
  }

  /**
   * Try each strategy that applies until one returns papers
   */
  async recommend(paperInfo: string, limit: number): Promise<S2Paper[]> {
    const identifier = extractPaperId(paperInfo);
    if (identifier) {
      const papers = await this.byId(identifier, limit);
      if (papers.length > 0) return papers;
    }
    if (looksLikeTitle(paperInfo)) {
      const papers = await this.byTitle(paperInfo, limit);
      if (papers.length > 0) return papers;
    }
    return this.byContent(paperInfo, limit);
  }

  private async attempt(what: string, lookup: () => Promise<S2Paper[]>): Promise<S2Paper[]> {
    try {
      return await lookup();
    } catch (error) {
      this.deps.logger.error(`${what} failed: ${errorMessage(error)}`);
      return [];
    }
  }
}

// =============================================================================
// Tool Definition
// =============================================================================

export const RecommenderInputSchema = z.object({
  paper_info: z.string().min(1).describe('DOI, arXiv id (arXiv:XXXX.XXXXX), paper title, or abstract/content'),
  num_recommendations: z.number().int().min(1).max(20).default(10).describe('Number of papers to recommend'),
});

export function createRecommenderTool(deps: RecommenderDeps): ToolDefinition<typeof RecommenderInputSchema.shape> {
  const logger = deps.logger.child('recommender');
  const recommender = new PaperRecommender({ ...deps, logger });

  return {
    name: 'recommend_similar_papers',
    description:
      'Recommend research papers similar to a given paper. Accepts a DOI, an arXiv id, a paper title, or the abstract or content of a paper.',
    inputSchema: RecommenderInputSchema,
    handler: async ({ paper_info, num_recommendations }) => {
      const papers = await recommender.recommend(paper_info, num_recommendations);
      if (papers.length === 0) {
        logger.warning('No recommendations found');
        return NO_RECOMMENDATIONS;
      }
      logger.info(`Recommendation complete: ${papers.length} papers found`);
      return formatRecommendations(papers);
    },
  };
}
