/**
 * Semantic Scholar Graph and Recommendations API client
 */

import { z } from 'zod';
import { buildUrl, HttpClient, isNotFound } from './http.js';

export const SEMANTIC_SCHOLAR_GRAPH_URL = 'https://api.semanticscholar.org/graph/v1';
export const SEMANTIC_SCHOLAR_RECOMMENDATIONS_URL = 'https://api.semanticscholar.org/recommendations/v1';

export const PAPER_FIELDS = 'paperId,title,authors,year,abstract,venue,citationCount,url,externalIds';

// =============================================================================
// Response Schemas
// =============================================================================

export const S2AuthorSchema = z.object({
  authorId: z.string().nullish(),
  name: z.string().nullish(),
});

export const S2PaperSchema = z.object({
  paperId: z.string().nullish(),
  title: z.string().nullish(),
  authors: z.array(S2AuthorSchema).nullish(),
  year: z.number().int().nullish(),
  abstract: z.string().nullish(),
  venue: z.string().nullish(),
  citationCount: z.number().int().nullish(),
  url: z.string().nullish(),
  externalIds: z.record(z.union([z.string(), z.number()])).nullish(),
});

export type S2Paper = z.infer<typeof S2PaperSchema>;

const SearchResponseSchema = z.object({
  data: z.array(S2PaperSchema).nullish(),
});

const RecommendationsResponseSchema = z.object({
  recommendedPapers: z.array(S2PaperSchema).nullish(),
});

// =============================================================================
// Client
// =============================================================================

export class SemanticScholarClient {
  constructor(private readonly http: HttpClient = new HttpClient()) {}

  async searchPapers(query: string, limit = 5): Promise<S2Paper[]> {
    const url = buildUrl(`${SEMANTIC_SCHOLAR_GRAPH_URL}/paper/search`, {
      query,
      limit,
      fields: PAPER_FIELDS,
    });
    const response = await this.http.getJson(url, SearchResponseSchema);
    return response.data ?? [];
  }

  /**
   * Look up a paper by DOI
   * @returns null when the DOI is unknown
   */
  async getPaperByDoi(doi: string): Promise<S2Paper | null> {
    const url = buildUrl(`${SEMANTIC_SCHOLAR_GRAPH_URL}/paper/DOI:${encodeURI(doi)}`, {
      fields: PAPER_FIELDS,
    });
    try {
      return await this.http.getJson(url, S2PaperSchema);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Papers similar to one paper. `paperId` is a Semantic Scholar id or a
   * prefixed external id such as `DOI:10.1000/xyz` or `ARXIV:2301.07041`.
   * An unknown paper yields an empty list.
   */
  async getRecommendations(paperId: string, limit = 10): Promise<S2Paper[]> {
    const url = buildUrl(
      `${SEMANTIC_SCHOLAR_RECOMMENDATIONS_URL}/papers/forpaper/${encodeURI(paperId)}`,
      { limit, fields: PAPER_FIELDS }
    );
    try {
      const response = await this.http.getJson(url, RecommendationsResponseSchema);
      return response.recommendedPapers ?? [];
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }
}

/**
 * Author names, dropping entries without one
 */
export function authorNames(paper: S2Paper): string[] {
  const names: string[] = [];
  for (const author of paper.authors ?? []) {
    if (author.name) {
      names.push(author.name);
    }
  }
  return names;
}
