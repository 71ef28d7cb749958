import { describe, it, expect } from 'vitest';
import { HttpClient, HttpError } from '../../../src/clients/http.js';
import { authorNames, PAPER_FIELDS, SemanticScholarClient } from '../../../src/clients/semantic-scholar.js';
import { mockFetch } from '../../helpers/index.js';

const PAPER = {
  paperId: 'abc123',
  title: 'Attention Over Sparse Graphs',
  authors: [{ authorId: '1', name: 'Ada Example' }, { authorId: '2', name: null }],
  year: 2023,
  abstract: 'We propose a method.',
  citationCount: 17,
  url: 'https://www.semanticscholar.org/paper/abc123',
  externalIds: { DOI: '10.1234/sparse.2023', CorpusId: 99 },
};

function createClient(responses: Parameters<typeof mockFetch>[0]) {
  const mock = mockFetch(responses);
  return { mock, client: new SemanticScholarClient(new HttpClient({ fetch: mock.fetch })) };
}

describe('SemanticScholarClient', () => {
  describe('searchPapers', () => {
    it('should search with the paper fields', async () => {
      const { mock, client } = createClient({ '/paper/search': { body: { total: 1, data: [PAPER] } } });

      const papers = await client.searchPapers('sparse attention', 3);

      expect(papers).toEqual([PAPER]);
      const url = new URL(mock.calls[0]?.url ?? '');
      expect(url.pathname).toBe('/graph/v1/paper/search');
      expect(url.searchParams.get('query')).toBe('sparse attention');
      expect(url.searchParams.get('limit')).toBe('3');
      expect(url.searchParams.get('fields')).toBe(PAPER_FIELDS);
    });

    it('should return an empty list when data is missing', async () => {
      const { client } = createClient({ '/paper/search': { body: { total: 0 } } });

      expect(await client.searchPapers('nothing')).toEqual([]);
    });
  });

  describe('getPaperByDoi', () => {
    it('should look the paper up under the DOI prefix', async () => {
      const { mock, client } = createClient({ '/paper/DOI:10.1234/sparse.2023': { body: PAPER } });

      const paper = await client.getPaperByDoi('10.1234/sparse.2023');

      expect(paper?.title).toBe('Attention Over Sparse Graphs');
      expect(mock.calls[0]?.url).toContain('/graph/v1/paper/DOI:10.1234/sparse.2023?fields=');
    });

    it('should return null for an unknown DOI', async () => {
      const { client } = createClient({});

      expect(await client.getPaperByDoi('10.9999/missing')).toBeNull();
    });

    it('should propagate other HTTP errors', async () => {
      const { client } = createClient({ '/paper/DOI:': { status: 429, body: { message: 'Too Many Requests' } } });

      await expect(client.getPaperByDoi('10.1234/x')).rejects.toBeInstanceOf(HttpError);
    });
  });

  describe('getRecommendations', () => {
    it('should call the recommendations API for a prefixed id', async () => {
      const { mock, client } = createClient({
        '/recommendations/v1/papers/forpaper/ARXIV:2301.07041': { body: { recommendedPapers: [PAPER] } },
      });

      const papers = await client.getRecommendations('ARXIV:2301.07041', 5);

      expect(papers).toHaveLength(1);
      expect(new URL(mock.calls[0]?.url ?? '').searchParams.get('limit')).toBe('5');
    });

    it('should return an empty list for an unknown paper', async () => {
      const { client } = createClient({});

      expect(await client.getRecommendations('DOI:10.9999/missing')).toEqual([]);
    });
  });
});

describe('authorNames', () => {
  it('should skip authors without a name', () => {
    expect(authorNames(PAPER)).toEqual(['Ada Example']);
  });
});
