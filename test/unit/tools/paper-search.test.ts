import { describe, it, expect, vi } from 'vitest';
import type { ArxivPaper } from '../../../src/clients/arxiv.js';
import {
  createPaperSearchTool,
  formatPapers,
  NO_PAPERS_FOUND,
  parseRanking,
  rankPapers,
} from '../../../src/tools/paper-search.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import { createTestLogger, FakeTextGenerator } from '../../helpers/index.js';

function makePaper(n: number): ArxivPaper {
  return {
    title: `Paper ${n}`,
    authors: [`Author ${n}`],
    summary: `Summary of paper ${n}.`,
    published: '2024-01-01',
    url: `http://arxiv.org/abs/2401.0000${n}v1`,
    pdfUrl: `http://arxiv.org/pdf/2401.0000${n}v1`,
  };
}

const TEN_PAPERS = Array.from({ length: 10 }, (_, i) => makePaper(i + 1));

describe('parseRanking', () => {
  it('should keep distinct in-range numbers in order', () => {
    expect(parseRanking('3, 1, 12, x, 3, 0', 10)).toEqual([2, 0]);
  });

  it('should return nothing for a reply without numbers', () => {
    expect(parseRanking('I cannot rank these.', 5)).toEqual([]);
  });
});

describe('rankPapers', () => {
  it('should skip ranking when there are few enough papers', async () => {
    const { logger } = createTestLogger();
    const generator = new FakeTextGenerator();
    const papers = TEN_PAPERS.slice(0, 3);

    expect(await rankPapers('q', papers, 5, generator, logger)).toEqual(papers);
    expect(generator.calls).toHaveLength(0);
  });

  it('should fill places the model leaves open in original order', async () => {
    const { logger } = createTestLogger();
    const generator = new FakeTextGenerator(['3, 1, 12, x, 3']);

    const ranked = await rankPapers('q', TEN_PAPERS, 5, generator, logger);

    expect(ranked.map((p) => p.title)).toEqual(['Paper 3', 'Paper 1', 'Paper 2', 'Paper 4', 'Paper 5']);
    expect(generator.calls[0]?.options).toEqual({ temperature: 0.1 });
  });

  it('should keep the original order when ranking fails', async () => {
    const { logger, sink } = createTestLogger();
    const generator = new FakeTextGenerator([new Error('quota exceeded')]);

    const ranked = await rankPapers('q', TEN_PAPERS, 5, generator, logger);

    expect(ranked).toEqual(TEN_PAPERS.slice(0, 5));
    expect([...sink.query('warning')][0]?.message).toBe('Ranking failed, using original order: quota exceeded');
  });
});

describe('formatPapers', () => {
  it('should list authors, date, summary and links', () => {
    const paper: ArxivPaper = {
      ...makePaper(1),
      authors: ['A One', 'B Two', 'C Three', 'D Four'],
    };

    expect(formatPapers([paper])).toBe(
      [
        'Found 1 relevant papers:',
        '',
        '1. **Paper 1**',
        '   Authors: A One, B Two, C Three et al.',
        '   Published: 2024-01-01',
        '   Summary: Summary of paper 1....',
        '   URL: http://arxiv.org/abs/2401.00001v1',
        '   PDF: http://arxiv.org/pdf/2401.00001v1',
      ].join('\n')
    );
  });
});

describe('retrieve_related_papers tool', () => {
  function setup(replies: (string | Error)[], papers: ArxivPaper[]) {
    const { logger } = createTestLogger();
    const generator = new FakeTextGenerator(replies);
    const arxiv = { search: vi.fn(async () => papers) };
    const registry = new ToolRegistry();
    registry.register(createPaperSearchTool({ arxiv, generator, logger }));
    return { registry, generator, arxiv };
  }

  it('should refine, search twice the count and rank', async () => {
    const { registry, arxiv, generator } = setup(['  graph neural networks  ', '2,1'], TEN_PAPERS);

    const output = await registry.dispatch('retrieve_related_papers', { query: 'GNN papers please' });

    expect(arxiv.search).toHaveBeenCalledWith('graph neural networks', 10);
    expect(generator.calls[0]?.options).toEqual({ temperature: 0.3 });
    expect(generator.calls[0]?.prompt).toContain('Given this user query: "GNN papers please"');
    expect(typeof output === 'string' && output.startsWith('Found 5 relevant papers:\n\n1. **Paper 2**')).toBe(true);
  });

  it('should search with the original query when refinement fails', async () => {
    const { registry, arxiv } = setup([new Error('offline')], TEN_PAPERS.slice(0, 2));

    await registry.dispatch('retrieve_related_papers', { query: 'sparse attention' });

    expect(arxiv.search).toHaveBeenCalledWith('sparse attention', 10);
  });

  it('should report when nothing is found', async () => {
    const { registry } = setup(['refined'], []);

    expect(await registry.dispatch('retrieve_related_papers', { query: 'nothing' })).toBe(NO_PAPERS_FOUND);
  });

  it('should propagate search failures', async () => {
    const { logger } = createTestLogger();
    const registry = new ToolRegistry();
    registry.register(
      createPaperSearchTool({
        arxiv: { search: async () => Promise.reject(new Error('arXiv unavailable')) },
        generator: new FakeTextGenerator(['refined']),
        logger,
      })
    );

    await expect(registry.dispatch('retrieve_related_papers', { query: 'x' })).rejects.toThrow('arXiv unavailable');
  });
});
