/**
 * arXiv search over the public Atom API
 */

import { buildUrl, HttpClient } from './http.js';

export const ARXIV_API_URL = 'http://export.arxiv.org/api/query';

export interface ArxivPaper {
  title: string;
  authors: string[];
  summary: string;
  /** YYYY-MM-DD */
  published: string;
  /** Abstract page, e.g. http://arxiv.org/abs/2301.07041v1 */
  url: string;
  pdfUrl: string;
  primaryCategory?: string;
}

const XML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
};

function decodeXml(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity);
}

function collapse(text: string): string {
  return decodeXml(text).replace(/\s+/g, ' ').trim();
}

function firstMatch(source: string, pattern: RegExp): string | undefined {
  return pattern.exec(source)?.[1];
}

function parseEntry(entry: string): ArxivPaper | null {
  const id = firstMatch(entry, /<id>([\s\S]*?)<\/id>/)?.trim();
  const title = firstMatch(entry, /<title[^>]*>([\s\S]*?)<\/title>/);
  if (!id || title === undefined) {
    return null;
  }

  const authors = [...entry.matchAll(/<author>\s*<name>([\s\S]*?)<\/name>/g)].map((m) => collapse(m[1] ?? ''));
  const published = firstMatch(entry, /<published>([\s\S]*?)<\/published>/)?.trim() ?? '';
  const pdfLink =
    firstMatch(entry, /<link[^>]*title="pdf"[^>]*href="([^"]+)"/) ??
    firstMatch(entry, /<link[^>]*href="([^"]+)"[^>]*title="pdf"/);
  const category = firstMatch(entry, /<arxiv:primary_category[^>]*term="([^"]+)"/);

  const paper: ArxivPaper = {
    title: collapse(title),
    authors,
    summary: collapse(firstMatch(entry, /<summary[^>]*>([\s\S]*?)<\/summary>/) ?? ''),
    published: published.split('T')[0] ?? '',
    url: id,
    pdfUrl: pdfLink ?? id.replace('/abs/', '/pdf/'),
  };
  if (category) {
    paper.primaryCategory = category;
  }
  return paper;
}

/**
 * Parse the entries of an arXiv Atom feed. Entries without an id or title
 * are skipped.
 */
export function parseArxivFeed(xml: string): ArxivPaper[] {
  const papers: ArxivPaper[] = [];
  for (const match of xml.matchAll(/<entry>([\s\S]*?)<\/entry>/g)) {
    const paper = parseEntry(match[1] ?? '');
    if (paper) {
      papers.push(paper);
    }
  }
  return papers;
}

export class ArxivClient {
  constructor(private readonly http: HttpClient = new HttpClient()) {}

  /**
   * Search all fields, most relevant first
   */
  async search(query: string, maxResults: number): Promise<ArxivPaper[]> {
    const url = buildUrl(ARXIV_API_URL, {
      search_query: `all:${query}`,
      start: 0,
      max_results: maxResults,
      sortBy: 'relevance',
      sortOrder: 'descending',
    });
    const xml = await this.http.getText(url);
    return parseArxivFeed(xml);
  }
}
