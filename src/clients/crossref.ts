/**
 * CrossRef works API client
 */

import { z } from 'zod';
import { buildUrl, HttpClient, isNotFound } from './http.js';

export const CROSSREF_WORKS_URL = 'https://api.crossref.org/works';

const DatePartsSchema = z.object({
  'date-parts': z.array(z.array(z.number().nullable())).optional(),
});

export const CrossRefWorkSchema = z.object({
  DOI: z.string().optional(),
  URL: z.string().optional(),
  title: z.array(z.string()).optional(),
  author: z
    .array(
      z.object({
        given: z.string().optional(),
        family: z.string().optional(),
        name: z.string().optional(),
      })
    )
    .optional(),
  'container-title': z.array(z.string()).optional(),
  'published-print': DatePartsSchema.optional(),
  'published-online': DatePartsSchema.optional(),
  issued: DatePartsSchema.optional(),
});

export type CrossRefWork = z.infer<typeof CrossRefWorkSchema>;

const WorkResponseSchema = z.object({ message: CrossRefWorkSchema });

const SearchResponseSchema = z.object({
  message: z.object({ items: z.array(CrossRefWorkSchema).optional() }),
});

export class CrossRefClient {
  constructor(private readonly http: HttpClient = new HttpClient()) {}

  /**
   * @returns null when CrossRef does not know the DOI
   */
  async getByDoi(doi: string): Promise<CrossRefWork | null> {
    try {
      const response = await this.http.getJson(`${CROSSREF_WORKS_URL}/${encodeURIComponent(doi)}`, WorkResponseSchema);
      return response.message;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Best bibliographic match for a title, optionally narrowed by author
   */
  async searchByTitle(title: string, author?: string): Promise<CrossRefWork | null> {
    const url = buildUrl(CROSSREF_WORKS_URL, {
      'query.title': title,
      'query.author': author || undefined,
      rows: 5,
    });
    const response = await this.http.getJson(url, SearchResponseSchema);
    return response.message.items?.[0] ?? null;
  }
}

function firstYear(parts: z.infer<typeof DatePartsSchema> | undefined): number | undefined {
  return parts?.['date-parts']?.[0]?.[0] ?? undefined;
}

/**
 * Publication year: print date, else online date, else issued date
 */
export function crossRefYear(work: CrossRefWork): number | undefined {
  return firstYear(work['published-print']) ?? firstYear(work['published-online']) ?? firstYear(work.issued);
}

export function crossRefAuthorNames(work: CrossRefWork): string[] {
  const names: string[] = [];
  for (const author of work.author ?? []) {
    const name = author.name ?? [author.given, author.family].filter(Boolean).join(' ');
    if (name) {
      names.push(name);
    }
  }
  return names;
}
