/**
 * Uploaded PDF Processing Tool
 *
 * Extracts the text of a local PDF page by page, cuts it to a character
 * budget and asks the model for a structured summary.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { TextGenerator } from '../llm/generator.js';
import type { StructuredLogger } from '../observability/logger.js';
import type { ToolDefinition } from './registry.js';

export const DEFAULT_MAX_PDF_CHARS = 10_000;
export const PDF_TRUNCATION_NOTE = '\n\n[Text truncated for processing...]';

// =============================================================================
// Text Extraction
// =============================================================================

export interface PdfPage {
  /** 1-based page number */
  num: number;
  text: string;
}

export interface PdfTextExtractor {
  extractPages(data: Uint8Array): Promise<PdfPage[]>;
}

/**
 * Extractor backed by pdf-parse. The library is loaded on first use.
 */
export class PdfParseExtractor implements PdfTextExtractor {
  async extractPages(data: Uint8Array): Promise<PdfPage[]> {
    const { PDFParse } = await import('pdf-parse');
    const parser = new PDFParse({ data });
    try {
      const result = await parser.getText();
      return result.pages.map((page) => ({ num: page.num, text: page.text }));
    } finally {
      await parser.destroy();
    }
  }
}

/**
 * Join non-empty pages under `--- Page n ---` headers
 */
export function formatPages(pages: PdfPage[]): string {
  return pages
    .filter((page) => page.text.trim().length > 0)
    .map((page) => `--- Page ${page.num} ---\n${page.text}`)
    .join('\n\n');
}

export function truncatePdfText(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) + PDF_TRUNCATION_NOTE : text;
}

export function buildPdfSummaryPrompt(pdfText: string): string {
  return `Analyze this research paper PDF and provide:

1. **Title and Authors** (if identifiable)
2. **Main Topic/Field**
3. **Key Contributions**
4. **Methodology Overview**
5. **Main Results/Findings**
6. **Conclusions**

PDF Content:
${pdfText}

Provide a clear, structured summary.`;
}

// =============================================================================
// Tool Definition
// =============================================================================

export const PdfProcessorInputSchema = z.object({
  pdf_path: z.string().min(1).describe('Local file system path of the uploaded PDF'),
});

export interface PdfProcessorDeps {
  generator: TextGenerator;
  logger: StructuredLogger;
  extractor?: PdfTextExtractor;
  maxChars?: number;
  /** Injected for tests */
  readFile?: (path: string) => Promise<Uint8Array>;
}

export function createPdfProcessorTool(
  deps: PdfProcessorDeps
): ToolDefinition<typeof PdfProcessorInputSchema.shape> {
  const logger = deps.logger.child('pdf_processor');
  const extractor = deps.extractor ?? new PdfParseExtractor();
  const maxChars = deps.maxChars ?? DEFAULT_MAX_PDF_CHARS;
  const read = deps.readFile ?? ((path: string) => readFile(path));

  return {
    name: 'process_uploaded_pdf',
    description:
      'Extract the text of an uploaded PDF research paper from its local path and summarize its title, field, contributions, methodology, results and conclusions.',
    inputSchema: PdfProcessorInputSchema,
    handler: async ({ pdf_path }) => {
      logger.info(`Processing PDF: ${pdf_path}`);

      const data = await read(pdf_path);
      const pages = await extractor.extractPages(data);
      const text = formatPages(pages);
      logger.info(`PDF text extracted: ${pages.length} pages, ${text.length} characters`);

      if (!text) {
        return `No extractable text found in ${pdf_path}. The PDF may contain only scanned images.`;
      }

      if (text.length > maxChars) {
        logger.debug(`Truncating PDF text from ${text.length} to ${maxChars} chars`);
      }

      const summary = await deps.generator.generate(buildPdfSummaryPrompt(truncatePdfText(text, maxChars)));
      logger.info(`PDF analysis complete (${summary.length} chars)`);
      return summary;
    },
  };
}
