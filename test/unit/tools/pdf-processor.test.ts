import { describe, it, expect } from 'vitest';
import {
  buildPdfSummaryPrompt,
  createPdfProcessorTool,
  formatPages,
  PDF_TRUNCATION_NOTE,
  truncatePdfText,
  type PdfPage,
  type PdfTextExtractor,
} from '../../../src/tools/pdf-processor.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import { createTestLogger, FakeTextGenerator } from '../../helpers/index.js';

class FakeExtractor implements PdfTextExtractor {
  readonly inputs: Uint8Array[] = [];

  constructor(private readonly pages: PdfPage[]) {}

  async extractPages(data: Uint8Array): Promise<PdfPage[]> {
    this.inputs.push(data);
    return this.pages;
  }
}

function setup(pages: PdfPage[], options: { maxChars?: number; replies?: string[] } = {}) {
  const { logger } = createTestLogger();
  const generator = new FakeTextGenerator(options.replies ?? ['Structured summary']);
  const extractor = new FakeExtractor(pages);
  const files = new Map<string, Uint8Array>([['/uploads/paper.pdf', new Uint8Array([37, 80, 68, 70])]]);
  const registry = new ToolRegistry();
  registry.register(
    createPdfProcessorTool({
      generator,
      logger,
      extractor,
      ...(options.maxChars !== undefined ? { maxChars: options.maxChars } : {}),
      readFile: async (path) => {
        const data = files.get(path);
        if (!data) {
          throw new Error(`ENOENT: no such file or directory, open '${path}'`);
        }
        return data;
      },
    })
  );
  return { registry, generator, extractor };
}

describe('formatPages', () => {
  it('should label pages and skip blank ones', () => {
    expect(
      formatPages([
        { num: 1, text: 'Intro' },
        { num: 2, text: '   ' },
        { num: 3, text: 'Results' },
      ])
    ).toBe('--- Page 1 ---\nIntro\n\n--- Page 3 ---\nResults');
  });
});

describe('truncatePdfText', () => {
  it('should leave short text alone', () => {
    expect(truncatePdfText('short', 10)).toBe('short');
  });

  it('should cut long text and add the note', () => {
    expect(truncatePdfText('abcdefghijkl', 5)).toBe(`abcde${PDF_TRUNCATION_NOTE}`);
  });
});

describe('process_uploaded_pdf tool', () => {
  it('should summarize the extracted text', async () => {
    const { registry, generator, extractor } = setup([
      { num: 1, text: 'Title page' },
      { num: 2, text: 'Method' },
    ]);

    const output = await registry.dispatch('process_uploaded_pdf', { pdf_path: '/uploads/paper.pdf' });

    expect(output).toBe('Structured summary');
    expect(extractor.inputs[0]).toEqual(new Uint8Array([37, 80, 68, 70]));
    expect(generator.calls[0]?.prompt).toBe(
      buildPdfSummaryPrompt('--- Page 1 ---\nTitle page\n\n--- Page 2 ---\nMethod')
    );
  });

  it('should truncate text beyond the character budget', async () => {
    const { registry, generator } = setup([{ num: 1, text: 'x'.repeat(500) }], { maxChars: 100 });

    await registry.dispatch('process_uploaded_pdf', { pdf_path: '/uploads/paper.pdf' });

    const expectedText = `--- Page 1 ---\n${'x'.repeat(500)}`.slice(0, 100) + PDF_TRUNCATION_NOTE;
    expect(generator.calls[0]?.prompt).toBe(buildPdfSummaryPrompt(expectedText));
  });

  it('should report a PDF without text and skip the model', async () => {
    const { registry, generator } = setup([{ num: 1, text: '' }]);

    const output = await registry.dispatch('process_uploaded_pdf', { pdf_path: '/uploads/paper.pdf' });

    expect(output).toBe(
      'No extractable text found in /uploads/paper.pdf. The PDF may contain only scanned images.'
    );
    expect(generator.calls).toHaveLength(0);
  });

  it('should fail for a missing file', async () => {
    const { registry } = setup([]);

    await expect(registry.dispatch('process_uploaded_pdf', { pdf_path: '/uploads/missing.pdf' })).rejects.toThrow(
      'ENOENT'
    );
  });
});
