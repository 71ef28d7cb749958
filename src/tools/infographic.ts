/**
 * Paper Infographic Tool
 *
 * Three steps: a structured summary of the paper from the model, a creative
 * brief built from the summary and the `infographic` prompt, and an image
 * rendered from the brief and written to the output directory.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { errorMessage, ToolExecutionError } from '../errors.js';
import { imageExtension, type ImageGenerator, type TextGenerator } from '../llm/generator.js';
import { parseModelJson } from '../llm/json.js';
import type { StructuredLogger } from '../observability/logger.js';
import type { PromptStore } from '../prompts/store.js';
import type { ToolDefinition } from './registry.js';

const TOOL_NAME = 'generate_paper_infographic';
const PAPER_INFO_CHARS = 8000;
const FALLBACK_PROBLEM_CHARS = 300;

export type InfographicFallback = 'summary' | 'error';

// =============================================================================
// Structured Summary
// =============================================================================

function toText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

const SummaryText = z.preprocess(toText, z.string());

const SummaryList = z.preprocess((value) => {
  if (Array.isArray(value)) {
    return value.map(toText);
  }
  const text = toText(value);
  return text ? [text] : [];
}, z.array(z.string()));

export const StructuredSummarySchema = z.object({
  title_and_authors: SummaryText,
  research_problem: SummaryText,
  background: SummaryText,
  methods: SummaryList,
  key_results: SummaryList,
  core_insights: SummaryList,
  limitations: SummaryList,
  conclusion: SummaryText,
  future_directions: SummaryList,
  visual_suggestions: SummaryText,
});

export type StructuredSummary = z.infer<typeof StructuredSummarySchema>;

function fallbackSummary(researchProblem: string, visualSuggestions: string): StructuredSummary {
  return {
    title_and_authors: 'Research Paper Summary',
    research_problem: researchProblem.slice(0, FALLBACK_PROBLEM_CHARS),
    background: '',
    methods: [],
    key_results: [],
    core_insights: [],
    limitations: [],
    conclusion: '',
    future_directions: [],
    visual_suggestions: visualSuggestions,
  };
}

function buildSummaryPrompt(paperInfo: string): string {
  return `Analyze this research paper and create a detailed structured summary for an academic infographic.

Extract and organize the following sections:

1. **title_and_authors**: Full paper title and author list
2. **research_problem**: What problem does this address? Why is it important? (2-3 sentences)
3. **background**: Brief context, key concepts, related work (2-3 sentences)
4. **methods**: Approach, techniques, data sources (3-4 bullet points)
5. **key_results**: Main findings with metrics and significance (4-6 bullet points)
6. **core_insights**: Novel contributions and takeaways (3-4 bullet points)
7. **limitations**: Constraints and scope boundaries (2-3 bullet points)
8. **conclusion**: Summary and broader implications (2-3 sentences)
9. **future_directions**: Next steps and open questions (2-3 bullet points)
10. **visual_suggestions**: Recommended color scheme, layout approach, and visual elements

Format your response as a JSON object with these exact keys.
For array fields (methods, key_results, etc.), provide arrays of strings.
For text fields, provide concise, clear text.

Research Paper Information:
${paperInfo.slice(0, PAPER_INFO_CHARS)}`;
}

/**
 * Ask the model for the ten-section summary. An unparseable reply or a
 * failed call yields a minimal fallback record.
 */
export async function generateStructuredSummary(
  paperInfo: string,
  generator: TextGenerator,
  logger: StructuredLogger
): Promise<StructuredSummary> {
  let reply: string;
  try {
    reply = await generator.generate(buildSummaryPrompt(paperInfo));
  } catch (error) {
    logger.error(`Structured summary failed: ${errorMessage(error)}`);
    return fallbackSummary(paperInfo, 'Clean and minimal design');
  }

  const summary = parseModelJson(StructuredSummarySchema, reply);
  if (!summary) {
    logger.warning('Could not parse the structured summary, using the text reply');
    return fallbackSummary(reply, 'Modern, professional color scheme');
  }
  return summary;
}

// =============================================================================
// Creative Brief and Fallback Text
// =============================================================================

function bullets(items: string[], empty = ''): string {
  return items.length > 0 ? items.map((item) => `• ${item}`).join('\n') : empty;
}

export function buildCreativeBrief(template: string, summary: StructuredSummary): string {
  const palette = summary.visual_suggestions || 'Professional academic color scheme (blues, grays, white)';
  return `${template}

INFOGRAPHIC CONTENT:

=== TITLE & AUTHORS ===
${summary.title_and_authors || 'Research Paper Summary'}

=== RESEARCH PROBLEM / MOTIVATION ===
${summary.research_problem}

=== BACKGROUND / CONTEXT ===
${summary.background}

=== METHODS OVERVIEW ===
${bullets(summary.methods)}

=== KEY DATA & RESULTS ===
${bullets(summary.key_results)}

=== CORE INSIGHTS / CONTRIBUTIONS ===
${bullets(summary.core_insights)}

=== LIMITATIONS ===
${bullets(summary.limitations)}

=== CONCLUSION ===
${summary.conclusion}

=== FUTURE DIRECTIONS / OPEN PROBLEMS ===
${bullets(summary.future_directions)}

DESIGN SPECIFICATIONS:
- Layout: Conference poster style with hierarchical sections
- Color Palette: ${palette}
- Style: Clean, data-focused, conference-ready
- Typography: Bold section headers, clear readable body text
- Visual Elements: Charts/diagrams for results, icons for sections, clear dividers

Create a professional academic infographic suitable for conference presentations,
research posters, and scholarly social media sharing.`;
}

export function formatSummaryText(summary: StructuredSummary): string {
  const section = (heading: string, body: string) => `**${heading}**\n${body || 'N/A'}`;
  return [
    section('TITLE & AUTHORS', summary.title_and_authors),
    section('RESEARCH PROBLEM / MOTIVATION', summary.research_problem),
    section('BACKGROUND / CONTEXT', summary.background),
    section('METHODS OVERVIEW', bullets(summary.methods)),
    section('KEY DATA & RESULTS', bullets(summary.key_results)),
    section('CORE INSIGHTS / CONTRIBUTIONS', bullets(summary.core_insights)),
    section('LIMITATIONS', bullets(summary.limitations)),
    section('CONCLUSION', summary.conclusion),
    section('FUTURE DIRECTIONS / OPEN PROBLEMS', bullets(summary.future_directions)),
  ].join('\n\n');
}

/**
 * YYYYMMDD_HHMMSS_mmm in UTC
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}_` +
    pad(date.getUTCMilliseconds(), 3)
  );
}

function isFileExistsError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Write `data` under `stem.ext`, or `stem_N.ext` for the first free N, and
 * return the path. Existing files are never replaced.
 */
async function writeNewFile(stem: string, ext: string, data: Uint8Array): Promise<string> {
  for (let attempt = 0; ; attempt++) {
    const path = attempt === 0 ? `${stem}.${ext}` : `${stem}_${attempt}.${ext}`;
    try {
      await writeFile(path, data, { flag: 'wx' });
      return path;
    } catch (error) {
      if (!isFileExistsError(error)) {
        throw error;
      }
    }
  }
}

// =============================================================================
// Tool Definition
// =============================================================================

export const InfographicInputSchema = z.object({
  paper_info: z.string().min(1).describe('Paper title, abstract, summary or full text to visualize'),
});

export interface InfographicDeps {
  generator: TextGenerator;
  /** Absent when no image-capable provider is configured */
  imageGenerator?: ImageGenerator;
  prompts: PromptStore;
  logger: StructuredLogger;
  outputDir: string;
  /** What to return when the image cannot be produced (default: summary) */
  fallback?: InfographicFallback;
  now?: () => Date;
}

export function createInfographicTool(deps: InfographicDeps): ToolDefinition<typeof InfographicInputSchema.shape> {
  const logger = deps.logger.child('infographic');
  const fallback = deps.fallback ?? 'summary';
  const now = deps.now ?? (() => new Date());

  const renderImage = async (brief: string): Promise<string> => {
    if (!deps.imageGenerator) {
      throw new Error('No image generation model is configured');
    }
    const image = await deps.imageGenerator.generateImage(brief);
    await mkdir(deps.outputDir, { recursive: true });
    const stem = join(deps.outputDir, `infographic_${formatTimestamp(now())}`);
    return writeNewFile(stem, imageExtension(image.mediaType), image.data);
  };

  return {
    name: TOOL_NAME,
    description:
      'Create an academic infographic image for a research paper and save it to disk. Returns the file path, or a structured summary of the paper when no image could be produced.',
    inputSchema: InfographicInputSchema,
    handler: async ({ paper_info }) => {
      logger.info(`Generating infographic (${paper_info.length} chars of paper info)`);

      logger.info('Step 1/3: structured summary');
      const summary = await generateStructuredSummary(paper_info, deps.generator, logger);

      logger.info('Step 2/3: creative brief');
      const brief = buildCreativeBrief(await deps.prompts.get('infographic'), summary);
      logger.debug(`Creative brief length: ${brief.length} chars`);

      logger.info('Step 3/3: image generation');
      let path: string;
      try {
        path = await renderImage(brief);
      } catch (error) {
        const message = errorMessage(error);
        logger.error(`Image generation failed: ${message}`);
        if (fallback === 'error') {
          throw new ToolExecutionError(TOOL_NAME, `Image generation failed: ${message}`, error);
        }
        return `Image generation failed: ${message}

Here is the structured summary that was generated. It can be used with an external design tool:

${formatSummaryText(summary)}`;
      }

      logger.info(`Infographic saved: ${path}`);
      return `Infographic generated successfully.

Saved to: ${path}

The infographic covers the title and authors, research problem, background, methods, key results, core insights, limitations, conclusion and future directions.`;
    },
  };
}
