/**
 * Prompt Store
 *
 * Named prompt templates read from `<dir>/<name>.txt`. A missing or empty
 * file falls back to the built-in default. With refresh `always` every
 * lookup re-reads the file, so edits apply to the next tool call.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { errorMessage } from '../errors.js';
import type { StructuredLogger } from '../observability/logger.js';

export type PromptName =
  | 'explainer'
  | 'social_post'
  | 'infographic'
  | 'claim_extraction'
  | 'claim_verification';

export type PromptRefresh = 'always' | 'cached';

export const DEFAULT_PROMPTS: Readonly<Record<PromptName, string>> = {
  explainer: `You are a research assistant. Explain the following research paper in clear, accessible language.

Include:
- Main research question
- Methodology
- Key findings
- Significance and implications`,
  social_post: `You are a social media content creator. Convert the following research explanation into an engaging social media post.

Requirements:
- 200-300 words
- Accessible and engaging
- Relevant hashtags
- Scientifically accurate`,
  infographic: `You are a creative designer. Create a detailed description of an infographic
that summarizes a research paper. The infographic should be visually appealing, well-organized,
and easy to understand.`,
  claim_extraction: `You are a scientific fact-checker analyzing an academic document.

Extract the most significant, verifiable claims: empirical findings, comparisons,
causal statements, statistics and novel contributions. Skip opinions, background
facts, method descriptions and future work.

For each claim provide:
- claim_text: the claim in 1-2 sentences
- claim_type: empirical | comparative | causal | statistical | contribution
- importance: high | medium | low
- specificity: specific | moderate | vague
- context: where in the paper it appears

Extract 5-10 claims. Respond with a JSON array of objects.`,
  claim_verification: `You are a rigorous scientific fact-checker. Judge a claim against the gathered evidence.

Use one status:
- SUPPORTED: strong evidence directly supports the claim (>70% confidence)
- PARTIALLY SUPPORTED: some support, not conclusive (40-70%)
- CONTRADICTED: evidence contradicts the claim (>70% confidence)
- NO CONSENSUS: mixed evidence (<40% either way)
- INSUFFICIENT EVIDENCE: not enough evidence to evaluate

Respond with a JSON object with the keys status, confidence_score (integer 0-100),
reasoning, supporting_evidence, contradicting_evidence and limitations.
When uncertain, prefer NO CONSENSUS or INSUFFICIENT EVIDENCE.`,
};

export interface PromptStoreOptions {
  dir: string;
  refresh?: PromptRefresh;
  logger?: StructuredLogger;
}

export class PromptStore {
  private readonly dir: string;
  private readonly refresh: PromptRefresh;
  private readonly logger: StructuredLogger | undefined;
  private readonly cache = new Map<PromptName, string>();

  constructor(options: PromptStoreOptions) {
    this.dir = options.dir;
    this.refresh = options.refresh ?? 'always';
    this.logger = options.logger;
  }

  async get(name: PromptName): Promise<string> {
    if (this.refresh === 'cached') {
      const cached = this.cache.get(name);
      if (cached !== undefined) {
        return cached;
      }
    }

    const prompt = await this.read(name);
    if (this.refresh === 'cached') {
      this.cache.set(name, prompt);
    }
    return prompt;
  }

  /**
   * Drop cached prompts; the next lookup reads the files again
   */
  reload(): void {
    this.cache.clear();
  }

  private async read(name: PromptName): Promise<string> {
    const path = join(this.dir, `${name}.txt`);
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      this.logger?.warning(`Prompt file ${path} unavailable (${errorMessage(error)}); using built-in default`);
      return DEFAULT_PROMPTS[name];
    }
    const trimmed = text.trim();
    if (!trimmed) {
      this.logger?.warning(`Prompt file ${path} is empty; using built-in default`);
      return DEFAULT_PROMPTS[name];
    }
    return trimmed;
  }
}
