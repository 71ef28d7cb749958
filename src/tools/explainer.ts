/**
 * Research Paper Explainer Tool
 */

import { z } from 'zod';
import type { TextGenerator } from '../llm/generator.js';
import type { StructuredLogger } from '../observability/logger.js';
import type { PromptStore } from '../prompts/store.js';
import type { ToolDefinition } from './registry.js';

export const ExplainerInputSchema = z.object({
  paper_info: z.string().min(1).describe('Paper title, abstract, citation or full text to explain'),
});

export interface ExplainerDeps {
  generator: TextGenerator;
  prompts: PromptStore;
  logger: StructuredLogger;
}

export function createExplainerTool(deps: ExplainerDeps): ToolDefinition<typeof ExplainerInputSchema.shape> {
  const logger = deps.logger.child('explainer');

  return {
    name: 'explain_research_paper',
    description:
      'Explain a research paper in clear, accessible language: the research question, methodology, key findings and significance.',
    inputSchema: ExplainerInputSchema,
    handler: async ({ paper_info }) => {
      logger.info(`Explaining research paper (${paper_info.length} chars)`);
      const prompt = await deps.prompts.get('explainer');

      const explanation = await deps.generator.generate(`${prompt}\n\nUser Input:\n${paper_info}`, {
        temperature: 0.7,
        maxTokens: 1500,
      });

      logger.info(`Explanation generated (${explanation.length} chars)`);
      return explanation;
    },
  };
}
