/**
 * Social Media Post Tool
 *
 * Turns an explanation of a paper into a post for a general audience.
 */

import { z } from 'zod';
import type { TextGenerator } from '../llm/generator.js';
import type { StructuredLogger } from '../observability/logger.js';
import type { PromptStore } from '../prompts/store.js';
import type { ToolDefinition } from './registry.js';

export const SocialPostInputSchema = z.object({
  explanation: z.string().min(1).describe('Explanation of the research to turn into a post'),
});

export interface SocialPostDeps {
  generator: TextGenerator;
  prompts: PromptStore;
  logger: StructuredLogger;
}

export function createSocialPostTool(deps: SocialPostDeps): ToolDefinition<typeof SocialPostInputSchema.shape> {
  const logger = deps.logger.child('social_post');

  return {
    name: 'write_social_media_post',
    description:
      'Write an engaging social media post from an explanation of a research paper. Call explain_research_paper first when only the paper itself is available.',
    inputSchema: SocialPostInputSchema,
    handler: async ({ explanation }) => {
      logger.info(`Creating social media post (${explanation.length} chars input)`);
      const prompt = await deps.prompts.get('social_post');

      const post = await deps.generator.generate(`${prompt}\n\n${explanation}`, {
        temperature: 0.8,
        maxTokens: 800,
      });

      logger.info(`Social media post generated (${post.length} chars)`);
      return post;
    },
  };
}
