/**
 * Research tool set
 */

import type { ArxivClient } from '../clients/arxiv.js';
import type { CrossRefClient } from '../clients/crossref.js';
import { RateLimiter } from '../clients/rate-limiter.js';
import type { SemanticScholarClient } from '../clients/semantic-scholar.js';
import type { Config } from '../config.js';
import type { ImageGenerator, TextGenerator } from '../llm/generator.js';
import type { StructuredLogger } from '../observability/logger.js';
import type { PromptStore } from '../prompts/store.js';
import { ClaimVerifier } from './claim-verifier.js';
import { createExplainerTool } from './explainer.js';
import { createInfographicTool } from './infographic.js';
import { createPaperSearchTool } from './paper-search.js';
import { createPdfProcessorTool, type PdfTextExtractor } from './pdf-processor.js';
import { createRecommenderTool } from './recommender.js';
import { ReferenceValidator } from './reference-validator.js';
import type { ToolRegistry } from './registry.js';
import { createSocialPostTool } from './social-post.js';
import { createSourceVerifierTool } from './source-verifier.js';

/** Calls per second to the literature APIs during verification */
const REFERENCE_RATE = 2;
const CLAIM_RATE = 1.5;

export interface ResearchToolDeps {
  generator: TextGenerator;
  imageGenerator?: ImageGenerator;
  prompts: PromptStore;
  arxiv: Pick<ArxivClient, 'search'>;
  semanticScholar: Pick<SemanticScholarClient, 'searchPapers' | 'getPaperByDoi' | 'getRecommendations'>;
  crossref: Pick<CrossRefClient, 'getByDoi' | 'searchByTitle'>;
  logger: StructuredLogger;
  settings: Pick<Config, 'maxPdfChars' | 'infographicsDir' | 'infographicFallback'>;
  pdfExtractor?: PdfTextExtractor;
}

/**
 * Register every research tool, in the order they are offered to the model
 */
export function registerResearchTools(registry: ToolRegistry, deps: ResearchToolDeps): void {
  const logger = deps.logger.child('tools');
  const { generator, prompts, semanticScholar } = deps;

  registry.register(createPaperSearchTool({ arxiv: deps.arxiv, generator, logger }));
  registry.register(createExplainerTool({ generator, prompts, logger }));
  registry.register(createSocialPostTool({ generator, prompts, logger }));
  registry.register(
    createPdfProcessorTool({
      generator,
      logger,
      maxChars: deps.settings.maxPdfChars,
      extractor: deps.pdfExtractor,
    })
  );
  registry.register(
    createInfographicTool({
      generator,
      prompts,
      logger,
      outputDir: deps.settings.infographicsDir,
      fallback: deps.settings.infographicFallback,
      imageGenerator: deps.imageGenerator,
    })
  );

  const verificationLogger = logger.child('verification');
  registry.register(
    createSourceVerifierTool({
      generator,
      prompts,
      logger,
      referenceValidator: new ReferenceValidator({
        semanticScholar,
        crossref: deps.crossref,
        rateLimiter: new RateLimiter(REFERENCE_RATE),
        logger: verificationLogger,
      }),
      claimVerifier: new ClaimVerifier({
        generator,
        semanticScholar,
        prompts,
        rateLimiter: new RateLimiter(CLAIM_RATE),
        logger: verificationLogger,
      }),
    })
  );
  registry.register(createRecommenderTool({ semanticScholar, generator, logger }));
}

export { ToolRegistry } from './registry.js';
export type { ToolDefinition, ToolDescriptor, ToolPayload } from './registry.js';
