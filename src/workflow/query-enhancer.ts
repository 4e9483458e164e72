import type { LanguageModel } from '../clients/types';
import type { Context } from '../core/context';
import { TaskExecutionFailedError } from '../core/errors';
import type { Task } from '../core/task';
import { getLogger } from '../utils/logger';
import { ContextKeys } from './keys';
import { normalizeSearchTerms, type PromptBuilder } from './prompt-builder';

/**
 * Stores the user query and its rewrite into search terms
 */
export class QueryEnhanceTask implements Task {
  readonly name = 'enhance-query';

  constructor(
    private readonly query: string,
    private readonly llm: LanguageModel,
    private readonly prompts: PromptBuilder
  ) {}

  async run(context: Context): Promise<void> {
    const logger = getLogger();
    context.set(ContextKeys.query, this.query);

    let completion: string;
    try {
      completion = await this.llm.complete({
        system: this.prompts.getEnhanceSystemPrompt(),
        prompt: this.prompts.buildEnhancePrompt(this.query),
      });
    } catch (error) {
      throw new TaskExecutionFailedError(
        `Failed to enhance query: ${error instanceof Error ? error.message : 'unknown error'}`,
        { cause: error }
      );
    }

    let enhancedQuery = normalizeSearchTerms(completion);
    if (!enhancedQuery) {
      logger.warn('Enhanced query was empty, falling back to the original query');
      enhancedQuery = normalizeSearchTerms(this.query);
    }

    logger.info('Enhanced query', { enhancedQuery });
    context.set(ContextKeys.enhancedQuery, enhancedQuery);
  }
}
