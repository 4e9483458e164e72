import type { LanguageModel } from '../clients/types';
import type { Context } from '../core/context';
import { TaskExecutionFailedError } from '../core/errors';
import type { Task } from '../core/task';
import { getLogger } from '../utils/logger';
import { ContextKeys } from './keys';
import type { PromptBuilder } from './prompt-builder';

export const NO_SOURCES_ANSWER = 'No relevant documents were found to answer this question.';

/**
 * Answers the user query from the retrieved documents
 */
export class GenerateAnswerTask implements Task {
  readonly name = 'generate-answer';

  constructor(
    private readonly llm: LanguageModel,
    private readonly prompts: PromptBuilder
  ) {}

  async run(context: Context): Promise<void> {
    const logger = getLogger();
    const query = context.tryGet(ContextKeys.query) ?? context.get(ContextKeys.enhancedQuery);
    const documents = context.get(ContextKeys.searchResults);

    logger.info('Generating answer', { documents: documents.length });

    if (documents.length === 0) {
      context.set(ContextKeys.answer, NO_SOURCES_ANSWER);
      return;
    }

    let answer: string;
    try {
      answer = await this.llm.complete({
        system: this.prompts.getAnswerSystemPrompt(),
        prompt: this.prompts.buildAnswerPrompt(query, documents),
      });
    } catch (error) {
      throw new TaskExecutionFailedError(
        `Failed to generate answer: ${error instanceof Error ? error.message : 'unknown error'}`,
        { cause: error }
      );
    }

    context.set(ContextKeys.answer, answer);
  }
}
