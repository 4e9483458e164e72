/**
 * Prompt Builder - prompts for query enhancement and answer generation
 */

const ENHANCE_SYSTEM_PROMPT = `You are a search assistant, helping users refine their web site search queries.
You are given a user query and you need to rewrite it in a way that will maximize the number of relevant documents found in a Google search.
Output only the list of words and terms, no other text, no commas or other punctuation.`;

const ANSWER_SYSTEM_PROMPT = `You are a research assistant answering questions from retrieved web documents.
Use only the information in the provided sources.
If the sources do not contain the answer, say so plainly.
Keep the answer concise and cite sources as [Source N].`;

interface PromptBuilderOptions {
  /** Longest excerpt of a single document included in a prompt */
  maxDocumentChars?: number;
  /** Budget for all document excerpts, in estimated tokens */
  maxContextTokens?: number;
}

export class PromptBuilder {
  private maxDocumentChars: number;
  private maxContextTokens: number;

  constructor(options: PromptBuilderOptions = {}) {
    this.maxDocumentChars = options.maxDocumentChars ?? 4000;
    this.maxContextTokens = options.maxContextTokens ?? 12000;
  }

  getEnhanceSystemPrompt(): string {
    return ENHANCE_SYSTEM_PROMPT;
  }

  getAnswerSystemPrompt(): string {
    return ANSWER_SYSTEM_PROMPT;
  }

  buildEnhancePrompt(query: string): string {
    return `User query:\n${query.trim()}`;
  }

  /**
   * Build the answer prompt. Documents are truncated to `maxDocumentChars`
   * and dropped once the context budget is spent.
   */
  buildAnswerPrompt(query: string, documents: string[]): string {
    const sections: string[] = [];

    sections.push('## Question');
    sections.push(query.trim());
    sections.push('');

    sections.push('## Sources');
    let usedTokens = 0;
    let included = 0;
    for (const document of documents) {
      const excerpt =
        document.length > this.maxDocumentChars
          ? document.substring(0, this.maxDocumentChars) + '...'
          : document;
      const tokens = this.estimateTokensFast(excerpt);
      if (included > 0 && usedTokens + tokens > this.maxContextTokens) {
        break;
      }

      included++;
      usedTokens += tokens;
      sections.push(`### Source ${included}`);
      sections.push(excerpt);
      sections.push('');
    }

    sections.push('---');
    sections.push('Answer the question using the sources above.');

    return sections.join('\n');
  }

  /**
   * Quick estimate using character-based heuristic
   */
  estimateTokensFast(text: string): number {
    return Math.ceil(text.length / 4);
  }
}

/**
 * Turn a model's rewrite into a single line of search terms
 */
export function normalizeSearchTerms(text: string): string {
  return text
    .replace(/["'`,;]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}
