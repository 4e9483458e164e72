/**
 * Context keys shared by the answer workflow's tasks
 */

import { z } from 'zod';
import { defineKey } from '../core/context';

export const ContextKeys = {
  query: defineKey('query', z.string()),
  enhancedQuery: defineKey('enhanced_query', z.string()),
  searchResults: defineKey('search_results', z.array(z.string())),
  answer: defineKey('answer', z.string()),
} as const;
