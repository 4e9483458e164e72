import { ClientError, type PageScraper, type SearchProvider } from '../clients/types';
import { utf8Length } from '../clients/web-scraper';
import type { Context } from '../core/context';
import { TaskExecutionFailedError } from '../core/errors';
import type { Task } from '../core/task';
import { getLogger } from '../utils/logger';
import type { OrganicResult } from '../types';
import { ContextKeys } from './keys';

const NON_SCRAPEABLE_EXTENSIONS = [
  '.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx',
  '.zip', '.rar', '.tar', '.gz', '.7z',
  '.mp3', '.mp4', '.avi', '.mov', '.wav',
  '.jpg', '.jpeg', '.png', '.gif', '.bmp', '.svg',
  '.exe', '.dmg', '.app', '.deb', '.rpm',
];

const DOWNLOAD_DOCUMENT_MARKERS = ['.doc', '.pdf', '.xls', '.ppt'];

/**
 * Whether a URL likely serves an HTML page rather than a document or media file
 */
export function isScrapeableUrl(url: string): boolean {
  const lower = url.toLowerCase();

  if (NON_SCRAPEABLE_EXTENSIONS.some((ext) => lower.endsWith(ext))) {
    return false;
  }

  if (lower.includes('/download/') && DOWNLOAD_DOCUMENT_MARKERS.some((marker) => lower.includes(marker))) {
    return false;
  }

  return true;
}

export interface DataRetrieverOptions {
  /** Scraped texts at or below this trimmed length, in UTF-8 bytes, are dropped */
  minContentLength: number;
}

/**
 * Searches for the enhanced query and stores the text of the result pages
 */
export class DataRetrieverTask implements Task {
  readonly name = 'retrieve-data';

  constructor(
    private readonly search: SearchProvider,
    private readonly scraper: PageScraper,
    private readonly options: DataRetrieverOptions
  ) {}

  async run(context: Context): Promise<void> {
    const logger = getLogger();
    const query = context.get(ContextKeys.enhancedQuery);

    logger.info('Retrieving data', { query });

    let organic: OrganicResult[];
    try {
      ({ organic } = await this.search.search(query));
    } catch (error) {
      throw new TaskExecutionFailedError(
        `Failed to retrieve data: ${error instanceof Error ? error.message : 'unknown error'}`,
        { cause: error, retryable: error instanceof ClientError && error.retryable }
      );
    }

    logger.info('Retrieved search results', { count: organic.length });

    const scrapeable = organic.filter((result) => {
      const ok = isScrapeableUrl(result.link);
      if (!ok) {
        logger.warn('Skipping non-scrapeable URL', { url: result.link, title: result.title });
      }
      return ok;
    });

    if (scrapeable.length === 0) {
      logger.warn('No scrapeable URLs found in search results');
      context.set(ContextKeys.searchResults, []);
      return;
    }

    const settled = await Promise.allSettled(scrapeable.map((result) => this.scraper.scrapeText(result.link)));

    const texts: string[] = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        texts.push(outcome.value);
      } else {
        logger.warn('Failed to scrape URL', {
          url: scrapeable[index].link,
          error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
        });
      }
    });

    if (texts.length === 0) {
      throw new TaskExecutionFailedError(`Failed to scrape all ${scrapeable.length} result pages`);
    }

    const substantial = texts.filter((text) => utf8Length(text.trim()) > this.options.minContentLength);
    logger.info('Scraped result pages', { scraped: texts.length, substantial: substantial.length });

    context.set(ContextKeys.searchResults, substantial);
  }
}
