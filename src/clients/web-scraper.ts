/**
 * Web Scraper - fetches a page and reduces it to its visible text
 */

import * as cheerio from 'cheerio';
import type { ScraperConfig } from '../types';
import { sleep } from '../utils/backoff';
import { getLogger } from '../utils/logger';
import { ClientError, type FetchFn, type PageScraper } from './types';

/** Regions tried in order before falling back to the whole document */
const CONTENT_SELECTORS = ['main', 'article', '.content', '#content', '.main'];

/** A content region is used only when its text exceeds this many UTF-8 bytes */
const MIN_REGION_BYTES = 100;

const HIDDEN_ELEMENTS = 'head, script, style, noscript, template, svg';

const BLOCK_ELEMENTS =
  'p, div, li, ul, ol, h1, h2, h3, h4, h5, h6, tr, table, section, article, main, nav, aside, header, footer, blockquote';

/**
 * Length of a string in UTF-8 bytes
 */
export function utf8Length(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/**
 * Trim every line and drop those of two UTF-8 bytes or fewer
 */
function cleanText(text: string): string {
  return text
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => utf8Length(line) > 2)
    .join('\n');
}

/**
 * Visible text of an HTML document. The first `main`, `article`, `.content`,
 * `#content` or `.main` element with enough text wins; otherwise the whole
 * document is used. Block elements become line breaks.
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);

  $(HIDDEN_ELEMENTS).remove();
  $('br').replaceWith('\n');
  $(BLOCK_ELEMENTS).each((_, element) => {
    $(element).prepend('\n').append('\n');
  });

  for (const selector of CONTENT_SELECTORS) {
    for (const element of $(selector).toArray()) {
      const text = $(element).text();
      if (utf8Length(text.trim()) > MIN_REGION_BYTES) {
        return cleanText(text);
      }
    }
  }

  return cleanText($.root().text());
}

export class WebScraper implements PageScraper {
  private config: ScraperConfig;
  private fetchFn: FetchFn;

  constructor(config: ScraperConfig, fetchFn: FetchFn = fetch) {
    this.config = config;
    this.fetchFn = fetchFn;
  }

  async scrapeText(url: string): Promise<string> {
    const logger = getLogger();

    if (this.config.politenessDelayMs > 0) {
      await sleep(this.config.politenessDelayMs);
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
        redirect: 'follow',
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new ClientError('SCRAPE_FAILED', `Failed to fetch ${url}: ${error instanceof Error ? error.message : 'unknown error'}`, {
        retryable: true,
        cause: error,
      });
    }

    if (!response.ok) {
      throw new ClientError('SCRAPE_FAILED', `Failed to fetch ${url}: status ${response.status}`, {
        status: response.status,
        retryable: response.status >= 500,
      });
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType && !contentType.includes('html')) {
      logger.warn('Skipping non-HTML response', { url, contentType });
      return '';
    }

    const text = htmlToText(await response.text());
    logger.debug('Scraped page', { url, characters: text.length });
    return text;
  }
}
