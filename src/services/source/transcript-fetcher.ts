/**
 * Transcript Fetcher
 * Downloads transcript pages and reads local transcript files as plain text
 */

import axios, { type AxiosInstance } from 'axios';
import { extractFromHtml } from '@extractus/article-extractor';
import { promises as fs } from 'fs';
import path from 'path';
import { createLogger } from '../logging/logger.js';
import { loggers } from '../logging/log-helpers.js';
import { TranscriptFetchError } from '../validation/errors.js';
import { htmlToText } from './html-text.js';

const logger = createLogger({ module: 'transcript-fetcher' });

export interface FetchedTranscript {
  /** URL or file path the text came from */
  source: string;
  title: string;
  /** Line-oriented plain text */
  text: string;
  fetchedAt: Date;
}

export interface TranscriptFetcherConfig {
  /** Maximum time to wait for a download (ms) */
  timeoutMs: number;
  userAgent: string;
}

export interface FetchTranscriptOptions {
  /**
   * Narrow the page to its main article body before conversion.
   * Falls back to the whole page when nothing is extracted.
   */
  extractMainContent?: boolean;
}

export const DEFAULT_FETCHER_CONFIG: TranscriptFetcherConfig = {
  timeoutMs: 15000,
  userAgent: 'debate-sentiment/0.1',
};

function titleOf(html: string): string {
  const match = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  return match?.[1] ? htmlToText(match[1]) : '';
}

export class TranscriptFetcher {
  private config: TranscriptFetcherConfig;
  private client: AxiosInstance;

  constructor(config?: Partial<TranscriptFetcherConfig>) {
    this.config = { ...DEFAULT_FETCHER_CONFIG, ...config };
    this.client = axios.create({
      timeout: this.config.timeoutMs,
      responseType: 'text',
      headers: {
        'User-Agent': this.config.userAgent,
        Accept: 'text/html,application/xhtml+xml,text/plain',
      },
    });
  }

  /**
   * Download a page and return its raw HTML
   */
  async fetchHtml(url: string): Promise<string> {
    try {
      new URL(url);
    } catch {
      throw new TranscriptFetchError(url, `Invalid URL: ${url}`);
    }

    const startTime = Date.now();
    try {
      const response = await this.client.get<string>(url);
      const html = typeof response.data === 'string' ? response.data : String(response.data);

      loggers.fetch({
        url,
        status: response.status,
        latency_ms: Date.now() - startTime,
        bytes: Buffer.byteLength(html, 'utf8'),
        success: true,
      });

      return html;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      const message = error instanceof Error ? error.message : String(error);

      loggers.fetch({
        url,
        status,
        latency_ms: Date.now() - startTime,
        success: false,
        error: message,
      });

      throw new TranscriptFetchError(url, `Failed to fetch ${url}: ${message}`, status);
    }
  }

  /**
   * Download a transcript page and convert it to line-oriented text
   */
  async fetchTranscript(
    url: string,
    options: FetchTranscriptOptions = {}
  ): Promise<FetchedTranscript> {
    const html = await this.fetchHtml(url);
    let body = html;
    let title = titleOf(html);

    if (options.extractMainContent) {
      const article = await extractFromHtml(html, url);
      if (article?.content) {
        body = article.content;
        title = article.title || title;
      } else {
        logger.warn({ url }, 'No main content extracted, using the whole page');
      }
    }

    const text = htmlToText(body);
    logger.debug({ url, title, characters: text.length }, 'Transcript text extracted');

    return { source: url, title, text, fetchedAt: new Date() };
  }
}

/**
 * Read a transcript from disk. HTML files are converted to text.
 */
export async function readTranscriptFile(filePath: string): Promise<FetchedTranscript> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TranscriptFetchError(filePath, `Failed to read ${filePath}: ${message}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  const isHtml = ext === '.html' || ext === '.htm';

  return {
    source: filePath,
    title: isHtml ? titleOf(raw) || path.basename(filePath) : path.basename(filePath),
    text: isHtml ? htmlToText(raw) : raw,
    fetchedAt: new Date(),
  };
}

/**
 * Create a fetcher with optional configuration overrides
 */
export function createTranscriptFetcher(
  config?: Partial<TranscriptFetcherConfig>
): TranscriptFetcher {
  return new TranscriptFetcher(config);
}
