import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { hasExplicitScheme } from '../utils/url.js';
import { FetchResponse, UrlResolution, WebEngine } from '../web-engine/types.js';

type FakeWebEngineOptions = {
  /** HTML by absolute URL; URLs without an entry fail as exhausted connection errors */
  pages: Record<string, string>;
  /** Bare inputs that no scheme probe can reach */
  unresolvable?: string[];
  /** Artificial latency per absolute URL, to shuffle task interleaving */
  delaysMs?: Record<string, number>;
};

/**
 * In-process stand-in for the network. Bare hosts resolve to https unless
 * listed as unresolvable; every call is recorded.
 */
export class FakeWebEngine extends WebEngine {
  readonly resolveCalls: string[] = [];
  readonly fetchCalls: string[] = [];
  cleanedUp = false;
  private readonly options: FakeWebEngineOptions;

  constructor(options: FakeWebEngineOptions) {
    super();
    this.options = options;
  }

  async resolveUrl(input: string): Promise<UrlResolution> {
    this.resolveCalls.push(input);
    const trimmed = input.trim();

    if (!trimmed || this.options.unresolvable?.includes(trimmed)) {
      return { success: false, input, error: 'no working scheme' };
    }

    if (hasExplicitScheme(trimmed)) {
      return { success: true, url: trimmed, probed: false };
    }

    return { success: true, url: `https://${trimmed}`, probed: true };
  }

  async fetchDocument(url: string): Promise<FetchResponse<CheerioAPI>> {
    this.fetchCalls.push(url);
    await this.delay(this.options.delaysMs?.[url] ?? 0);

    const html = this.options.pages[url];
    if (html === undefined) {
      return {
        success: false,
        error: 'ECONNREFUSED',
        errorClass: 'connection',
        metadata: { duration: 0, method: 'fake', attempts: 3 },
      };
    }

    return {
      success: true,
      content: cheerio.load(html),
      metadata: { duration: 0, method: 'fake', attempts: 1, responseStatus: 200 },
    };
  }

  async cleanup(): Promise<void> {
    this.cleanedUp = true;
  }

  fetchCount(url: string): number {
    return this.fetchCalls.filter((call) => call === url).length;
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
