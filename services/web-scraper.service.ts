import fetch, { Response } from 'node-fetch';
import { JSDOM } from 'jsdom';

export interface FetchedPage {
  html: string;
  statusCode: number;
}

interface OutgoingRequest {
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
}

async function readPage(response: Response): Promise<FetchedPage> {
  return { html: await response.text(), statusCode: response.status };
}

export type PageClient = Pick<WebScraperService, 'fetchPage' | 'submitForm' | 'fetchJson' | 'parseDocument'>;

export class WebScraperService {
  constructor(
    private userAgent: string,
    private timeoutMs: number = 10000
  ) {}

  async fetchPage(url: string, timeoutMs: number = this.timeoutMs): Promise<FetchedPage> {
    return this.request(url, { method: 'GET' }, timeoutMs, readPage);
  }

  async submitForm(
    url: string,
    form: Record<string, string>,
    timeoutMs: number = this.timeoutMs
  ): Promise<FetchedPage> {
    return this.request(
      url,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams(form).toString(),
      },
      timeoutMs,
      readPage
    );
  }

  async fetchJson(url: string, timeoutMs: number = this.timeoutMs): Promise<unknown> {
    return this.request(
      url,
      { method: 'GET', headers: { Accept: 'application/json' } },
      timeoutMs,
      (response): Promise<unknown> => response.json()
    );
  }

  parseDocument(html: string, url?: string): Document {
    const dom = new JSDOM(html, { url });
    return dom.window.document;
  }

  /** The timeout covers the body as well as the headers. */
  private async request<T>(
    url: string,
    init: OutgoingRequest,
    timeoutMs: number,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: init.method,
        body: init.body,
        headers: {
          'User-Agent': this.userAgent,
          'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
          ...init.headers,
        },
        signal: controller.signal,
        follow: 5,
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      return await read(response);
    } finally {
      clearTimeout(timeout);
    }
  }
}
