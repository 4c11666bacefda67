import Parser from 'rss-parser';
import { ToolError } from '@/features/workflows/workflows.errors';
import type { ToolOfType } from '@/features/agents/agents.types';
import type { HttpClient, ToolHandler, ToolParams, ToolScope } from './tools.types';

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 100;

export interface FeedEntry {
  title: string;
  summary: string;
  link: string;
  published: string | null;
  author: string | null;
}

export interface FeedResult {
  title: string;
  link: string;
  entries: FeedEntry[];
  count: number;
}

interface CachedFeed {
  fetchedAt: number;
  title: string;
  link: string;
  entries: FeedEntry[];
}

const resolveLimit = (requested: unknown, configured: number | undefined): number => {
  const value = typeof requested === 'number' ? requested : Number(requested ?? configured ?? DEFAULT_LIMIT);
  if (!Number.isFinite(value) || value <= 0) {
    return configured ?? DEFAULT_LIMIT;
  }
  return Math.min(Math.floor(value), MAX_LIMIT);
};

export class RssToolHandler implements ToolHandler<'RSS'> {
  private readonly parser = new Parser();
  private readonly cache = new Map<string, CachedFeed>();

  constructor(
    private readonly http: HttpClient,
    private readonly now: () => number = Date.now,
  ) {}

  async invoke(tool: ToolOfType<'RSS'>, params: ToolParams, scope: ToolScope): Promise<FeedResult> {
    const { url, refreshInterval } = tool.config;
    const limit = resolveLimit(params.limit, tool.config.limit);

    const cached = this.cache.get(url);
    const fresh = cached && refreshInterval && this.now() - cached.fetchedAt < refreshInterval * 1000;
    const feed = fresh && cached ? cached : await this.fetchFeed(tool.toolId, url, scope.signal);
    if (refreshInterval && feed !== cached) {
      this.cache.set(url, feed);
    }

    const entries = feed.entries.slice(0, limit);
    return { title: feed.title, link: feed.link, entries, count: entries.length };
  }

  private async fetchFeed(toolId: string, url: string, signal?: AbortSignal): Promise<CachedFeed> {
    let body: string;
    try {
      const response = await this.http.request<string>({
        url,
        method: 'GET',
        responseType: 'text',
        headers: { Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml' },
        signal,
        validateStatus: () => true,
      });
      if (response.status < 200 || response.status >= 300) {
        throw new Error(`HTTP ${response.status}`);
      }
      body = String(response.data);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ToolError('FetchFailed', `Feed ${url} is unreachable: ${reason}`, { toolId, url });
    }

    try {
      const feed = await this.parser.parseString(body);
      return {
        fetchedAt: this.now(),
        title: feed.title ?? '',
        link: feed.link ?? url,
        entries: feed.items.map((item) => ({
          title: item.title ?? '',
          summary: item.contentSnippet ?? item.summary ?? item.content ?? '',
          link: item.link ?? '',
          published: item.isoDate ?? item.pubDate ?? null,
          author: item.creator ?? null,
        })),
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ToolError('FetchFailed', `Feed ${url} could not be parsed: ${reason}`, { toolId, url });
    }
  }
}
