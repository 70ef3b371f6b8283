import { Configuration, LogLevel, ProxyConfiguration, log } from 'crawlee';

export interface CrawlRequest {
  url: string;
  uniqueKey: string;
  userData: { key: string };
}

export interface CrawlRunner {
  run: (requests: CrawlRequest[]) => Promise<unknown>;
}

export interface CrawlTarget<T> {
  crawler: CrawlRunner;
  results: Map<string, T>;
}

/** Crawlee logs every run start and its statistics; a monitor polling every few seconds only wants warnings. */
export function quietCrawlerLogs(): void {
  log.setLevel(LogLevel.WARNING);
}

/** In-memory storage: each poll is a fresh request, nothing is kept between runs. */
export function createCrawlerConfiguration(): Configuration {
  return new Configuration({ persistStorage: false, purgeOnStart: true });
}

export function createProxyConfiguration(proxyUrl?: string): ProxyConfiguration | undefined {
  return proxyUrl ? new ProxyConfiguration({ proxyUrls: [proxyUrl] }) : undefined;
}

/**
 * Runs one request through the crawler and takes its result out of the
 * results map. `key` doubles as part of the uniqueKey so that crawlee never
 * dedupes a repeated poll of the same URL.
 */
export async function runAndTakeResult<T>(
  target: CrawlTarget<T>,
  { key, url, source }: { key: string; url: string; source: string },
): Promise<T> {
  await target.crawler.run([{ url, uniqueKey: `${url}#${key}`, userData: { key } }]);
  const result = target.results.get(key);
  target.results.delete(key);

  if (!result) {
    throw new Error(`No result for ${url} via ${source} crawler`);
  }

  return result;
}
