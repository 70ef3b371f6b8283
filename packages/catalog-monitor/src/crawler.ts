import { HttpCrawler } from 'crawlee';
import {
  TransientFetchError,
  createCrawlerConfiguration,
  createProxyConfiguration,
  errorMessage,
  generateCacheBustingToken,
  runAndTakeResult,
  type CrawlTarget,
} from '@dropwatch/shared';
import { parseProductFeed, type RawProduct } from './feed.js';

export interface FeedFetchResult {
  /** HTTP status of the feed response, 0 when the request itself failed */
  statusCode: number;
  products: RawProduct[];
  error?: TransientFetchError;
}

export function createFeedCrawler(proxyUrl?: string) {
  /** Map from request key to fetch result, populated by handlers, consumed by fetchFeed */
  const results = new Map<string, FeedFetchResult>();

  const crawler = new HttpCrawler(
    {
      proxyConfiguration: createProxyConfiguration(proxyUrl),
      additionalMimeTypes: ['application/json'],
      maxConcurrency: 1,
      maxRequestRetries: 1,
      navigationTimeoutSecs: 10,
      requestHandlerTimeoutSecs: 30,
      requestHandler: async ({ request, response, body, log }) => {
        const key = String(request.userData.key);
        const statusCode = response.statusCode ?? 0;

        // A body that isn't JSON throws here and ends up in failedRequestHandler.
        const { products, skipped } = parseProductFeed(JSON.parse(body.toString()));
        if (skipped > 0) {
          log.warning(`Skipped ${skipped} malformed products from ${request.url}`);
        }

        results.set(key, { statusCode, products });
      },
      // crawlee fails 401/403/429 (blocked) and 5xx responses before the handler runs.
      failedRequestHandler: async ({ request, log }, error) => {
        const key = String(request.userData.key);
        log.warning(`Feed request failed for ${request.url}: ${error.message}`);
        results.set(key, {
          statusCode: 0,
          products: [],
          error: new TransientFetchError(error.message, { cause: error }),
        });
      },
    },
    createCrawlerConfiguration(),
  );

  return { crawler, results };
}

/**
 * Fetches the feed once. When the direct request fails and a proxy crawler is
 * set, the same poll is repeated once through it. Never rejects: a failed
 * fetch is an empty feed with status 0.
 */
export async function fetchFeed({
  feedUrl,
  direct,
  proxy,
}: {
  feedUrl: string;
  direct: CrawlTarget<FeedFetchResult>;
  proxy?: CrawlTarget<FeedFetchResult>;
}): Promise<FeedFetchResult> {
  const key = generateCacheBustingToken();
  try {
    const result = await runAndTakeResult(direct, { key, url: feedUrl, source: 'direct' });
    if (!result.error || !proxy) {
      return result;
    }

    console.warn(`Feed ${feedUrl}: direct request failed (${result.error.message}), retrying through proxy`);
    return await runAndTakeResult(proxy, { key, url: feedUrl, source: 'proxy' });
  } catch (err) {
    return {
      statusCode: 0,
      products: [],
      error: new TransientFetchError(`Feed ${feedUrl} could not be fetched: ${errorMessage(err)}`, { cause: err }),
    };
  }
}
