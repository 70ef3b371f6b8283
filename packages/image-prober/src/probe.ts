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

export interface ProbeResult {
  found: boolean;
  /** HTTP status, 0 when the request itself failed */
  statusCode: number;
  /** URL that was actually fetched, after redirects */
  url: string;
  error?: TransientFetchError;
}

// Any content type reaches the handler; `isImageResponse` decides what counts.
const ANY_MIME_TYPE = ['*/*'];

// crawlee throws on 5xx before the handler runs. For a probe that is just "not there yet".
const SERVER_ERROR_STATUS_CODES = Array.from({ length: 100 }, (_, i) => 500 + i);

export function buildProbeUrl(urlTemplate: string, id: number, token: string): string {
  return urlTemplate.replaceAll('{id}', String(id)).replaceAll('{token}', token);
}

export function isImageResponse(statusCode: number, contentType: string | undefined): boolean {
  return statusCode === 200 && (contentType ?? '').toLowerCase().includes('image');
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function createProbeCrawler(proxyUrl?: string) {
  /** Map from probed id to result, populated by handlers, consumed by probeImage */
  const results = new Map<string, ProbeResult>();

  const crawler = new HttpCrawler(
    {
      proxyConfiguration: createProxyConfiguration(proxyUrl),
      additionalMimeTypes: ANY_MIME_TYPE,
      ignoreHttpErrorStatusCodes: SERVER_ERROR_STATUS_CODES,
      // CDNs answer 403 for objects that don't exist yet; that must not retire the session.
      sessionPoolOptions: { blockedStatusCodes: [] },
      maxConcurrency: 1,
      // A missing image is the normal case; retrying it would only double the requests.
      maxRequestRetries: 0,
      navigationTimeoutSecs: 10,
      requestHandlerTimeoutSecs: 30,
      requestHandler: async ({ request, response }) => {
        const statusCode = response.statusCode ?? 0;
        results.set(String(request.userData.key), {
          found: isImageResponse(statusCode, headerValue(response.headers['content-type'])),
          statusCode,
          url: request.loadedUrl ?? request.url,
        });
      },
      failedRequestHandler: async ({ request, response }, error) => {
        const key = String(request.userData.key);
        // The server answered, but crawlee refused the response afterwards.
        if (response?.statusCode) {
          results.set(key, {
            found: isImageResponse(response.statusCode, headerValue(response.headers['content-type'])),
            statusCode: response.statusCode,
            url: request.loadedUrl ?? request.url,
          });
          return;
        }

        results.set(key, {
          found: false,
          statusCode: 0,
          url: request.url,
          error: new TransientFetchError(error.message, { cause: error }),
        });
      },
    },
    createCrawlerConfiguration(),
  );

  return { crawler, results };
}

/**
 * Requests one id with a fresh cache-busting token. Never rejects: anything
 * other than an image response means "not published yet".
 */
export async function probeImage({
  id,
  urlTemplate,
  target,
  token = generateCacheBustingToken(),
}: {
  id: number;
  urlTemplate: string;
  target: CrawlTarget<ProbeResult>;
  token?: string;
}): Promise<ProbeResult> {
  const url = buildProbeUrl(urlTemplate, id, token);
  try {
    return await runAndTakeResult(target, { key: String(id), url, source: 'probe' });
  } catch (err) {
    return {
      found: false,
      statusCode: 0,
      url,
      error: new TransientFetchError(`Image fetch error for ID ${id}: ${errorMessage(err)}`, { cause: err }),
    };
  }
}
