import { createServer, type Server } from 'node:http';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { TransientFetchError, quietCrawlerLogs } from '@dropwatch/shared';
import { createFeedCrawler, fetchFeed } from '../crawler.js';

const feedBody = JSON.stringify({
  products: [
    {
      id: 101,
      handle: 'trail-runner',
      title: 'Trail Runner',
      variants: [{ id: 5001, title: '10.5', price: '120.00' }],
    },
    { title: 'record without an id' },
  ],
});

function startShop(): Promise<Server> {
  const server = createServer((req, res) => {
    const path = (req.url ?? '').split('?')[0];
    if (path === '/products.json') {
      res.writeHead(200, { 'content-type': 'application/json' });
      res.end(feedBody);
    } else if (path === '/maintenance.json') {
      res.writeHead(200, { 'content-type': 'text/html' });
      res.end('<html><body>Back soon</body></html>');
    } else {
      res.writeHead(500, { 'content-type': 'text/html' });
      res.end('<html><body>Oops</body></html>');
    }
  });
  return new Promise((resolve) => server.listen(0, '127.0.0.1', () => resolve(server)));
}

describe('createFeedCrawler', { timeout: 30_000 }, () => {
  let server: Server;
  let baseUrl: string;
  const direct = createFeedCrawler();

  beforeAll(async () => {
    quietCrawlerLogs();
    server = await startShop();
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('shop server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await direct.crawler.teardown();
    await new Promise((resolve) => server.close(resolve));
  });

  it('reads the products of a JSON feed and skips records without an id', async () => {
    const result = await fetchFeed({ feedUrl: `${baseUrl}/products.json`, direct });

    expect(result).toEqual({
      statusCode: 200,
      products: [
        {
          id: '101',
          handle: 'trail-runner',
          title: 'Trail Runner',
          variants: [{ id: '5001', title: '10.5', price: '120.00' }],
        },
      ],
    });
  });

  it('turns a body that is not JSON into an empty failed fetch', async () => {
    const result = await fetchFeed({ feedUrl: `${baseUrl}/maintenance.json`, direct });

    expect(result.statusCode).toBe(0);
    expect(result.products).toEqual([]);
    expect(result.error).toBeInstanceOf(TransientFetchError);
  });

  it('turns a server error into an empty failed fetch', async () => {
    const result = await fetchFeed({ feedUrl: `${baseUrl}/down.json`, direct });

    expect(result.statusCode).toBe(0);
    expect(result.products).toEqual([]);
    expect(result.error).toBeInstanceOf(TransientFetchError);
  });
});
