import {
  DiscordNotifier,
  DrizzleIdentityStore,
  abortOnSignals,
  createDatabase,
  createShutdownHandler,
  ensureSchema,
  errorMessage,
  quietCrawlerLogs,
  runPollLoop,
} from '@dropwatch/shared';
import { loadConfig } from './config.js';
import { createFeedCrawler, fetchFeed } from './crawler.js';
import { runCatalogCycle } from './cycle.js';
import { normalizeProduct } from './normalize.js';
import { buildProductEmbed } from './notifications.js';

async function main() {
  const config = loadConfig();
  quietCrawlerLogs();

  console.log('Starting catalog monitor...');
  const database = createDatabase(config.databaseUrl);
  try {
    await ensureSchema(database.db);
  } catch (err) {
    console.error(`Database error: ${errorMessage(err)}`);
    console.error('Database connection failed. Exiting.');
    await database.close().catch(() => undefined);
    process.exitCode = 1;
    return;
  }

  const store = new DrizzleIdentityStore(database.db, config.storeNamespace);
  const notifier = new DiscordNotifier({
    webhookUrl: config.discordWebhookUrl,
    username: config.monitorName,
    avatarUrl: config.monitorAvatarUrl,
    format: (item) =>
      buildProductEmbed(item, {
        sourceLabel: config.sourceLabel,
        sizeUnit: config.sizeUnit,
        footerText: config.monitorName,
        iconUrl: config.monitorAvatarUrl,
      }),
  });

  const direct = createFeedCrawler();
  const proxy = config.proxyUrl ? createFeedCrawler(config.proxyUrl) : undefined;
  const controller = abortOnSignals();

  console.log(`Monitor running on ${config.feedUrl}...`);
  await runPollLoop({
    name: 'Catalog monitor',
    signal: controller.signal,
    delayMs: config.pollDelayMs,
    maxDelayMs: config.backoffMaxMs,
    jitterRatio: config.backoffJitter,
    runCycle: () =>
      runCatalogCycle({
        fetchFeed: () => fetchFeed({ feedUrl: config.feedUrl, direct, proxy }),
        normalize: (raw) => normalizeProduct(raw, { storeUrl: config.storeUrl }),
        store,
        notifier,
      }),
  });

  const shutdown = createShutdownHandler([
    { name: 'database', close: database.close },
    { name: 'discord webhook', close: () => notifier.close() },
    { name: 'feed crawler', close: () => direct.crawler.teardown() },
    ...(proxy ? [{ name: 'proxy feed crawler', close: () => proxy.crawler.teardown() }] : []),
  ]);
  await shutdown();
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
