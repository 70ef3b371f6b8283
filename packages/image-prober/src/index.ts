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
import { ProbeCursor } from './cursor.js';
import { runProbeCycle } from './cycle.js';
import { buildImageEmbed } from './notifications.js';
import { createProbeCrawler, probeImage } from './probe.js';

async function main() {
  const config = loadConfig();
  quietCrawlerLogs();

  console.log('Starting image prober...');
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
      buildImageEmbed(item, {
        sourceLabel: config.sourceLabel,
        footerText: config.monitorName,
        iconUrl: config.monitorAvatarUrl,
      }),
  });

  const target = createProbeCrawler(config.proxyUrl);
  const cursor = new ProbeCursor(config.startId, config.endId);
  const controller = abortOnSignals();

  console.log(`Prober running on ids ${config.startId} - ${config.endId}...`);
  await runPollLoop({
    name: 'Image prober',
    signal: controller.signal,
    delayMs: config.pollDelayMs,
    maxDelayMs: config.backoffMaxMs,
    jitterRatio: config.backoffJitter,
    runCycle: () =>
      runProbeCycle({
        cursor,
        probe: (id) => probeImage({ id, urlTemplate: config.urlTemplate, target }),
        store,
        notifier,
      }),
  });

  const shutdown = createShutdownHandler([
    { name: 'database', close: database.close },
    { name: 'discord webhook', close: () => notifier.close() },
    { name: 'probe crawler', close: () => target.crawler.teardown() },
  ]);
  await shutdown();
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
