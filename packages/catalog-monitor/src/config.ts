import { optional, optionalNumber, required, WEBHOOK_PLACEHOLDERS, type Env } from '@dropwatch/shared';

export interface CatalogMonitorConfig {
  databaseUrl: string;
  feedUrl: string;
  /** Origin of the feed; product and cart links are built on it */
  storeUrl: string;
  storeNamespace: string;
  discordWebhookUrl: string;
  pollDelayMs: number;
  backoffMaxMs: number;
  backoffJitter: number;
  proxyUrl: string | undefined;
  sourceLabel: string;
  sizeUnit: string;
  monitorName: string;
  monitorAvatarUrl: string | undefined;
}

function parseUrl(name: string, value: string): URL {
  try {
    return new URL(value);
  } catch {
    throw new Error(`Env var ${name} is not a valid URL: "${value}"`);
  }
}

export function loadConfig(env: Env = process.env): Readonly<CatalogMonitorConfig> {
  const feedUrl = required(env, 'FEED_URL');
  const parsedFeedUrl = parseUrl('FEED_URL', feedUrl);

  return Object.freeze({
    databaseUrl: required(env, 'DATABASE_URL'),
    feedUrl,
    storeUrl: parsedFeedUrl.origin,
    storeNamespace: optional(env, 'STORE_NAMESPACE', 'catalog'),
    discordWebhookUrl: optional(env, 'DISCORD_WEBHOOK_URL', WEBHOOK_PLACEHOLDERS[0]),
    pollDelayMs: optionalNumber(env, 'POLL_DELAY_SECONDS', 30) * 1000,
    backoffMaxMs: optionalNumber(env, 'BACKOFF_MAX_SECONDS', 300) * 1000,
    backoffJitter: optionalNumber(env, 'BACKOFF_JITTER', 0.2),
    proxyUrl: env.PROXY_URL || undefined,
    sourceLabel: optional(env, 'SOURCE_LABEL', parsedFeedUrl.hostname),
    sizeUnit: optional(env, 'SIZE_UNIT', 'US'),
    monitorName: optional(env, 'MONITOR_NAME', 'Catalog Monitor'),
    monitorAvatarUrl: env.MONITOR_AVATAR_URL || undefined,
  });
}
