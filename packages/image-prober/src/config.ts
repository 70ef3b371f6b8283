import { optional, optionalNumber, required, requiredInteger, WEBHOOK_PLACEHOLDERS, type Env } from '@dropwatch/shared';

export interface ImageProberConfig {
  databaseUrl: string;
  /** CDN URL with `{id}` and `{token}` placeholders */
  urlTemplate: string;
  startId: number;
  endId: number;
  storeNamespace: string;
  discordWebhookUrl: string;
  pollDelayMs: number;
  backoffMaxMs: number;
  backoffJitter: number;
  proxyUrl: string | undefined;
  sourceLabel: string;
  monitorName: string;
  monitorAvatarUrl: string | undefined;
}

export function loadConfig(env: Env = process.env): Readonly<ImageProberConfig> {
  const urlTemplate = required(env, 'PROBE_URL_TEMPLATE');
  if (!urlTemplate.includes('{id}')) {
    throw new Error('PROBE_URL_TEMPLATE must contain an {id} placeholder');
  }

  const startId = requiredInteger(env, 'PROBE_START_ID');
  const endId = requiredInteger(env, 'PROBE_END_ID');
  if (startId > endId) {
    throw new Error(`PROBE_START_ID (${startId}) must not be greater than PROBE_END_ID (${endId})`);
  }

  return Object.freeze({
    databaseUrl: required(env, 'DATABASE_URL'),
    urlTemplate,
    startId,
    endId,
    storeNamespace: optional(env, 'STORE_NAMESPACE', 'images'),
    discordWebhookUrl: optional(env, 'DISCORD_WEBHOOK_URL', WEBHOOK_PLACEHOLDERS[0]),
    pollDelayMs: optionalNumber(env, 'POLL_DELAY_SECONDS', 1) * 1000,
    backoffMaxMs: optionalNumber(env, 'BACKOFF_MAX_SECONDS', 60) * 1000,
    backoffJitter: optionalNumber(env, 'BACKOFF_JITTER', 0.2),
    proxyUrl: env.PROXY_URL || undefined,
    sourceLabel: optional(env, 'SOURCE_LABEL', templateHost(urlTemplate)),
    monitorName: optional(env, 'MONITOR_NAME', 'Image Prober'),
    monitorAvatarUrl: env.MONITOR_AVATAR_URL || undefined,
  });
}

function templateHost(urlTemplate: string): string {
  try {
    return new URL(urlTemplate.replace('{id}', '0').replace('{token}', '')).hostname;
  } catch {
    throw new Error(`PROBE_URL_TEMPLATE is not a valid URL: "${urlTemplate}"`);
  }
}
