import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

/**
 * Runtime configuration, loaded from `config/siem.yaml` and overridden
 * by environment variables.
 */
export interface AppConfig {
  alerting: { enabled: boolean; cooldown_seconds: number };
  email: {
    smtp_host: string;
    smtp_port: number;
    smtp_user: string;
    smtp_pass: string;
    recipient: string;
    timeout_ms: number;
  };
  threat_feed: { path: string };
  geoip: { path: string };
}

/**
 * Default configuration: alerting disabled, 10 minute cooldown.
 */
export const DEFAULT_CONFIG: AppConfig = {
  alerting: { enabled: false, cooldown_seconds: 600 },
  email: {
    smtp_host: 'smtp.gmail.com',
    smtp_port: 587,
    smtp_user: '',
    smtp_pass: '',
    recipient: '',
    timeout_ms: 15_000,
  },
  threat_feed: { path: 'threat_feeds.txt' },
  geoip: { path: 'GeoLite2-City.mmdb' },
};

type RawConfig = Record<string, Record<string, unknown>>;

/** Environment variable → [section, key]. */
const ENV_OVERRIDES: Record<string, readonly [string, string]> = {
  SEND_EMAIL: ['alerting', 'enabled'],
  ALERT_EMAIL_COOLDOWN: ['alerting', 'cooldown_seconds'],
  SMTP_SERVER: ['email', 'smtp_host'],
  SMTP_PORT: ['email', 'smtp_port'],
  SMTP_USER: ['email', 'smtp_user'],
  SMTP_PASS: ['email', 'smtp_pass'],
  ALERT_RECIPIENT: ['email', 'recipient'],
  SMTP_TIMEOUT_MS: ['email', 'timeout_ms'],
  THREAT_FEED_FILE: ['threat_feed', 'path'],
  GEOIP_DB: ['geoip', 'path'],
};

const flag = z.preprocess(
  (v) => (v === '1' || v === 'true' ? true : v === '0' || v === 'false' ? false : v),
  z.boolean(),
);

const count = z.preprocess(
  (v) => (v === '' ? undefined : v),
  z.coerce.number().int().min(0),
);

const text = z.string();

// Every field falls back to its default on its own, so one bad value
// never discards the rest of the file.
const configSchema = z.object({
  alerting: z.object({
    enabled: flag.catch(DEFAULT_CONFIG.alerting.enabled),
    cooldown_seconds: count.catch(DEFAULT_CONFIG.alerting.cooldown_seconds),
  }),
  email: z.object({
    smtp_host: text.min(1).catch(DEFAULT_CONFIG.email.smtp_host),
    smtp_port: count.pipe(z.number().min(1).max(65535)).catch(DEFAULT_CONFIG.email.smtp_port),
    smtp_user: text.catch(DEFAULT_CONFIG.email.smtp_user),
    smtp_pass: text.catch(DEFAULT_CONFIG.email.smtp_pass),
    recipient: text.catch(DEFAULT_CONFIG.email.recipient),
    timeout_ms: count.pipe(z.number().min(1)).catch(DEFAULT_CONFIG.email.timeout_ms),
  }),
  threat_feed: z.object({ path: text.min(1).catch(DEFAULT_CONFIG.threat_feed.path) }),
  geoip: z.object({ path: text.min(1).catch(DEFAULT_CONFIG.geoip.path) }),
});

/**
 * Minimal YAML reader for the flat config structure.
 *
 * Handles only what config/siem.yaml uses: top-level section keys with
 * indented `key: value` scalars. Not a general-purpose YAML parser.
 */
export function parseSimpleYaml(content: string): RawConfig {
  const result: RawConfig = {};
  let section: Record<string, unknown> | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trimStart().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const key = line.slice(0, colonIdx).trim();

    // Top-level key (no leading whitespace) opens a section
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      section = {};
      result[key] = section;
      continue;
    }

    if (section === null) continue;

    let value: unknown = line.slice(colonIdx + 1).trim();
    if (value === 'true') {
      value = true;
    } else if (value === 'false') {
      value = false;
    } else if (typeof value === 'string' && value.length >= 2 && /^(".*"|'.*')$/.test(value)) {
      value = value.slice(1, -1);
    }

    section[key] = value;
  }

  return result;
}

function applyEnv(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  for (const [name, [section, key]] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value === undefined) continue;
    (raw[section] ??= {})[key] = value;
  }
  return raw;
}

/**
 * Loads configuration.
 *
 * Missing or unreadable file → defaults. Environment variables win over
 * file values; any field that fails validation keeps its default.
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'siem.yaml');

  let raw: RawConfig;
  try {
    raw = parseSimpleYaml(readFileSync(filePath, 'utf-8'));
  } catch {
    raw = {};
  }

  applyEnv(raw, env);

  return configSchema.parse({
    alerting: raw['alerting'] ?? {},
    email: raw['email'] ?? {},
    threat_feed: raw['threat_feed'] ?? {},
    geoip: raw['geoip'] ?? {},
  });
}
