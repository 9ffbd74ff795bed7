import * as fs from 'fs';
import * as yaml from 'yaml';
import { BridgeConfig, GitHubCredentials } from '../types';
import { parseAddressList, RawBridgeSettings, validateBridgeConfig } from './validate-config';

export type Env = Record<string, string | undefined>;

/**
 * YAML keys accepted in the file named by BRIDGE_CONFIG_PATH, and the
 * environment variable each one stands in for
 */
const FILE_KEYS: Record<string, string> = {
  sender_whitelist: 'SENDER_WHITELIST',
  repo_whitelist: 'REPO_WHITELIST',
  default_repo: 'DEFAULT_GITHUB_REPO_NAME',
  default_branch: 'DEFAULT_BRANCH',
  mailbox: 'IMAP_MAILBOX',
};

/**
 * GitHub Codespaces reserves the GITHUB_* prefix, so GH_* is accepted too
 */
const ENV_ALIASES: Array<[string, string]> = [
  ['GH_TOKEN', 'GITHUB_TOKEN'],
  ['GH_APP_ID', 'GITHUB_APP_ID'],
  ['GH_APP_PRIVATE_KEY', 'GITHUB_APP_PRIVATE_KEY'],
];

/**
 * Read the optional YAML config file
 */
export function loadConfigFile(configPath: string): RawBridgeSettings {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Bridge config not found: ${configPath}`);
  }

  const parsed: unknown = yaml.parse(fs.readFileSync(configPath, 'utf8'));
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Bridge config ${configPath} must be a mapping`);
  }

  const settings: RawBridgeSettings = {};
  for (const [key, value] of Object.entries(parsed)) {
    const envKey = FILE_KEYS[key];
    if (!envKey) {
      console.warn(`[Config] Ignoring unknown key "${key}" in ${configPath}`);
      continue;
    }
    settings[envKey] = value;
  }
  return settings;
}

/**
 * Merge file settings with the environment; environment values win
 */
export function collectSettings(env: Env): RawBridgeSettings {
  const fileSettings = env.BRIDGE_CONFIG_PATH ? loadConfigFile(env.BRIDGE_CONFIG_PATH) : {};
  const settings: RawBridgeSettings = { ...fileSettings };

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      settings[key] = value;
    }
  }

  for (const [alias, name] of ENV_ALIASES) {
    if (settings[name] === undefined && settings[alias] !== undefined) {
      settings[name] = settings[alias];
    }
  }

  // Private key from file (local development)
  const keyPath = settings.GITHUB_APP_PRIVATE_KEY_PATH;
  if (settings.GITHUB_APP_PRIVATE_KEY === undefined && typeof keyPath === 'string') {
    if (!fs.existsSync(keyPath)) {
      throw new Error(`Private key file not found: ${keyPath}`);
    }
    settings.GITHUB_APP_PRIVATE_KEY = fs.readFileSync(keyPath, 'utf8');
  }

  return settings;
}

function str(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

/**
 * Build the bridge configuration from the environment (and the YAML file
 * it points to). Throws listing every problem when invalid.
 */
export function loadBridgeConfig(env: Env = process.env): BridgeConfig {
  const raw = collectSettings(env);
  const validation = validateBridgeConfig(raw);
  if (!validation.valid) {
    const details = validation.errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n');
    throw new Error(`Invalid bridge configuration:\n${details}`);
  }

  const defaultRepo = str(raw.DEFAULT_GITHUB_REPO_NAME, '');
  const repoWhitelist =
    raw.REPO_WHITELIST !== undefined ? parseAddressList(raw.REPO_WHITELIST) : [defaultRepo.toLowerCase()];

  const credentials: GitHubCredentials = str(raw.GITHUB_TOKEN, '')
    ? { type: 'token', token: str(raw.GITHUB_TOKEN, '') }
    : { type: 'app', appId: str(raw.GITHUB_APP_ID, ''), privateKey: str(raw.GITHUB_APP_PRIVATE_KEY, '') };

  const secure = str(raw.IMAP_SECURE, 'true').toLowerCase();
  const interval = raw.POLL_INTERVAL_SECONDS;

  const config: BridgeConfig = {
    imap: Object.freeze({
      host: str(raw.IMAP_SERVER, ''),
      port: Number(str(raw.IMAP_PORT, '993')),
      secure: secure === 'true' || secure === '1',
      user: str(raw.EMAIL_ACCOUNT, ''),
      password: str(raw.EMAIL_PASSWORD, ''),
      mailbox: str(raw.IMAP_MAILBOX, 'INBOX'),
    }),
    github: Object.freeze({
      apiUrl: str(raw.GITHUB_API_URL, 'https://api.github.com'),
      credentials: Object.freeze(credentials),
    }),
    defaultRepo,
    defaultBranch: str(raw.DEFAULT_BRANCH, 'main'),
    senderWhitelist: new Set(parseAddressList(raw.SENDER_WHITELIST)),
    repoWhitelist: new Set(repoWhitelist),
    mtaHostname: str(raw.MTA_HOSTNAME, 'localhost'),
    ...(interval !== undefined ? { pollIntervalSeconds: Number(interval) } : {}),
    telemetryEnabled: raw.BRIDGE_ENABLE_TELEMETRY === '1',
  };

  return Object.freeze(config);
}
