/**
 * Validates bridge settings gathered from the environment and the optional
 * YAML config file. Keys are the environment variable names.
 */

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export type RawBridgeSettings = Record<string, unknown>;

const REPO_NAME_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

/**
 * Split a comma/whitespace separated list (or a YAML sequence) into
 * lower-cased, de-duplicated entries
 */
export function parseAddressList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : typeof value === 'string' ? value.split(/[,;\s]+/) : [];
  const entries = items
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return [...new Set(entries)];
}

export function isRepoName(value: string): boolean {
  return REPO_NAME_PATTERN.test(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isListLike(value: unknown): boolean {
  return typeof value === 'string' || (Array.isArray(value) && value.every((item) => typeof item === 'string'));
}

/**
 * Validate raw bridge settings
 */
export function validateBridgeConfig(raw: RawBridgeSettings): ValidationResult {
  const errors: ValidationError[] = [];

  // Mailbox
  for (const key of ['IMAP_SERVER', 'EMAIL_ACCOUNT', 'EMAIL_PASSWORD']) {
    if (!isNonEmptyString(raw[key])) {
      errors.push({ path: key, message: `Missing required "${key}"` });
    }
  }

  const port = raw.IMAP_PORT;
  if (port !== undefined) {
    const parsed = Number(port);
    if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
      errors.push({ path: 'IMAP_PORT', message: `Invalid port "${String(port)}"` });
    }
  }

  const secure = raw.IMAP_SECURE;
  if (secure !== undefined && !['true', 'false', '1', '0'].includes(String(secure).toLowerCase())) {
    errors.push({ path: 'IMAP_SECURE', message: 'Must be true or false' });
  }

  // Repository API credentials: a token, or a GitHub App
  const hasToken = isNonEmptyString(raw.GITHUB_TOKEN);
  const hasApp = isNonEmptyString(raw.GITHUB_APP_ID);
  if (!hasToken && !hasApp) {
    errors.push({ path: 'GITHUB_TOKEN', message: 'Set GITHUB_TOKEN or GITHUB_APP_ID with a private key' });
  }
  if (!hasToken && hasApp) {
    const key = raw.GITHUB_APP_PRIVATE_KEY;
    if (!isNonEmptyString(key)) {
      errors.push({
        path: 'GITHUB_APP_PRIVATE_KEY',
        message: 'Neither GITHUB_APP_PRIVATE_KEY nor GITHUB_APP_PRIVATE_KEY_PATH is set',
      });
    } else if (!key.includes('-----BEGIN') || !key.includes('PRIVATE KEY-----')) {
      errors.push({ path: 'GITHUB_APP_PRIVATE_KEY', message: 'Invalid private key format - expected PEM format' });
    }
  }

  // Repository defaults
  const defaultRepo = raw.DEFAULT_GITHUB_REPO_NAME;
  if (!isNonEmptyString(defaultRepo)) {
    errors.push({ path: 'DEFAULT_GITHUB_REPO_NAME', message: 'Missing required "DEFAULT_GITHUB_REPO_NAME"' });
  } else if (!isRepoName(defaultRepo.trim())) {
    errors.push({
      path: 'DEFAULT_GITHUB_REPO_NAME',
      message: `Invalid repository "${defaultRepo}" (expected owner/repo)`,
    });
  }

  if (raw.DEFAULT_BRANCH !== undefined && !isNonEmptyString(raw.DEFAULT_BRANCH)) {
    errors.push({ path: 'DEFAULT_BRANCH', message: '"DEFAULT_BRANCH" must be a non-empty string' });
  }

  // Whitelists
  if (!isListLike(raw.SENDER_WHITELIST) || parseAddressList(raw.SENDER_WHITELIST).length === 0) {
    errors.push({ path: 'SENDER_WHITELIST', message: 'At least one sender address is required' });
  } else {
    for (const address of parseAddressList(raw.SENDER_WHITELIST)) {
      if (!/^[^@\s]+@[^@\s]+$/.test(address)) {
        errors.push({ path: 'SENDER_WHITELIST', message: `Invalid email address "${address}"` });
      }
    }
  }

  if (raw.REPO_WHITELIST !== undefined) {
    if (!isListLike(raw.REPO_WHITELIST)) {
      errors.push({ path: 'REPO_WHITELIST', message: 'Must be a list of owner/repo identifiers' });
    } else {
      for (const repo of parseAddressList(raw.REPO_WHITELIST)) {
        if (!isRepoName(repo)) {
          errors.push({ path: 'REPO_WHITELIST', message: `Invalid repository "${repo}" (expected owner/repo)` });
        }
      }
    }
  }

  const interval = raw.POLL_INTERVAL_SECONDS;
  if (interval !== undefined) {
    const parsed = Number(interval);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      errors.push({ path: 'POLL_INTERVAL_SECONDS', message: 'Must be a positive number' });
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
