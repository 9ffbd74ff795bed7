export interface ImapSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  mailbox: string;
}

export type GitHubCredentials =
  | { type: 'token'; token: string }
  | { type: 'app'; appId: string; privateKey: string };

export interface GitHubSettings {
  apiUrl: string;
  credentials: GitHubCredentials;
}

/**
 * Process-wide bridge configuration. Built once at startup, frozen, and
 * handed to each component.
 */
export interface BridgeConfig {
  imap: ImapSettings;
  github: GitHubSettings;
  defaultRepo: string;
  defaultBranch: string;
  /** Lower-cased sender addresses */
  senderWhitelist: ReadonlySet<string>;
  /** Lower-cased owner/repo identifiers */
  repoWhitelist: ReadonlySet<string>;
  mtaHostname: string;
  pollIntervalSeconds?: number;
  telemetryEnabled: boolean;
}
