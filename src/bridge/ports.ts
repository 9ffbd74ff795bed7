/**
 * Capabilities the bridge consumes. Concrete adapters live under src/mail
 * and src/github; tests provide in-memory versions.
 */

export interface MailSource {
  /** Identifiers of unread messages, in mailbox order */
  listUnread(): Promise<string[]>;
  /**
   * Raw RFC 822 bytes of a message, or null when it no longer exists.
   * Fetching marks the message as read.
   */
  fetch(messageId: string): Promise<Buffer | null>;
}

/** `unknown` when the SPF lookup itself errored (temperror, permerror) */
export type SpfCheckResult = 'pass' | 'softfail' | 'fail' | 'unknown';

export interface SpfVerifier {
  verify(ip: string, domain: string, sender: string): Promise<SpfCheckResult>;
}

export interface DkimVerifier {
  /** Passes only on a valid signature aligned with `fromDomain` */
  verify(rawMessage: Buffer, fromDomain: string): Promise<'pass' | 'fail'>;
}

export interface RepositoryFile {
  /** Revision token required to update the file (the blob SHA on GitHub) */
  revision: string;
  content: string;
}

export type FileLookup = { found: true; file: RepositoryFile } | { found: false };

/**
 * Repository operations. Existence probes return false / not-found for
 * absence and throw only on transport or API failure.
 */
export interface RepositoryClient {
  branchExists(repo: string, branch: string): Promise<boolean>;
  /** Commit SHA at the tip of a branch */
  getBranchHead(repo: string, branch: string): Promise<string>;
  createBranch(repo: string, branch: string, fromRef: string): Promise<void>;
  pathExists(repo: string, path: string, ref: string): Promise<boolean>;
  getFile(repo: string, path: string, ref: string): Promise<FileLookup>;
  createFile(repo: string, path: string, message: string, content: string, branch: string): Promise<void>;
  updateFile(
    repo: string,
    path: string,
    message: string,
    content: string,
    revision: string,
    branch: string
  ): Promise<void>;
  createTagAndRelease(repo: string, tag: string, message: string, targetCommit: string): Promise<void>;
}
