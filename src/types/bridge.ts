/**
 * Unit of work extracted from one message subject and body.
 */
export interface ChangeRequest {
  filename: string;
  /** Directory prefix inside the repository; undefined means the root */
  path?: string;
  commitMessage: string;
  branch: string;
  /** Parsed for the record only; commits are made with the API identity */
  author: string;
  repoName: string;
  tagName?: string;
  content: string;
}

/**
 * Fields of a ChangeRequest that the subject line may omit.
 */
export interface ChangeRequestDefaults {
  commitMessage: string;
  branch: string;
  author: string;
  repoName: string;
}

export type SpfStatus = 'pass' | 'softfail' | 'fail' | 'unknown';

export type DkimStatus = 'pass' | 'fail';

export type BridgeErrorKind =
  | 'MalformedSubject'
  | 'SenderNotWhitelisted'
  | 'AuthenticationFailed'
  | 'RepoNotWhitelisted'
  | 'EmptyBody'
  | 'BranchCreateFailed'
  | 'PathMaterializeFailed'
  | 'FileWriteFailed'
  | 'TagCreateFailed'
  | 'MailFetchFailed'
  | 'Unexpected';

export interface BridgeFailure {
  kind: BridgeErrorKind;
  message: string;
}

export interface TrustVerdict {
  senderAddress: string;
  whitelisted: boolean;
  spf: SpfStatus;
  dkim: DkimStatus;
  admitted: boolean;
  /** Set when admitted is false */
  failure?: BridgeFailure;
  warnings: string[];
}

export interface RepoLocation {
  repoName: string;
  branch: string;
  fullPath: string;
}

export interface SyncResult extends RepoLocation {
  action: 'created' | 'updated';
  branchCreated: boolean;
  directoriesCreated: string[];
  tagCreated: boolean;
  tagError?: string;
}

export type SyncOutcome =
  | { ok: true; result: SyncResult }
  | { ok: false; failure: BridgeFailure };

export type MessageOutcome =
  | {
      messageId: string;
      status: 'synced';
      request: ChangeRequest;
      verdict: TrustVerdict;
      sync: SyncResult;
    }
  | {
      messageId: string;
      status: 'rejected' | 'failed';
      failure: BridgeFailure;
      verdict?: TrustVerdict;
    };

export interface CycleReport {
  startedAt: string;
  finishedAt: string;
  outcomes: MessageOutcome[];
  synced: number;
  rejected: number;
  failed: number;
}
