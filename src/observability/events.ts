import { emitEvent } from './telemetry';

/**
 * Bridge events, one per significant decision in a poll cycle
 */

export function emitMessageRejected(params: { sender: string; kind: string; messageId?: string }): void {
  emitEvent(
    'mail_bridge.message_rejected',
    {
      'sender.address': params.sender,
      'failure.kind': params.kind,
      ...(params.messageId ? { 'message.id': params.messageId } : {}),
    },
    'warn'
  );
}

export function emitAuthenticationResult(params: { sender: string; spf: string; dkim: string }): void {
  emitEvent('mail_bridge.authentication', {
    'sender.address': params.sender,
    spf: params.spf,
    dkim: params.dkim,
  });
}

export function emitBranchCreated(params: { repo: string; branch: string; fromRef: string }): void {
  emitEvent('mail_bridge.branch_created', {
    'repo.name': params.repo,
    branch: params.branch,
    from_ref: params.fromRef,
  });
}

export function emitFileWritten(params: {
  repo: string;
  branch: string;
  path: string;
  action: 'created' | 'updated';
}): void {
  emitEvent('mail_bridge.file_written', {
    'repo.name': params.repo,
    branch: params.branch,
    path: params.path,
    action: params.action,
  });
}

export function emitTagResult(params: { repo: string; tag: string; success: boolean; error?: string }): void {
  emitEvent(
    params.success ? 'mail_bridge.tag_created' : 'mail_bridge.tag_failed',
    {
      'repo.name': params.repo,
      tag: params.tag,
      ...(params.error ? { error: params.error } : {}),
    },
    params.success ? 'info' : 'error'
  );
}

export function emitMessageFailed(params: { messageId: string; kind: string; error: string }): void {
  emitEvent(
    'mail_bridge.message_failed',
    {
      'message.id': params.messageId,
      'failure.kind': params.kind,
      error: params.error,
    },
    'error'
  );
}

export function emitCycleComplete(params: {
  messages: number;
  synced: number;
  rejected: number;
  failed: number;
  durationMs: number;
}): void {
  emitEvent('mail_bridge.cycle_complete', {
    messages: params.messages,
    synced: params.synced,
    rejected: params.rejected,
    failed: params.failed,
    duration_ms: params.durationMs,
  });
}
