import { CycleReport, MessageOutcome } from '../types';
import {
  emitCycleComplete,
  emitMessageFailed,
  recordCycleDuration,
  recordMessageOutcome,
} from '../observability';
import { errorMessage, failure } from './errors';
import { MessageIngestor } from './ingestor';
import { MailSource } from './ports';
import { RepositorySyncEngine } from './sync-engine';

/**
 * Runs poll cycles: every unread message, one at a time, through the
 * ingestor and then the sync engine.
 *
 * Failing to list the mailbox aborts the cycle (the error propagates).
 * Anything that goes wrong with a single message is recorded in that
 * message's outcome and the cycle moves on.
 */
export class BridgeController {
  constructor(
    private readonly mail: MailSource,
    private readonly ingestor: MessageIngestor,
    private readonly sync: RepositorySyncEngine
  ) {}

  async runCycle(): Promise<CycleReport> {
    const started = Date.now();
    const startedAt = new Date(started).toISOString();

    const messageIds = await this.mail.listUnread();
    console.log(`[Bridge] ${messageIds.length} unread message(s)`);

    const outcomes: MessageOutcome[] = [];
    for (const messageId of messageIds) {
      const outcome = await this.processMessage(messageId);
      recordMessageOutcome({
        status: outcome.status,
        kind: outcome.status === 'synced' ? undefined : outcome.failure.kind,
      });
      outcomes.push(outcome);
    }

    const report: CycleReport = {
      startedAt,
      finishedAt: new Date().toISOString(),
      outcomes,
      synced: outcomes.filter((o) => o.status === 'synced').length,
      rejected: outcomes.filter((o) => o.status === 'rejected').length,
      failed: outcomes.filter((o) => o.status === 'failed').length,
    };

    const durationMs = Date.now() - started;
    recordCycleDuration(durationMs);
    emitCycleComplete({
      messages: outcomes.length,
      synced: report.synced,
      rejected: report.rejected,
      failed: report.failed,
      durationMs,
    });
    console.log(
      `[Bridge] Cycle complete: ${report.synced} synced, ${report.rejected} rejected, ${report.failed} failed`
    );

    return report;
  }

  async processMessage(messageId: string): Promise<MessageOutcome> {
    try {
      const ingested = await this.ingestor.ingest(messageId);
      if (!ingested.ok) {
        return {
          messageId,
          status: ingested.status,
          failure: ingested.failure,
          ...(ingested.verdict ? { verdict: ingested.verdict } : {}),
        };
      }

      const synced = await this.sync.apply(ingested.request);
      if (!synced.ok) {
        emitMessageFailed({ messageId, kind: synced.failure.kind, error: synced.failure.message });
        return { messageId, status: 'failed', failure: synced.failure, verdict: ingested.verdict };
      }

      return {
        messageId,
        status: 'synced',
        request: ingested.request,
        verdict: ingested.verdict,
        sync: synced.result,
      };
    } catch (error) {
      const unexpected = failure('Unexpected', errorMessage(error));
      console.error(`[Bridge] Unexpected error processing message ${messageId}:`, error);
      emitMessageFailed({ messageId, kind: unexpected.kind, error: unexpected.message });
      return { messageId, status: 'failed', failure: unexpected };
    }
  }
}
