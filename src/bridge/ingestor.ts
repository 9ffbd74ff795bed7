import { BridgeFailure, ChangeRequest, ChangeRequestDefaults, TrustVerdict } from '../types';
import { parseRawMessage, ParsedMessage } from '../mail/parse-message';
import { emitMessageRejected } from '../observability';
import { failure, toFailure } from './errors';
import { MailSource } from './ports';
import { parseSubject } from './subject-parser';
import { TrustEvaluator } from './trust';

export type IngestOutcome =
  | { ok: true; request: ChangeRequest; verdict: TrustVerdict }
  | { ok: false; status: 'rejected' | 'failed'; failure: BridgeFailure; verdict?: TrustVerdict };

/**
 * Turns one mailbox message into a validated change request.
 *
 * Order: fetch, authenticate sender, parse subject, authorize repository,
 * require a body. The first gate that fails decides the outcome.
 */
export class MessageIngestor {
  constructor(
    private readonly mail: MailSource,
    private readonly trust: TrustEvaluator,
    private readonly defaults: ChangeRequestDefaults
  ) {}

  async ingest(messageId: string): Promise<IngestOutcome> {
    const loaded = await this.load(messageId);
    if ('kind' in loaded) {
      return this.failed(loaded);
    }
    const { raw, message } = loaded;

    console.log(`[Ingestor] Message ${messageId} from ${message.senderAddress || '(unknown)'}: "${message.subject}"`);

    const verdict = await this.trust.evaluate({
      senderAddress: message.senderAddress,
      senderIp: message.senderIp,
      senderDomain: message.senderDomain,
      rawMessage: raw,
    });
    if (!verdict.admitted) {
      return {
        ok: false,
        status: 'rejected',
        failure: verdict.failure ?? failure('AuthenticationFailed', `Sender ${verdict.senderAddress} not admitted`),
        verdict,
      };
    }

    const parsed = parseSubject(message.subject, this.defaults);
    if (!parsed.ok) {
      return this.rejected(messageId, verdict, parsed.failure);
    }

    const repoRejection = this.trust.authorizeRepository(parsed.request.repoName);
    if (repoRejection) {
      return this.rejected(messageId, verdict, repoRejection);
    }

    if (!message.body.trim()) {
      return this.rejected(messageId, verdict, failure('EmptyBody', `Message ${messageId} has no plain-text body`));
    }

    return {
      ok: true,
      request: { ...parsed.request, content: message.body },
      verdict,
    };
  }

  private async load(messageId: string): Promise<{ raw: Buffer; message: ParsedMessage } | BridgeFailure> {
    try {
      const raw = await this.mail.fetch(messageId);
      if (!raw) {
        return failure('MailFetchFailed', `Message ${messageId} not found`);
      }
      return { raw, message: await parseRawMessage(raw) };
    } catch (error) {
      return toFailure('MailFetchFailed', `Could not fetch message ${messageId}`, error);
    }
  }

  private rejected(messageId: string, verdict: TrustVerdict, reason: BridgeFailure): IngestOutcome {
    console.warn(`[Ingestor] ${reason.kind}: ${reason.message}`);
    emitMessageRejected({ sender: verdict.senderAddress, kind: reason.kind, messageId });
    return { ok: false, status: 'rejected', failure: reason, verdict };
  }

  private failed(reason: BridgeFailure): IngestOutcome {
    console.error(`[Ingestor] ${reason.kind}: ${reason.message}`);
    return { ok: false, status: 'failed', failure: reason };
  }
}
