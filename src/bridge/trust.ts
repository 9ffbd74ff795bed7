import { BridgeConfig, BridgeFailure, DkimStatus, SpfStatus, TrustVerdict } from '../types';
import { emitAuthenticationResult, emitMessageRejected } from '../observability';
import { errorMessage, failure } from './errors';
import { DkimVerifier, SpfVerifier } from './ports';

export interface TrustInput {
  senderAddress: string;
  /** Connecting client IP from the transport headers, if one was found */
  senderIp?: string;
  senderDomain: string;
  rawMessage: Buffer;
}

/**
 * Sender authentication
 *
 * The sender whitelist is a hard gate. SPF and DKIM are combined
 * leniently: either one passing admits the message, with a warning when
 * the other failed. Repository authorization is a separate check made
 * once the subject has been parsed.
 */
export class TrustEvaluator {
  constructor(
    private readonly config: Pick<BridgeConfig, 'senderWhitelist' | 'repoWhitelist'>,
    private readonly spf: SpfVerifier,
    private readonly dkim: DkimVerifier
  ) {}

  async evaluate(input: TrustInput): Promise<TrustVerdict> {
    const senderAddress = input.senderAddress.trim().toLowerCase();

    // Nothing else is checked for unknown senders
    if (!this.config.senderWhitelist.has(senderAddress)) {
      const rejection = failure('SenderNotWhitelisted', `Sender ${senderAddress || '(none)'} is not whitelisted`);
      console.warn(`[TrustEvaluator] ${rejection.message}`);
      emitMessageRejected({ sender: senderAddress, kind: rejection.kind });
      return {
        senderAddress,
        whitelisted: false,
        spf: 'unknown',
        dkim: 'fail',
        admitted: false,
        failure: rejection,
        warnings: [],
      };
    }

    const spf = await this.checkSpf(senderAddress, input.senderDomain, input.senderIp);
    const dkim = await this.checkDkim(senderAddress, input.senderDomain, input.rawMessage);
    emitAuthenticationResult({ sender: senderAddress, spf, dkim });

    return this.combine(senderAddress, input.senderDomain, spf, dkim);
  }

  /**
   * Check that a resolved repository may be written to
   *
   * @returns null when allowed
   */
  authorizeRepository(repoName: string): BridgeFailure | null {
    if (this.config.repoWhitelist.has(repoName.trim().toLowerCase())) {
      return null;
    }
    const rejection = failure('RepoNotWhitelisted', `Repository ${repoName} is not whitelisted`);
    console.warn(`[TrustEvaluator] ${rejection.message}`);
    return rejection;
  }

  private async checkSpf(sender: string, domain: string, ip?: string): Promise<SpfStatus> {
    if (!ip) {
      console.warn(`[TrustEvaluator] SPF not checked for ${sender}: no IP available`);
      return 'unknown';
    }

    try {
      const result = await this.spf.verify(ip, domain, sender);
      switch (result) {
        case 'pass':
          console.log(`[TrustEvaluator] SPF pass for ${domain} from ${ip}`);
          break;
        case 'softfail':
          console.warn(`[TrustEvaluator] SPF softfail for ${domain} from ${ip}`);
          break;
        case 'fail':
          console.warn(`[TrustEvaluator] SPF fail for ${domain} from ${ip}`);
          break;
        case 'unknown':
          console.error(`[TrustEvaluator] SPF lookup error for ${domain} from ${ip}`);
          break;
      }
      return result;
    } catch (error) {
      console.error(`[TrustEvaluator] SPF verification error for ${domain}: ${errorMessage(error)}`);
      return 'unknown';
    }
  }

  private async checkDkim(sender: string, domain: string, rawMessage: Buffer): Promise<DkimStatus> {
    try {
      const result = await this.dkim.verify(rawMessage, domain);
      if (result === 'pass') {
        console.log(`[TrustEvaluator] DKIM pass for ${sender}`);
      } else {
        console.warn(`[TrustEvaluator] DKIM fail for ${sender}`);
      }
      return result;
    } catch (error) {
      console.error(`[TrustEvaluator] DKIM verification error for ${sender}: ${errorMessage(error)}`);
      return 'fail';
    }
  }

  private combine(senderAddress: string, domain: string, spf: SpfStatus, dkim: DkimStatus): TrustVerdict {
    const spfPassed = spf === 'pass' || spf === 'softfail';
    const dkimPassed = dkim === 'pass';
    const warnings: string[] = [];

    if (!spfPassed && !dkimPassed) {
      const rejection = failure(
        'AuthenticationFailed',
        `SPF (${spf}) and DKIM (${dkim}) both failed for ${senderAddress}`
      );
      console.error(`[TrustEvaluator] ${rejection.message}`);
      emitMessageRejected({ sender: senderAddress, kind: rejection.kind });
      return { senderAddress, whitelisted: true, spf, dkim, admitted: false, failure: rejection, warnings };
    }

    if (spf === 'softfail') {
      warnings.push(`SPF softfail for ${domain}`);
    }
    if (spfPassed && !dkimPassed) {
      warnings.push('Admitted on SPF only (DKIM fail)');
    }
    if (!spfPassed && dkimPassed) {
      warnings.push(`Admitted on DKIM only (SPF ${spf})`);
    }
    for (const warning of warnings) {
      console.warn(`[TrustEvaluator] ${warning}: ${senderAddress}`);
    }

    return { senderAddress, whitelisted: true, spf, dkim, admitted: true, warnings };
  }
}
