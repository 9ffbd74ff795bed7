import { spf } from 'mailauth/lib/spf';
import { dkimVerify } from 'mailauth/lib/dkim/verify';
import { DkimVerifier, SpfCheckResult, SpfVerifier } from '../bridge/ports';

/** The parts of mailauth's SPF lookup the verifier reads */
export type SpfLookup = (options: {
  sender: string;
  ip: string;
  helo: string;
  mta: string;
}) => Promise<{ status: { result?: string } }>;

/** The parts of mailauth's DKIM verification the verifier reads */
export type DkimCheck = (input: Buffer) => Promise<{
  results: Array<{ signingDomain?: string; status: { result?: string } }>;
}>;

/**
 * SPF check backed by mailauth's resolver.
 *
 * neutral and none are reported as fail; temperror and permerror mean
 * the lookup itself failed and are reported as unknown.
 */
export class MailauthSpfVerifier implements SpfVerifier {
  constructor(
    private readonly mtaHostname: string,
    private readonly lookup: SpfLookup = spf
  ) {}

  async verify(ip: string, domain: string, sender: string): Promise<SpfCheckResult> {
    const result = await this.lookup({
      sender: sender.includes('@') ? sender : `postmaster@${domain}`,
      ip,
      helo: domain,
      mta: this.mtaHostname,
    });

    switch (result.status.result) {
      case 'pass':
        return 'pass';
      case 'softfail':
        return 'softfail';
      case 'temperror':
      case 'permerror':
        return 'unknown';
      default:
        return 'fail';
    }
  }
}

/**
 * Relaxed alignment: the signing domain is the From domain, or one is a
 * subdomain of the other
 */
export function isAlignedDomain(signingDomain: string, fromDomain: string): boolean {
  const signing = signingDomain.trim().toLowerCase().replace(/\.$/, '');
  const from = fromDomain.trim().toLowerCase().replace(/\.$/, '');
  if (!signing || !from || !signing.includes('.')) {
    return false;
  }
  return signing === from || from.endsWith(`.${signing}`) || signing.endsWith(`.${from}`);
}

/**
 * DKIM check: passes when a signature verifies and its signing domain is
 * aligned with the From domain
 */
export class MailauthDkimVerifier implements DkimVerifier {
  constructor(private readonly check: DkimCheck = dkimVerify) {}

  async verify(rawMessage: Buffer, fromDomain: string): Promise<'pass' | 'fail'> {
    const { results } = await this.check(rawMessage);
    const aligned = results.some(
      (signature) => signature.status.result === 'pass' && isAlignedDomain(signature.signingDomain ?? '', fromDomain)
    );
    if (!aligned && results.some((signature) => signature.status.result === 'pass')) {
      const signers = results.map((signature) => signature.signingDomain ?? '(none)').join(', ');
      console.warn(`[DkimVerifier] Valid signature from ${signers} is not aligned with ${fromDomain}`);
    }
    return aligned ? 'pass' : 'fail';
  }
}
