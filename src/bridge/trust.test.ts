import { SpfCheckResult } from './ports';
import { TrustEvaluator, TrustInput } from './trust';
import { FakeDkimVerifier, FakeSpfVerifier } from './__tests__/fakes';

const config = {
  senderWhitelist: new Set(['alice@example.org']),
  repoWhitelist: new Set(['acme/notes', 'acme/site']),
};

function makeInput(overrides?: Partial<TrustInput>): TrustInput {
  return {
    senderAddress: 'alice@example.org',
    senderIp: '203.0.113.7',
    senderDomain: 'example.org',
    rawMessage: Buffer.from('Subject: test\r\n\r\nbody\r\n'),
    ...overrides,
  };
}

describe('TrustEvaluator', () => {
  describe('sender whitelist', () => {
    it('should reject unknown senders without running SPF or DKIM', async () => {
      const spf = new FakeSpfVerifier('pass');
      const dkim = new FakeDkimVerifier('pass');
      const evaluator = new TrustEvaluator(config, spf, dkim);

      const verdict = await evaluator.evaluate(makeInput({ senderAddress: 'mallory@example.org' }));

      expect(verdict.admitted).toBe(false);
      expect(verdict.whitelisted).toBe(false);
      expect(verdict.failure?.kind).toBe('SenderNotWhitelisted');
      expect(spf.calls).toHaveLength(0);
      expect(dkim.calls).toBe(0);
    });

    it('should match whitelisted addresses case-insensitively', async () => {
      const evaluator = new TrustEvaluator(config, new FakeSpfVerifier('pass'), new FakeDkimVerifier('pass'));

      const verdict = await evaluator.evaluate(makeInput({ senderAddress: ' Alice@Example.ORG ' }));

      expect(verdict.senderAddress).toBe('alice@example.org');
      expect(verdict.admitted).toBe(true);
      expect(verdict.warnings).toEqual([]);
    });
  });

  describe('SPF and DKIM combination', () => {
    const cases: Array<{ spf: SpfCheckResult; dkim: 'pass' | 'fail'; admitted: boolean }> = [
      { spf: 'pass', dkim: 'pass', admitted: true },
      { spf: 'pass', dkim: 'fail', admitted: true },
      { spf: 'softfail', dkim: 'pass', admitted: true },
      { spf: 'softfail', dkim: 'fail', admitted: true },
      { spf: 'fail', dkim: 'pass', admitted: true },
      { spf: 'fail', dkim: 'fail', admitted: false },
      { spf: 'unknown', dkim: 'pass', admitted: true },
      { spf: 'unknown', dkim: 'fail', admitted: false },
    ];

    it.each(cases)('should admit=$admitted for SPF $spf and DKIM $dkim', async ({ spf, dkim, admitted }) => {
      // unknown means no sender IP could be extracted
      const spfVerifier = new FakeSpfVerifier(spf === 'unknown' ? 'pass' : spf);
      const evaluator = new TrustEvaluator(config, spfVerifier, new FakeDkimVerifier(dkim));

      const verdict = await evaluator.evaluate(makeInput(spf === 'unknown' ? { senderIp: undefined } : {}));

      expect(verdict.spf).toBe(spf);
      expect(verdict.dkim).toBe(dkim);
      expect(verdict.admitted).toBe(admitted);
    });

    it('should pass the sender IP, domain and address to SPF', async () => {
      const spf = new FakeSpfVerifier('pass');
      const evaluator = new TrustEvaluator(config, spf, new FakeDkimVerifier('pass'));

      await evaluator.evaluate(makeInput());

      expect(spf.calls).toEqual([{ ip: '203.0.113.7', domain: 'example.org', sender: 'alice@example.org' }]);
    });

    it('should hand the From domain to DKIM for alignment', async () => {
      const dkim = new FakeDkimVerifier('pass');
      const evaluator = new TrustEvaluator(config, new FakeSpfVerifier('pass'), dkim);

      await evaluator.evaluate(makeInput({ senderDomain: 'example.org' }));

      expect(dkim.domains).toEqual(['example.org']);
    });

    it('should treat an SPF lookup error result like a failure', async () => {
      const evaluator = new TrustEvaluator(config, new FakeSpfVerifier('unknown'), new FakeDkimVerifier('fail'));

      const verdict = await evaluator.evaluate(makeInput());

      expect(verdict.spf).toBe('unknown');
      expect(verdict.failure).toEqual({
        kind: 'AuthenticationFailed',
        message: 'SPF (unknown) and DKIM (fail) both failed for alice@example.org',
      });
    });

    it('should admit on DKIM alone with a warning when no IP is available', async () => {
      const spf = new FakeSpfVerifier('pass');
      const evaluator = new TrustEvaluator(config, spf, new FakeDkimVerifier('pass'));

      const verdict = await evaluator.evaluate(makeInput({ senderIp: undefined }));

      expect(verdict.admitted).toBe(true);
      expect(verdict.spf).toBe('unknown');
      expect(verdict.warnings).toEqual(['Admitted on DKIM only (SPF unknown)']);
      expect(spf.calls).toHaveLength(0);
    });

    it('should warn when SPF alone admits the message', async () => {
      const evaluator = new TrustEvaluator(config, new FakeSpfVerifier('pass'), new FakeDkimVerifier('fail'));

      const verdict = await evaluator.evaluate(makeInput());

      expect(verdict.warnings).toEqual(['Admitted on SPF only (DKIM fail)']);
    });

    it('should warn separately for an SPF softfail', async () => {
      const evaluator = new TrustEvaluator(config, new FakeSpfVerifier('softfail'), new FakeDkimVerifier('pass'));

      const verdict = await evaluator.evaluate(makeInput());

      expect(verdict.admitted).toBe(true);
      expect(verdict.warnings).toEqual(['SPF softfail for example.org']);
    });

    it('should reject with AuthenticationFailed when both checks fail', async () => {
      const evaluator = new TrustEvaluator(config, new FakeSpfVerifier('fail'), new FakeDkimVerifier('fail'));

      const verdict = await evaluator.evaluate(makeInput());

      expect(verdict.admitted).toBe(false);
      expect(verdict.whitelisted).toBe(true);
      expect(verdict.failure).toEqual({
        kind: 'AuthenticationFailed',
        message: 'SPF (fail) and DKIM (fail) both failed for alice@example.org',
      });
    });

    it('should treat verifier errors as unknown SPF and failed DKIM', async () => {
      const evaluator = new TrustEvaluator(
        config,
        new FakeSpfVerifier(new Error('DNS timeout')),
        new FakeDkimVerifier(new Error('bad signature header'))
      );

      const verdict = await evaluator.evaluate(makeInput());

      expect(verdict.spf).toBe('unknown');
      expect(verdict.dkim).toBe('fail');
      expect(verdict.failure?.kind).toBe('AuthenticationFailed');
    });
  });

  describe('authorizeRepository', () => {
    const evaluator = new TrustEvaluator(config, new FakeSpfVerifier('pass'), new FakeDkimVerifier('pass'));

    it('should allow whitelisted repositories regardless of case', () => {
      expect(evaluator.authorizeRepository('acme/notes')).toBeNull();
      expect(evaluator.authorizeRepository('Acme/Site')).toBeNull();
    });

    it('should reject repositories outside the whitelist', () => {
      expect(evaluator.authorizeRepository('acme/secrets')).toEqual({
        kind: 'RepoNotWhitelisted',
        message: 'Repository acme/secrets is not whitelisted',
      });
    });
  });
});
