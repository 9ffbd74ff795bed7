import { MessageIngestor } from '../ingestor';
import { DEFAULT_AUTHOR, DEFAULT_COMMIT_MESSAGE } from '../subject-parser';
import { TrustEvaluator } from '../trust';
import { FakeDkimVerifier, FakeMailSource, FakeSpfVerifier, rawMessage } from './fakes';

const RECEIVED = 'from mail.example.org (mail.example.org [203.0.113.7]) by mx.example.net with ESMTPS';

const defaults = {
  commitMessage: DEFAULT_COMMIT_MESSAGE,
  branch: 'main',
  author: DEFAULT_AUTHOR,
  repoName: 'acme/notes',
};

function makeIngestor(messages: Record<string, string>) {
  const mailbox = new FakeMailSource(new Map(Object.entries(messages)));
  const spf = new FakeSpfVerifier('pass');
  const dkim = new FakeDkimVerifier('pass');
  const trust = new TrustEvaluator(
    { senderWhitelist: new Set(['alice@example.org']), repoWhitelist: new Set(['acme/notes']) },
    spf,
    dkim
  );
  return { mailbox, spf, dkim, ingestor: new MessageIngestor(mailbox, trust, defaults) };
}

describe('MessageIngestor', () => {
  it('should build a change request from an admitted message', async () => {
    const { ingestor, spf } = makeIngestor({
      '1': rawMessage({
        from: 'Alice <ALICE@example.org>',
        subject: '[commit_msg:Add guide][branch:docs] guides/setup.md',
        body: 'Step one',
        received: [RECEIVED],
      }),
    });

    const outcome = await ingestor.ingest('1');

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.request.filename).toBe('setup.md');
      expect(outcome.request.path).toBe('guides');
      expect(outcome.request.branch).toBe('docs');
      expect(outcome.request.commitMessage).toBe('Add guide');
      expect(outcome.request.repoName).toBe('acme/notes');
      expect(outcome.request.content.trim()).toBe('Step one');
      expect(outcome.verdict).toEqual({
        senderAddress: 'alice@example.org',
        whitelisted: true,
        spf: 'pass',
        dkim: 'pass',
        admitted: true,
        warnings: [],
      });
    }
    expect(spf.calls).toEqual([{ ip: '203.0.113.7', domain: 'example.org', sender: 'alice@example.org' }]);
  });

  it('should check the sender before the subject', async () => {
    const { ingestor, dkim } = makeIngestor({
      '2': rawMessage({ from: 'mallory@example.org', subject: 'not a filename', body: 'x' }),
    });

    const outcome = await ingestor.ingest('2');

    expect(outcome.ok === false && outcome.failure.kind).toBe('SenderNotWhitelisted');
    expect(dkim.calls).toBe(0);
  });

  it('should check the repository after the subject', async () => {
    const { ingestor } = makeIngestor({
      '3': rawMessage({ from: 'alice@example.org', subject: '[repo:Acme/Other] a.txt', body: 'x' }),
    });

    const outcome = await ingestor.ingest('3');

    expect(outcome).toEqual(
      expect.objectContaining({
        ok: false,
        status: 'rejected',
        failure: { kind: 'RepoNotWhitelisted', message: 'Repository Acme/Other is not whitelisted' },
      })
    );
  });

  it('should reject HTML-only mail as having no body', async () => {
    const html = [
      'From: alice@example.org',
      'Subject: page.md',
      'MIME-Version: 1.0',
      'Content-Type: text/html; charset=utf-8',
      '',
      '<p>HTML only</p>',
      '',
    ].join('\r\n');
    const { ingestor } = makeIngestor({ '5': html });

    const outcome = await ingestor.ingest('5');

    expect(outcome.ok === false && outcome.failure).toEqual({
      kind: 'EmptyBody',
      message: 'Message 5 has no plain-text body',
    });
  });

  it('should report a message that is gone as a fetch failure', async () => {
    const { ingestor } = makeIngestor({});

    await expect(ingestor.ingest('99')).resolves.toEqual({
      ok: false,
      status: 'failed',
      failure: { kind: 'MailFetchFailed', message: 'Message 99 not found' },
    });
  });

  it('should wrap mailbox errors with the message id', async () => {
    const { ingestor, mailbox } = makeIngestor({ '4': rawMessage({ from: 'alice@example.org', subject: 'a.txt', body: 'x' }) });
    mailbox.fetchErrors.set('4', new Error('connection reset'));

    const outcome = await ingestor.ingest('4');

    expect(outcome.ok === false && outcome.failure).toEqual({
      kind: 'MailFetchFailed',
      message: 'Could not fetch message 4: connection reset',
    });
  });
});
