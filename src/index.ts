import 'dotenv/config';
import { BridgeConfig } from './types';
import { loadBridgeConfig } from './config/load-config';
import { BridgeController } from './bridge/controller';
import { MessageIngestor } from './bridge/ingestor';
import { RepositorySyncEngine } from './bridge/sync-engine';
import { DEFAULT_AUTHOR, DEFAULT_COMMIT_MESSAGE } from './bridge/subject-parser';
import { TrustEvaluator } from './bridge/trust';
import { GitHubAuth } from './github/auth';
import { GitHubRepositoryClient } from './github/repository-client';
import { ImapMailSource } from './mail/imap-source';
import { MailauthDkimVerifier, MailauthSpfVerifier } from './mail/verifiers';
import { initMetrics, initTelemetry, shutdownTelemetry } from './observability';

/**
 * Connect to the mailbox, run one poll cycle, log out
 */
async function runOnce(config: BridgeConfig): Promise<void> {
  const mail = new ImapMailSource(config.imap);
  const trust = new TrustEvaluator(
    config,
    new MailauthSpfVerifier(config.mtaHostname),
    new MailauthDkimVerifier()
  );
  const ingestor = new MessageIngestor(mail, trust, {
    commitMessage: DEFAULT_COMMIT_MESSAGE,
    branch: config.defaultBranch,
    author: DEFAULT_AUTHOR,
    repoName: config.defaultRepo,
  });
  const repository = new GitHubRepositoryClient(new GitHubAuth(config.github));
  const controller = new BridgeController(mail, ingestor, new RepositorySyncEngine(repository, config));

  await mail.connect();
  try {
    await controller.runCycle();
  } finally {
    await mail.close();
  }
}

/**
 * Main entry point for the mail-to-repository bridge
 */
async function main() {
  const config = loadBridgeConfig();
  initTelemetry(config.telemetryEnabled);
  initMetrics();

  console.log(
    `[Startup] Bridge for ${config.imap.user}@${config.imap.host}: ` +
      `${config.senderWhitelist.size} sender(s), ${config.repoWhitelist.size} repositor(ies), ` +
      `default ${config.defaultRepo}@${config.defaultBranch}`
  );

  if (config.pollIntervalSeconds === undefined) {
    await runOnce(config);
    shutdownTelemetry();
    return;
  }

  // Poll on a timer until signalled
  const intervalMs = config.pollIntervalSeconds * 1000;
  let stopping = false;
  let timer: NodeJS.Timeout | undefined;
  let running: Promise<void> = Promise.resolve();

  const stop = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    stopping = true;
    if (timer) {
      clearTimeout(timer);
    }
    running
      .then(() => {
        shutdownTelemetry();
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  const tick = () => {
    running = runOnce(config)
      .catch((error: unknown) => {
        // A failed cycle (mailbox unreachable, listing failed) is retried next tick
        console.error('[Bridge] Poll cycle failed:', error);
      })
      .finally(() => {
        if (!stopping) {
          timer = setTimeout(tick, intervalMs);
        }
      });
  };

  process.on('SIGTERM', () => stop('SIGTERM'));
  process.on('SIGINT', () => stop('SIGINT'));

  console.log(`[Startup] Polling every ${config.pollIntervalSeconds}s`);
  tick();
}

main().catch((error) => {
  console.error('Fatal error running bridge:', error);
  process.exit(1);
});
