import type { Counter, Histogram } from '@opentelemetry/api';
import { getMeter, isTelemetryEnabled } from './telemetry';

let messageCounter: Counter | null = null;
let commitCounter: Counter | null = null;
let cycleDurationHistogram: Histogram | null = null;

/**
 * Create the metric instruments. Call after initTelemetry.
 */
export function initMetrics(): void {
  if (!isTelemetryEnabled()) {
    return;
  }

  const meter = getMeter();

  messageCounter = meter.createCounter('mail_bridge.message.count', {
    description: 'Messages processed, by outcome',
    unit: 'count',
  });

  commitCounter = meter.createCounter('mail_bridge.commit.count', {
    description: 'Repository commits made (files, directory markers)',
    unit: 'count',
  });

  cycleDurationHistogram = meter.createHistogram('mail_bridge.cycle.duration', {
    description: 'Poll cycle duration in milliseconds',
    unit: 'ms',
  });
}

export function recordMessageOutcome(attributes: { status: string; kind?: string }): void {
  messageCounter?.add(1, {
    status: attributes.status,
    ...(attributes.kind ? { 'failure.kind': attributes.kind } : {}),
  });
}

export function recordCommit(attributes: { repo: string; kind: 'file' | 'directory' }): void {
  commitCounter?.add(1, {
    'repo.name': attributes.repo,
    kind: attributes.kind,
  });
}

export function recordCycleDuration(durationMs: number): void {
  cycleDurationHistogram?.record(durationMs);
}
