import { logs, SeverityNumber } from '@opentelemetry/api-logs';
import { metrics } from '@opentelemetry/api';

/**
 * OpenTelemetry wiring for the bridge
 *
 * Events go to the global OTEL logger provider and metrics to the global
 * meter provider. Exporters are configured by whoever hosts the process;
 * without them the API calls are no-ops.
 */

const INSTRUMENTATION_NAME = 'mail-commit-bridge';

let enabled = false;

export function isTelemetryEnabled(): boolean {
  return enabled;
}

/**
 * Turn telemetry on or off for the process
 */
export function initTelemetry(enable: boolean): void {
  enabled = enable;
  if (!enabled) {
    console.log('[Telemetry] Disabled (set BRIDGE_ENABLE_TELEMETRY=1 to enable)');
    return;
  }

  console.log('[Telemetry] Enabled');
  if (process.env.OTEL_EXPORTER_OTLP_ENDPOINT) {
    console.log(`[Telemetry] OTLP endpoint: ${process.env.OTEL_EXPORTER_OTLP_ENDPOINT}`);
  }
}

export function shutdownTelemetry(): void {
  if (enabled) {
    console.log('[Telemetry] Shutdown');
  }
  enabled = false;
}

export function getLogger(name: string = INSTRUMENTATION_NAME) {
  return logs.getLogger(name);
}

export function getMeter(name: string = INSTRUMENTATION_NAME) {
  return metrics.getMeter(name);
}

export type EventSeverity = 'info' | 'warn' | 'error';

const SEVERITY: Record<EventSeverity, { number: SeverityNumber; text: string }> = {
  info: { number: SeverityNumber.INFO, text: 'INFO' },
  warn: { number: SeverityNumber.WARN, text: 'WARN' },
  error: { number: SeverityNumber.ERROR, text: 'ERROR' },
};

/**
 * Emit a structured event through the OTEL logs API.
 *
 * Falls back to a console line if the logger throws.
 */
export function emitEvent(
  eventName: string,
  attributes: Record<string, string | number | boolean>,
  severity: EventSeverity = 'info'
): void {
  if (!enabled) {
    return;
  }

  const timestamp = new Date().toISOString();
  const level = SEVERITY[severity];

  try {
    getLogger().emit({
      severityNumber: level.number,
      severityText: level.text,
      body: eventName,
      attributes: {
        'event.name': eventName,
        'event.timestamp': timestamp,
        ...attributes,
      },
    });
  } catch (error) {
    console.log(`[Event] ${eventName}`, JSON.stringify({ name: eventName, timestamp, ...attributes }), error);
  }
}
