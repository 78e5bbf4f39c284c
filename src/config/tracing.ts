/**
 * OpenTelemetry tracing configuration
 *
 * Supports two modes:
 * - 'console': Logs spans to stdout
 * - 'disabled': No tracing; spans stay no-ops
 *
 * Call once from the entry point, before loading an export.
 */

import { ConsoleSpanExporter } from '@opentelemetry/sdk-trace-base';
import { registerOTel } from '@vercel/otel';
import type { TracingMode } from './settings.js';

export function initTracing(mode: TracingMode): void {
  if (mode === 'disabled') {
    return;
  }

  registerOTel({
    serviceName: 'event-graph',
    traceExporter: new ConsoleSpanExporter(),
  });
  console.log('[Tracing] Enabled with console exporter (logs to stdout)');
}
