/**
 * OpenTelemetry tracing configuration
 *
 * Supports two modes:
 * - 'console': Logs spans to stdout (default in development, no setup needed)
 * - 'disabled': No tracing (default in production)
 *
 * Environment Variables:
 * - TRACING_MODE: 'console' | 'disabled' (default: 'console' in dev, 'disabled' otherwise)
 */

import { BasicTracerProvider, ConsoleSpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import type { AppConfig } from './index.js';

const SERVICE_NAME = 'journal-archive';

let provider: BasicTracerProvider | null = null;

/**
 * Initialize OpenTelemetry tracing
 *
 * Called at the top of entry points (src/index.ts and src/worker.ts) before
 * any spans are opened.
 */
export function initTracing(config: Pick<AppConfig, 'NODE_ENV' | 'TRACING_MODE'>): void {
  const tracingMode = config.TRACING_MODE ?? (config.NODE_ENV === 'development' ? 'console' : 'disabled');

  if (tracingMode === 'disabled') {
    console.log('[Tracing] Disabled');
    return;
  }

  if (provider) return;

  provider = new BasicTracerProvider();
  provider.addSpanProcessor(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  provider.register();

  console.log('[Tracing] Enabled with console exporter (logs to stdout)');
  console.log(`[Tracing] Service: ${SERVICE_NAME}`);
}

/**
 * Flush and stop the tracer provider (graceful shutdown)
 */
export async function shutdownTracing(): Promise<void> {
  if (provider) {
    await provider.shutdown();
    provider = null;
  }
}
