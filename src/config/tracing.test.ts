import { ConsoleSpanExporter } from '@opentelemetry/sdk-trace-base';
import { registerOTel } from '@vercel/otel';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { initTracing } from './tracing.js';

vi.mock('@vercel/otel', () => ({ registerOTel: vi.fn() }));

describe('initTracing', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.mocked(registerOTel).mockClear();
    vi.restoreAllMocks();
  });

  it('registers a console exporter in console mode', () => {
    initTracing('console');
    expect(registerOTel).toHaveBeenCalledTimes(1);
    expect(registerOTel).toHaveBeenCalledWith({
      serviceName: 'event-graph',
      traceExporter: expect.any(ConsoleSpanExporter),
    });
  });

  it('registers nothing when disabled', () => {
    initTracing('disabled');
    expect(registerOTel).not.toHaveBeenCalled();
  });
});
