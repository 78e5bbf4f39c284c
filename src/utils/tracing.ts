/**
 * OpenTelemetry tracing utilities for the event graph loader
 *
 * Span wrappers with sanitized attributes. Spans are no-ops until initTracing()
 * (src/config/tracing.ts) registers a provider.
 */

import { trace, SpanStatusCode } from '@opentelemetry/api';

// ============================================================================
// Constants for standard attribute keys
// ============================================================================

export const TraceAttributes = {
  // Export context
  EXPORT_VERSION: 'exportVersion',
  EVENT_SHORTNAME: 'eventShortname',
  INPUT_PATH: 'inputPath',

  // Graph size
  PART_COUNT: 'partCount',
  TRACK_COUNT: 'trackCount',
  COURSE_COUNT: 'courseCount',
  LODGEMENT_COUNT: 'lodgementCount',
  REGISTRATION_COUNT: 'registrationCount',

  // Resolver results
  SYNTHESIZED_COUNT: 'synthesizedCount',
  PRUNED_COUNT: 'prunedCount',
  ATTENDEE_COUNT: 'attendeeCount',
  INHABITANT_COUNT: 'inhabitantCount',

  // Rendering
  TARGET_NAME: 'targetName',
  TASK_COUNT: 'taskCount',
} as const;

type AttributeValue = string | number | boolean | undefined | null;

const SENSITIVE_KEY_PARTS = ['given', 'family', 'display', 'email', 'phone', 'mobile', 'address', 'birthday', 'field'];

/**
 * Get the OpenTelemetry tracer instance for the loader
 */
export function getTracer() {
  return trace.getTracer('event-graph', '1.0.0');
}

// ============================================================================
// Span wrapper for sync operations
// ============================================================================

/**
 * Wrap a sync function with OpenTelemetry span tracking
 *
 * @param name - Span name (e.g., "loader.build", "loader.resolver")
 * @param attributes - Span attributes, sanitized before recording
 * @returns Result of fn or throws if fn throws
 *
 * @example
 * const event = withSpanSync('loader.build', { inputPath }, () => buildEvent(document));
 */
export function withSpanSync<T>(name: string, attributes: Record<string, AttributeValue>, fn: () => T): T {
  const tracer = getTracer();
  const sanitized = sanitizeMetadata(attributes);

  return tracer.startActiveSpan(name, { attributes: sanitized }, (span) => {
    try {
      const result = fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: errorMessage,
      });
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Add attributes to the active span, if any
 */
export function setSpanAttributes(attributes: Record<string, AttributeValue>): void {
  const activeSpan = trace.getActiveSpan();
  if (activeSpan) {
    activeSpan.setAttributes(sanitizeMetadata(attributes));
  }
}

// ============================================================================
// Metadata sanitization (PII filtering)
// ============================================================================

/**
 * Remove personal data from span attributes
 *
 * DO NOT include in spans:
 * - Names, addresses, email addresses, phone numbers
 * - Birthdays
 * - Custom field values
 *
 * SAFE to include:
 * - Entity counts
 * - Export version and event shortname
 * - Target names
 */
export function sanitizeMetadata(metadata: Record<string, AttributeValue>): Record<string, string | number | boolean> {
  const sanitized: Record<string, string | number | boolean> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (value === null || value === undefined) {
      continue;
    }

    const lowered = key.toLowerCase();
    if (SENSITIVE_KEY_PARTS.some((part) => lowered.includes(part))) {
      continue;
    }

    sanitized[key] = value;
  }

  return sanitized;
}

// ============================================================================
// Standard attribute builders
// ============================================================================

/**
 * Build graph size attributes
 */
export function buildGraphAttributes(counts: {
  parts?: number;
  tracks?: number;
  courses?: number;
  lodgements?: number;
  registrations?: number;
}) {
  return {
    [TraceAttributes.PART_COUNT]: counts.parts,
    [TraceAttributes.TRACK_COUNT]: counts.tracks,
    [TraceAttributes.COURSE_COUNT]: counts.courses,
    [TraceAttributes.LODGEMENT_COUNT]: counts.lodgements,
    [TraceAttributes.REGISTRATION_COUNT]: counts.registrations,
  };
}
