import { Attributes, SpanStatusCode, trace } from '@opentelemetry/api';
import { describeError } from '../common/errors';

type SpanAttributes = Record<string, string | number | boolean | undefined>;

/** Run `fn` inside an active span. Without a registered SDK the tracer is a no-op. */
export function withSpan<T>(name: string, attributes: SpanAttributes | undefined, fn: () => Promise<T>): Promise<T> {
  const tracer = trace.getTracer('log-sanitizer');
  const attrs: Attributes | undefined = attributes
    ? Object.fromEntries(
        Object.entries(attributes).filter((entry): entry is [string, string | number | boolean] =>
          entry[1] !== undefined,
        ),
      )
    : undefined;

  return tracer.startActiveSpan(name, { attributes: attrs }, async (span) => {
    try {
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.recordException(error instanceof Error ? error : describeError(error));
      span.setStatus({ code: SpanStatusCode.ERROR, message: describeError(error) });
      throw error;
    } finally {
      span.end();
    }
  });
}
