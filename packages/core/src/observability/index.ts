export { getTracer, startSpan, endSpan, withSpan, SpanStatusCode } from './tracing.js';
