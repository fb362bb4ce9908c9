import { context, type Span, SpanStatusCode, trace } from '@opentelemetry/api';
import { logger } from './log.js';
import { getVersion } from './version.js';

export const ot = { trace, context };

class TraceControl {
  tracer = ot.trace.getTracer('cross-toolchain-sources', getVersion().version ?? 'unknown');
  rootSpan?: Span;

  /** Start a root span that traces */
  startRootSpan<T>(name: string, cb: (s: Span) => Promise<T>): Promise<T> {
    if (this.rootSpan) throw new Error('Duplicate root span');
    logger.info({ command: { package: 'cross-toolchain-sources', cmd: name, ...getVersion() } }, 'Command:Start');

    return this.tracer.startActiveSpan(name, async (span) => {
      this.rootSpan = span;
      try {
        return await cb(span);
      } catch (e) {
        if (e instanceof Error) span.recordException(e);
        span.setStatus({ code: SpanStatusCode.ERROR });
        throw e;
      } finally {
        span.end();
      }
    });
  }

  /** Run `cb` inside a child span of the active span */
  span<T>(name: string, cb: (s: Span) => Promise<T>): Promise<T> {
    return this.tracer.startActiveSpan(name, async (span) => {
      try {
        return await cb(span);
      } catch (e) {
        if (e instanceof Error) span.recordException(e);
        span.setStatus({ code: SpanStatusCode.ERROR });
        throw e;
      } finally {
        span.end();
      }
    });
  }

  /** Run a command, any failure is logged and turns into a non zero exit code */
  async run(cb: () => Promise<unknown>): Promise<void> {
    try {
      await cb();
    } catch (err) {
      logger.fatal({ err }, 'Command:Failed');
      process.exitCode = 1;
    }
  }
}

export const Tracer = new TraceControl();
