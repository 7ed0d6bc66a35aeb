import { StreamingFault } from "../errors.js";
import type { Logger } from "../../lib/logger.js";
import { createSilentLogger } from "../../lib/logger.js";
import type { ExecutionEvent, ResponseCompletedEvent, ResponseObject } from "../types/domain.js";

export const DONE_FRAME = "data: [DONE]\n\n";

export const GENERIC_EXECUTION_FAILURE = "Execution failed.";

export interface StreamOptions {
  /** Folds the events that were streamed into the terminal response object. */
  aggregate: (events: readonly ExecutionEvent[]) => ResponseObject | Promise<ResponseObject>;
  /** Aborts the stream, typically when the client disconnects. */
  signal?: AbortSignal | undefined;
}

interface JsonStringSource {
  toJsonString(): unknown;
}

const ABORTED = Symbol("aborted");

function isJsonStringSource(value: unknown): value is JsonStringSource {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, "toJsonString") === "function";
}

/**
 * Single-line JSON for one event. Objects that render themselves through
 * `toJsonString()` may pretty-print, so line breaks are stripped from them.
 */
export function serializeEvent(event: unknown): string {
  if (isJsonStringSource(event)) {
    return String(event.toJsonString()).replace(/[\r\n]+/g, "");
  }
  try {
    const encoded = JSON.stringify(event);
    return encoded === undefined ? JSON.stringify(String(event)) : encoded;
  } catch {
    return JSON.stringify(String(event));
  }
}

export function formatFrame(payload: string): string {
  return `data: ${payload}\n\n`;
}

export function errorFrame(message: string): string {
  return formatFrame(
    JSON.stringify({
      id: "error",
      object: "error",
      error: { message, type: "execution_error" }
    })
  );
}

function whenAborted(signal: AbortSignal | undefined): { promise: Promise<typeof ABORTED>; dispose: () => void } {
  if (!signal) {
    return { promise: new Promise<typeof ABORTED>(() => undefined), dispose: () => undefined };
  }
  let onAbort = (): void => undefined;
  const promise = new Promise<typeof ABORTED>((resolve) => {
    onAbort = () => resolve(ABORTED);
  });
  signal.addEventListener("abort", onAbort, { once: true });
  return { promise, dispose: () => signal.removeEventListener("abort", onAbort) };
}

export class StreamingAggregator {
  constructor(private readonly logger: Logger = createSilentLogger()) {}

  /**
   * SSE frames for `events` in production order, then a `response.completed`
   * frame and the `[DONE]` sentinel. A fault ends the stream with one error
   * frame and no sentinel. An abort ends it silently.
   */
  async *stream(events: AsyncIterable<ExecutionEvent>, options: StreamOptions): AsyncGenerator<string, void, undefined> {
    const { signal } = options;
    if (signal?.aborted) {
      return;
    }

    const iterator = events[Symbol.asyncIterator]();
    const abort = whenAborted(signal);
    const collected: ExecutionEvent[] = [];
    let exhausted = false;

    try {
      for (;;) {
        const next = await Promise.race([iterator.next(), abort.promise]);
        if (next === ABORTED) {
          this.logger.debug({ emitted: collected.length }, "Stream aborted by client");
          return;
        }
        if (next.done) {
          exhausted = true;
          break;
        }
        collected.push(next.value);
        yield formatFrame(serializeEvent(next.value));
        if (signal?.aborted) {
          return;
        }
      }

      const response = await options.aggregate(collected);
      if (signal?.aborted) {
        return;
      }
      const completed: ResponseCompletedEvent = {
        type: "response.completed",
        response,
        sequence_number: collected.length
      };
      yield formatFrame(JSON.stringify(completed));
      yield DONE_FRAME;
    } catch (error) {
      this.logger.error({ err: error, emitted: collected.length }, "Streaming execution failed");
      if (!signal?.aborted) {
        yield errorFrame(error instanceof StreamingFault ? error.message : GENERIC_EXECUTION_FAILURE);
      }
    } finally {
      abort.dispose();
      if (!exhausted) {
        this.closeUpstream(iterator);
      }
    }
  }

  /** Not awaited: a pull may still be pending on the iterator. */
  private closeUpstream(iterator: AsyncIterator<ExecutionEvent>): void {
    if (typeof iterator.return !== "function") {
      return;
    }
    const close = iterator.return.bind(iterator);
    Promise.resolve()
      .then(() => close())
      .catch((error: unknown) => {
        this.logger.warn({ err: error }, "Failed to close upstream event source");
      });
  }
}
