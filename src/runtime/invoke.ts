import { errorMessage, ExternalInvocationError } from "../errors.js";
import { MAX_TIMER_MS } from "../utils/clock.js";

/**
 * The language-model call, supplied by the host. It should stop work when
 * the signal aborts; its result is ignored from that point on regardless.
 */
export type ModelInvoker = (prompt: string, options: { signal: AbortSignal }) => Promise<string>;

export type InvokeOptions = {
  timeoutMs: number;
  /** Caller cancellation */
  signal?: AbortSignal;
};

/**
 * Call the model once under a deadline. Every failure mode comes back as an
 * ExternalInvocationError; there is no retry here.
 */
export async function invokeModel(
  invoker: ModelInvoker,
  prompt: string,
  options: InvokeOptions,
): Promise<string> {
  if (options.signal?.aborted) {
    throw new ExternalInvocationError("aborted", "Model invocation aborted before start");
  }

  const timeoutMs = Math.min(options.timeoutMs, MAX_TIMER_MS);
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ExternalInvocationError("timeout", `Model invocation timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    timer.unref?.();

    if (options.signal) {
      onAbort = () => {
        controller.abort();
        reject(new ExternalInvocationError("aborted", "Model invocation aborted"));
      };
      options.signal.addEventListener("abort", onAbort, { once: true });
    }
  });

  try {
    const response = await Promise.race([
      Promise.resolve().then(() => invoker(prompt, { signal: controller.signal })),
      interrupted,
    ]);
    if (typeof response !== "string") {
      throw new ExternalInvocationError("failed", "Model returned a non-text response");
    }
    return response;
  } catch (err) {
    if (err instanceof ExternalInvocationError) throw err;
    throw new ExternalInvocationError("failed", `Model invocation failed: ${errorMessage(err)}`, err);
  } finally {
    if (timer) clearTimeout(timer);
    if (onAbort) options.signal?.removeEventListener("abort", onAbort);
  }
}
