import { DownstreamTimeoutError } from "./app-error.js";

/**
 * Runs `operation` with an AbortSignal that fires after `timeoutMs`. The
 * returned promise rejects with DownstreamTimeoutError at the deadline even if
 * the operation ignores the signal.
 */
export async function withTimeout<TOutput>(
  dependency: string,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<TOutput>,
): Promise<TOutput> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new DownstreamTimeoutError(dependency, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
