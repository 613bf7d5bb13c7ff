/**
 * Contract for the external text-generation service (story narration and
 * answer judgment) and the bounded call wrapper the engine uses.
 *
 * The service is a black box: a prompt goes in, best-effort text comes out.
 * Callers own all parsing and fallback behavior, so every call is turned into
 * a Result here instead of letting exceptions steer control flow.
 */

// ============================================================================
// Result
// ============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================================================
// Service Contract
// ============================================================================

/**
 * TextGenerator: `generate(prompt) -> text`.
 *
 * Implementations may throw or reject on network and provider errors; the
 * optional signal is aborted when the caller stops waiting.
 */
export interface TextGenerator {
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}

/**
 * ServiceUnavailable: The generator could not produce text in time.
 */
export interface ServiceUnavailable {
  kind: 'service_unavailable';
  reason: 'timeout' | 'error' | 'not_configured';
  message: string;
}

export const DEFAULT_TIMEOUT_MS = 8000;

/**
 * Calls the generator with a timeout. Never throws.
 *
 * A missing generator, a rejection, or a timeout all become
 * `ServiceUnavailable`; the generator's signal is aborted on timeout.
 */
export async function callGenerator(
  generator: TextGenerator | null,
  prompt: string,
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<Result<string, ServiceUnavailable>> {
  if (!generator) {
    return err({
      kind: 'service_unavailable',
      reason: 'not_configured',
      message: 'No text generator configured',
    });
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<Result<string, ServiceUnavailable>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(
        err({
          kind: 'service_unavailable',
          reason: 'timeout',
          message: `Text generator did not answer within ${timeoutMs}ms`,
        })
      );
    }, timeoutMs);
  });

  const call = (async (): Promise<Result<string, ServiceUnavailable>> => {
    try {
      const text = await generator.generate(prompt, controller.signal);
      return ok(text);
    } catch (error) {
      return err({
        kind: 'service_unavailable',
        reason: 'error',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  })();

  try {
    return await Promise.race([call, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Removes markdown code fences a model tends to wrap JSON in.
 */
export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/```(?:json)?/gi, '')
    .trim();
}
