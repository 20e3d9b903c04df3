import {
  ExternalCallError,
  ExternalCallTimeout,
} from "../errors/pipeline.errors";

/**
 * Races `work` against a timer. The timer is always cleared so a settled
 * call never keeps the process alive.
 */
export async function withTimeout<T>(
  work: () => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new ExternalCallTimeout(label, timeoutMs)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([work(), timeout]);
  } catch (error) {
    if (error instanceof ExternalCallTimeout) throw error;
    throw new ExternalCallError(label, error);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export type CallOutcome<T> =
  | { status: "ok"; value: T }
  | { status: "timeout"; value: T; error: ExternalCallTimeout }
  | { status: "error"; value: T; error: ExternalCallError };

/**
 * Runs an external call with a timeout and maps any failure onto the
 * supplied conservative value.
 */
export async function callOrDefault<T>(
  work: () => Promise<T>,
  timeoutMs: number,
  label: string,
  fallbackValue: T
): Promise<CallOutcome<T>> {
  try {
    const value = await withTimeout(work, timeoutMs, label);
    return { status: "ok", value };
  } catch (error) {
    if (error instanceof ExternalCallTimeout) {
      console.warn(`${error.message}; using conservative default`);
      return { status: "timeout", value: fallbackValue, error };
    }
    const wrapped =
      error instanceof ExternalCallError
        ? error
        : new ExternalCallError(label, error);
    console.warn(`${wrapped.message}; using conservative default`);
    return { status: "error", value: fallbackValue, error: wrapped };
  }
}
