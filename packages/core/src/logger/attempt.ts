import { Err, Ok, type Result, tryCatch } from "@logfan/shared";
import { WriteFailure } from "../errors/types.js";

/**
 * Options for {@link attempt}.
 */
export interface AttemptOptions {
  /** Give up waiting after this many milliseconds (0 or absent: wait) */
  timeoutMs?: number;
  /** Identifier recorded on the WriteFailure */
  destinationId?: string;
  /** Receives every discarded failure */
  onDiscard?: (failure: WriteFailure) => void;
}

export type AttemptOutcome = Result<void, WriteFailure>;

/**
 * Attempt-and-discard policy applied at every destination boundary.
 *
 * Runs `fn`; any throw, rejection or timeout is converted to a WriteFailure,
 * passed to `onDiscard` and returned as an Err. Never rejects.
 *
 * A timed-out `fn` keeps running; only the wait is abandoned.
 */
export async function attempt(
  fn: () => Promise<void> | void,
  options: AttemptOptions = {}
): Promise<AttemptOutcome> {
  const { timeoutMs, destinationId, onDiscard } = options;
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    const work = Promise.resolve().then(fn);
    if (timeoutMs !== undefined && timeoutMs > 0) {
      let abandoned = false;
      const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          abandoned = true;
          reject(
            new WriteFailure(`Write did not settle within ${timeoutMs}ms`, {
              destinationId,
              timedOut: true,
            })
          );
        }, timeoutMs);
      });
      // A write that rejects after being abandoned is reported on its own,
      // unless it is a timeout of its own (already reported as this one).
      work.catch((error: unknown) => {
        if (abandoned && !(error instanceof WriteFailure && error.timedOut)) {
          discard(error, destinationId, onDiscard);
        }
      });
      await Promise.race([work, timeout]);
    } else {
      await work;
    }
    return Ok(undefined);
  } catch (error) {
    return Err(discard(error, destinationId, onDiscard));
  } finally {
    if (timer) clearTimeout(timer);
  }
}

function discard(
  error: unknown,
  destinationId: string | undefined,
  onDiscard: ((failure: WriteFailure) => void) | undefined
): WriteFailure {
  const failure = WriteFailure.from(error, destinationId);
  if (onDiscard) {
    // hook errors are discarded too
    tryCatch(() => onDiscard(failure));
  }
  return failure;
}
