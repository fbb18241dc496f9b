/**
 * Deadline helper for Result-returning port calls.
 *
 * Ports never reject, so a timed-out call is reported as an error value and
 * the underlying promise is left to settle on its own.
 */

import { err, type Result } from 'neverthrow';

/**
 * Races a Result-returning operation against a deadline.
 *
 * @param operation - Pending port call
 * @param timeoutMs - Deadline in milliseconds
 * @param onTimeout - Builds the error returned when the deadline passes first
 */
export const withDeadline = async <T, E>(
  operation: Promise<Result<T, E>>,
  timeoutMs: number,
  onTimeout: () => E
): Promise<Result<T, E>> => {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<Result<T, E>>((resolve) => {
    timer = setTimeout(() => {
      resolve(err(onTimeout()));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, deadline]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
};
