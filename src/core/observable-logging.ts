/**
 * RxJS operators that log a stream's lifecycle on behalf of an owner.
 * The owner's logger is looked up per event, so suppression and resolver
 * changes take effect mid-stream.
 * @module
 */

import {
  catchError,
  EMPTY,
  type MonoTypeOperatorFunction,
  type Observable,
  tap,
  throwError,
} from "rxjs";
import { logFor } from "./log-host.js";

/**
 * Side-effect tap: logs each value and completion at INFO and an error at
 * WARN. Values, errors and completion reach downstream unchanged.
 */
export function logged<T>(
  owner: string | object,
  label = "",
  stringify?: (value: T) => string,
): MonoTypeOperatorFunction<T> {
  return tap<T>({
    next: (value) =>
      logFor(owner).info("{0} OnNext: {1}", label, stringify ? stringify(value) : value),
    error: (err: unknown) => logFor(owner).warnException(`${label} OnError`, err),
    complete: () => logFor(owner).info("{0} OnCompleted", label),
  });
}

/** On any error: log it at WARN with `message`, then continue with `fallback`. */
export function loggedCatch<T>(
  owner: string | object,
  fallback: Observable<T> = EMPTY,
  message = "",
): MonoTypeOperatorFunction<T> {
  return catchError<T, Observable<T>>((err: unknown) => {
    logFor(owner).warnException(message, err);
    return fallback;
  });
}

/**
 * Like {@link loggedCatch}, restricted to errors of `errorType`; the
 * replacement stream comes from `handler`. Other errors propagate unlogged.
 */
export function loggedCatchOf<T, E>(
  errorType: new (...args: never[]) => E,
  owner: string | object,
  handler: (error: E) => Observable<T>,
  message = "",
): MonoTypeOperatorFunction<T> {
  return catchError<T, Observable<T>>((err: unknown) => {
    if (!(err instanceof errorType)) return throwError(() => err);
    logFor(owner).warnException(message, err);
    return handler(err);
  });
}
