import type { Job } from "./job";

/**
 * Register the wrapped function as the job's function, returning it unchanged
 *
 * @param job - Configured job, still missing its function
 * @param args - Arguments passed to the function on every run
 *
 * @example
 * ```typescript
 * const heartbeat = repeat(scheduler.every(30).seconds())(() => ping("status"));
 * const greet = repeat(scheduler.every().day().at("09:00"), "team")((who: string) => say(`Morning ${who}`));
 * ```
 */
export function repeat<TArgs extends unknown[]>(job: Job, ...args: TArgs) {
  return <TFunction extends (...args: TArgs) => unknown>(fn: TFunction): TFunction => {
    job.do(fn, ...args);
    return fn;
  };
}
