import type { Validate } from "./types";

export interface LoggedOptions {
  /** Prefix of every message */
  name: string;
  /** Logger function */
  logger?: (message: string) => void;
}

/**
 * Reports the outcome of each run of a validator through `logger`:
 * `<name>: ok`, or `<name>: <n> errors: <first error>`. The result is
 * returned unchanged.
 *
 * @example
 * ```typescript
 * const checked = logged({ name: "signup", logger: console.debug })(signup);
 * ```
 */
export const logged =
  ({ name, logger = () => {} }: LoggedOptions) =>
  <I, A>(validator: Validate<I, A>): Validate<I, A> =>
  (input) =>
  (context) => {
    const result = validator(input)(context);
    if (result.ok) {
      logger(`${name}: ok`);
    } else {
      const count = result.errors.length;
      const first = result.errors[0];
      const summary = `${name}: ${count} ${count === 1 ? "error" : "errors"}`;
      logger(first !== undefined ? `${summary}: ${first.toString()}` : summary);
    }
    return result;
  };
