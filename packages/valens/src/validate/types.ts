import type { Reader } from "../reader";
import type { Context, Validation } from "../validation";

/**
 * A validator: given an input, and then the context it sits in, produces a
 * validation. Validators hold no state; running one twice on the same input
 * and context gives the same result.
 */
export type Validate<I, A> = (input: I) => Reader<Context, Validation<A>>;

export type Kleisli<I, A, B> = (a: A) => Validate<I, B>;

export type Operator<I, A, B> = (fa: Validate<I, A>) => Validate<I, B>;
