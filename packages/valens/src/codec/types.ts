import type { Refinement } from "../function";
import type { Validate } from "../validate";
import type { Validation } from "../validation";

/** Checks that an arbitrary value already is an `A`. */
export type Is<A> = Refinement<unknown, A>;

export type Encode<A, O> = (a: A) => O;

/**
 * A codec: decodes an input `I` into an `A`, reporting every error with its
 * path, and encodes an `A` back into an output `O`.
 *
 * - `validate` runs from a given context, so codecs nest inside each other.
 * - `decode` runs from a root context named after the codec.
 * - `is` checks a value that is already decoded.
 */
export interface Type<A, O = A, I = unknown> {
  readonly name: string;
  readonly is: Is<A>;
  readonly validate: Validate<I, A>;
  readonly decode: (input: I) => Validation<A>;
  readonly encode: Encode<A, O>;
}

export type Operator<A, B, O, I> = (fa: Type<A, O, I>) => Type<B, O, I>;
