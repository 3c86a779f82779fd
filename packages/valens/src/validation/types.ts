import type { Reader } from "../reader";
import type { ValidationError } from "./errors";

/**
 * One step of the path from the validation root to the value being
 * checked: the field name (or index), the expected type name, and the
 * value found there.
 */
export interface ContextEntry {
  readonly key: string;
  readonly type: string;
  readonly actual?: unknown;
}

/**
 * The path through nested structures, root first.
 * `[{ key: "user" }, { key: "address" }, { key: "zipCode" }]` is
 * `user.address.zipCode`.
 */
export type Context = readonly ContextEntry[];

/** Validation failures in the order they were produced. */
export type Errors = readonly ValidationError[];

export type Success<A> = { ok: true; value: A };

export type Failure = { ok: false; errors: Errors };

/**
 * Either a validated value or every error found while producing it.
 */
export type Validation<A> = Success<A> | Failure;

export type Kleisli<A, B> = (a: A) => Validation<B>;

export type Operator<A, B> = (fa: Validation<A>) => Validation<B>;

export type { Reader };
