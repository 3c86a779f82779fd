import type { Lens } from "../lens";
import type { Monoid } from "../monoid";
import type { Optional } from "../optional";
import * as VD from "../validate";
import { makeType } from "./codec";
import type { Operator, Type } from "./types";

/**
 * Adds a field to a struct codec through a lens.
 *
 * Decoding runs `fa` on the same input and writes its value with the lens;
 * errors of the struct and the field are both kept, the struct's first.
 * Encoding appends the field's encoding to the struct's with `m`.
 *
 * @example
 * ```typescript
 * const person = pipe(
 *   makeType("Person", isPerson, VD.of(emptyPerson), () => "Person:"),
 *   apSL(M.string, nameLens, field("name", string()))
 * );
 * person.encode({ name: "Ada", age: 36 }); // "Person:Ada"
 * ```
 */
export const apSL =
  <S, T, O, I>(m: Monoid<O>, lens: Lens<S, T>, fa: Type<T, O, I>): Operator<S, S, O, I> =>
  (self) =>
    makeType(
      `ApS[${lens.name} x ${fa.name}]`,
      self.is,
      VD.apSL(lens, fa.validate)(self.validate),
      (s) => m.concat(self.encode(s), fa.encode(lens.get(s)))
    );

/**
 * `apSL` through an optional: a decoded field is only written where the
 * optional focuses, and a missing part adds nothing to the encoding.
 */
export const apSO =
  <S, T, O, I>(m: Monoid<O>, optional: Optional<S, T>, fa: Type<T, O, I>): Operator<S, S, O, I> =>
  (self) =>
    makeType(
      `ApS[${optional.name} x ${fa.name}]`,
      self.is,
      VD.apS(optional.set, fa.validate)(self.validate),
      (s) => {
        const encoded = self.encode(s);
        const part = optional.getOption(s);
        return part.some ? m.concat(encoded, fa.encode(part.value)) : encoded;
      }
    );
