// CHANGE: Generic smart-constructor adapter over the Validatable capability
// WHY: Every domain type validates itself; tryCreate only adds the field label once, in one place
// PURITY: CORE
// FORMAT THEOREM: ∀label, raw: tryValidate(raw) = failure(e) → tryCreate(C, label, raw) = failure({ label, error: e })
// FORMAT THEOREM: ∀label, raw: tryValidate(raw) = success(v) → tryCreate(C, label, raw) = success(v)
// COMPLEXITY: O(1) plus tryValidate

import { type Validation, ofOutcome } from "./accumulate.js";
import { type FieldError, fieldError } from "./field-error.js";
import { mapError, type Outcome } from "./outcome.js";

/**
 * Capability of a type that knows how to validate its own raw input.
 *
 * Classes usually implement it with a static method, so the class itself is
 * passed wherever a `Validatable` is expected.
 *
 * @typeParam T - Validated type
 * @typeParam Raw - Unvalidated input representation
 * @typeParam E - The type's own error representation
 *
 * @example
 * ```ts
 * class Latitude {
 *   private constructor(readonly degrees: number) {}
 *   static tryValidate(raw: number): Outcome<Latitude, string> {
 *     return raw >= -90 && raw <= 90
 *       ? success(new Latitude(raw))
 *       : failure(`${raw} is an invalid latitude value`);
 *   }
 * }
 * ```
 */
export interface Validatable<T, Raw, E> {
	tryValidate(raw: Raw): Outcome<T, E>;
}

/**
 * Validates `raw` with the capability and tags any failure with `label`.
 *
 * @pure true (if tryValidate is pure)
 * @invariant success values are returned as produced by tryValidate
 * @complexity O(1) plus tryValidate
 */
export const tryCreate = <T, Raw, E>(
	capability: Validatable<T, Raw, E>,
	label: string,
	raw: Raw,
): Outcome<T, FieldError<E>> =>
	mapError(capability.tryValidate(raw), (error) => fieldError(label, error));

/**
 * {@link tryCreate} lifted for the accumulating combinators.
 *
 * @pure true (if tryValidate is pure)
 * @postcondition isFailure(result) → errors(result).length = 1
 */
export const tryCreateValidated = <T, Raw, E>(
	capability: Validatable<T, Raw, E>,
	label: string,
	raw: Raw,
): Validation<T, FieldError<E>> => ofOutcome(tryCreate(capability, label, raw));

/**
 * Partially applied {@link tryCreate}, for passing to traversals.
 */
export const fieldValidator =
	<T, Raw, E>(capability: Validatable<T, Raw, E>, label: string) =>
	(raw: Raw): Outcome<T, FieldError<E>> =>
		tryCreate(capability, label, raw);
