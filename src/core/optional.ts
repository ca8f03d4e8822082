// CHANGE: Bridge between Effect's Option and Outcome
// WHY: An absent optional field is valid and must not reach the validator
// PURITY: CORE
// FORMAT THEOREM: ∀v: traverseOption(none, v) = success(none) ∧ v is not invoked
// FORMAT THEOREM: ∀v, x: traverseOption(some(x), v) = map(v(x), some)
// COMPLEXITY: O(1) plus the validator

import { Option } from "effect";
import { dual } from "effect/Function";

import type { FieldError } from "./field-error.js";
import { map, type Outcome, success } from "./outcome.js";
import { tryCreate, type Validatable } from "./try-create.js";

/**
 * Runs a validator on a present value; absence is always valid.
 *
 * @pure true (if validator is pure)
 * @invariant Option.isNone(input) → validator never called
 * @complexity O(1) plus validator
 */
export const traverseOption: {
	<Raw, T, E>(
		validator: (raw: Raw) => Outcome<T, E>,
	): (input: Option.Option<Raw>) => Outcome<Option.Option<T>, E>;
	<Raw, T, E>(
		input: Option.Option<Raw>,
		validator: (raw: Raw) => Outcome<T, E>,
	): Outcome<Option.Option<T>, E>;
} = dual(
	2,
	<Raw, T, E>(
		input: Option.Option<Raw>,
		validator: (raw: Raw) => Outcome<T, E>,
	): Outcome<Option.Option<T>, E> =>
		Option.match(input, {
			onNone: () => success(Option.none()),
			onSome: (raw) => map(validator(raw), Option.some),
		}),
);

/**
 * Turns an optional outcome inside out.
 *
 * @pure true
 * @complexity O(1)
 */
export const sequenceOption = <T, E>(
	input: Option.Option<Outcome<T, E>>,
): Outcome<Option.Option<T>, E> => traverseOption(input, (outcome) => outcome);

/**
 * {@link tryCreate} for an optional raw field.
 *
 * @pure true (if tryValidate is pure)
 */
export const tryCreateOptional = <T, Raw, E>(
	capability: Validatable<T, Raw, E>,
	label: string,
	input: Option.Option<Raw>,
): Outcome<Option.Option<T>, FieldError<E>> =>
	traverseOption(input, (raw: Raw) => tryCreate(capability, label, raw));
