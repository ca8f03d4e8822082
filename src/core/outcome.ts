// CHANGE: Outcome type with total, dual-form combinators
// WHY: Expected failures travel as values so every caller must handle both variants
// PURITY: CORE
// INVARIANT: Outcome contains exactly one of Success (value) or Failure (error); values are frozen
// FORMAT THEOREM: ∀o, f: isFailure(o) → map(o, f) = o
// COMPLEXITY: O(1) for every operation

import { dual } from "effect/Function";

import { PreconditionViolated } from "./errors.js";

/**
 * Result of a computation that may fail.
 *
 * @typeParam T - Success value type
 * @typeParam E - Error type
 *
 * @invariant Outcome contains exactly one of Success or Failure
 */
export type Outcome<T, E> = Success<T> | Failure<E>;

export interface Success<T> {
	readonly tag: "Success";
	readonly value: T;
}

export interface Failure<E> {
	readonly tag: "Failure";
	readonly error: E;
}

/**
 * Creates a Success outcome.
 *
 * @pure true
 * @complexity O(1)
 */
export const success = <T, E = never>(value: T): Outcome<T, E> => {
	const outcome: Success<T> = { tag: "Success", value };
	return Object.freeze(outcome);
};

/**
 * Creates a Failure outcome.
 *
 * @pure true
 * @complexity O(1)
 */
export const failure = <E, T = never>(error: E): Outcome<T, E> => {
	const outcome: Failure<E> = { tag: "Failure", error };
	return Object.freeze(outcome);
};

export const isSuccess = <T, E>(self: Outcome<T, E>): self is Success<T> =>
	self.tag === "Success";

export const isFailure = <T, E>(self: Outcome<T, E>): self is Failure<E> =>
	self.tag === "Failure";

/**
 * Maps over the success value. A failure is returned as the same instance.
 *
 * @pure true
 * @invariant map(success(a), f) = success(f(a))
 * @complexity O(1)
 *
 * @example
 * ```ts
 * pipe(success(21), map((n) => n * 2)); // success(42)
 * map(failure("boom"), (n: number) => n * 2); // failure("boom")
 * ```
 */
export const map: {
	<T, U>(f: (value: T) => U): <E>(self: Outcome<T, E>) => Outcome<U, E>;
	<T, E, U>(self: Outcome<T, E>, f: (value: T) => U): Outcome<U, E>;
} = dual(
	2,
	<T, E, U>(self: Outcome<T, E>, f: (value: T) => U): Outcome<U, E> =>
		self.tag === "Success" ? success(f(self.value)) : self,
);

/**
 * Maps over the error. A success is returned as the same instance.
 *
 * @pure true
 * @invariant mapError(failure(e), f) = failure(f(e))
 * @complexity O(1)
 */
export const mapError: {
	<E, F>(f: (error: E) => F): <T>(self: Outcome<T, E>) => Outcome<T, F>;
	<T, E, F>(self: Outcome<T, E>, f: (error: E) => F): Outcome<T, F>;
} = dual(
	2,
	<T, E, F>(self: Outcome<T, E>, f: (error: E) => F): Outcome<T, F> =>
		self.tag === "Failure" ? failure(f(self.error)) : self,
);

/**
 * Handlers for both variants of an outcome.
 */
export interface OutcomeCases<T, E, R> {
	readonly onSuccess: (value: T) => R;
	readonly onFailure: (error: E) => R;
}

/**
 * Total elimination of an outcome: exactly one handler runs.
 *
 * @pure true (if handlers are pure)
 * @complexity O(1)
 */
export const match: {
	<T, E, R>(cases: OutcomeCases<T, E, R>): (self: Outcome<T, E>) => R;
	<T, E, R>(self: Outcome<T, E>, cases: OutcomeCases<T, E, R>): R;
} = dual(
	2,
	<T, E, R>(self: Outcome<T, E>, cases: OutcomeCases<T, E, R>): R =>
		self.tag === "Success"
			? cases.onSuccess(self.value)
			: cases.onFailure(self.error),
);

/**
 * Extracts the success value or computes a fallback from the error.
 *
 * @pure true
 * @complexity O(1)
 */
export const getOrElse: {
	<E, U>(onFailure: (error: E) => U): <T>(self: Outcome<T, E>) => T | U;
	<T, E, U>(self: Outcome<T, E>, onFailure: (error: E) => U): T | U;
} = dual(
	2,
	<T, E, U>(self: Outcome<T, E>, onFailure: (error: E) => U): T | U =>
		self.tag === "Success" ? self.value : onFailure(self.error),
);

/**
 * Returns the success value.
 *
 * Prefer {@link match}; this accessor exists for program boundaries and tests.
 *
 * @throws PreconditionViolated when the outcome is a Failure
 * @precondition isSuccess(self)
 */
export const unwrap = <T, E>(self: Outcome<T, E>): T => {
	if (self.tag === "Success") return self.value;
	throw new PreconditionViolated({
		expected: "Success",
		message: "unwrap called on a Failure outcome",
	});
};

/**
 * Returns the error value.
 *
 * @throws PreconditionViolated when the outcome is a Success
 * @precondition isFailure(self)
 */
export const unwrapError = <T, E>(self: Outcome<T, E>): E => {
	if (self.tag === "Failure") return self.error;
	throw new PreconditionViolated({
		expected: "Failure",
		message: "unwrapError called on a Success outcome",
	});
};

/**
 * Lifts a value into an outcome by checking a predicate.
 *
 * @pure true
 * @postcondition predicate(value) → result = success(value)
 * @complexity O(1) plus the predicate
 *
 * @example
 * ```ts
 * const tryValidate = (raw: number) =>
 *   fromPredicate(raw, (n) => n >= 0, (n) => `${n} is negative`);
 * ```
 */
export const fromPredicate: {
	<T, E>(
		predicate: (value: T) => boolean,
		onFalse: (value: T) => E,
	): (value: T) => Outcome<T, E>;
	<T, E>(
		value: T,
		predicate: (value: T) => boolean,
		onFalse: (value: T) => E,
	): Outcome<T, E>;
} = dual(
	3,
	<T, E>(
		value: T,
		predicate: (value: T) => boolean,
		onFalse: (value: T) => E,
	): Outcome<T, E> =>
		predicate(value) ? success(value) : failure(onFalse(value)),
);

/**
 * Lifts a possibly absent value; `null` and `undefined` become a Failure.
 *
 * @pure true
 * @complexity O(1)
 */
export const fromNullable: {
	<E>(onNullish: () => E): <T>(value: T) => Outcome<NonNullable<T>, E>;
	<T, E>(value: T, onNullish: () => E): Outcome<NonNullable<T>, E>;
} = dual(
	2,
	<T, E>(value: T, onNullish: () => E): Outcome<NonNullable<T>, E> =>
		value === null || value === undefined
			? failure(onNullish())
			: success(value),
);
