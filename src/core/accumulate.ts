// CHANGE: Error-accumulating (applicative) combinators over ordered error lists
// WHY: Independent fields must all be checked so one pass reports every problem to the caller
// PURITY: CORE
// FORMAT THEOREM: ∀a, b: errors(zipWith(a, b, f)) = errors(a) ++ errors(b)
// INVARIANT: Every input is evaluated by the caller before combination; no error is dropped
// INVARIANT: Concatenation flattens exactly one level; error elements are never inspected
// COMPLEXITY: O(|errors(a)| + |errors(b)|) per combination step; O(n + |errors|) for all/traverseArray

import { dual } from "effect/Function";

import { failure, type Outcome, success } from "./outcome.js";

/**
 * Outcome whose failure is an ordered list of errors.
 *
 * @invariant order of errors = left-to-right order of combination
 */
export type Validation<T, E> = Outcome<T, ReadonlyArray<E>>;

export const valid = <T, E = never>(value: T): Validation<T, E> =>
	success(value);

export const invalid = <E, T = never>(error: E): Validation<T, E> =>
	failure(Object.freeze([error]));

/**
 * Lifts a single-error outcome into a validation with a one-element error list.
 *
 * @pure true
 * @complexity O(1)
 */
export const ofOutcome = <T, E>(self: Outcome<T, E>): Validation<T, E> =>
	self.tag === "Success" ? self : invalid(self.error);

const errorsOf = <T, E>(self: Validation<T, E>): ReadonlyArray<E> =>
	self.tag === "Failure" ? self.error : [];

/**
 * Combines two independently computed validations.
 *
 * Both successes give `success(f(a, b))`; otherwise the result fails with
 * the errors of `self` followed by the errors of `that`.
 *
 * @pure true (if f is pure)
 * @invariant f is called only when both inputs succeed
 * @complexity O(|errors(self)| + |errors(that)|)
 */
export const zipWith: {
	<A, B, E2, C>(
		that: Validation<B, E2>,
		f: (a: A, b: B) => C,
	): <E1>(self: Validation<A, E1>) => Validation<C, E1 | E2>;
	<A, E1, B, E2, C>(
		self: Validation<A, E1>,
		that: Validation<B, E2>,
		f: (a: A, b: B) => C,
	): Validation<C, E1 | E2>;
} = dual(
	3,
	<A, E1, B, E2, C>(
		self: Validation<A, E1>,
		that: Validation<B, E2>,
		f: (a: A, b: B) => C,
	): Validation<C, E1 | E2> => {
		if (self.tag === "Success" && that.tag === "Success") {
			return success(f(self.value, that.value));
		}
		const errors: ReadonlyArray<E1 | E2> = [
			...errorsOf(self),
			...errorsOf(that),
		];
		return failure(Object.freeze(errors));
	},
);

/**
 * Applies a validated curried function to a validated argument.
 *
 * This is one step of a curried left fold: starting from `valid(ctor)`,
 * each `apply` feeds the next argument and appends that argument's errors.
 *
 * @pure true
 * @complexity O(|errors|)
 *
 * @example
 * ```ts
 * const makeCoordinate = (latitude: Latitude) => (longitude: Longitude) =>
 *   ({ latitude, longitude });
 *
 * pipe(
 *   valid(makeCoordinate),
 *   apply(tryCreateValidated(Latitude, "latitude", 300)),
 *   apply(tryCreateValidated(Longitude, "longitude", 400)),
 * );
 * ```
 */
export const apply: {
	<A, E2>(
		that: Validation<A, E2>,
	): <B, E1>(self: Validation<(a: A) => B, E1>) => Validation<B, E1 | E2>;
	<A, B, E1, E2>(
		self: Validation<(a: A) => B, E1>,
		that: Validation<A, E2>,
	): Validation<B, E1 | E2>;
} = dual(
	2,
	<A, B, E1, E2>(
		self: Validation<(a: A) => B, E1>,
		that: Validation<A, E2>,
	): Validation<B, E1 | E2> => zipWith(self, that, (fn, a) => fn(a)),
);

/**
 * Builder for combining any number of validations positionally.
 *
 * Each `and` appends one validation; `map` hands the collected values to a
 * constructor in the order they were added.
 *
 * @invariant errors are reported in the order of the `and` calls
 * @complexity O(k + |errors|) per `and`, k = arguments collected so far;
 * meant for constructor arity, use {@link all} for long lists
 */
export class Collector<Args extends ReadonlyArray<unknown>, E> {
	constructor(readonly validation: Validation<Args, E>) {}

	and<A, E2>(input: Validation<A, E2>): Collector<[...Args, A], E | E2> {
		return new Collector(
			zipWith(this.validation, input, (args, a): [...Args, A] => [...args, a]),
		);
	}

	map<R>(ctor: (...args: Args) => R): Validation<R, E> {
		return this.validation.tag === "Success"
			? success(ctor(...this.validation.value))
			: this.validation;
	}
}

/**
 * Starts an empty {@link Collector}.
 *
 * With no `and` call, `collect().map(ctor)` succeeds with `ctor()`: a
 * constructor of no arguments has nothing to validate.
 *
 * @example
 * ```ts
 * collect()
 *   .and(tryCreateValidated(Latitude, "latitude", 300))
 *   .and(tryCreateValidated(Longitude, "longitude", 400))
 *   .map((latitude, longitude) => ({ latitude, longitude }));
 * ```
 */
export const collect = (): Collector<[], never> =>
	new Collector<[], never>(valid<[]>([]));

/**
 * Combines a homogeneous list of validations, keeping values in input order.
 *
 * @pure true
 * @complexity O(n + |errors|)
 */
export const all = <T, E>(
	validations: ReadonlyArray<Validation<T, E>>,
): Validation<ReadonlyArray<T>, E> => {
	// Local mutation only; each array escapes once, inside the result
	const values: T[] = [];
	const errors: E[] = [];
	let failed = false;
	for (const validation of validations) {
		if (validation.tag === "Success") {
			values.push(validation.value);
		} else {
			failed = true;
			for (const error of validation.error) errors.push(error);
		}
	}
	return failed ? failure(Object.freeze(errors)) : success(values);
};

/**
 * Validates every item, without short-circuit, and accumulates all errors.
 *
 * @pure true (if f is pure)
 * @invariant f is called exactly once per item
 * @complexity O(n + |errors|) plus n calls of f
 */
export const traverseArray: {
	<A, B, E>(
		f: (item: A, index: number) => Validation<B, E>,
	): (items: ReadonlyArray<A>) => Validation<ReadonlyArray<B>, E>;
	<A, B, E>(
		items: ReadonlyArray<A>,
		f: (item: A, index: number) => Validation<B, E>,
	): Validation<ReadonlyArray<B>, E>;
} = dual(
	2,
	<A, B, E>(
		items: ReadonlyArray<A>,
		f: (item: A, index: number) => Validation<B, E>,
	): Validation<ReadonlyArray<B>, E> => all(items.map(f)),
);
