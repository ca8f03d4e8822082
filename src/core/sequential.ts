// CHANGE: Short-circuiting sequential combinators (flatMap and scoped chaining)
// WHY: Dependent steps need the previous value, so nothing after the first failure may run
// PURITY: CORE
// FORMAT THEOREM: ∀e, f: bind(failure(e), f) = failure(e) ∧ f is not invoked
// INVARIANT: In a chain of N steps only the steps up to the first Failure run
// COMPLEXITY: O(1) per step; O(k) for traverseSequential where k = index of first failure

import { dual } from "effect/Function";

import { type Outcome, success } from "./outcome.js";

/**
 * Chains a computation on the success value, stopping at the first failure.
 *
 * The error type widens to the union of both steps so that steps with
 * different error types can share a pipeline.
 *
 * @pure true (if f is pure)
 * @invariant isFailure(self) → result = self ∧ f never called
 * @complexity O(1) plus f
 *
 * @example
 * ```ts
 * pipe(
 *   tryCreate(Latitude, "latitude", raw.latitude),
 *   bind((latitude) =>
 *     pipe(
 *       tryCreate(Longitude, "longitude", raw.longitude),
 *       map((longitude) => ({ latitude, longitude })),
 *     ),
 *   ),
 * );
 * ```
 */
export const bind: {
	<T, U, E2>(
		f: (value: T) => Outcome<U, E2>,
	): <E1>(self: Outcome<T, E1>) => Outcome<U, E1 | E2>;
	<T, E1, U, E2>(
		self: Outcome<T, E1>,
		f: (value: T) => Outcome<U, E2>,
	): Outcome<U, E1 | E2>;
} = dual(
	2,
	<T, E1, U, E2>(
		self: Outcome<T, E1>,
		f: (value: T) => Outcome<U, E2>,
	): Outcome<U, E1 | E2> => (self.tag === "Success" ? f(self.value) : self),
);

/**
 * Empty scope that starts a {@link bindScope} chain.
 */
export const Do: Outcome<object, never> = success({});

/**
 * Extends an accumulated scope with the fields produced by the next step.
 *
 * Each step sees every field bound before it, which is how the
 * "stop at the first error" pipelines thread intermediate successes.
 *
 * A key the step returns again replaces the earlier binding: later bindings
 * win. Re-bind a key only with a value of the same type, since the result
 * is typed `A & B`.
 *
 * @pure true (if f is pure)
 * @invariant isFailure(self) → result = self ∧ f never called
 * @complexity O(|A| + |B|) for the object spread
 *
 * @example
 * ```ts
 * pipe(
 *   Do,
 *   bindScope(() => pipe(tryCreate(Latitude, "latitude", 12), map((latitude) => ({ latitude })))),
 *   bindScope(({ latitude }) => ...),
 * );
 * ```
 */
export const bindScope: {
	<A extends object, B extends object, E2>(
		f: (scope: A) => Outcome<B, E2>,
	): <E1>(self: Outcome<A, E1>) => Outcome<A & B, E1 | E2>;
	<A extends object, E1, B extends object, E2>(
		self: Outcome<A, E1>,
		f: (scope: A) => Outcome<B, E2>,
	): Outcome<A & B, E1 | E2>;
} = dual(
	2,
	<A extends object, E1, B extends object, E2>(
		self: Outcome<A, E1>,
		f: (scope: A) => Outcome<B, E2>,
	): Outcome<A & B, E1 | E2> => {
		if (self.tag === "Failure") return self;
		const scope = self.value;
		const next = f(scope);
		return next.tag === "Success" ? success({ ...scope, ...next.value }) : next;
	},
);

/**
 * Runs an observer on the success value and returns the outcome unchanged.
 *
 * @pure false when the observer has effects
 * @complexity O(1) plus f
 */
export const tap: {
	<T>(f: (value: T) => void): <E>(self: Outcome<T, E>) => Outcome<T, E>;
	<T, E>(self: Outcome<T, E>, f: (value: T) => void): Outcome<T, E>;
} = dual(
	2,
	<T, E>(self: Outcome<T, E>, f: (value: T) => void): Outcome<T, E> => {
		if (self.tag === "Success") f(self.value);
		return self;
	},
);

/**
 * Validates items left to right and stops at the first failure.
 *
 * @pure true (if f is pure)
 * @invariant items after the first failing one are never passed to f
 * @complexity O(k) where k = index of the first failure (or n)
 */
export const traverseSequential: {
	<A, B, E>(
		f: (item: A, index: number) => Outcome<B, E>,
	): (items: ReadonlyArray<A>) => Outcome<ReadonlyArray<B>, E>;
	<A, B, E>(
		items: ReadonlyArray<A>,
		f: (item: A, index: number) => Outcome<B, E>,
	): Outcome<ReadonlyArray<B>, E>;
} = dual(
	2,
	<A, B, E>(
		items: ReadonlyArray<A>,
		f: (item: A, index: number) => Outcome<B, E>,
	): Outcome<ReadonlyArray<B>, E> => {
		// Local mutation only; the array escapes once, inside the Success
		const values: B[] = [];
		for (const [index, item] of items.entries()) {
			const step = f(item, index);
			if (step.tag === "Failure") return step;
			values.push(step.value);
		}
		return success(values);
	},
);
