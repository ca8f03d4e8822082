// CHANGE: Effect interop for outcomes, with logging kept at the shell boundary
// WHY: Callers running inside Effect programs need outcomes as Effects, and CORE must stay free of I/O
// SOURCE: https://effect.website/docs/observability/logging
// PURITY: SHELL (produces Effects that log through the Effect logger)
// INVARIANT: toEffect preserves the variant and payload; CORE never logs
// COMPLEXITY: O(1), plus O(n) log lines for a failure carrying n errors

import { Effect, Either, pipe } from "effect";

import type { Validation } from "../core/accumulate.js";
import { failure, type Outcome, success } from "../core/outcome.js";

/**
 * Converts an outcome into an Effect that succeeds or fails with its payload.
 *
 * @pure true (returns a description, runs nothing)
 * @effect Effect<T, E, never>
 * @complexity O(1)
 */
export const toEffect = <T, E>(self: Outcome<T, E>): Effect.Effect<T, E> =>
	self.tag === "Success" ? Effect.succeed(self.value) : Effect.fail(self.error);

export const toEither = <T, E>(self: Outcome<T, E>): Either.Either<T, E> =>
	self.tag === "Success" ? Either.right(self.value) : Either.left(self.error);

export const fromEither = <T, E>(either: Either.Either<T, E>): Outcome<T, E> =>
	Either.match(either, {
		onLeft: (error) => failure(error),
		onRight: (value) => success(value),
	});

export interface LogOptions<E> {
	/** Annotation attached to every log line, usually the validated entity. */
	readonly scope: string;
	/** Renders one error; defaults to `String(error)`. */
	readonly describe?: (error: E) => string;
}

const withLogging = <T, F>(
	self: Outcome<T, F>,
	scope: string,
	render: (error: F) => ReadonlyArray<string>,
): Effect.Effect<T, F> =>
	pipe(
		toEffect(self),
		Effect.tap(() => Effect.logDebug("validation succeeded")),
		Effect.tapError((error) =>
			Effect.forEach(
				render(error),
				(line) => Effect.logWarning(`validation failed: ${line}`),
				{ discard: true },
			),
		),
		Effect.annotateLogs("scope", scope),
	);

const describeWith = <E>(options: LogOptions<E>): ((error: E) => string) =>
	options.describe ?? ((error: E) => String(error));

/**
 * {@link toEffect} with logging: a debug line on success and one warning
 * for the error on failure, annotated with `scope`.
 *
 * The error is rendered whole, whatever its shape; use {@link loggedAll}
 * for a validation's error list.
 *
 * The logger, its level and its sink come from the caller's Effect layers
 * (`Logger.replace`, `Logger.minimumLogLevel`).
 *
 * @pure false - logs when run
 * @effect Effect<T, E, never>
 *
 * @example
 * ```ts
 * const program = logged(tryCreate(Latitude, "latitude", 300), {
 *   scope: "coordinate",
 *   describe: ({ label, error }) => `${label}: ${error}`,
 * });
 * Effect.runSync(Effect.either(program));
 * ```
 */
export const logged = <T, E>(
	self: Outcome<T, E>,
	options: LogOptions<E>,
): Effect.Effect<T, E> => {
	const describe = describeWith(options);
	return withLogging(self, options.scope, (error) => [describe(error)]);
};

/**
 * {@link logged} for a {@link Validation}: one warning per accumulated
 * error, in order.
 *
 * @pure false - logs when run
 * @effect Effect<T, ReadonlyArray<E>, never>
 */
export const loggedAll = <T, E>(
	self: Validation<T, E>,
	options: LogOptions<E>,
): Effect.Effect<T, ReadonlyArray<E>> => {
	const describe = describeWith(options);
	return withLogging(self, options.scope, (errors) => errors.map(describe));
};
