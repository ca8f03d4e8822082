// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are pure functions, typed interfaces, or Effect descriptions

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOME (two-variant result)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	Failure,
	Outcome,
	OutcomeCases,
	Success,
} from "./core/outcome.js";
export {
	failure,
	fromNullable,
	fromPredicate,
	getOrElse,
	isFailure,
	isSuccess,
	map,
	mapError,
	match,
	success,
	unwrap,
	unwrapError,
} from "./core/outcome.js";

/**
 * Thrown only by `unwrap` / `unwrapError` on the wrong variant.
 */
export { type OutcomeError, PreconditionViolated } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SEQUENTIAL (short-circuit)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	bind,
	bindScope,
	Do,
	tap,
	traverseSequential,
} from "./core/sequential.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ACCUMULATING (validation applicative)
// ═══════════════════════════════════════════════════════════════════════════════

export type { Validation } from "./core/accumulate.js";
export {
	all,
	apply,
	Collector,
	collect,
	invalid,
	ofOutcome,
	traverseArray,
	valid,
	zipWith,
} from "./core/accumulate.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SMART CONSTRUCTORS
// ═══════════════════════════════════════════════════════════════════════════════

export { type FieldError, fieldError } from "./core/field-error.js";
export {
	fieldValidator,
	tryCreate,
	tryCreateValidated,
	type Validatable,
} from "./core/try-create.js";
export {
	sequenceOption,
	traverseOption,
	tryCreateOptional,
} from "./core/optional.js";

// ═══════════════════════════════════════════════════════════════════════════════
// EFFECT INTEROP (shell)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	fromEither,
	type LogOptions,
	logged,
	loggedAll,
	toEffect,
	toEither,
} from "./shell/effect.js";
