// CHANGE: Typed programmer-error ADT for the outcome core using Effect.Data
// WHY: Reading the wrong variant of an outcome is a caller bug, not a validation failure
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Validation failures are values (Failure); only misuse of an accessor throws
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Raised when a payload accessor is asked for the variant an outcome does not hold.
 *
 * @pure true (Data class)
 * @invariant message.length > 0
 * @complexity O(1)
 */
export class PreconditionViolated extends Data.TaggedError(
	"PreconditionViolated",
)<{
	readonly expected: "Success" | "Failure";
	readonly message: string;
}> {}

/**
 * Union of errors the library itself can raise.
 *
 * @pure true
 */
export type OutcomeError = PreconditionViolated;
