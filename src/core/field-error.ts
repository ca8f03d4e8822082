// CHANGE: Field-labelled error carried by tryCreate failures
// WHY: Several fields may share one domain type, so the error alone cannot say which field failed
// PURITY: CORE
// INVARIANT: label is opaque; it is never validated, normalised or deduplicated

/**
 * A domain validation error paired with the caller-chosen field label.
 *
 * This is the `(label, message)` pair: `error` holds the message part,
 * typed as whatever the domain type reports (a string for most types).
 *
 * @typeParam E - The domain type's own error representation
 */
export interface FieldError<E> {
	readonly label: string;
	readonly error: E;
}

/**
 * @pure true
 * @complexity O(1)
 */
export const fieldError = <E>(label: string, error: E): FieldError<E> =>
	Object.freeze({ label, error });
