// CHANGE: Tests for the smart-constructor adapter
// FORMAT THEOREM: tryValidate(raw) = failure(e) ⇒ tryCreate(C, label, raw) = failure({ label, error: e })

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { fieldError } from "../../src/core/field-error.js";
import { failure, type Outcome, success } from "../../src/core/outcome.js";
import {
	fieldValidator,
	tryCreate,
	tryCreateValidated,
	type Validatable,
} from "../../src/core/try-create.js";
import { Latitude } from "../utils/coordinates.js";

/** Plain-object capability: non-empty trimmed strings. */
const NonEmpty: Validatable<string, string, string> = {
	tryValidate: (raw) =>
		raw.trim().length > 0 ? success(raw.trim()) : failure("must not be empty"),
};

describe("fieldError", () => {
	it("pairs the label with the message under error, frozen", () => {
		const tagged = fieldError("latitude", "300 is an invalid latitude value");
		expect(tagged).toEqual({
			label: "latitude",
			error: "300 is an invalid latitude value",
		});
		expect(Object.isFrozen(tagged)).toBe(true);
	});
});

describe("tryCreate", () => {
	it("returns the validated value unchanged on success", () => {
		expect(tryCreate(NonEmpty, "name", "  Ada ")).toEqual(success("Ada"));
	});

	it("tags the domain error with the caller's label", () => {
		expect(tryCreate(NonEmpty, "name", "   ")).toEqual(
			failure({ label: "name", error: "must not be empty" }),
		);
	});

	it("works with a class exposing a static tryValidate", () => {
		const result = tryCreate(Latitude, "lat", 45);
		expect(result.tag).toBe("Success");
		if (result.tag === "Success") {
			expect(result.value).toBeInstanceOf(Latitude);
			expect(result.value.degrees).toBe(45);
		}
		expect(tryCreate(Latitude, "lat", -91)).toEqual(
			failure(fieldError("lat", "-91 is an invalid latitude value")),
		);
	});

	it("accepts duplicate labels across calls", () => {
		const first = tryCreate(NonEmpty, "field", "");
		const second = tryCreate(NonEmpty, "field", "");
		expect(first).toEqual(second);
	});

	it("matches tryValidate on success and tags it on failure for any input", () => {
		const parity: Validatable<number, number, string> = {
			tryValidate: (raw) =>
				raw % 2 === 0 ? success(raw / 2) : failure(`${raw} is odd`),
		};
		fc.assert(
			fc.property(fc.string(), fc.integer(), (label, raw) => {
				const direct: Outcome<number, string> = parity.tryValidate(raw);
				const tagged = tryCreate(parity, label, raw);
				if (direct.tag === "Success") {
					expect(tagged).toEqual(direct);
				} else {
					expect(tagged).toEqual(failure({ label, error: direct.error }));
				}
			}),
		);
	});
});

describe("tryCreateValidated", () => {
	it("wraps the tagged error in a one-element list", () => {
		expect(tryCreateValidated(NonEmpty, "title", "")).toEqual(
			failure([{ label: "title", error: "must not be empty" }]),
		);
	});

	it("passes successes through", () => {
		expect(tryCreateValidated(NonEmpty, "title", "x")).toEqual(success("x"));
	});
});

describe("fieldValidator", () => {
	it("behaves like tryCreate with the capability and label fixed", () => {
		const validateName = fieldValidator(NonEmpty, "name");
		expect(validateName("")).toEqual(tryCreate(NonEmpty, "name", ""));
		expect(validateName("ok")).toEqual(success("ok"));
	});
});
