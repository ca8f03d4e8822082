// CHANGE: Tests for the Option traversal bridge
// FORMAT THEOREM: traverseOption(none, v) = success(none) ∧ v never invoked

import { Option, pipe } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	failure,
	map,
	type Outcome,
	success,
} from "../../src/core/outcome.js";
import {
	sequenceOption,
	traverseOption,
	tryCreateOptional,
} from "../../src/core/optional.js";
import { countingCapability, Longitude } from "../utils/coordinates.js";

const even = (n: number): Outcome<number, string> =>
	n % 2 === 0 ? success(n) : failure(`${n} is odd`);

describe("traverseOption", () => {
	it("maps None to Success(None) without invoking the validator", () => {
		let calls = 0;
		const result = traverseOption(Option.none(), (n: number) => {
			calls += 1;
			return even(n);
		});
		expect(result).toEqual(success(Option.none()));
		expect(calls).toBe(0);
	});

	it("wraps a present valid value in Some", () => {
		expect(traverseOption(Option.some(4), even)).toEqual(
			success(Option.some(4)),
		);
	});

	it("passes the validator's failure through", () => {
		expect(
			pipe(
				Option.some(3),
				traverseOption(even),
			),
		).toEqual(failure("3 is odd"));
	});

	it("equals the validator's outcome re-wrapped in Option for every present value", () => {
		fc.assert(
			fc.property(fc.integer(), (n) => {
				expect(traverseOption(Option.some(n), even)).toEqual(
					map(even(n), Option.some),
				);
			}),
		);
	});

	it("never runs the validator for None whatever the validator is", () => {
		fc.assert(
			fc.property(fc.boolean(), (accept) => {
				let calls = 0;
				const validator = (raw: string): Outcome<string, string> => {
					calls += 1;
					return accept ? success(raw) : failure(raw);
				};
				expect(traverseOption(Option.none(), validator)).toEqual(
					success(Option.none()),
				);
				expect(calls).toBe(0);
			}),
		);
	});
});

describe("sequenceOption", () => {
	it("turns Some(Success) into Success(Some)", () => {
		expect(sequenceOption(Option.some(success(1)))).toEqual(
			success(Option.some(1)),
		);
	});

	it("turns Some(Failure) into Failure", () => {
		expect(sequenceOption(Option.some(failure("bad")))).toEqual(
			failure("bad"),
		);
	});

	it("turns None into Success(None)", () => {
		expect(sequenceOption(Option.none())).toEqual(success(Option.none()));
	});
});

describe("tryCreateOptional", () => {
	it("skips validation for an absent field", () => {
		const capability = countingCapability(Longitude);
		expect(tryCreateOptional(capability, "longitude", Option.none())).toEqual(
			success(Option.none()),
		);
		expect(capability.calls()).toBe(0);
	});

	it("tags the failure of a present field", () => {
		expect(tryCreateOptional(Longitude, "longitude", Option.some(400))).toEqual(
			failure({ label: "longitude", error: "400 is an invalid longitude value" }),
		);
	});

	it("wraps a valid present field in Some", () => {
		const result = tryCreateOptional(Longitude, "longitude", Option.some(10));
		expect(result.tag).toBe("Success");
		if (result.tag === "Success") {
			expect(Option.isSome(result.value)).toBe(true);
			expect(Option.getOrUndefined(result.value)?.degrees).toBe(10);
		}
	});
});
