import { describe, expect, it } from "vitest"
import { assertValidCoordinate, isValidCoordinate } from "../src/coordinates"
import { InvalidCoordinate, isStoplinkError } from "../src/errors"

describe("isValidCoordinate", () => {
	it("accepts WGS84 degrees", () => {
		expect(isValidCoordinate({ lat: 44.43, lon: 26.1 })).toBe(true)
		expect(isValidCoordinate({ lat: -90, lon: 180 })).toBe(true)
	})

	it("rejects NaN, infinities and out of range values", () => {
		expect(isValidCoordinate({ lat: Number.NaN, lon: 0 })).toBe(false)
		expect(isValidCoordinate({ lat: 0, lon: Number.POSITIVE_INFINITY })).toBe(false)
		expect(isValidCoordinate({ lat: 90.5, lon: 0 })).toBe(false)
		expect(isValidCoordinate({ lat: 0, lon: -180.1 })).toBe(false)
	})
})

describe("assertValidCoordinate", () => {
	it("throws InvalidCoordinate naming the point", () => {
		let thrown: unknown
		try {
			assertValidCoordinate({ lat: 91, lon: 10 }, "stop S1")
		} catch (error) {
			thrown = error
		}
		expect(thrown).toBeInstanceOf(InvalidCoordinate)
		expect(isStoplinkError(thrown, "INVALID_COORDINATE")).toBe(true)
		expect(isStoplinkError(thrown, "DUPLICATE_KEY")).toBe(false)
		expect(thrown).toHaveProperty(
			"message",
			"stop S1 has invalid coordinates (lat 91, lon 10)",
		)
	})
})
