import { InvalidCoordinate } from "./errors"
import type { ILonLat } from "./types"

/**
 * True when both values are finite WGS84 degrees within range.
 */
export function isValidCoordinate(point: ILonLat): boolean {
	return (
		Number.isFinite(point.lat) &&
		Number.isFinite(point.lon) &&
		Math.abs(point.lat) <= 90 &&
		Math.abs(point.lon) <= 180
	)
}

/**
 * Throw `InvalidCoordinate` unless the point is a valid WGS84 coordinate.
 * @param label - Identifies the point in the error message.
 */
export function assertValidCoordinate(
	point: ILonLat,
	label = "point",
): void {
	if (!isValidCoordinate(point)) {
		throw new InvalidCoordinate(
			`${label} has invalid coordinates (lat ${point.lat}, lon ${point.lon})`,
		)
	}
}
