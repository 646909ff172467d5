import type { ILonLat, LonLat } from "./types"

const EARTH_RADIUS_M = 6371008.8
const RAD = Math.PI / 180

/**
 * Calculate the haversine distance between two LonLat points.
 * @param p1 - The first point
 * @param p2 - The second point
 * @returns The haversine distance in meters
 */
export function haversineDistance(p1: LonLat, p2: LonLat): number {
	const dLat = (p2[1] - p1[1]) * RAD
	const dLon = (p2[0] - p1[0]) * RAD
	const a =
		Math.sin(dLat / 2) ** 2 +
		Math.sin(dLon / 2) ** 2 * Math.cos(p1[1] * RAD) * Math.cos(p2[1] * RAD)
	return 2 * EARTH_RADIUS_M * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a))
}

/**
 * Distance in meters between two objects carrying `lon` and `lat`.
 */
export function stopDistance(a: ILonLat, b: ILonLat): number {
	return haversineDistance([a.lon, a.lat], [b.lon, b.lat])
}
