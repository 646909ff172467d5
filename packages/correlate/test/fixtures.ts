import type { MapStop, TransitStop } from "@stoplink/shared/types"

export const MAIN_ST: TransitStop = {
	id: "S1",
	name: "Main St",
	lat: 44.43,
	lon: 26.1,
}

/** About 14 m from MAIN_ST. */
export const W1: MapStop = {
	id: "W1",
	type: "node",
	name: "Strada Principala",
	lat: 44.4301,
	lon: 26.1001,
}

/** About 12 km from MAIN_ST. */
export const W2: MapStop = {
	id: "W2",
	type: "node",
	name: "Far Away",
	lat: 44.5,
	lon: 26.2,
}

/** Meters per 0.0001 degree of latitude. */
export const M_PER_1E4_DEG = 11.119508

export const ORIGIN: TransitStop = { id: "T0", name: "Origin", lat: 0, lon: 0 }

export function mapStop(
	id: string,
	lat: number,
	lon: number,
	name?: string,
): MapStop {
	return name === undefined
		? { id, type: "node", lat, lon }
		: { id, type: "node", lat, lon, name }
}
