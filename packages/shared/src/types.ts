/**
 * Shared stop and coordinate types.
 *
 * @module
 */

export type LonLat = [lon: number, lat: number]

export interface ILonLat {
	lon: number
	lat: number
}

export type OsmEntityType = "node" | "way" | "relation"

export interface OsmTags {
	[key: string]: string
}

/**
 * A stop from a GTFS feed's stops.txt.
 */
export interface TransitStop extends ILonLat {
	id: string
	name: string
	description?: string
	/** 0 = stop, 1 = station, 2 = entrance/exit, 3 = generic node, 4 = boarding area */
	locationType?: string
}

/**
 * A transit platform taken from an Overpass export. The numeric OSM id is kept
 * as a string so it compares the same way GTFS ids do.
 */
export interface MapStop extends ILonLat {
	id: string
	type: OsmEntityType
	name?: string
	tags?: OsmTags
}
