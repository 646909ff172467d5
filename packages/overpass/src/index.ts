/**
 * @stoplink/overpass - Read transit platforms from Overpass API exports.
 *
 * @example
 * ```ts
 * import { readMapStops } from "@stoplink/overpass"
 *
 * // Export of: [out:json]; node["public_transport"="platform"](area); out;
 * const stops = await readMapStops("platforms.json")
 * ```
 *
 * @module @stoplink/overpass
 */

export { mapStopsFromOverpass, readMapStops } from "./map-stops"
export {
	type OverpassDocument,
	OverpassDocumentSchema,
	type OverpassElement,
	OverpassElementSchema,
	type OverpassStopElement,
	OverpassStopElementSchema,
} from "./types"
