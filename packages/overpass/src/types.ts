/**
 * Overpass API JSON export schemas.
 *
 * Only the fields stop correlation needs are validated; everything else on an
 * element passes through untouched.
 *
 * @module
 */

import { z } from "zod"

const nonEmptyString = z.string().min(1)

export const OverpassCenterSchema = z.object({
	lat: z.number(),
	lon: z.number(),
})

/**
 * A raw element as it appears in the `elements` array. Nodes carry `lat`
 * and `lon`; ways and relations only carry a `center` when the query ends
 * with `out center`.
 */
export const OverpassElementSchema = z
	.object({
		type: nonEmptyString,
		id: z.number().int(),
		lat: z.number().optional(),
		lon: z.number().optional(),
		center: OverpassCenterSchema.optional(),
		tags: z.record(z.string(), z.string()).optional(),
	})
	.passthrough()

/**
 * An element that can stand as a map stop: a known entity type and a point.
 */
export const OverpassStopElementSchema = OverpassElementSchema.extend({
	type: z.enum(["node", "way", "relation"]),
}).transform((element, ctx) => {
	const point =
		element.lat !== undefined && element.lon !== undefined
			? { lat: element.lat, lon: element.lon }
			: element.center
	if (!point) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: "element has neither lat/lon nor center",
			path: ["lat"],
		})
		return z.NEVER
	}
	return {
		type: element.type,
		id: element.id,
		lat: point.lat,
		lon: point.lon,
		tags: element.tags,
	}
})

export const OverpassDocumentSchema = z
	.object({
		version: z.number().optional(),
		generator: z.string().optional(),
		elements: z.array(z.unknown()),
	})
	.passthrough()

export type OverpassElement = z.infer<typeof OverpassElementSchema>
export type OverpassStopElement = z.output<typeof OverpassStopElementSchema>
export type OverpassDocument = z.infer<typeof OverpassDocumentSchema>
