import { zipSync } from "fflate"

const encoder = new TextEncoder()

/**
 * Zip a set of GTFS files given as CSV text. Entries are stored without
 * compression.
 */
export function createGtfsZip(files: Record<string, string>): Uint8Array {
	const entries: Record<string, Uint8Array> = {}
	for (const [name, text] of Object.entries(files)) {
		entries[name] = encoder.encode(text)
	}
	return zipSync(entries, { level: 0 })
}

export const AGENCY_TXT = `agency_id,agency_name,agency_url,agency_timezone
agency1,Test Transit,https://example.com,Europe/Bucharest`

export const STOPS_TXT = `stop_id,stop_name,stop_desc,stop_lat,stop_lon,location_type
S1,Main St,,44.43,26.10,0
S2,"Piata Unirii, North",Near the fountain,44.4269,26.1025,0
S3,Central Station,,44.4468,26.0755,1`

/**
 * Create a complete test GTFS zip with sample data.
 */
export function createTestGtfsZip(): Uint8Array {
	return createGtfsZip({
		"agency.txt": AGENCY_TXT,
		"stops.txt": STOPS_TXT,
		"routes.txt": `route_id,route_short_name,route_type
R1,1,3`,
		"trips.txt": `trip_id,route_id,service_id
T1,R1,weekday`,
		"stop_times.txt": `trip_id,stop_id,stop_sequence
T1,S1,1
T1,S2,2`,
	})
}
