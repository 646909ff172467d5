import { writeFile } from "node:fs/promises"
import { join } from "node:path"
import { strToU8, zipSync } from "fflate"
import type { Prompt } from "../src/terminal-reviewer"

export const HEADER = "gtfs_stop_id,gtfs_stop_name,osm:id,osm:name\n"

const STOPS_TXT = `stop_id,stop_name,stop_lat,stop_lon,location_type
S1,Main St,44.43,26.1,0
S2,Second,44.44,26.11,0
S3,Central Station,44.45,26.12,1
`

const AGENCY_TXT = `agency_id,agency_name,agency_url,agency_timezone
A1,City Transit,https://transit.example.com,Europe/Bucharest
`

/** 101 is 14 m from S1, 103 is 11 m from S2, 102 is far from all. */
const OVERPASS = {
	version: 0.6,
	elements: [
		{
			type: "node",
			id: 101,
			lat: 44.4301,
			lon: 26.1001,
			tags: { name: "Strada Principala", public_transport: "platform" },
		},
		{ type: "node", id: 102, lat: 44.5, lon: 26.2, tags: { name: "Far Away" } },
		{
			type: "node",
			id: 103,
			lat: 44.4401,
			lon: 26.11,
			tags: { name: "Second Stop" },
		},
	],
}

export interface Inputs {
	gtfsFile: string
	osmFile: string
	outputFile: string
}

/** Write a small GTFS feed and Overpass export into `dir`. */
export async function writeInputs(dir: string): Promise<Inputs> {
	const gtfsFile = join(dir, "feed.zip")
	const osmFile = join(dir, "stops.json")
	await writeFile(
		gtfsFile,
		zipSync(
			{ "stops.txt": strToU8(STOPS_TXT), "agency.txt": strToU8(AGENCY_TXT) },
			{ level: 0 },
		),
	)
	await writeFile(osmFile, JSON.stringify(OVERPASS))
	return { gtfsFile, osmFile, outputFile: join(dir, "correlation.csv") }
}

/** Prompt answering from a script and recording what it was sent. */
export class ScriptedPrompt implements Prompt {
	readonly questions: string[] = []
	readonly output: string[] = []
	closed = false

	constructor(private readonly answers: (string | null)[]) {}

	async ask(question: string) {
		this.questions.push(question)
		const answer = this.answers.shift()
		if (answer === undefined) throw new Error(`no answer scripted for ${question}`)
		return answer
	}

	write(text: string) {
		this.output.push(text)
	}

	close() {
		this.closed = true
	}
}
