/**
 * File operations the correlation store needs, behind an interface so tests
 * can simulate failures at each step of a write.
 *
 * @module
 */

import { open, readFile, rename, rm } from "node:fs/promises"

export interface StoreFileSystem {
	/** File contents, or null when the file does not exist. */
	read(path: string): Promise<Uint8Array | null>
	/** Create or truncate `path`, write `data` and fsync before resolving. */
	writeSynced(path: string, data: Uint8Array): Promise<void>
	rename(from: string, to: string): Promise<void>
	remove(path: string): Promise<void>
	/** fsync a directory so a rename inside it is durable. */
	syncDirectory(path: string): Promise<void>
}

function isNotFound(error: unknown) {
	return error instanceof Error && "code" in error && error.code === "ENOENT"
}

export const nodeFileSystem: StoreFileSystem = {
	async read(path) {
		try {
			return await readFile(path)
		} catch (error) {
			if (isNotFound(error)) return null
			throw error
		}
	},
	async writeSynced(path, data) {
		const handle = await open(path, "w")
		try {
			await handle.writeFile(data)
			await handle.sync()
		} finally {
			await handle.close()
		}
	},
	rename(from, to) {
		return rename(from, to)
	},
	remove(path) {
		return rm(path, { force: true })
	},
	async syncDirectory(path) {
		const handle = await open(path, "r")
		try {
			await handle.sync()
		} finally {
			await handle.close()
		}
	},
}
