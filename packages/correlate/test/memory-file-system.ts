import type { StoreFileSystem } from "../src/store-file-system"

const decoder = new TextDecoder()
const encoder = new TextEncoder()

/**
 * In-process StoreFileSystem. Individual steps can be made to fail.
 */
export class MemoryFileSystem implements StoreFileSystem {
	readonly files = new Map<string, Uint8Array>()
	failures: Partial<Record<"read" | "writeSynced" | "rename" | "syncDirectory", number>> = {}

	constructor(files: Record<string, string> = {}) {
		for (const [path, text] of Object.entries(files)) {
			this.files.set(path, encoder.encode(text))
		}
	}

	/** Make the next `times` calls of `step` throw. */
	failNext(
		step: "read" | "writeSynced" | "rename" | "syncDirectory",
		times = 1,
	) {
		this.failures[step] = times
	}

	text(path: string): string | undefined {
		const bytes = this.files.get(path)
		return bytes ? decoder.decode(bytes) : undefined
	}

	private maybeFail(step: "read" | "writeSynced" | "rename" | "syncDirectory") {
		const remaining = this.failures[step] ?? 0
		if (remaining > 0) {
			this.failures[step] = remaining - 1
			throw new Error(`${step} failed`)
		}
	}

	async read(path: string) {
		this.maybeFail("read")
		return this.files.get(path) ?? null
	}

	async writeSynced(path: string, data: Uint8Array) {
		this.maybeFail("writeSynced")
		this.files.set(path, data.slice())
	}

	async rename(from: string, to: string) {
		this.maybeFail("rename")
		const data = this.files.get(from)
		if (!data) throw new Error(`ENOENT: ${from}`)
		this.files.set(to, data)
		this.files.delete(from)
	}

	async remove(path: string) {
		this.files.delete(path)
	}

	async syncDirectory(_path: string) {
		this.maybeFail("syncDirectory")
	}
}
