/**
 * Byte array to stream conversion.
 *
 * @module
 */

const CHUNK_SIZE = 64 * 1024

/**
 * Create a ReadableStream of text from UTF-8 bytes.
 *
 * Decodes in 64KB chunks so multi-byte characters split across a chunk
 * boundary are carried over. A leading byte order mark is dropped.
 */
export function bytesToTextStream(bytes: Uint8Array): ReadableStream<string> {
	const decoder = new TextDecoder()
	let offset = 0

	return new ReadableStream<string>({
		pull(controller) {
			if (offset >= bytes.length) {
				controller.close()
				return
			}

			const end = Math.min(offset + CHUNK_SIZE, bytes.length)
			const chunk = bytes.subarray(offset, end)
			offset = end

			controller.enqueue(
				decoder.decode(chunk, { stream: offset < bytes.length }),
			)
		},
	})
}
