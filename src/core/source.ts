import fs from 'node:fs';
import { StringDecoder } from 'node:string_decoder';
import { ReadError } from './errors';

// Any chunked input: a string array, a generator over file reads, ...
export type ByteSource = Iterable<string | Uint8Array>;

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export function fromString(text: string): ByteSource {
	return [text];
}

function errnoCode(err: unknown): string | undefined {
	return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

// Delay between reads of a non-blocking fd that has nothing ready.
export const EAGAIN_RETRY_MS = 10;

function sleepSync(ms: number) {
	Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

export function* readFdChunks(fd: number, chunkSize = DEFAULT_CHUNK_SIZE, retryMs = EAGAIN_RETRY_MS): Generator<Uint8Array, void, undefined> {
	for (;;) {
		const buf = Buffer.allocUnsafe(chunkSize);
		let n: number;
		try {
			n = fs.readSync(fd, buf, 0, chunkSize, null);
		} catch (err) {
			const code = errnoCode(err);
			if (code === 'EAGAIN') {
				sleepSync(retryMs);
				continue;
			}
			if (code === 'EOF') return;
			throw err;
		}
		if (n === 0) return;
		yield buf.subarray(0, n);
	}
}

// Opens lazily on first pull and closes when exhausted or abandoned.
export function* readFileChunks(file: string, chunkSize = DEFAULT_CHUNK_SIZE): Generator<Uint8Array, void, undefined> {
	const fd = fs.openSync(file, 'r');
	try {
		yield* readFdChunks(fd, chunkSize);
	} finally {
		fs.closeSync(fd);
	}
}

/**
 * Pull-based character reader over a ByteSource. Holds only the current chunk;
 * UTF-8 sequences split between chunks are stitched by the decoder.
 */
export class CharReader {
	private readonly it: Iterator<string | Uint8Array>;
	private readonly decoder = new StringDecoder('utf8');
	private chunk = '';
	private idx = 0;
	private done = false;

	constructor(source: ByteSource) {
		this.it = source[Symbol.iterator]();
	}

	peek(offset = 0): string | undefined {
		while (this.idx + offset >= this.chunk.length) {
			if (!this.fill()) return undefined;
		}
		return this.chunk[this.idx + offset];
	}

	read(): string | undefined {
		const ch = this.peek();
		if (ch !== undefined) this.idx++;
		return ch;
	}

	private fill(): boolean {
		if (this.done) return false;
		let next: IteratorResult<string | Uint8Array>;
		try {
			next = this.it.next();
		} catch (err) {
			this.done = true;
			throw new ReadError(err);
		}
		this.chunk = this.chunk.slice(this.idx);
		this.idx = 0;
		if (next.done) {
			this.done = true;
			const tail = this.decoder.end();
			this.chunk += tail;
			return tail.length > 0;
		}
		this.chunk += typeof next.value === 'string' ? next.value : this.decoder.write(next.value);
		return true;
	}
}
