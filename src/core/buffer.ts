import { BufferOverflowError } from './errors';

/**
 * Per-token character buffer used by both the scanner and the macro argument
 * parser. A `maxSize` of 0 leaves it unbounded.
 */
export class TokenBuffer {
	private chars: string[] = [];

	constructor(private maxSize = 0) {}

	get length(): number { return this.chars.length; }

	setMaxSize(maxSize: number) { this.maxSize = maxSize; }

	/** `slack` lets one pending character sit past the limit until checkSize() or the next push. */
	push(ch: string, slack = 0) {
		if (this.maxSize > 0 && this.chars.length >= this.maxSize + slack) throw new BufferOverflowError(this.maxSize);
		this.chars.push(ch);
	}

	checkSize() {
		if (this.maxSize > 0 && this.chars.length > this.maxSize) throw new BufferOverflowError(this.maxSize);
	}

	last(): string | undefined {
		return this.chars.length > 0 ? this.chars[this.chars.length - 1] : undefined;
	}

	// True when the buffer ends in an odd run of backslashes, i.e. the next char is escaped.
	isEscaped(): boolean {
		let n = 0;
		for (let i = this.chars.length - 1; i >= 0 && this.chars[i] === '\\'; i--) n++;
		return n % 2 === 1;
	}

	text(): string { return this.chars.join(''); }

	trimmed(): string { return this.text().trim(); }

	takeTrimmed(): string {
		const s = this.trimmed();
		this.reset();
		return s;
	}

	reset() { this.chars = []; }
}
