import { TokenBuffer } from './buffer';
import { CspanError, EndOfInput, UnterminatedCommentError } from './errors';
import { type Position, NO_POSITION, makePosition } from './position';
import { type ByteSource, CharReader, fromString } from './source';
import type { Token, TokenType } from './tokens';

export interface ScannerOptions {
	filename?: string;
	maxBuf?: number; // 0 = unlimited
}

/**
 * Splits C source into alternating comment and text tokens in one forward
 * pass. Only string literals and the two comment forms are recognised; the
 * scanner knows nothing else about C.
 *
 * Usage mirrors a pull tokenizer:
 *
 *     const s = new Scanner(readFileChunks('main.c'), { filename: 'main.c' });
 *     while (s.next() !== 'error') use(s.token());
 *     if (!isEndOfInput(s.err())) throw s.err();
 */
export class Scanner {
	filename: string;

	private readonly reader: CharReader;
	private readonly buf: TokenBuffer;
	private line = 1;
	private column = 1;
	private failure: CspanError | null = null;
	private current: Token | null = null;
	// A '/' consumed into a text token that turned out to open a comment.
	private carry: Position | null = null;

	// Reset on every next()
	private inString = false;
	private inChar = false;
	private blockDepth = 0;
	private inLineComment = false;

	constructor(source: ByteSource, opts: ScannerOptions = {}) {
		this.reader = new CharReader(source);
		this.filename = opts.filename ?? '';
		this.buf = new TokenBuffer(opts.maxBuf ?? 0);
	}

	/** Current cursor, i.e. the position of the next unread character. */
	get position(): Position { return makePosition(this.filename, this.line, this.column); }

	setMaxBuf(maxBuf: number) { this.buf.setMaxSize(maxBuf); }

	/** Terminal error after next() returned 'error'; an EndOfInput on a clean finish. */
	err(): CspanError | null { return this.failure; }

	token(): Token {
		return this.current ?? { type: 'text', position: NO_POSITION, data: '' };
	}

	tokenText(): string { return this.current?.data ?? ''; }

	next(): TokenType {
		if (this.failure) return 'error';
		this.buf.reset();
		this.current = null;
		this.inString = false;
		this.inChar = false;
		this.blockDepth = 0;
		this.inLineComment = false;
		try {
			return this.scan();
		} catch (err) {
			if (!(err instanceof CspanError)) throw err;
			this.failure = err;
			return 'error';
		}
	}

	private scan(): TokenType {
		let start: Position | null = null;
		if (this.carry) {
			start = this.carry;
			this.carry = null;
			this.buf.push('/');
		}
		for (;;) {
			const ch = this.reader.peek();
			if (ch === undefined) return this.finish(start);
			if (ch === '\r') { this.reader.read(); continue; }
			if (!start) start = this.position;

			switch (ch) {
			case '/':
				if (this.blockDepth > 0) {
					// "/*/" is not a close: the '*' must come after the opening pair
					if (this.buf.last() === '*' && this.buf.length > 2) {
						this.consume(ch);
						return this.emit('comment', start);
					}
				} else if (this.opensComment()) {
					this.inLineComment = true;
					if (this.buf.length > 1) return this.splitBeforeComment(start);
				} else if (this.inCode()) {
					// may open a comment and move to the next token, so it does not count yet
					this.consume(ch, 1);
					continue;
				}
				break;
			case '*':
				if (this.blockDepth === 0 && this.opensComment()) {
					this.blockDepth = 1;
					if (this.buf.length > 1) return this.splitBeforeComment(start);
				}
				break;
			case '"':
				if (!this.inLineComment && this.blockDepth === 0 && !this.inChar && !this.buf.isEscaped()) this.inString = !this.inString;
				break;
			case "'":
				if (!this.inLineComment && this.blockDepth === 0 && !this.inString && !this.buf.isEscaped()) this.inChar = !this.inChar;
				break;
			case '\n':
				this.inChar = false;
				this.consume(ch);
				if (this.inLineComment) return this.emit('comment', start);
				continue;
			}
			this.consume(ch);
		}
	}

	private inCode(): boolean {
		return !this.inLineComment && !this.inString && !this.inChar;
	}

	// Previous char is '/', and we are in plain text.
	private opensComment(): boolean {
		return this.inCode() && this.buf.last() === '/';
	}

	// The pending '/' moves to the next token; everything before it is text.
	private splitBeforeComment(start: Position): TokenType {
		this.carry = makePosition(this.filename, this.line, this.column - 1);
		const text = this.buf.text();
		this.current = { type: 'text', position: start, data: text.slice(0, -1) };
		return 'text';
	}

	private consume(ch: string, slack = 0) {
		this.reader.read();
		this.buf.push(ch, slack);
		if (ch === '\n') {
			this.line++;
			this.column = 1;
		} else {
			this.column++;
		}
	}

	private emit(type: Token['type'], start: Position): TokenType {
		this.current = { type, position: start, data: this.buf.text() };
		return type;
	}

	private finish(start: Position | null): TokenType {
		if (this.buf.length === 0 || !start) {
			this.failure = new EndOfInput(this.position);
			return 'error';
		}
		if (this.blockDepth > 0) {
			this.failure = new UnterminatedCommentError(start);
			return 'error';
		}
		this.buf.checkSize();
		// a line comment cut off by end of input is still a comment
		return this.emit(this.inLineComment ? 'comment' : 'text', start);
	}
}

/** Yields every token; returns at end of input and throws any other terminal error. */
export function* scanTokens(source: ByteSource, opts: ScannerOptions = {}): Generator<Token, void, undefined> {
	const s = new Scanner(source, opts);
	while (s.next() !== 'error') yield s.token();
	const err = s.err();
	if (err && !(err instanceof EndOfInput)) throw err;
}

export function tokenize(text: string, opts: ScannerOptions = {}): Token[] {
	return [...scanTokens(fromString(text), opts)];
}
