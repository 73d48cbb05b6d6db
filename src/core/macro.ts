import { TokenBuffer } from './buffer';
import { CSPAN_ERRORS, EndOfInput, MacroSyntaxError } from './errors';
import { Scanner, type ScannerOptions } from './scanner';
import { type ByteSource, fromString } from './source';

/** One call of a function-like macro. Lines are 1-based and inclusive. */
export interface Invocation {
	name: string;
	startLine: number; // line of the macro name
	endLine: number; // line of the terminating ';'
	args: string[];
}

export type InvocationCallback = (inv: Invocation) => void;

export function formatInvocation(inv: Invocation): string {
	return `${inv.name}( ${inv.args.join(', ')} );`;
}

function escapeRegExp(s: string): string {
	return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Single alternation over all names, whole words only. Null when there is nothing to look for. */
export function compileNamesPattern(names: readonly string[]): RegExp | null {
	const uniq = [...new Set(names.filter(n => n.length > 0))];
	if (!uniq.length) return null;
	return new RegExp(`\\b(?:${uniq.map(escapeRegExp).join('|')})\\b`, 'g');
}

const isBlank = (ch: string | undefined) => ch === ' ' || ch === '\t';
const isSpace = (ch: string) => ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\v' || ch === '\f';
const isWordChar = (ch: string | undefined) => !!ch && /[A-Za-z0-9_]/.test(ch);

function skipBlanksBack(text: string, i: number): number {
	while (i >= 0 && isBlank(text[i])) i--;
	return i;
}

/** `#  define  NAME`: the occurrence at `index` is being defined, not called. */
export function isMacroDefinition(text: string, index: number): boolean {
	const i = skipBlanksBack(text, index - 1);
	if (i < 5 || text.slice(i - 5, i + 1) !== 'define') return false;
	const j = skipBlanksBack(text, i - 6);
	return j >= 0 && text[j] === '#';
}

const NAME_DIRECTIVES = new Set(['undef', 'ifdef', 'ifndef']);

/** `#undef NAME`, `#ifdef NAME`, `#ifndef NAME`, `defined NAME` and `defined(NAME)`. */
export function isDirectiveReference(text: string, index: number): boolean {
	let i = skipBlanksBack(text, index - 1);
	let paren = false;
	if (text[i] === '(') {
		paren = true;
		i = skipBlanksBack(text, i - 1);
	}
	const end = i + 1;
	while (i >= 0 && isWordChar(text[i])) i--;
	const word = text.slice(i + 1, end);
	if (word === 'defined') return true;
	if (paren || !NAME_DIRECTIVES.has(word)) return false;
	const j = skipBlanksBack(text, i);
	return j >= 0 && text[j] === '#';
}

/**
 * Splits the argument list of one call, fed one character at a time from just
 * after the opening parenthesis. String and character literals are tracked at
 * every nesting depth; nested calls are kept whole.
 */
export class ArgumentListParser {
	readonly args: string[] = [];
	private readonly buf: TokenBuffer;
	private depth = 0;
	private inString = false;
	private inChar = false;
	private closed = false;

	constructor(maxBuf = 0) {
		this.buf = new TokenBuffer(maxBuf);
	}

	/** Returns true once the terminating ';' has been seen. */
	push(ch: string): boolean {
		if (ch === '\r') return false;
		// after the outer ')' nothing counts until the ';'
		if (this.closed) return ch === ';';
		if (this.inString) {
			const escaped = this.buf.isEscaped();
			this.buf.push(ch);
			if (ch === '"' && !escaped) {
				this.inString = false;
				if (this.depth === 0) this.complete();
			}
			return false;
		}
		if (this.inChar) {
			const escaped = this.buf.isEscaped();
			this.buf.push(ch);
			if (ch === "'" && !escaped) this.inChar = false;
			return false;
		}
		switch (ch) {
		case ';':
			this.complete();
			return true;
		case '"':
			this.inString = true;
			this.buf.push(ch);
			break;
		case "'":
			this.inChar = true;
			this.buf.push(ch);
			break;
		case '(':
			this.depth++;
			this.buf.push(ch);
			break;
		case ')':
			if (this.depth > 0) {
				this.buf.push(ch);
				if (--this.depth === 0) this.complete();
			} else {
				this.complete();
				this.closed = true;
			}
			break;
		case ' ':
		case ',':
			if (this.depth > 0) this.buf.push(ch);
			else this.complete();
			break;
		default:
			this.buf.push(ch);
		}
		return false;
	}

	private complete() {
		const arg = this.buf.takeTrimmed();
		if (arg) this.args.push(arg);
	}
}

// Walks text tokens as one character stream; comment tokens in between read as a single space.
class InvocationReader {
	private readonly scanner: Scanner;
	private readonly maxBuf: number;
	private text = '';
	private idx = 0;
	private line = 0;
	private inString = false;
	private inChar = false;
	private skippedComment = false;
	private finished = false;

	constructor(source: ByteSource, private readonly pattern: RegExp, opts: ScannerOptions) {
		this.scanner = new Scanner(source, opts);
		this.maxBuf = opts.maxBuf ?? 0;
	}

	*invocations(): Generator<Invocation, void, undefined> {
		while (this.nextTextToken()) {
			for (;;) {
				const inv = this.findInvocation();
				if (!inv) break;
				yield inv;
			}
		}
	}

	private nextTextToken(): boolean {
		if (this.finished) return false;
		for (;;) {
			const tt = this.scanner.next();
			if (tt === 'comment') { this.skippedComment = true; continue; }
			if (tt === 'error') {
				this.finished = true;
				const err = this.scanner.err();
				if (err && !(err instanceof EndOfInput)) throw err;
				return false;
			}
			const tok = this.scanner.token();
			this.text = tok.data;
			this.idx = 0;
			this.line = tok.position.line;
			this.inString = false;
			this.inChar = false;
			return true;
		}
	}

	// Next call in the current token, skipping string literals and directive operands.
	private findInvocation(): Invocation | null {
		for (;;) {
			this.pattern.lastIndex = this.idx;
			const m = this.pattern.exec(this.text);
			if (!m) {
				this.idx = this.text.length;
				return null;
			}
			this.advanceTo(m.index);
			this.idx = m.index + m[0].length;
			if (this.inString || this.inChar) continue;
			if (isMacroDefinition(this.text, m.index) || isDirectiveReference(this.text, m.index)) continue;
			return this.parseInvocation(m[0]);
		}
	}

	private advanceTo(to: number) {
		for (let i = this.idx; i < to; i++) {
			const ch = this.text[i];
			if (ch === '\n') {
				this.line++;
				this.inChar = false;
			} else if (ch === '"' && !this.inChar && !isEscapedAt(this.text, i)) {
				this.inString = !this.inString;
			} else if (ch === "'" && !this.inString && !isEscapedAt(this.text, i)) {
				this.inChar = !this.inChar;
			}
		}
		this.idx = to;
	}

	private readChar(): string | undefined {
		while (this.idx >= this.text.length) {
			if (!this.nextTextToken()) return undefined;
			if (this.skippedComment) {
				this.skippedComment = false;
				return ' ';
			}
		}
		const ch = this.text[this.idx++];
		if (ch === '\n') this.line++;
		return ch;
	}

	private parseInvocation(name: string): Invocation {
		const startLine = this.line;
		this.skippedComment = false;
		let ch = this.readChar();
		while (ch !== undefined && isSpace(ch)) ch = this.readChar();
		if (ch !== '(') throw new MacroSyntaxError(CSPAN_ERRORS.MISSING_OPEN_PAREN, name, this.scanner.filename, startLine);

		const parser = new ArgumentListParser(this.maxBuf);
		for (;;) {
			const c = this.readChar();
			if (c === undefined) throw new MacroSyntaxError(CSPAN_ERRORS.MISSING_SEMICOLON, name, this.scanner.filename, startLine);
			if (parser.push(c)) return { name, startLine, endLine: this.line, args: parser.args };
		}
	}
}

function isEscapedAt(text: string, i: number): boolean {
	let n = 0;
	for (let j = i - 1; j >= 0 && text[j] === '\\'; j--) n++;
	return n % 2 === 1;
}

/**
 * Lazily yields every call of one of `names` found in the code spans of
 * `source`. Definitions and comment-embedded occurrences are skipped.
 */
export function* invocations(source: ByteSource, names: readonly string[], opts: ScannerOptions = {}): Generator<Invocation, void, undefined> {
	const pattern = compileNamesPattern(names);
	if (!pattern) {
		// nothing to match, but scan anyway so malformed input still fails
		const s = new Scanner(source, opts);
		while (s.next() !== 'error') { /* drain */ }
		const err = s.err();
		if (err && !(err instanceof EndOfInput)) throw err;
		return;
	}
	yield* new InvocationReader(source, pattern, opts).invocations();
}

export function scanInvocations(source: ByteSource, names: readonly string[], onInvocation: InvocationCallback, opts: ScannerOptions = {}): void {
	for (const inv of invocations(source, names, opts)) onInvocation(inv);
}

export function scanInvocationsString(text: string, names: readonly string[], onInvocation: InvocationCallback, opts: ScannerOptions = {}): void {
	scanInvocations(fromString(text), names, onInvocation, opts);
}
