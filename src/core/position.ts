// Source positions: 1-based line and column, line 0 means "unset".

export interface Position {
	readonly filename: string;
	readonly line: number;
	readonly column: number;
}

export const NO_POSITION: Position = Object.freeze({ filename: '', line: 0, column: 0 });

export function makePosition(filename: string, line: number, column: number): Position {
	return Object.freeze({ filename, line, column });
}

export function isValidPosition(pos: Position): boolean {
	return pos.line > 0;
}

/**
 * Renders `file:line:col`. An empty filename becomes `<input>`; an unset
 * position renders the filename part only.
 */
export function formatPosition(pos: Position): string {
	const file = pos.filename || '<input>';
	return isValidPosition(pos) ? `${file}:${pos.line}:${pos.column}` : file;
}
