import { describe, it, expect } from 'vitest';
import { UnterminatedCommentError } from '../src/core/errors';
import { stripComments, stripCommentsString } from '../src/core/strip';
import { fromString } from '../src/core/source';

const SOURCE = '/* header */\n#include <stdio.h>\nint x; // trailing\nint y; /* inline */ int z;\n';

describe('stripComments', () => {
	it('drops comments and keeps all other text verbatim', () => {
		expect(stripCommentsString(SOURCE)).toBe('\n#include <stdio.h>\nint x; int y;  int z;\n');
	});

	it('writes one chunk per text token', () => {
		const chunks: string[] = [];
		stripComments(fromString(SOURCE), c => chunks.push(c));
		expect(chunks).toEqual(['\n#include <stdio.h>\nint x; ', 'int y; ', ' int z;\n']);
	});

	it('leaves comment markers inside strings alone', () => {
		expect(stripCommentsString('puts("/* no */ // no"); // yes\n')).toBe('puts("/* no */ // no"); ');
	});

	it('is idempotent', () => {
		const once = stripCommentsString(SOURCE);
		expect(stripCommentsString(once)).toBe(once);
	});

	it('fails on an unterminated comment after writing the text before it', () => {
		const chunks: string[] = [];
		expect(() => stripComments(fromString('a;\n/* b'), c => chunks.push(c))).toThrow(UnterminatedCommentError);
		expect(chunks).toEqual(['a;\n']);
	});
});
