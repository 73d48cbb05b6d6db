import { describe, it, expect } from 'vitest';
import { MacroSyntaxError, UnterminatedCommentError } from '../src/core/errors';
import { compileNamesPattern, formatInvocation, invocations } from '../src/core/macro';
import { fromString } from '../src/core/source';
import { collectInvocations } from './testUtils';

describe('macro invocations', () => {
	it('finds a call with no arguments', () => {
		expect(collectInvocations('TEST_FUNC ( );', ['TEST_FUNC'])).toEqual([
			{ name: 'TEST_FUNC', startLine: 1, endLine: 1, args: [] },
		]);
	});

	it('keeps string literals and nested calls as single arguments', () => {
		const src = 'TEST_FUNC ( "Format string: %d %s %d", a, "b \\\\ string", c );';
		expect(collectInvocations(src, ['TEST_FUNC'])[0].args).toEqual(['"Format string: %d %s %d"', 'a', '"b \\\\ string"', 'c']);
		expect(collectInvocations('F( G(1,2), 3 );', ['F'])[0].args).toEqual(['G(1,2)', '3']);
		expect(collectInvocations('TEST_FUNC( INNER_TEST_FUNC() );', ['TEST_FUNC'])[0].args).toEqual(['INNER_TEST_FUNC()']);
	});

	it('spans several lines', () => {
		const src = [
			'int a;',
			'LOG( "%d",',
			'     1,',
			'     INNER( 123, "Test" )',
			');',
		].join('\n');
		expect(collectInvocations(src, ['LOG'])).toEqual([
			{ name: 'LOG', startLine: 2, endLine: 5, args: ['"%d"', '1', 'INNER( 123, "Test" )'] },
		]);
	});

	it('counts line breaks inside string arguments', () => {
		const src = 'x;\nF("a\nb",\n c\n);';
		expect(collectInvocations(src, ['F'])).toEqual([
			{ name: 'F', startLine: 2, endLine: 5, args: ['"a\nb"', 'c'] },
		]);
	});

	it('skips definitions and directive operands', () => {
		expect(collectInvocations('#define F(a,b) (a+b)', ['F'])).toEqual([]);
		const src = [
			'#define TEST_FUNC( _fmt, ... )  func( _fmt, __VA_ARGS__ )',
			'#undef F',
			'#ifdef F',
			'#if defined(F) || defined F',
			'#endif',
			'  TEST_FUNC ( "one", a );',
			'  F(1);',
		].join('\n');
		expect(collectInvocations(src, ['TEST_FUNC', 'F'])).toEqual([
			{ name: 'TEST_FUNC', startLine: 6, endLine: 6, args: ['"one"', 'a'] },
			{ name: 'F', startLine: 7, endLine: 7, args: ['1'] },
		]);
	});

	it('ignores occurrences in comments and string literals', () => {
		expect(collectInvocations('/* F(1); */ F(2);', ['F']).map(i => i.args)).toEqual([['2']]);
		expect(collectInvocations('// F(1);\nF(2);', ['F'])).toEqual([{ name: 'F', startLine: 2, endLine: 2, args: ['2'] }]);
		expect(collectInvocations('puts("F(1);"); F(2);', ['F']).map(i => i.args)).toEqual([['2']]);
	});

	it('finds calls after character literals', () => {
		expect(collectInvocations("c = '\"'; F(1);", ['F'])).toEqual([{ name: 'F', startLine: 1, endLine: 1, args: ['1'] }]);
		expect(collectInvocations("c = '\\''; F(2);", ['F']).map(i => i.args)).toEqual([['2']]);
		expect(collectInvocations('s = "it\'s F(0);"; F(3);', ['F']).map(i => i.args)).toEqual([['3']]);
		expect(collectInvocations("c = 'F'; F(4);", ['F']).map(i => i.args)).toEqual([['4']]);
	});

	it('matches whole words only', () => {
		expect(collectInvocations('MYF(1); F2(2); F(3);', ['F']).map(i => i.args)).toEqual([['3']]);
	});

	it('reports several names in source order', () => {
		const src = [
			'TEST_FUNC_A( "Format string 1: %d", a );  // comment 1',
			'TEST_FUNC_B( "Format string 2: %d",',
			'             "d \\\\ string",',
			'             e,',
			'             f );',
		].join('\n');
		expect(collectInvocations(src, ['TEST_FUNC_A', 'TEST_FUNC_B'])).toEqual([
			{ name: 'TEST_FUNC_A', startLine: 1, endLine: 1, args: ['"Format string 1: %d"', 'a'] },
			{ name: 'TEST_FUNC_B', startLine: 2, endLine: 5, args: ['"Format string 2: %d"', '"d \\\\ string"', 'e', 'f'] },
		]);
	});

	it('treats comments inside the argument list as whitespace', () => {
		expect(collectInvocations('F(a /* first */, b);', ['F'])[0].args).toEqual(['a', 'b']);
		expect(collectInvocations('F(a/*x*/b);', ['F'])[0].args).toEqual(['a', 'b']);
		expect(collectInvocations('F(\n  a, // first\n  b\n);', ['F'])).toEqual([
			{ name: 'F', startLine: 1, endLine: 4, args: ['a', 'b'] },
		]);
	});

	it('tracks strings inside nested parentheses', () => {
		expect(collectInvocations('F(G(")"), 1);', ['F'])[0].args).toEqual(['G(")")', '1']);
		expect(collectInvocations('F("say \\"hi\\"", x);', ['F'])[0].args).toEqual(['"say \\"hi\\""', 'x']);
	});

	it('ignores text between the closing parenthesis and the semicolon', () => {
		expect(collectInvocations('F(a) + b;', ['F'])[0].args).toEqual(['a']);
	});

	it('does not report names inside an argument list a second time', () => {
		expect(collectInvocations('F(F(1));', ['F'])).toEqual([{ name: 'F', startLine: 1, endLine: 1, args: ['F(1)'] }]);
	});

	it('fails on a missing opening parenthesis', () => {
		let caught: unknown;
		try {
			collectInvocations('TEST_FUNC  );', ['TEST_FUNC'], { filename: 'bad.c' });
		} catch (e) {
			caught = e;
		}
		expect(caught).toBeInstanceOf(MacroSyntaxError);
		if (!(caught instanceof MacroSyntaxError)) return;
		expect(caught.message).toBe('macro function missing opening parentheses');
		expect(caught.code).toBe('CS010');
		expect(caught.macro).toBe('TEST_FUNC');
		expect(caught.filename).toBe('bad.c');
		expect(caught.line).toBe(1);
	});

	it('fails when input ends before the semicolon, after earlier calls were delivered', () => {
		const gen = invocations(fromString('F(1);\nF(2);\nF(3'), ['F']);
		expect(gen.next().value).toEqual({ name: 'F', startLine: 1, endLine: 1, args: ['1'] });
		expect(gen.next().value).toEqual({ name: 'F', startLine: 2, endLine: 2, args: ['2'] });
		expect(() => gen.next()).toThrow('macro function missing terminating semicolon');
		expect(() => collectInvocations('F(a, b)', ['F'])).toThrow(MacroSyntaxError);
	});

	it('surfaces scanner errors even with no names to match', () => {
		expect([...invocations(fromString('F(1);'), [])]).toEqual([]);
		expect(() => [...invocations(fromString('F(1); /* open'), [])]).toThrow(UnterminatedCommentError);
		expect(() => collectInvocations('F(1); /* open', ['F'])).toThrow(UnterminatedCommentError);
	});
});

describe('macro helpers', () => {
	it('formats an invocation as a call statement', () => {
		expect(formatInvocation({ name: 'PRINTF', startLine: 1, endLine: 1, args: ['"x"', '1'] })).toBe('PRINTF( "x", 1 );');
		expect(formatInvocation({ name: 'F', startLine: 1, endLine: 1, args: [] })).toBe('F(  );');
	});

	it('compiles one escaped alternation', () => {
		expect(compileNamesPattern([])).toBeNull();
		expect(compileNamesPattern(['', ''])).toBeNull();
		expect(compileNamesPattern(['A.B', 'C', 'C'])?.source).toBe('\\b(?:A\\.B|C)\\b');
	});
});
