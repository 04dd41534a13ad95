import * as assert from 'assert';
import { indentationCandidates, levelColumn, locate, openerPattern } from '../levelLocator';
import { TextBuffer } from '../textBuffer';

suite('Level Locator Tests', () => {

    suite('indentationCandidates', () => {
        test('should produce only the empty prefix for level 0', () => {
            assert.deepStrictEqual(indentationCandidates(0, 4), ['']);
        });

        test('should produce one candidate per visual width', () => {
            assert.deepStrictEqual(indentationCandidates(5, 4), [
                '',
                ' ',
                '  ',
                '   ',
                '(?: {0,3}\\t| {4}){1}',
                '(?: {0,3}\\t| {4}){1} '
            ]);
        });

        test('should stay finite for deep levels', () => {
            assert.strictEqual(indentationCandidates(63, 8).length, 64);
        });
    });

    suite('openerPattern', () => {
        test('should accept every encoding of a shallower indentation', () => {
            const pattern = openerPattern(5, 4);
            assert.strictEqual(pattern.test('if x:'), true);
            assert.strictEqual(pattern.test('\tif x:'), true);
            assert.strictEqual(pattern.test('    if x:'), true);
            assert.strictEqual(pattern.test('  \tif x:'), true);
            assert.strictEqual(pattern.test(' \tif x:'), true);
        });

        test('should reject lines indented to the level or deeper', () => {
            const pattern = openerPattern(5, 4);
            assert.strictEqual(pattern.test('\t x'), false);
            assert.strictEqual(pattern.test('     x'), false);
            assert.strictEqual(pattern.test('\t\tx'), false);
        });

        test('should reject blank lines', () => {
            const pattern = openerPattern(5, 4);
            assert.strictEqual(pattern.test(''), false);
            assert.strictEqual(pattern.test('  '), false);
            assert.strictEqual(pattern.test('\t'), false);
        });

        test('should capture the indentation', () => {
            const match = openerPattern(9, 4).exec('\t  while y:');
            assert.ok(match);
            assert.strictEqual(match[1], '\t  ');
        });
    });

    suite('levelColumn', () => {
        test('should use the indentation of a non-blank line', () => {
            const buffer = TextBuffer.fromText('if x:\n      a', 4);
            assert.strictEqual(levelColumn(buffer, 2), 6);
        });

        test('should take the deeper neighbour for a blank line', () => {
            const buffer = TextBuffer.fromText('if x:\n    a\n\nb', 4);
            assert.strictEqual(levelColumn(buffer, 3), 4);
        });

        test('should skip runs of blank lines in both directions', () => {
            const buffer = TextBuffer.fromText('  a\n\n \n\t\n\n        b', 4);
            assert.strictEqual(levelColumn(buffer, 3), 8);
        });

        test('should be 0 in a buffer of blank lines', () => {
            const buffer = TextBuffer.fromText('\n  \n\t\n', 4);
            assert.strictEqual(levelColumn(buffer, 2), 0);
        });
    });

    suite('locate', () => {
        test('should find the opener of a simple block', () => {
            const buffer = TextBuffer.fromText('if x:\n    a\n\n    b', 4);
            assert.deepStrictEqual(locate(buffer, { line: 2, column: 4 }), {
                column: 4,
                startLine: 1,
                anchorColumn: 0,
                startOffset: 0
            });
        });

        test('should locate the same block from a blank line inside it', () => {
            const buffer = TextBuffer.fromText('if x:\n    a\n\n    b', 4);
            assert.deepStrictEqual(locate(buffer, { line: 3, column: 0 }), {
                column: 4,
                startLine: 1,
                anchorColumn: 0,
                startOffset: 0
            });
        });

        test('should return column 0 for top-level code', () => {
            const buffer = TextBuffer.fromText('if x:\n    a', 4);
            assert.deepStrictEqual(locate(buffer, { line: 1, column: 2 }), {
                column: 0,
                startLine: 1,
                anchorColumn: 0,
                startOffset: 0
            });
        });

        test('should return column 0 in an empty buffer', () => {
            const buffer = TextBuffer.fromText('', 4);
            assert.strictEqual(locate(buffer, { line: 1, column: 0 }).column, 0);
        });

        test('should find the nearest shallower opener in nested blocks', () => {
            const buffer = TextBuffer.fromText([
                'class A:',
                '    def f(self):',
                '        return 1',
                '    def g(self):',
                '        return 2'
            ].join('\n'), 4);

            assert.deepStrictEqual(locate(buffer, { line: 5, column: 8 }), {
                column: 8,
                startLine: 4,
                anchorColumn: 4,
                startOffset: 4
            });
        });

        test('should match a tab-indented opener from a space-indented body', () => {
            const buffer = TextBuffer.fromText([
                'def f():',
                '\tif x:',
                '\t\ta',
                '        b'
            ].join('\n'), 4);

            const fromTabs = locate(buffer, { line: 3, column: 8 });
            const fromSpaces = locate(buffer, { line: 4, column: 8 });

            assert.deepStrictEqual(fromTabs, { column: 8, startLine: 2, anchorColumn: 4, startOffset: 1 });
            assert.deepStrictEqual(fromSpaces, fromTabs);
        });

        test('should match a space-indented opener from a tab-indented body', () => {
            const buffer = TextBuffer.fromText([
                'def f():',
                '    if x:',
                '\t\ta'
            ].join('\n'), 4);

            assert.deepStrictEqual(locate(buffer, { line: 3, column: 8 }), {
                column: 8,
                startLine: 2,
                anchorColumn: 4,
                startOffset: 4
            });
        });

        test('should skip blank lines and deeper lines while searching upward', () => {
            const buffer = TextBuffer.fromText([
                'for i in xs:',
                '    if i:',
                '        print(i)',
                '',
                '    total += i'
            ].join('\n'), 4);

            assert.deepStrictEqual(locate(buffer, { line: 5, column: 4 }), {
                column: 4,
                startLine: 1,
                anchorColumn: 0,
                startOffset: 0
            });
        });

        test('should start the block at the top of the buffer without an opener', () => {
            const buffer = TextBuffer.fromText('    a\n    b', 4);
            assert.deepStrictEqual(locate(buffer, { line: 2, column: 4 }), {
                column: 4,
                startLine: 0,
                anchorColumn: 0,
                startOffset: 0
            });
        });

        test('should clamp a cursor line past the end of the buffer', () => {
            const buffer = TextBuffer.fromText('if x:\n    a', 4);
            assert.strictEqual(locate(buffer, { line: 9, column: 0 }).startLine, 1);
        });
    });
});
