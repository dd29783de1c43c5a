import { describe, it, expect } from 'vitest';
import { findMatchingEnd, findElseOrEndIf } from './BlockMatcher';
import { ScriptParser } from './ScriptParser';
import { UnmatchedControlStructureError } from './exceptions';

const program = new ScriptParser().parse([
    'IF $a == 1',       // 0
    'IF $b == 1',       // 1
    'ELSE',             // 2
    'ENDIF',            // 3
    'ELSE',             // 4
    'FOR $i = 1 TO 2',  // 5
    'ENDFOR',           // 6
    'ENDIF',            // 7
    'WHILE $c < 1',     // 8
    'ENDWHILE'          // 9
].join('\n')).program ?? [];

describe('findMatchingEnd', () => {
    it.each([
        [0, 7],
        [1, 3],
        [2, 3],
        [4, 7],
        [5, 6],
        [8, 9]
    ])('matches the opener at %i with %i', (opener, closer) => {
        expect(findMatchingEnd(program, opener)).toBe(closer);
    });

    it('rejects instructions that do not open a block', () => {
        expect(() => findMatchingEnd(program, 3)).toThrow(UnmatchedControlStructureError);
        expect(() => findMatchingEnd(program, 3)).toThrow('EndIf does not open a block');
    });

    it('throws when the closer is missing', () => {
        expect(() => findMatchingEnd(program.slice(0, 3), 0)).toThrow('Failed to find matching ENDIF');
    });
});

describe('findElseOrEndIf', () => {
    it('finds the same-depth ELSE', () => {
        expect(findElseOrEndIf(program, 0)).toBe(4);
        expect(findElseOrEndIf(program, 1)).toBe(2);
    });

    it('falls back to ENDIF', () => {
        const simple = new ScriptParser().parse('IF 1\nWAIT 1\nENDIF').program ?? [];
        expect(findElseOrEndIf(simple, 0)).toBe(2);
    });

    it('throws when neither exists', () => {
        expect(() => findElseOrEndIf(program.slice(0, 2), 0)).toThrow(UnmatchedControlStructureError);
    });
});
