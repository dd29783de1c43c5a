import { describe, it, expect } from 'vitest';
import { formatErrorWithContext, formatParseErrors } from './errorFormatter';
import { ParseError } from '../classes/exceptions';

describe('formatErrorWithContext', () => {
    it('shows the line, a caret and surrounding context', () => {
        const formatted = formatErrorWithContext({ lineNumber: 2, column: 3, code: 'a\n  bcd\ne', message: 'Bad' });
        expect(formatted).toBe('Bad\n  at line 2, column 3\n\n    bcd\n    ^\n\nContext:\n     1 | a\n  >  2 |   bcd\n     3 | e');
    });

    it('returns the bare message without a position', () => {
        expect(formatErrorWithContext({ message: 'Bad' })).toBe('Bad');
    });

    it('omits the column when unknown', () => {
        expect(formatErrorWithContext({ lineNumber: 4, message: 'Bad' })).toBe('Bad\n  at line 4');
    });
});

describe('formatParseErrors', () => {
    it('formats every error, caret under the first non-blank character', () => {
        const code = 'WAIT 1\n  FOO\nWAIT 2\nBAR';
        const formatted = formatParseErrors([
            new ParseError('Unknown command: FOO', 2),
            new ParseError('Unknown command: BAR', 4)
        ], code);

        expect(formatted).toBe([
            'Unknown command: FOO\n  at line 2, column 3\n\n    FOO\n    ^\n\nContext:\n     1 | WAIT 1\n  >  2 |   FOO\n     3 | WAIT 2\n     4 | BAR',
            'Unknown command: BAR\n  at line 4, column 1\n\n  BAR\n  ^\n\nContext:\n     2 |   FOO\n     3 | WAIT 2\n  >  4 | BAR'
        ].join('\n\n'));
    });
});
