import { describe, it, expect } from 'vitest';
import { describeInstruction } from './InstructionPrinter';
import { ScriptParser } from './ScriptParser';

const parser = new ScriptParser();

describe('describeInstruction', () => {
    it('renders each instruction with its keyword and operands', () => {
        const result = parser.parse([
            'DEFINE PROCEDURE prime()',
            'LASER_ON',
            'END',
            'SET $x = 2',
            'IF $x == 2',
            'CALL prime()',
            'ELSE',
            'MOVE gantry TO n1 IN Flow',
            'ENDIF',
            'FOR $i = 1 TO 3',
            'WHILE $i < 5',
            'SET $i = $i + 1',
            'ENDWHILE',
            'ENDFOR'
        ].join('\n'));

        expect(result.program?.map(describeInstruction)).toEqual([
            'SET $x = 2',
            'IF $x == 2',
            'CALL prime()',
            'ELSE',
            'MOVE gantry TO n1 IN Flow',
            'ENDIF',
            'FOR $i = 1 TO 3 STEP 1',
            'WHILE $i < 5',
            'SET $i = $i + 1',
            'ENDWHILE',
            'ENDFOR'
        ]);
    });

    it('produces text that parses back to the same program', () => {
        const script = [
            'SET $n = 3',
            'FOR $i = $n TO 1 STEP -1',
            'IF $i != 2',
            'PRINT "pass $i"',
            'ELSE',
            'WAIT 10',
            'ENDIF',
            'ENDFOR',
            'READ_INPUT io 3 $s'
        ].join('\n');
        const program = parser.parse(script).program ?? [];
        const reparsed = parser.parse(program.map(describeInstruction).join('\n'));

        expect(reparsed.errors).toEqual([]);
        expect(reparsed.program).toEqual(program);
    });
});
