import { describe, it, expect } from 'vitest';
import { ScriptParser } from './ScriptParser';
import { CommandRegistry } from './CommandRegistry';
import {
    UnknownCommandError,
    InvalidSyntaxError,
    UnmatchedControlStructureError,
    ProcedureDefinitionError
} from './exceptions';

const parser = new ScriptParser();

describe('ScriptParser', () => {
    describe('instructions', () => {
        it('builds a flat program with block markers', () => {
            const result = parser.parse([
                'SET $x = 2',
                'IF $x == 2',
                '  SET $y = 10',
                'ELSE',
                '  SET $y = 20',
                'ENDIF'
            ].join('\n'));

            expect(result.errors).toEqual([]);
            expect(result.program).toEqual([
                { type: 'assignment', variableName: '$x', expression: '2', line: 1 },
                { type: 'flowControl', kind: 'If', condition: '$x == 2', line: 2 },
                { type: 'assignment', variableName: '$y', expression: '10', line: 3 },
                { type: 'flowControl', kind: 'Else', condition: '', line: 4 },
                { type: 'assignment', variableName: '$y', expression: '20', line: 5 },
                { type: 'flowControl', kind: 'EndIf', condition: '', line: 6 }
            ]);
        });

        it('accepts keywords in any case', () => {
            const result = parser.parse('for $i = 1 to 3 step 2\nendfor');
            expect(result.errors).toEqual([]);
            expect(result.program).toEqual([
                { type: 'flowControl', kind: 'For', condition: '$i|1|3|2', line: 1 },
                { type: 'flowControl', kind: 'EndFor', condition: '', line: 2 }
            ]);
        });

        it('packs FOR operands spanning several tokens with a default step', () => {
            const result = parser.parse('FOR $i = $n - 1 TO 0 STEP -1\nENDFOR\nFOR $j = 1 TO $n\nENDFOR');
            expect(result.program?.[0]).toEqual({ type: 'flowControl', kind: 'For', condition: '$i|$n - 1|0|-1', line: 1 });
            expect(result.program?.[2]).toEqual({ type: 'flowControl', kind: 'For', condition: '$j|1|$n|1', line: 3 });
        });

        it('compiles procedure bodies with their source lines', () => {
            const result = parser.parse('DEFINE PROCEDURE prime()\nSET $a = 1\nEND\nCALL prime()');
            expect(result.errors).toEqual([]);
            expect(result.program).toEqual([{ type: 'procedureCall', name: 'prime', line: 4 }]);
            expect(result.procedurePrograms.get('prime')).toEqual([
                { type: 'assignment', variableName: '$a', expression: '1', line: 2 }
            ]);
            expect(result.procedures.get('prime')).toEqual(['SET $a = 1']);
        });

        it('joins the instruction lines into the processed script', () => {
            const result = parser.parse('# header\n\nSET $x = 1\n  PRINT hi  \nDEFINE PROCEDURE p()\nWAIT 1\nEND');
            expect(result.processedScript).toBe('SET $x = 1\nPRINT hi');
        });
    });

    describe('commands', () => {
        it('records operands and a description', () => {
            const result = parser.parse('MOVE gantry TO n1 IN Flow');
            expect(result.program).toEqual([{
                type: 'command',
                effectName: 'MOVE',
                arguments: ['gantry', 'TO', 'n1', 'IN', 'Flow'],
                description: 'MOVE gantry TO n1 IN Flow',
                line: 1
            }]);
        });

        it('keeps a free-text message as one operand', () => {
            const result = parser.parse('PRINT "Hello   there" $x');
            expect(result.program).toEqual([{
                type: 'command',
                effectName: 'PRINT',
                arguments: ['"Hello   there" $x'],
                description: 'PRINT "Hello   there" $x',
                line: 1
            }]);
        });

        it('marks the result variable of READ_INPUT', () => {
            const result = parser.parse('READ_INPUT io 3 $sensor');
            expect(result.program?.[0]).toMatchObject({ type: 'command', storesInto: '$sensor' });
        });

        it('accepts optional operands', () => {
            expect(parser.validate('LASER_ON\nLASER_ON laser2\nSET_OUTPUT io 1 ON\nSET_OUTPUT io 1 OFF 200')).toEqual([]);
            expect(parser.validate('RUN_SCAN hex-left ch1 0.01,0.005 300 Z,X')).toEqual([]);
            expect(parser.validate('MOVE_RELATIVE hex-left z $offset')).toEqual([]);
        });

        it.each([
            ['MOVE gantry n1 IN Flow', 'Line 1: Invalid MOVE syntax. Expected: MOVE <device> TO <node> IN <graph>'],
            ['MOVE gantry FROM n1 IN Flow', "Line 1: Expected 'TO' in MOVE command. Expected: MOVE <device> TO <node> IN <graph>"],
            ['MOVE_RELATIVE hex Q 1', "Line 1: Unknown axis 'Q', expected one of X, Y, Z, U, V, W. Expected: MOVE_RELATIVE <device> <axis> <distance>"],
            ['MOVE_RELATIVE hex Z abc', "Line 1: MOVE_RELATIVE expects a number for operand 3, got 'abc'. Expected: MOVE_RELATIVE <device> <axis> <distance>"],
            ['READ_INPUT io 3 sensor', 'Line 1: READ_INPUT stores its result in a $variable. Expected: READ_INPUT <device> <pin> $variable'],
            ['SET_OUTPUT io 1 MAYBE', "Line 1: Invalid output state 'MAYBE', expected ON or OFF. Expected: SET_OUTPUT <device> <pin> <ON|OFF> [delay_ms]"],
            ['RUN_SCAN hex ch 0.01,abc', "Line 1: Invalid step sizes '0.01,abc', expected comma-separated positive numbers. Expected: RUN_SCAN <device> <channel> <step_sizes> [settling_time] [axes]"],
            ['PRINT', 'Line 1: Invalid PRINT syntax. Expected: PRINT <message>'],
            ['WAIT', 'Line 1: Invalid WAIT syntax. Expected: WAIT <milliseconds>']
        ])('rejects %s', (line, message) => {
            expect(parser.validate(line)).toEqual([message]);
        });

        it('parses commands added to the registry', () => {
            const registry = CommandRegistry.withNativeModules();
            registry.registerCommand('FAIL_EFFECT', { minArgs: 0 });
            const result = new ScriptParser(registry).parse('FAIL_EFFECT');
            expect(result.errors).toEqual([]);
            expect(result.program?.[0]).toMatchObject({ effectName: 'FAIL_EFFECT', description: 'FAIL_EFFECT' });
        });
    });

    describe('errors', () => {
        it('reports unknown commands and keeps parsing', () => {
            const result = parser.parse('FOO 1\nSET $x = 1\nBAR');
            expect(result.errors).toHaveLength(2);
            expect(result.errors[0]).toBeInstanceOf(UnknownCommandError);
            expect(result.errors.map(String)).toEqual(['Line 1: Unknown command: FOO', 'Line 3: Unknown command: BAR']);
            expect(result.program).toHaveLength(1);
        });

        it('numbers errors by their original line after procedures are removed', () => {
            expect(parser.validate('DEFINE PROCEDURE p()\nSET $a = 1\nEND\nBOGUS')).toEqual(['Line 4: Unknown command: BOGUS']);
        });

        it('rejects malformed assignments', () => {
            const result = parser.parse('SET x = 1\nSET $x 1');
            expect(result.errors[0]).toBeInstanceOf(InvalidSyntaxError);
            expect(result.errors.map(String)).toEqual([
                'Line 1: Variable name must start with $: x',
                'Line 2: Invalid variable assignment. Expected: SET $variable = expression'
            ]);
        });

        it('rejects malformed FOR headers', () => {
            expect(parser.validate('FOR i = 1 TO 3\nENDFOR')).toEqual([
                'Line 1: FOR loop variable must start with $. Expected: FOR $variable = start TO end [STEP step]',
                'Line 2: ENDFOR without matching FOR'
            ]);
            expect(parser.validate('FOR $i = 1 3\nENDFOR')[0])
                .toBe('Line 1: Invalid FOR syntax, missing start or TO. Expected: FOR $variable = start TO end [STEP step]');
            expect(parser.validate('FOR $i = 1 TO 3 STEP\nENDFOR')[0])
                .toBe('Line 1: Invalid FOR syntax, missing step value. Expected: FOR $variable = start TO end [STEP step]');
        });

        it('requires conditions and rejects operands on closers', () => {
            expect(parser.validate('IF\nENDIF')).toEqual([
                'Line 1: IF statement requires a condition',
                'Line 2: ENDIF without matching IF'
            ]);
            expect(parser.validate('WHILE\nENDWHILE')[0]).toBe('Line 1: WHILE loop requires a condition');
            expect(parser.validate('IF 1\nENDIF now')).toEqual([
                'Line 1: Unclosed IF statement',
                'Line 2: ENDIF takes no operands'
            ]);
        });

        it('requires called procedures to be defined', () => {
            const result = parser.parse('CALL nothing()');
            expect(result.errors[0]).toBeInstanceOf(ProcedureDefinitionError);
            expect(result.errors.map(String)).toEqual(['Line 1: Procedure not defined: nothing']);
        });
    });

    describe('structural validation', () => {
        it.each([
            ['ELSE', 'Line 1: ELSE without matching IF'],
            ['ENDIF', 'Line 1: ENDIF without matching IF'],
            ['ENDFOR', 'Line 1: ENDFOR without matching FOR'],
            ['ENDWHILE', 'Line 1: ENDWHILE without matching WHILE'],
            ['IF $x == 1\nFOR $i = 1 TO 3\nENDIF\nENDFOR', 'Line 3: ENDIF without matching IF'],
            ['WHILE $x < 3\nSET $x = $x + 1', 'Line 1: Unclosed WHILE statement'],
            ['SET $a = 1\nFOR $i = 1 TO 2\nIF $i == 1\nENDIF', 'Line 2: Unclosed FOR statement'],
            ['IF 1\nELSE\nELSE\nENDIF', 'Line 3: Duplicate ELSE in IF statement']
        ])('rejects %j', (script, message) => {
            const result = parser.parse(script);
            expect(result.program).toBeNull();
            expect(result.errors[0]).toBeInstanceOf(UnmatchedControlStructureError);
            expect(result.errors.map(String)).toEqual([message]);
        });

        it('validates procedure bodies', () => {
            const result = parser.parse('DEFINE PROCEDURE p()\nIF 1\nEND\nCALL p()');
            expect(result.program).toBeNull();
            expect(result.errors.map(String)).toEqual(['Line 2: Unclosed IF statement']);
        });

        it('accepts properly nested blocks', () => {
            const result = parser.parse([
                'FOR $i = 1 TO 2',
                '  WHILE $j < 2',
                '    IF $j == 0',
                '      SET $j = 1',
                '    ELSE',
                '      SET $j = 2',
                '    ENDIF',
                '  ENDWHILE',
                'ENDFOR'
            ].join('\n'));
            expect(result.errors).toEqual([]);
            expect(result.program).toHaveLength(9);
        });
    });
});
