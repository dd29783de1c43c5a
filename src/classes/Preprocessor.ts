/**
 * Preprocessor: trims lines and extracts DEFINE PROCEDURE ... END blocks
 */

import type { SourceLine } from '../types/Instruction.type';
import { splitIntoLines, trimLine, isDebugEnabled, debugLog } from '../utils';
import { ParseError, ProcedureDefinitionError } from './exceptions';

const DEFINE_KEYWORD = 'DEFINE PROCEDURE';
const END_KEYWORD = 'END';

export interface PreprocessResult {
    lines: SourceLine[]; // Lines outside procedure definitions, original numbering kept
    procedures: Map<string, string[]>;
    procedureSources: Map<string, SourceLine[]>;
    errors: ParseError[];
}

interface OpenDefinition {
    name: string;
    body: SourceLine[];
    register: boolean; // false for a duplicate name: the body is consumed but discarded
}

export class Preprocessor {
    static debug: boolean = isDebugEnabled();

    static process(script: string): PreprocessResult {
        const rawLines = splitIntoLines(script);
        const result: PreprocessResult = {
            lines: [],
            procedures: new Map(),
            procedureSources: new Map(),
            errors: []
        };
        let open: OpenDefinition | null = null;

        for (let index = 0; index < rawLines.length; index++) {
            const text = trimLine(rawLines[index]);
            const line: SourceLine = { text, lineNumber: index + 1 };

            if (text.toUpperCase().startsWith(DEFINE_KEYWORD)) {
                if (open) {
                    result.errors.push(new ProcedureDefinitionError('Nested procedure definitions are not allowed', line.lineNumber));
                    continue;
                }
                open = Preprocessor.openDefinition(line, result);
                continue;
            }

            if (text === END_KEYWORD) {
                if (!open) {
                    result.errors.push(new ProcedureDefinitionError('END without DEFINE PROCEDURE', line.lineNumber));
                    continue;
                }
                if (open.register) {
                    result.procedures.set(open.name, open.body.map((bodyLine) => bodyLine.text));
                    result.procedureSources.set(open.name, open.body);
                    if (Preprocessor.debug) {
                        debugLog('Preprocessor.process', `Extracted procedure ${open.name} with ${open.body.length} line(s)`);
                    }
                }
                open = null;
                continue;
            }

            if (open) {
                open.body.push(line);
            } else {
                result.lines.push(line);
            }
        }

        if (open) {
            result.errors.push(new ProcedureDefinitionError(`Unclosed procedure: ${open.name}`, rawLines.length));
        }

        return result;
    }

    /**
     * Start capturing a definition. A malformed header still opens a capture so
     * its body and END are consumed rather than parsed as main-program lines.
     */
    private static openDefinition(line: SourceLine, result: PreprocessResult): OpenDefinition {
        const rest = line.text.slice(DEFINE_KEYWORD.length).trim();
        const paren = rest.indexOf('(');
        const name = (paren >= 0 ? rest.slice(0, paren) : rest).trim();

        if (name.length === 0) {
            result.errors.push(new ProcedureDefinitionError('Invalid procedure definition, missing name', line.lineNumber));
            return { name: '', body: [], register: false };
        }
        if (paren < 0) {
            result.errors.push(new ProcedureDefinitionError('Invalid procedure definition, missing ()', line.lineNumber));
            return { name, body: [], register: false };
        }
        if (result.procedures.has(name)) {
            result.errors.push(new ProcedureDefinitionError(`Procedure already defined: ${name}`, line.lineNumber));
            return { name, body: [], register: false };
        }
        return { name, body: [], register: true };
    }
}
