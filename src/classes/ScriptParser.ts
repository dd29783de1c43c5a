import { Tokenizer, FLOW_CONTROL_KEYWORDS } from './Tokenizer';
import { Preprocessor } from './Preprocessor';
import { CommandRegistry } from './CommandRegistry';
import { ParseError, UnknownCommandError } from './exceptions';
import {
    parseFlowControl,
    parseAssignment,
    parseProcedureCall,
    parseCommand,
    validateControlStructures
} from '../parsers';
import { isSkippableLine, isDebugEnabled, debugLog } from '../utils';
import type {
    Instruction,
    Program,
    ProcedureTable,
    ParseResult,
    SourceLine
} from '../types/Instruction.type';

interface CompiledLines {
    instructions: Instruction[];
    sourceLines: string[];
}

export class ScriptParser {
    private registry: CommandRegistry;

    /**
     * Debug mode flag - set to true to enable logging
     * Controlled by the VITE_DEBUG environment variable or set programmatically
     */
    static debug: boolean = isDebugEnabled();

    /**
     * @param registry - Commands the parser accepts; defaults to the native modules
     */
    constructor(registry?: CommandRegistry) {
        this.registry = registry ?? CommandRegistry.withNativeModules();
    }

    /**
     * Parse a script into its main program and compiled procedure bodies.
     *
     * Per-line errors do not stop parsing. A structural error in the main
     * program or any procedure body leaves `program` null.
     */
    parse(script: string): ParseResult {
        const preprocessed = Preprocessor.process(script);
        const errors: ParseError[] = [...preprocessed.errors];
        let structureValid = true;

        const main = this.compile(preprocessed.lines, preprocessed.procedures, errors);
        const mainStructure = validateControlStructures(main.instructions);
        if (mainStructure.length > 0) {
            structureValid = false;
            errors.push(...mainStructure);
        }

        const procedurePrograms = new Map<string, Program>();
        for (const [name, body] of preprocessed.procedureSources) {
            const compiled = this.compile(body, preprocessed.procedures, errors);
            const bodyStructure = validateControlStructures(compiled.instructions);
            if (bodyStructure.length > 0) {
                structureValid = false;
                errors.push(...bodyStructure);
                continue;
            }
            procedurePrograms.set(name, compiled.instructions);
        }

        errors.sort((a, b) => a.lineNumber - b.lineNumber);

        if (ScriptParser.debug) {
            debugLog('ScriptParser.parse', `Parsed ${main.instructions.length} instruction(s), ${procedurePrograms.size} procedure(s), ${errors.length} error(s)`);
        }

        return {
            program: structureValid ? main.instructions : null,
            procedures: preprocessed.procedures,
            procedurePrograms,
            errors,
            processedScript: main.sourceLines.join('\n')
        };
    }

    /**
     * Parse and return the formatted errors (`Line n: message`); empty when the script is valid
     */
    validate(script: string): string[] {
        return this.parse(script).errors.map((error) => error.toString());
    }

    /**
     * Parse one trimmed line. Returns null for blank and comment lines.
     *
     * @throws ParseError when the line is not a valid instruction
     */
    parseLine(line: SourceLine, procedures: ProcedureTable): Instruction | null {
        if (isSkippableLine(line.text)) {
            return null;
        }
        const tokens = Tokenizer.tokenizeLine(line.text);
        if (tokens.length === 0) {
            return null;
        }

        const keyword = tokens[0].toUpperCase();
        const flowControl = FLOW_CONTROL_KEYWORDS.get(keyword);
        if (flowControl) {
            return parseFlowControl(tokens, flowControl, line.lineNumber);
        }
        if (keyword === 'SET') {
            return parseAssignment(tokens, line.lineNumber);
        }
        if (keyword === 'CALL') {
            return parseProcedureCall(tokens, line.lineNumber, procedures);
        }

        const definition = this.registry.getDefinition(keyword);
        if (definition) {
            const syntax = this.registry.getMetadata(keyword)?.syntax;
            return parseCommand(keyword, tokens, definition, line.lineNumber, syntax);
        }

        throw new UnknownCommandError(`Unknown command: ${tokens[0]}`, line.lineNumber);
    }

    private compile(lines: readonly SourceLine[], procedures: ProcedureTable, errors: ParseError[]): CompiledLines {
        const compiled: CompiledLines = { instructions: [], sourceLines: [] };

        for (const line of lines) {
            try {
                const instruction = this.parseLine(line, procedures);
                if (instruction) {
                    compiled.instructions.push(instruction);
                    compiled.sourceLines.push(line.text);
                }
            } catch (error) {
                if (!(error instanceof ParseError)) {
                    throw error;
                }
                errors.push(error);
            }
        }

        return compiled;
    }
}
