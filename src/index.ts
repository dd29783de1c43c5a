/**
 * Script engine for line-oriented motion, I/O and laser control scripts
 *
 * A script compiles into a flat program that a cooperative worker runs one
 * instruction at a time. Runs can be paused, resumed and stopped between any
 * two instructions.
 *
 * @example
 * ```typescript
 * const engine = new ScriptEngine({ effects: createSimulatedEffects() });
 * engine.executeScript('FOR $i = 1 TO 3\nPRINT "pass $i"\nENDFOR');
 * await engine.waitForCompletion();
 * ```
 */

// Engine and supporting classes
export {
    ScriptEngine,
    DEFAULT_ENGINE_OPTIONS,
    ScriptParser,
    ScriptRunner,
    UserPrompt,
    CommandRegistry,
    Preprocessor,
    Tokenizer,
    ExpressionEvaluator,
    ConditionEvaluator,
    VariableStore,
    evaluateExpression,
    evaluateCondition,
    findMatchingEnd,
    findElseOrEndIf,
    describeInstruction
} from './classes';

export type {
    ExecutionProgress,
    SlotConfig,
    SlotSnapshot,
    RunnerConfiguration,
    RunnerEngineOptions,
    ScriptRunnerOptions,
    PromptListener,
    UserPromptOptions,
    PreprocessResult
} from './classes';

// Errors
export {
    ScriptError,
    ParseError,
    UnknownCommandError,
    InvalidSyntaxError,
    UnmatchedControlStructureError,
    ProcedureDefinitionError,
    ExecutionError,
    InvalidExpressionError,
    DivisionByZeroError,
    ExecutionFailedError,
    TimeoutError,
    CancelledError
} from './classes';

// Types
export { ExecutionState } from './types/Environment.type';
export type {
    CommandDefinition,
    CommandMetadata,
    CommandHelp,
    ModuleMetadata,
    ModuleAdapter,
    Effect,
    EffectContext,
    EffectResult,
    PromptHandler,
    ScriptEngineOptions,
    ExecutionCallback,
    LogCallback,
    PrintCallback
} from './types/Environment.type';

export { FlowControlKind } from './types/Instruction.type';
export type {
    Instruction,
    CommandInstruction,
    FlowControlInstruction,
    AssignmentInstruction,
    ProcedureCallInstruction,
    Program,
    ProcedureTable,
    ParseResult,
    SourceLine,
    ForLoopDescriptor
} from './types/Instruction.type';

// Command modules
export { default as MotionModule } from './modules/Motion';
export { default as IoModule } from './modules/Io';
export { default as PneumaticModule } from './modules/Pneumatic';
export { default as LaserModule } from './modules/Laser';
export { default as ScanModule } from './modules/Scan';
export { default as UtilityModule } from './modules/Utility';
export { createSimulatedEffects, type SimulationOptions } from './modules/Simulation';

// Utilities
export {
    formatErrorWithContext,
    formatParseErrors,
    sleep,
    withTimeout,
    systemClock,
    type ClockAdapter,
    type ErrorContext,
    type Value,
    type VariableLookup
} from './utils';
