/**
 * Barrel export for all engine classes
 */

export { Tokenizer, FLOW_CONTROL_KEYWORDS, RESERVED_WORDS } from './Tokenizer';
export { Preprocessor, type PreprocessResult } from './Preprocessor';
export { ScriptParser } from './ScriptParser';
export { CommandRegistry } from './CommandRegistry';
export { ExpressionEvaluator, evaluateExpression } from './ExpressionEvaluator';
export { ConditionEvaluator, evaluateCondition } from './ConditionEvaluator';
export { VariableStore } from './VariableStore';
export { findMatchingEnd, findElseOrEndIf } from './BlockMatcher';
export { describeInstruction } from './InstructionPrinter';
export { Executor, type RunOutcome, type ExecutorContext } from './Executor';
export { ExecutionControl } from './ExecutionControl';
export { ExecutionStateTracker, type ExecutionProgress } from './ExecutionStateTracker';
export { ScriptThread, type ThreadEnvironment } from './ScriptThread';
export { ScriptEngine, DEFAULT_ENGINE_OPTIONS } from './ScriptEngine';
export { UserPrompt, type PromptListener, type UserPromptOptions } from './UserPrompt';
export {
    ScriptRunner,
    type SlotConfig,
    type SlotSnapshot,
    type RunnerConfiguration,
    type RunnerEngineOptions,
    type ScriptRunnerOptions
} from './ScriptRunner';
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
} from './exceptions';
