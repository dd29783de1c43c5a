/**
 * Parsers - one per instruction family
 */

export { parseFlowControl } from './FlowControlParser';
export { parseForLoop, packForLoop, unpackForLoop, FOR_SYNTAX } from './ForLoopParser';
export { parseAssignment, SET_SYNTAX } from './AssignmentParser';
export { parseProcedureCall, CALL_SYNTAX } from './ProcedureCallParser';
export { parseCommand, isNumericOperand } from './CommandParser';
export { validateControlStructures } from './ControlStructureValidator';
