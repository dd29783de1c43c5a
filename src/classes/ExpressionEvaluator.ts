/**
 * ExpressionEvaluator class for evaluating arithmetic expressions
 *
 * Grammar, after `$name` substitution:
 *   expr   := term (('+' | '-') term)*
 *   term   := unary (('*' | '/') unary)*
 *   unary  := ('-' | '+') unary | '(' expr ')' | number
 *
 * Binary operators associate to the left, so the evaluator splits at the
 * rightmost top-level operator of the lowest precedence present.
 */

import { substituteVariables, type Value, type VariableLookup } from '../utils';
import { InvalidExpressionError, DivisionByZeroError } from './exceptions';

const NUMBER_LITERAL = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const OPERATORS = '+-*/';

export class ExpressionEvaluator {
    private variables: VariableLookup;

    constructor(variables: VariableLookup) {
        this.variables = variables;
    }

    evaluate(expression: string): Value {
        const substituted = substituteVariables(expression, this.variables);
        ExpressionEvaluator.checkParentheses(substituted, expression);
        return ExpressionEvaluator.evaluateArithmetic(substituted, expression);
    }

    private static evaluateArithmetic(text: string, source: string): Value {
        const expr = text.trim();
        if (expr.length === 0) {
            throw new InvalidExpressionError(`Invalid expression: ${source}`, source);
        }

        if (ExpressionEvaluator.isWrapped(expr)) {
            return ExpressionEvaluator.evaluateArithmetic(expr.slice(1, -1), source);
        }

        const additive = ExpressionEvaluator.findSplit(expr, '+-');
        if (additive >= 0) {
            const left = ExpressionEvaluator.evaluateArithmetic(expr.slice(0, additive), source);
            const right = ExpressionEvaluator.evaluateArithmetic(expr.slice(additive + 1), source);
            return expr[additive] === '+' ? left + right : left - right;
        }

        const multiplicative = ExpressionEvaluator.findSplit(expr, '*/');
        if (multiplicative >= 0) {
            const left = ExpressionEvaluator.evaluateArithmetic(expr.slice(0, multiplicative), source);
            const right = ExpressionEvaluator.evaluateArithmetic(expr.slice(multiplicative + 1), source);
            if (expr[multiplicative] === '*') {
                return left * right;
            }
            if (right === 0) {
                throw new DivisionByZeroError(source);
            }
            return left / right;
        }

        if (expr[0] === '-') {
            return -ExpressionEvaluator.evaluateArithmetic(expr.slice(1), source);
        }
        if (expr[0] === '+') {
            return ExpressionEvaluator.evaluateArithmetic(expr.slice(1), source);
        }

        if (expr === 'Infinity' || NUMBER_LITERAL.test(expr)) {
            return Number(expr);
        }

        throw new InvalidExpressionError(`Invalid expression: ${source}`, source);
    }

    private static checkParentheses(text: string, source: string): void {
        let depth = 0;
        for (const char of text) {
            if (char === '(') {
                depth++;
            } else if (char === ')') {
                depth--;
                if (depth < 0) {
                    break;
                }
            }
        }
        if (depth !== 0) {
            throw new InvalidExpressionError(`Unbalanced parentheses in expression: ${source}`, source);
        }
    }

    /**
     * True when the first '(' closes at the last character
     */
    private static isWrapped(expr: string): boolean {
        if (!expr.startsWith('(') || !expr.endsWith(')')) {
            return false;
        }
        let depth = 0;
        for (let i = 0; i < expr.length; i++) {
            if (expr[i] === '(') {
                depth++;
            } else if (expr[i] === ')') {
                depth--;
                if (depth === 0) {
                    return i === expr.length - 1;
                }
            }
        }
        return false;
    }

    /**
     * Index of the rightmost top-level binary operator from `operators`, or -1
     */
    private static findSplit(expr: string, operators: string): number {
        let depth = 0;
        let found = -1;
        for (let i = 0; i < expr.length; i++) {
            const char = expr[i];
            if (char === '(') {
                depth++;
            } else if (char === ')') {
                depth--;
            } else if (depth === 0 && operators.includes(char) && ExpressionEvaluator.isBinary(expr, i)) {
                found = i;
            }
        }
        return found;
    }

    /**
     * A sign is unary at the start, after another operator or '(',
     * and when it is the exponent sign of a literal such as 1e-3
     */
    private static isBinary(expr: string, index: number): boolean {
        let prev = index - 1;
        while (prev >= 0 && (expr[prev] === ' ' || expr[prev] === '\t')) {
            prev--;
        }
        if (prev < 0) {
            return false;
        }
        const before = expr[prev];
        if (OPERATORS.includes(before) || before === '(') {
            return false;
        }
        const sign = expr[index] === '+' || expr[index] === '-';
        if (sign && prev === index - 1 && (before === 'e' || before === 'E')) {
            const mantissa = prev > 0 ? expr[prev - 1] : '';
            if (/[0-9.]/.test(mantissa)) {
                return false;
            }
        }
        return true;
    }
}

/**
 * Evaluate `expression` against `variables`
 */
export function evaluateExpression(expression: string, variables: VariableLookup): Value {
    return new ExpressionEvaluator(variables).evaluate(expression);
}
