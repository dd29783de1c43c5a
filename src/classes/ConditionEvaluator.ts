/**
 * ConditionEvaluator class for IF and WHILE conditions
 */

import type { VariableLookup } from '../utils';
import { ExpressionEvaluator } from './ExpressionEvaluator';

type Comparator = (left: number, right: number) => boolean;

/**
 * Scanned in this order; the first operator present splits the text at its first occurrence
 */
const COMPARISONS: ReadonlyArray<[string, Comparator]> = [
    ['<=', (left, right) => left <= right],
    ['>=', (left, right) => left >= right],
    ['==', (left, right) => left === right],
    ['!=', (left, right) => left !== right],
    ['<', (left, right) => left < right],
    ['>', (left, right) => left > right]
];

export class ConditionEvaluator {
    private expressions: ExpressionEvaluator;

    constructor(variables: VariableLookup) {
        this.expressions = new ExpressionEvaluator(variables);
    }

    evaluate(condition: string): boolean {
        for (const [operator, compare] of COMPARISONS) {
            const index = condition.indexOf(operator);
            if (index < 0) {
                continue;
            }
            const left = this.expressions.evaluate(condition.slice(0, index).trim());
            const right = this.expressions.evaluate(condition.slice(index + operator.length).trim());
            return compare(left, right);
        }

        // No comparison: any non-zero value is true
        return this.expressions.evaluate(condition) !== 0;
    }
}

export function evaluateCondition(condition: string, variables: VariableLookup): boolean {
    return new ConditionEvaluator(variables).evaluate(condition);
}
