import { ComplexityResult, DeclarationRecord, Token, TokenSpan } from '../types';
import { DialectDescriptor } from '../dialects/dialect';
import { getComplexityType, isBooleanOperator, isConditional } from './common';
import { evaluateCognitive } from './cognitive';

export { getComplexityType, isConditional } from './common';

/**
 * Complexity of one function or method body. Cyclomatic complexity is one
 * plus the number of decision points; cognitive complexity and nesting depth
 * come from the same body. Tokens inside `nested` spans (functions declared
 * in the body) belong to those declarations and are skipped.
 */
export function evaluateComplexity(
    tokens: readonly Token[],
    record: DeclarationRecord,
    dialect: DialectDescriptor,
    nested: readonly TokenSpan[] = []
): ComplexityResult {
    let decisionPoints = 0;
    const { start, end } = record.body;

    for (let i = start + 1; i < end; i++) {
        const inner = nested.find(span => i >= span.start && i < span.end);
        if (inner) {
            i = inner.end - 1;
            continue;
        }

        const type = getComplexityType(tokens[i], dialect);
        if (!type) continue;
        if (type === 'TERNARY' && !isConditional(tokens, i, end)) continue;
        // `auto&& r = g()` declares a reference
        if (type === 'BINARY' && !isBooleanOperator(tokens, i, dialect)) continue;
        decisionPoints++;
    }

    const { cognitive, nestingDepth } = evaluateCognitive(tokens, record.body, dialect, nested);
    return { decisionPoints, cyclomatic: decisionPoints + 1, cognitive, nestingDepth };
}
