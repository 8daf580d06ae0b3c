import { PATTERNS } from './patterns';
import { ExpressionKind } from './types';

export interface Expression {
    raw: string;
    /** Inner text of the expression, trimmed. */
    expression: string;
    kind: ExpressionKind;
    method?: string;
    argument?: string;
    start: number;
    end: number;
}

export function extractExpressions(template: string): Expression[] {
    const expressions: Expression[] = [];

    // Reset lastIndex for global regex
    PATTERNS.INTERPOLATION.lastIndex = 0;

    let match: RegExpExecArray | null;
    while ((match = PATTERNS.INTERPOLATION.exec(template)) !== null) {
        const inner = (match[1] ?? '').trim();
        const methodMatch = PATTERNS.METHOD.exec(inner);
        expressions.push({
            raw: match[0],
            expression: inner,
            kind: methodMatch ? 'METHOD' : 'VARIABLE',
            method: methodMatch ? methodMatch[1] : undefined,
            argument: methodMatch ? (methodMatch[2] ?? methodMatch[3]) : undefined,
            start: match.index,
            end: match.index + match[0].length
        });
    }

    return expressions;
}

export function hasInterpolation(template: string): boolean {
    PATTERNS.INTERPOLATION.lastIndex = 0;
    return PATTERNS.INTERPOLATION.test(template);
}
