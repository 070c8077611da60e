import { Expression } from '../types/ast';
import { AnalysisUnit } from './analysisUnit';
import { Rational, foldBinary, foldUnary, parseNumberLiteral } from './rational';

/**
 * Evaluates integer constant expressions before the type checker has run:
 * number literals, operators over them and references to constants.
 */
export class ConstantEvaluator {
    private readonly evaluating = new Set<number>();

    constructor(private readonly unit: AnalysisUnit) {}

    evaluate(expression: Expression): Rational | null {
        switch (expression.nodeType) {
            case 'Literal':
                return expression.kind === 'number'
                    ? parseNumberLiteral(expression.value, expression.subdenomination)
                    : null;
            case 'UnaryOperation': {
                const operand = this.evaluate(expression.subExpression);
                return operand ? foldUnary(expression.operator, operand) : null;
            }
            case 'BinaryOperation': {
                const left = this.evaluate(expression.leftExpression);
                const right = this.evaluate(expression.rightExpression);
                return left && right ? foldBinary(expression.operator, left, right) : null;
            }
            case 'TupleExpression':
                if (expression.isInlineArray || expression.components.length !== 1) {
                    return null;
                }
                return expression.components[0] ? this.evaluate(expression.components[0]) : null;
            case 'Identifier':
                return this.evaluateReference(expression.id);
            default:
                return null;
        }
    }

    private evaluateReference(id: number): Rational | null {
        const declarationId = this.unit.annotations.referencedDeclaration.get(id);
        const declaration = declarationId === undefined ? null : this.unit.find(declarationId, 'VariableDeclaration');
        if (!declaration || !declaration.constant || !declaration.value || this.evaluating.has(declaration.id)) {
            return null;
        }
        this.evaluating.add(declaration.id);
        try {
            return this.evaluate(declaration.value);
        } finally {
            this.evaluating.delete(declaration.id);
        }
    }
}
