import { AstNode, isDeclaration, isScopeNode } from '../types/ast';
import { ASTTraverser } from '../parser/astTraverser';
import { AnalysisUnit } from './analysisUnit';

/**
 * Records, for every declaration, the id of the closest enclosing node that
 * opens a scope. Performs no validation and cannot fail.
 */
export class Scoper {
    constructor(private readonly unit: AnalysisUnit) {}

    assignScopes(): void {
        const scopes: AstNode[] = [];
        new ASTTraverser().traverse(this.unit.sourceUnit, {
            enter: node => {
                const current = scopes[scopes.length - 1];
                if (current && isDeclaration(node)) {
                    this.unit.annotations.scope.set(node.id, current.id);
                }
                if (isScopeNode(node)) {
                    scopes.push(node);
                }
            },
            leave: node => {
                if (isScopeNode(node)) {
                    scopes.pop();
                }
            }
        });
    }
}
