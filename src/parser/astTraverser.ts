import { AstNode, SourceUnit } from '../types/ast';

export interface TraversalVisitor {
    /** Return false to skip the children of the node */
    enter?(node: AstNode, parent: AstNode | null): boolean | void;
    leave?(node: AstNode, parent: AstNode | null): void;
}

/**
 * Generic walker over the syntax tree. Children are produced in source order,
 * which is the order every stage relies on for diagnostics.
 */
export class ASTTraverser {
    /**
     * Walk a subtree depth-first
     */
    traverse(node: AstNode, visitor: TraversalVisitor, parent: AstNode | null = null): void {
        const descend = visitor.enter ? visitor.enter(node, parent) : true;
        if (descend !== false) {
            for (const child of ASTTraverser.childrenOf(node)) {
                this.traverse(child, visitor, node);
            }
        }
        visitor.leave?.(node, parent);
    }

    /**
     * Build the id -> node index of a source unit
     */
    buildIndex(unit: SourceUnit): Map<number, AstNode> {
        const index = new Map<number, AstNode>();
        this.traverse(unit, {
            enter: node => {
                index.set(node.id, node);
            }
        });
        return index;
    }

    /**
     * Build the child id -> parent node map of a source unit
     */
    buildParentMap(unit: SourceUnit): Map<number, AstNode> {
        const parents = new Map<number, AstNode>();
        this.traverse(unit, {
            enter: (node, parent) => {
                if (parent) {
                    parents.set(node.id, parent);
                }
            }
        });
        return parents;
    }

    /**
     * Direct children of a node in source order
     */
    static childrenOf(node: AstNode): AstNode[] {
        switch (node.nodeType) {
            case 'SourceUnit':
                return [...node.nodes];
            case 'ContractDefinition':
                return compact([node.documentation, ...node.baseContracts, ...node.nodes]);
            case 'InheritanceSpecifier':
                return [node.baseName, ...(node.arguments ?? [])];
            case 'FunctionDefinition':
                return compact([
                    node.documentation,
                    node.overrides,
                    node.parameters,
                    node.returnParameters,
                    ...node.modifiers,
                    node.body
                ]);
            case 'ModifierDefinition':
                return compact([node.documentation, node.overrides, node.parameters, node.body]);
            case 'ModifierInvocation':
                return [node.modifierName, ...(node.arguments ?? [])];
            case 'OverrideSpecifier':
                return [...node.overrides];
            case 'ParameterList':
                return [...node.parameters];
            case 'VariableDeclaration':
                return compact([node.documentation, node.typeName, node.overrides, node.value]);
            case 'EventDefinition':
            case 'ErrorDefinition':
                return compact([node.documentation, node.parameters]);
            case 'StructDefinition':
                return compact([node.documentation, ...node.members]);
            case 'EnumDefinition':
                return compact([node.documentation, ...node.members]);
            case 'UserDefinedTypeName':
                return [node.pathNode];
            case 'ArrayTypeName':
                return compact([node.baseType, node.length]);
            case 'Mapping':
                return [node.keyType, node.valueType];
            case 'Block':
            case 'UncheckedBlock':
                return [...node.statements];
            case 'ExpressionStatement':
                return [node.expression];
            case 'VariableDeclarationStatement':
                return compact([...node.declarations, node.initialValue]);
            case 'IfStatement':
                return compact([node.condition, node.trueBody, node.falseBody]);
            case 'ForStatement':
                return compact([node.initializationExpression, node.condition, node.loopExpression, node.body]);
            case 'WhileStatement':
                return [node.condition, node.body];
            case 'DoWhileStatement':
                return [node.body, node.condition];
            case 'Return':
                return compact([node.expression]);
            case 'EmitStatement':
                return [node.eventCall];
            case 'RevertStatement':
                return [node.errorCall];
            case 'MemberAccess':
                return [node.expression];
            case 'IndexAccess':
                return compact([node.baseExpression, node.indexExpression]);
            case 'FunctionCall':
                return [node.expression, ...node.arguments];
            case 'Assignment':
                return [node.leftHandSide, node.rightHandSide];
            case 'BinaryOperation':
                return [node.leftExpression, node.rightExpression];
            case 'UnaryOperation':
                return [node.subExpression];
            case 'Conditional':
                return [node.condition, node.trueExpression, node.falseExpression];
            case 'TupleExpression':
                return compact(node.components);
            case 'ElementaryTypeNameExpression':
                return [node.typeName];
            case 'NewExpression':
                return [node.typeName];
            case 'PragmaDirective':
            case 'ImportDirective':
            case 'StructuredDocumentation':
            case 'EnumValue':
            case 'ElementaryTypeName':
            case 'IdentifierPath':
            case 'Break':
            case 'Continue':
            case 'PlaceholderStatement':
            case 'Identifier':
            case 'Literal':
                return [];
        }
    }
}

function compact(nodes: (AstNode | null)[]): AstNode[] {
    return nodes.filter((node): node is AstNode => node !== null);
}
