import type * as Raw from '@solidity-parser/parser/dist/src/ast-types';
import {
    Block,
    ContractDefinition,
    ContractMember,
    ElementaryTypeName,
    EnumDefinition,
    ErrorDefinition,
    EventDefinition,
    Expression,
    ExpressionStatement,
    ForStatement,
    FunctionCall,
    FunctionDefinition,
    FunctionKind,
    IdentifierPath,
    ImportDirective,
    InheritanceSpecifier,
    ModifierDefinition,
    ModifierInvocation,
    OverrideSpecifier,
    ParameterList,
    PragmaDirective,
    SourceRange,
    SourceUnit,
    SourceUnitMember,
    Statement,
    StateMutability,
    StorageLocation,
    StructDefinition,
    StructuredDocumentation,
    TypeName,
    VariableDeclaration,
    VariableDeclarationStatement,
    Visibility
} from '../types/ast';
import { findDocComment, findLicense } from './natspec';

type RawNode<K extends Raw.ASTNode['type']> = Extract<Raw.ASTNode, { type: K }>;

function isRaw<K extends Raw.ASTNode['type']>(node: Raw.BaseASTNode, type: K): node is RawNode<K> {
    return node.type === type;
}

const ASSIGNMENT_OPERATORS = new Set(['=', '+=', '-=', '*=', '/=', '%=', '|=', '&=', '^=', '<<=', '>>=', '>>>=']);

/**
 * Raised for grammar productions the analysis does not model
 */
export class UnsupportedConstructError extends Error {
    constructor(readonly construct: string, readonly range: SourceRange) {
        super(`${construct} is not supported.`);
        this.name = 'UnsupportedConstructError';
    }
}

/**
 * Converts the tree produced by @solidity-parser/parser into the compiler-shaped
 * node model. Ids are handed out in pre-order, starting at 0 for the source
 * unit, so the same text always yields the same ids.
 */
export class AstBuilder {
    private nextId = 0;
    private inModifier = false;

    constructor(private readonly source: string, private readonly sourceUnitName: string) {}

    build(ast: Raw.SourceUnit): SourceUnit {
        this.nextId = 0;
        const id = this.allocateId();
        const nodes: SourceUnitMember[] = [];
        for (const child of ast.children) {
            nodes.push(this.buildSourceUnitMember(child));
        }
        return {
            id,
            src: { start: 0, length: this.source.length, sourceIndex: 0 },
            nodeType: 'SourceUnit',
            absolutePath: this.sourceUnitName,
            license: findLicense(this.source),
            nodes
        };
    }

    private allocateId(): number {
        return this.nextId++;
    }

    private src(node: Raw.BaseASTNode): SourceRange {
        if (!node.range) {
            return { start: 0, length: 0, sourceIndex: 0 };
        }
        return { start: node.range[0], length: node.range[1] - node.range[0] + 1, sourceIndex: 0 };
    }

    private spanOf(nodes: Raw.BaseASTNode[], fallback: Raw.BaseASTNode): SourceRange {
        const first = nodes[0];
        const last = nodes[nodes.length - 1];
        if (!first || !last || !first.range || !last.range) {
            const at = this.src(fallback).start;
            return { start: at, length: 0, sourceIndex: 0 };
        }
        return { start: first.range[0], length: last.range[1] - first.range[0] + 1, sourceIndex: 0 };
    }

    private unsupported(construct: string, node: Raw.BaseASTNode): UnsupportedConstructError {
        return new UnsupportedConstructError(construct, this.src(node));
    }

    private documentation(node: Raw.BaseASTNode): StructuredDocumentation | null {
        if (!node.range) {
            return null;
        }
        const comment = findDocComment(this.source, node.range[0]);
        if (!comment) {
            return null;
        }
        return {
            id: this.allocateId(),
            src: { start: comment.start, length: comment.end - comment.start, sourceIndex: 0 },
            nodeType: 'StructuredDocumentation',
            text: comment.text
        };
    }

    // ============ Source unit members ============

    private buildSourceUnitMember(node: Raw.BaseASTNode): SourceUnitMember {
        if (isRaw(node, 'PragmaDirective')) {
            return this.buildPragma(node);
        }
        if (isRaw(node, 'ImportDirective')) {
            return this.buildImport(node);
        }
        if (isRaw(node, 'ContractDefinition')) {
            return this.buildContract(node);
        }
        if (isRaw(node, 'FunctionDefinition')) {
            return this.buildFunction(node, true);
        }
        if (isRaw(node, 'StructDefinition')) {
            return this.buildStruct(node);
        }
        if (isRaw(node, 'EnumDefinition')) {
            return this.buildEnum(node);
        }
        if (isRaw(node, 'CustomErrorDefinition')) {
            return this.buildError(node);
        }
        if (isRaw(node, 'FileLevelConstant')) {
            return this.buildFileLevelConstant(node);
        }
        throw this.unsupported(describe(node.type), node);
    }

    private buildPragma(node: RawNode<'PragmaDirective'>): PragmaDirective {
        return {
            id: this.allocateId(),
            src: this.src(node),
            nodeType: 'PragmaDirective',
            literals: [node.name, node.value]
        };
    }

    private buildImport(node: RawNode<'ImportDirective'>): ImportDirective {
        return {
            id: this.allocateId(),
            src: this.src(node),
            nodeType: 'ImportDirective',
            file: node.path,
            unitAlias: node.unitAlias ?? '',
            symbolAliases: (node.symbolAliases ?? []).map(([foreign, local]) => ({ foreign, local }))
        };
    }

    private buildContract(node: RawNode<'ContractDefinition'>): ContractDefinition {
        const id = this.allocateId();
        const documentation = this.documentation(node);
        const baseContracts = node.baseContracts.map(base => this.buildInheritanceSpecifier(base));
        const members: ContractMember[] = [];
        for (const subNode of node.subNodes) {
            members.push(...this.buildContractMember(subNode));
        }
        const kind = node.kind;
        return {
            id,
            src: this.src(node),
            nodeType: 'ContractDefinition',
            name: node.name,
            contractKind: kind === 'interface' || kind === 'library' ? kind : 'contract',
            abstract: kind === 'abstract',
            baseContracts,
            nodes: members,
            documentation
        };
    }

    private buildInheritanceSpecifier(node: RawNode<'InheritanceSpecifier'>): InheritanceSpecifier {
        const id = this.allocateId();
        const baseName = this.buildIdentifierPath(node.baseName.namePath, node.baseName);
        return {
            id,
            src: this.src(node),
            nodeType: 'InheritanceSpecifier',
            baseName,
            arguments: node.arguments.length > 0 ? node.arguments.map(arg => this.buildExpression(arg)) : null
        };
    }

    private buildContractMember(node: Raw.BaseASTNode): ContractMember[] {
        if (isRaw(node, 'FunctionDefinition')) {
            return [this.buildFunction(node, false)];
        }
        if (isRaw(node, 'ModifierDefinition')) {
            return [this.buildModifier(node)];
        }
        if (isRaw(node, 'StateVariableDeclaration')) {
            return this.buildStateVariables(node);
        }
        if (isRaw(node, 'StructDefinition')) {
            return [this.buildStruct(node)];
        }
        if (isRaw(node, 'EnumDefinition')) {
            return [this.buildEnum(node)];
        }
        if (isRaw(node, 'EventDefinition')) {
            return [this.buildEvent(node)];
        }
        if (isRaw(node, 'CustomErrorDefinition')) {
            return [this.buildError(node)];
        }
        throw this.unsupported(describe(node.type), node);
    }

    private buildFunction(node: RawNode<'FunctionDefinition'>, free: boolean): FunctionDefinition {
        const id = this.allocateId();
        const documentation = this.documentation(node);
        const overrides = this.buildOverrides(node.override, node);
        const parameters = this.buildParameterList(node.parameters, node, 'internal');
        const returnParameters = this.buildParameterList(node.returnParameters ?? [], node, 'internal');
        const modifiers = node.modifiers.map(modifier => this.buildModifierInvocation(modifier));
        const body = node.body ? this.buildBlock(node.body) : null;

        let kind: FunctionKind = free ? 'freeFunction' : 'function';
        if (node.isConstructor) {
            kind = 'constructor';
        } else if (node.isFallback) {
            kind = 'fallback';
        } else if (node.isReceiveEther) {
            kind = 'receive';
        }

        let visibility: Visibility = node.visibility;
        if (visibility === 'default' && kind === 'constructor') {
            visibility = 'public';
        } else if (visibility === 'default' && kind === 'freeFunction') {
            visibility = 'internal';
        }

        return {
            id,
            src: this.src(node),
            nodeType: 'FunctionDefinition',
            name: kind === 'function' || kind === 'freeFunction' ? (node.name ?? '') : '',
            kind,
            visibility,
            stateMutability: normalizeMutability(node.stateMutability),
            virtual: node.isVirtual,
            overrides,
            parameters,
            returnParameters,
            modifiers,
            body,
            implemented: body !== null,
            documentation
        };
    }

    private buildModifier(node: RawNode<'ModifierDefinition'>): ModifierDefinition {
        const id = this.allocateId();
        const documentation = this.documentation(node);
        const overrides = this.buildOverrides(node.override, node);
        const parameters = this.buildParameterList(node.parameters ?? [], node, 'internal');
        this.inModifier = true;
        const body = node.body ? this.buildBlock(node.body) : null;
        this.inModifier = false;
        return {
            id,
            src: this.src(node),
            nodeType: 'ModifierDefinition',
            name: node.name,
            visibility: 'internal',
            virtual: node.isVirtual,
            overrides,
            parameters,
            body,
            documentation
        };
    }

    private buildModifierInvocation(node: RawNode<'ModifierInvocation'>): ModifierInvocation {
        const id = this.allocateId();
        const modifierName = this.buildIdentifierPath(node.name, node);
        return {
            id,
            src: this.src(node),
            nodeType: 'ModifierInvocation',
            modifierName,
            arguments: node.arguments ? node.arguments.map(arg => this.buildExpression(arg)) : null
        };
    }

    private buildOverrides(
        overrides: RawNode<'UserDefinedTypeName'>[] | null,
        owner: Raw.BaseASTNode
    ): OverrideSpecifier | null {
        if (overrides === null) {
            return null;
        }
        const id = this.allocateId();
        return {
            id,
            src: this.spanOf(overrides, owner),
            nodeType: 'OverrideSpecifier',
            overrides: overrides.map(path => this.buildIdentifierPath(path.namePath, path))
        };
    }

    private buildParameterList(
        params: RawNode<'VariableDeclaration'>[],
        owner: Raw.BaseASTNode,
        visibility: Visibility
    ): ParameterList {
        const id = this.allocateId();
        return {
            id,
            src: this.spanOf(params, owner),
            nodeType: 'ParameterList',
            parameters: params.map(param => this.buildVariable(param, { visibility }))
        };
    }

    private buildStateVariables(node: RawNode<'StateVariableDeclaration'>): VariableDeclaration[] {
        return node.variables.map(variable => {
            const id = this.allocateId();
            const documentation = this.documentation(node);
            const typeName = this.requireTypeName(variable.typeName, variable);
            const overrides = this.buildOverrides(variable.override, variable);
            const initial = variable.expression ?? node.initialValue;
            const constant = variable.isDeclaredConst === true;
            const visibility: Visibility = variable.visibility === undefined || variable.visibility === 'default'
                ? 'internal'
                : variable.visibility;
            return {
                id,
                src: this.src(node),
                nodeType: 'VariableDeclaration',
                name: variable.name ?? '',
                typeName,
                constant,
                mutability: constant ? 'constant' : variable.isImmutable ? 'immutable' : 'mutable',
                stateVariable: true,
                storageLocation: normalizeLocation(variable.storageLocation),
                visibility,
                value: initial ? this.buildExpression(initial) : null,
                indexed: false,
                overrides,
                documentation
            };
        });
    }

    private buildFileLevelConstant(node: RawNode<'FileLevelConstant'>): VariableDeclaration {
        const id = this.allocateId();
        const typeName = this.buildTypeName(node.typeName);
        return {
            id,
            src: this.src(node),
            nodeType: 'VariableDeclaration',
            name: node.name,
            typeName,
            constant: node.isDeclaredConst,
            mutability: node.isDeclaredConst ? 'constant' : 'mutable',
            stateVariable: false,
            storageLocation: 'default',
            visibility: 'internal',
            value: this.buildExpression(node.initialValue),
            indexed: false,
            overrides: null,
            documentation: null
        };
    }

    private buildVariable(
        node: RawNode<'VariableDeclaration'>,
        options: { visibility: Visibility }
    ): VariableDeclaration {
        const id = this.allocateId();
        const typeName = this.requireTypeName(node.typeName, node);
        const constant = node.isDeclaredConst === true;
        return {
            id,
            src: this.src(node),
            nodeType: 'VariableDeclaration',
            name: node.name ?? '',
            typeName,
            constant,
            mutability: constant ? 'constant' : 'mutable',
            stateVariable: false,
            storageLocation: normalizeLocation(node.storageLocation),
            visibility: options.visibility,
            value: null,
            indexed: node.isIndexed,
            overrides: null,
            documentation: null
        };
    }

    private buildStruct(node: RawNode<'StructDefinition'>): StructDefinition {
        const id = this.allocateId();
        const documentation = this.documentation(node);
        return {
            id,
            src: this.src(node),
            nodeType: 'StructDefinition',
            name: node.name,
            members: node.members.map(member => this.buildVariable(member, { visibility: 'internal' })),
            documentation
        };
    }

    private buildEnum(node: RawNode<'EnumDefinition'>): EnumDefinition {
        const id = this.allocateId();
        const documentation = this.documentation(node);
        return {
            id,
            src: this.src(node),
            nodeType: 'EnumDefinition',
            name: node.name,
            members: node.members.map(member => ({
                id: this.allocateId(),
                src: this.src(member),
                nodeType: 'EnumValue',
                name: member.name
            })),
            documentation
        };
    }

    private buildEvent(node: RawNode<'EventDefinition'>): EventDefinition {
        const id = this.allocateId();
        const documentation = this.documentation(node);
        return {
            id,
            src: this.src(node),
            nodeType: 'EventDefinition',
            name: node.name,
            anonymous: node.isAnonymous,
            parameters: this.buildParameterList(node.parameters, node, 'internal'),
            documentation
        };
    }

    private buildError(node: RawNode<'CustomErrorDefinition'>): ErrorDefinition {
        const id = this.allocateId();
        const documentation = this.documentation(node);
        return {
            id,
            src: this.src(node),
            nodeType: 'ErrorDefinition',
            name: node.name,
            parameters: this.buildParameterList(node.parameters, node, 'internal'),
            documentation
        };
    }

    // ============ Type names ============

    private requireTypeName(typeName: Raw.TypeName | null, owner: Raw.BaseASTNode): TypeName {
        if (typeName === null) {
            throw this.unsupported('Variable declaration without a type', owner);
        }
        return this.buildTypeName(typeName);
    }

    private buildTypeName(node: Raw.BaseASTNode): TypeName {
        if (isRaw(node, 'ElementaryTypeName')) {
            return this.buildElementaryTypeName(node);
        }
        if (isRaw(node, 'UserDefinedTypeName')) {
            const id = this.allocateId();
            return {
                id,
                src: this.src(node),
                nodeType: 'UserDefinedTypeName',
                pathNode: this.buildIdentifierPath(node.namePath, node)
            };
        }
        if (isRaw(node, 'ArrayTypeName')) {
            const id = this.allocateId();
            const baseType = this.buildTypeName(node.baseTypeName);
            return {
                id,
                src: this.src(node),
                nodeType: 'ArrayTypeName',
                baseType,
                length: node.length ? this.buildExpression(node.length) : null
            };
        }
        if (isRaw(node, 'Mapping')) {
            const id = this.allocateId();
            const keyType = this.buildTypeName(node.keyType);
            const valueType = this.buildTypeName(node.valueType);
            return {
                id,
                src: this.src(node),
                nodeType: 'Mapping',
                keyType,
                keyName: node.keyName?.name ?? '',
                valueType,
                valueName: node.valueName?.name ?? ''
            };
        }
        throw this.unsupported(describe(node.type), node);
    }

    private buildElementaryTypeName(node: RawNode<'ElementaryTypeName'>): ElementaryTypeName {
        const payable = node.stateMutability === 'payable';
        return {
            id: this.allocateId(),
            src: this.src(node),
            nodeType: 'ElementaryTypeName',
            name: node.name,
            stateMutability: node.name === 'address' ? (payable ? 'payable' : 'nonpayable') : null
        };
    }

    private buildIdentifierPath(name: string, node: Raw.BaseASTNode): IdentifierPath {
        return {
            id: this.allocateId(),
            src: this.src(node),
            nodeType: 'IdentifierPath',
            name
        };
    }

    // ============ Statements ============

    private buildBlock(node: RawNode<'Block'>): Block {
        const id = this.allocateId();
        return {
            id,
            src: this.src(node),
            nodeType: 'Block',
            statements: node.statements.map(statement => this.buildStatement(statement))
        };
    }

    private buildStatement(node: Raw.BaseASTNode): Statement {
        if (isRaw(node, 'Block')) {
            return this.buildBlock(node);
        }
        if (isRaw(node, 'UncheckedStatement')) {
            const id = this.allocateId();
            return {
                id,
                src: this.src(node),
                nodeType: 'UncheckedBlock',
                statements: node.block.statements.map(statement => this.buildStatement(statement))
            };
        }
        if (isRaw(node, 'ExpressionStatement')) {
            if (node.expression === null) {
                throw this.unsupported('Empty statement', node);
            }
            const expression = node.expression;
            if (this.inModifier && isRaw(expression, 'Identifier') && expression.name === '_') {
                return { id: this.allocateId(), src: this.src(node), nodeType: 'PlaceholderStatement' };
            }
            return this.buildExpressionStatement(node, expression);
        }
        if (isRaw(node, 'VariableDeclarationStatement')) {
            return this.buildVariableDeclarationStatement(node);
        }
        if (isRaw(node, 'IfStatement')) {
            const id = this.allocateId();
            return {
                id,
                src: this.src(node),
                nodeType: 'IfStatement',
                condition: this.buildExpression(node.condition),
                trueBody: this.buildStatement(node.trueBody),
                falseBody: node.falseBody ? this.buildStatement(node.falseBody) : null
            };
        }
        if (isRaw(node, 'ForStatement')) {
            return this.buildFor(node);
        }
        if (isRaw(node, 'WhileStatement')) {
            const id = this.allocateId();
            return {
                id,
                src: this.src(node),
                nodeType: 'WhileStatement',
                condition: this.buildExpression(node.condition),
                body: this.buildStatement(node.body)
            };
        }
        if (isRaw(node, 'DoWhileStatement')) {
            const id = this.allocateId();
            const body = this.buildStatement(node.body);
            return {
                id,
                src: this.src(node),
                nodeType: 'DoWhileStatement',
                condition: this.buildExpression(node.condition),
                body
            };
        }
        if (isRaw(node, 'ReturnStatement')) {
            const id = this.allocateId();
            return {
                id,
                src: this.src(node),
                nodeType: 'Return',
                expression: node.expression ? this.buildExpression(node.expression) : null
            };
        }
        if (isRaw(node, 'EmitStatement')) {
            const id = this.allocateId();
            return {
                id,
                src: this.src(node),
                nodeType: 'EmitStatement',
                eventCall: this.buildCallOnly(node.eventCall, 'Event invocation')
            };
        }
        if (isRaw(node, 'RevertStatement')) {
            const id = this.allocateId();
            return {
                id,
                src: this.src(node),
                nodeType: 'RevertStatement',
                errorCall: this.buildCallOnly(node.revertCall, 'Error invocation')
            };
        }
        if (isRaw(node, 'BreakStatement')) {
            return { id: this.allocateId(), src: this.src(node), nodeType: 'Break' };
        }
        if (isRaw(node, 'ContinueStatement')) {
            return { id: this.allocateId(), src: this.src(node), nodeType: 'Continue' };
        }
        throw this.unsupported(describe(node.type), node);
    }

    private buildExpressionStatement(node: Raw.BaseASTNode, expression: Raw.BaseASTNode): ExpressionStatement {
        const id = this.allocateId();
        return {
            id,
            src: this.src(node),
            nodeType: 'ExpressionStatement',
            expression: this.buildExpression(expression)
        };
    }

    private buildVariableDeclarationStatement(node: RawNode<'VariableDeclarationStatement'>): VariableDeclarationStatement {
        const id = this.allocateId();
        const declarations = node.variables.map(variable => {
            if (variable === null) {
                return null;
            }
            if (!isRaw(variable, 'VariableDeclaration')) {
                throw this.unsupported(describe(variable.type), variable);
            }
            return this.buildVariable(variable, { visibility: 'internal' });
        });
        return {
            id,
            src: this.src(node),
            nodeType: 'VariableDeclarationStatement',
            assignments: declarations.map(declaration => (declaration ? declaration.id : null)),
            declarations,
            initialValue: node.initialValue ? this.buildExpression(node.initialValue) : null
        };
    }

    private buildFor(node: RawNode<'ForStatement'>): ForStatement {
        const id = this.allocateId();
        let initializationExpression: VariableDeclarationStatement | ExpressionStatement | null = null;
        const init = node.initExpression;
        if (init !== null) {
            if (isRaw(init, 'VariableDeclarationStatement')) {
                initializationExpression = this.buildVariableDeclarationStatement(init);
            } else if (isRaw(init, 'ExpressionStatement') && init.expression !== null) {
                initializationExpression = this.buildExpressionStatement(init, init.expression);
            }
        }
        const condition = node.conditionExpression ? this.buildExpression(node.conditionExpression) : null;
        const loop = node.loopExpression;
        const loopExpression = loop && loop.expression ? this.buildExpressionStatement(loop, loop.expression) : null;
        return {
            id,
            src: this.src(node),
            nodeType: 'ForStatement',
            initializationExpression,
            condition,
            loopExpression,
            body: this.buildStatement(node.body)
        };
    }

    private buildCallOnly(node: Raw.BaseASTNode, construct: string): FunctionCall {
        const expression = this.buildExpression(node);
        if (expression.nodeType !== 'FunctionCall') {
            throw new UnsupportedConstructError(`${construct} without a call`, expression.src);
        }
        return expression;
    }

    // ============ Expressions ============

    private buildExpression(node: Raw.BaseASTNode): Expression {
        const src = this.src(node);
        if (isRaw(node, 'Identifier')) {
            return { id: this.allocateId(), src, nodeType: 'Identifier', name: node.name };
        }
        if (isRaw(node, 'BinaryOperation')) {
            const id = this.allocateId();
            const left = this.buildExpression(node.left);
            const right = this.buildExpression(node.right);
            if (ASSIGNMENT_OPERATORS.has(node.operator)) {
                return { id, src, nodeType: 'Assignment', operator: node.operator, leftHandSide: left, rightHandSide: right };
            }
            return {
                id,
                src,
                nodeType: 'BinaryOperation',
                operator: node.operator,
                leftExpression: left,
                rightExpression: right
            };
        }
        if (isRaw(node, 'UnaryOperation')) {
            const id = this.allocateId();
            return {
                id,
                src,
                nodeType: 'UnaryOperation',
                operator: node.operator,
                prefix: node.isPrefix,
                subExpression: this.buildExpression(node.subExpression)
            };
        }
        if (isRaw(node, 'FunctionCall')) {
            return this.buildFunctionCall(node);
        }
        if (isRaw(node, 'MemberAccess')) {
            const id = this.allocateId();
            return {
                id,
                src,
                nodeType: 'MemberAccess',
                expression: this.buildExpression(node.expression),
                memberName: node.memberName
            };
        }
        if (isRaw(node, 'IndexAccess')) {
            const id = this.allocateId();
            const baseExpression = this.buildExpression(node.base);
            const index: Raw.BaseASTNode | undefined = node.index;
            return {
                id,
                src,
                nodeType: 'IndexAccess',
                baseExpression,
                indexExpression: index ? this.buildExpression(index) : null
            };
        }
        if (isRaw(node, 'Conditional')) {
            const id = this.allocateId();
            return {
                id,
                src,
                nodeType: 'Conditional',
                condition: this.buildExpression(node.condition),
                trueExpression: this.buildExpression(node.trueExpression),
                falseExpression: this.buildExpression(node.falseExpression)
            };
        }
        if (isRaw(node, 'TupleExpression')) {
            const id = this.allocateId();
            return {
                id,
                src,
                nodeType: 'TupleExpression',
                components: node.components.map(component => (component ? this.buildExpression(component) : null)),
                isInlineArray: node.isArray
            };
        }
        if (isRaw(node, 'NumberLiteral')) {
            return {
                id: this.allocateId(),
                src,
                nodeType: 'Literal',
                kind: 'number',
                value: node.number,
                subdenomination: node.subdenomination ?? null
            };
        }
        if (isRaw(node, 'BooleanLiteral')) {
            return {
                id: this.allocateId(),
                src,
                nodeType: 'Literal',
                kind: 'bool',
                value: node.value ? 'true' : 'false',
                subdenomination: null
            };
        }
        if (isRaw(node, 'StringLiteral')) {
            return {
                id: this.allocateId(),
                src,
                nodeType: 'Literal',
                kind: node.isUnicode.some(flag => flag) ? 'unicodeString' : 'string',
                value: node.value,
                subdenomination: null
            };
        }
        if (isRaw(node, 'HexLiteral')) {
            return {
                id: this.allocateId(),
                src,
                nodeType: 'Literal',
                kind: 'hexString',
                value: node.value,
                subdenomination: null
            };
        }
        if (isRaw(node, 'ElementaryTypeName')) {
            const id = this.allocateId();
            return { id, src, nodeType: 'ElementaryTypeNameExpression', typeName: this.buildElementaryTypeName(node) };
        }
        if (isRaw(node, 'TypeNameExpression') && isRaw(node.typeName, 'ElementaryTypeName')) {
            const id = this.allocateId();
            return { id, src, nodeType: 'ElementaryTypeNameExpression', typeName: this.buildElementaryTypeName(node.typeName) };
        }
        if (isRaw(node, 'NewExpression')) {
            const id = this.allocateId();
            return { id, src, nodeType: 'NewExpression', typeName: this.buildTypeName(node.typeName) };
        }
        if (isRaw(node, 'NameValueExpression')) {
            throw this.unsupported('Function call options', node);
        }
        throw this.unsupported(describe(node.type), node);
    }

    private buildFunctionCall(node: RawNode<'FunctionCall'>): FunctionCall {
        const callee = node.expression;
        if (isRaw(callee, 'Identifier') && callee.name === 'type') {
            throw this.unsupported('The "type(...)" expression', node);
        }
        const id = this.allocateId();
        let expression: Expression;
        if (isRaw(callee, 'Identifier') && (callee.name === 'payable' || callee.name === 'address')) {
            const calleeId = this.allocateId();
            const calleeSrc = this.src(callee);
            expression = {
                id: calleeId,
                src: calleeSrc,
                nodeType: 'ElementaryTypeNameExpression',
                typeName: {
                    id: this.allocateId(),
                    src: calleeSrc,
                    nodeType: 'ElementaryTypeName',
                    name: 'address',
                    stateMutability: callee.name === 'payable' ? 'payable' : 'nonpayable'
                }
            };
        } else {
            expression = this.buildExpression(callee);
        }
        return {
            id,
            src: this.src(node),
            nodeType: 'FunctionCall',
            expression,
            arguments: node.arguments.map(arg => this.buildExpression(arg)),
            names: [...node.names]
        };
    }
}

function normalizeMutability(mutability: string | null): StateMutability {
    switch (mutability) {
        case 'pure':
            return 'pure';
        case 'view':
        case 'constant':
            return 'view';
        case 'payable':
            return 'payable';
        default:
            return 'nonpayable';
    }
}

function normalizeLocation(location: string | null): StorageLocation {
    switch (location) {
        case 'storage':
        case 'memory':
        case 'calldata':
            return location;
        default:
            return 'default';
    }
}

const CONSTRUCT_NAMES: Record<string, string> = {
    InlineAssemblyStatement: 'Inline assembly',
    TryStatement: 'Try/catch',
    ThrowStatement: 'The "throw" statement',
    UsingForDeclaration: 'The "using for" directive',
    TypeDefinition: 'User-defined value types',
    FunctionTypeName: 'Function types',
    IndexRangeAccess: 'Index range access',
    EventDefinition: 'File-level events'
};

function describe(type: string): string {
    return CONSTRUCT_NAMES[type] ?? `Construct "${type}"`;
}
