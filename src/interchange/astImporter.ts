import { z } from 'zod';
import { AstNode, NodeType, SourceRange, SourceUnit } from '../types/ast';

/**
 * Raised when a document is not a well-formed syntax tree
 */
export class InterchangeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InterchangeError';
    }
}

const NODE_TYPES = [
    'SourceUnit',
    'PragmaDirective',
    'ImportDirective',
    'StructuredDocumentation',
    'ContractDefinition',
    'InheritanceSpecifier',
    'FunctionDefinition',
    'ModifierDefinition',
    'ModifierInvocation',
    'OverrideSpecifier',
    'ParameterList',
    'VariableDeclaration',
    'EventDefinition',
    'ErrorDefinition',
    'StructDefinition',
    'EnumDefinition',
    'EnumValue',
    'ElementaryTypeName',
    'IdentifierPath',
    'UserDefinedTypeName',
    'ArrayTypeName',
    'Mapping',
    'Block',
    'UncheckedBlock',
    'ExpressionStatement',
    'VariableDeclarationStatement',
    'IfStatement',
    'ForStatement',
    'WhileStatement',
    'DoWhileStatement',
    'Return',
    'EmitStatement',
    'RevertStatement',
    'Break',
    'Continue',
    'PlaceholderStatement',
    'Identifier',
    'MemberAccess',
    'IndexAccess',
    'FunctionCall',
    'Assignment',
    'BinaryOperation',
    'UnaryOperation',
    'Conditional',
    'Literal',
    'TupleExpression',
    'ElementaryTypeNameExpression',
    'NewExpression'
] as const satisfies readonly NodeType[];

const EXPRESSION_KINDS = [
    'Identifier',
    'MemberAccess',
    'IndexAccess',
    'FunctionCall',
    'Assignment',
    'BinaryOperation',
    'UnaryOperation',
    'Conditional',
    'Literal',
    'TupleExpression',
    'ElementaryTypeNameExpression',
    'NewExpression'
] as const;

const STATEMENT_KINDS = [
    'Block',
    'UncheckedBlock',
    'ExpressionStatement',
    'VariableDeclarationStatement',
    'IfStatement',
    'ForStatement',
    'WhileStatement',
    'DoWhileStatement',
    'Return',
    'EmitStatement',
    'RevertStatement',
    'Break',
    'Continue',
    'PlaceholderStatement'
] as const;

const TYPE_NAME_KINDS = ['ElementaryTypeName', 'UserDefinedTypeName', 'ArrayTypeName', 'Mapping'] as const;

const CONTRACT_MEMBER_KINDS = [
    'FunctionDefinition',
    'ModifierDefinition',
    'VariableDeclaration',
    'StructDefinition',
    'EnumDefinition',
    'EventDefinition',
    'ErrorDefinition'
] as const;

const SOURCE_UNIT_MEMBER_KINDS = [
    'PragmaDirective',
    'ImportDirective',
    'ContractDefinition',
    'FunctionDefinition',
    'StructDefinition',
    'EnumDefinition',
    'ErrorDefinition',
    'VariableDeclaration'
] as const;

// ============ Schemas ============

const ENVELOPE = z.object({
    id: z.number().int().nonnegative().safe(),
    nodeType: z.enum(NODE_TYPES),
    src: z.string().regex(/^\d+:\d+:-?\d+$/, 'Source location must have the form "start:length:index"')
});

const child = z.unknown();
const children = z.array(z.unknown());
const visibility = z.enum(['external', 'public', 'internal', 'private', 'default']);
const stateMutability = z.enum(['pure', 'view', 'nonpayable', 'payable']);

const SCHEMAS = {
    SourceUnit: z.object({ absolutePath: z.string(), license: z.string().nullable(), nodes: children }),
    PragmaDirective: z.object({ literals: z.array(z.string()) }),
    ImportDirective: z.object({
        file: z.string(),
        unitAlias: z.string(),
        symbolAliases: z.array(z.object({ foreign: z.string(), local: z.string().nullable() }))
    }),
    StructuredDocumentation: z.object({ text: z.string() }),
    ContractDefinition: z.object({
        name: z.string(),
        contractKind: z.enum(['contract', 'interface', 'library']),
        abstract: z.boolean(),
        baseContracts: children,
        nodes: children,
        documentation: child
    }),
    InheritanceSpecifier: z.object({ baseName: child, arguments: children.nullable() }),
    FunctionDefinition: z.object({
        name: z.string(),
        kind: z.enum(['function', 'constructor', 'fallback', 'receive', 'freeFunction']),
        visibility,
        stateMutability,
        virtual: z.boolean(),
        overrides: child,
        parameters: child,
        returnParameters: child,
        modifiers: children,
        body: child,
        implemented: z.boolean(),
        documentation: child
    }),
    ModifierDefinition: z.object({
        name: z.string(),
        visibility,
        virtual: z.boolean(),
        overrides: child,
        parameters: child,
        body: child,
        documentation: child
    }),
    ModifierInvocation: z.object({ modifierName: child, arguments: children.nullable() }),
    OverrideSpecifier: z.object({ overrides: children }),
    ParameterList: z.object({ parameters: children }),
    VariableDeclaration: z.object({
        name: z.string(),
        typeName: child,
        constant: z.boolean(),
        mutability: z.enum(['mutable', 'immutable', 'constant']),
        stateVariable: z.boolean(),
        storageLocation: z.enum(['default', 'storage', 'memory', 'calldata']),
        visibility,
        value: child,
        indexed: z.boolean(),
        overrides: child,
        documentation: child
    }),
    EventDefinition: z.object({ name: z.string(), anonymous: z.boolean(), parameters: child, documentation: child }),
    ErrorDefinition: z.object({ name: z.string(), parameters: child, documentation: child }),
    StructDefinition: z.object({ name: z.string(), members: children, documentation: child }),
    EnumDefinition: z.object({ name: z.string(), members: children, documentation: child }),
    EnumValue: z.object({ name: z.string() }),
    ElementaryTypeName: z.object({ name: z.string(), stateMutability: z.enum(['payable', 'nonpayable']).nullable() }),
    IdentifierPath: z.object({ name: z.string() }),
    UserDefinedTypeName: z.object({ pathNode: child }),
    ArrayTypeName: z.object({ baseType: child, length: child }),
    Mapping: z.object({ keyType: child, keyName: z.string(), valueType: child, valueName: z.string() }),
    Block: z.object({ statements: children }),
    ExpressionStatement: z.object({ expression: child }),
    VariableDeclarationStatement: z.object({
        assignments: z.array(z.number().int().safe().nullable()),
        declarations: children,
        initialValue: child
    }),
    IfStatement: z.object({ condition: child, trueBody: child, falseBody: child }),
    ForStatement: z.object({ initializationExpression: child, condition: child, loopExpression: child, body: child }),
    Loop: z.object({ condition: child, body: child }),
    Return: z.object({ expression: child }),
    EmitStatement: z.object({ eventCall: child }),
    RevertStatement: z.object({ errorCall: child }),
    Identifier: z.object({ name: z.string() }),
    MemberAccess: z.object({ expression: child, memberName: z.string() }),
    IndexAccess: z.object({ baseExpression: child, indexExpression: child }),
    FunctionCall: z.object({ expression: child, arguments: children, names: z.array(z.string()) }),
    Assignment: z.object({ operator: z.string(), leftHandSide: child, rightHandSide: child }),
    BinaryOperation: z.object({ operator: z.string(), leftExpression: child, rightExpression: child }),
    UnaryOperation: z.object({ operator: z.string(), prefix: z.boolean(), subExpression: child }),
    Conditional: z.object({ condition: child, trueExpression: child, falseExpression: child }),
    Literal: z.object({
        kind: z.enum(['number', 'bool', 'string', 'hexString', 'unicodeString']),
        value: z.string(),
        subdenomination: z.string().nullable()
    }),
    TupleExpression: z.object({ components: children, isInlineArray: z.boolean() }),
    TypeNameWrapper: z.object({ typeName: child })
};

type NodeOf<K extends NodeType> = Extract<AstNode, { nodeType: K }>;

function isOneOf<K extends NodeType>(node: AstNode, kinds: readonly K[]): node is NodeOf<K> {
    return kinds.some(kind => kind === node.nodeType);
}

function parseSourceRange(src: string): SourceRange {
    const [start, length, sourceIndex] = src.split(':').map(Number);
    return { start, length, sourceIndex };
}

/**
 * Reads a compiler-style JSON document back into a syntax tree. Only
 * syntactic fields are taken; semantic ones such as typeDescriptions or
 * referencedDeclaration are dropped, and analysis recomputes them.
 */
export class AstImporter {
    // Set: node ids seen in the current document
    private readonly seen = new Set<number>();

    /**
     * Accepts a bare SourceUnit, or a map from source unit names to units
     * (optionally wrapped as `{ "ast": ... }`), from which the entry for
     * `sourceUnitName` is taken.
     */
    import(json: string, sourceUnitName: string): SourceUnit {
        let document: unknown;
        try {
            document = JSON.parse(json);
        } catch (error) {
            throw new InterchangeError(`Malformed JSON: ${error instanceof Error ? error.message : String(error)}`);
        }
        this.seen.clear();
        return this.expect(this.selectRoot(document, sourceUnitName), ['SourceUnit']);
    }

    private selectRoot(document: unknown, sourceUnitName: string): unknown {
        const record = z.record(z.unknown()).safeParse(document);
        if (!record.success) {
            throw new InterchangeError('Document must be a JSON object.');
        }
        if ('nodeType' in record.data) {
            return document;
        }
        if (!Object.hasOwn(record.data, sourceUnitName)) {
            throw new InterchangeError(`Document has no source unit named "${sourceUnitName}".`);
        }
        const entry = record.data[sourceUnitName];
        const wrapped = z.object({ ast: z.unknown() }).safeParse(entry);
        return wrapped.success && wrapped.data.ast !== undefined ? wrapped.data.ast : entry;
    }

    private expect<K extends NodeType>(value: unknown, kinds: readonly K[]): NodeOf<K> {
        const node = this.node(value);
        if (!isOneOf(node, kinds)) {
            throw new InterchangeError(`Node ${node.id}: expected ${kinds.join(' | ')}, found ${node.nodeType}.`);
        }
        return node;
    }

    private optional<K extends NodeType>(value: unknown, kinds: readonly K[]): NodeOf<K> | null {
        return value === null ? null : this.expect(value, kinds);
    }

    private list<K extends NodeType>(values: unknown[], kinds: readonly K[]): NodeOf<K>[] {
        return values.map(value => this.expect(value, kinds));
    }

    private fields<T extends z.ZodTypeAny>(schema: T, value: unknown, id: number, nodeType: string): z.infer<T> {
        const result = schema.safeParse(value);
        if (!result.success) {
            const issue = result.error.issues[0];
            throw new InterchangeError(`${nodeType} ${id}: ${issue.path.join('.')} ${issue.message}`);
        }
        return result.data;
    }

    private node(value: unknown): AstNode {
        const envelope = this.fields(ENVELOPE, value, -1, 'Node');
        const { id, nodeType } = envelope;
        if (this.seen.has(id)) {
            throw new InterchangeError(`Duplicate node id ${id}.`);
        }
        this.seen.add(id);
        const src = parseSourceRange(envelope.src);
        const base = { id, src };

        switch (nodeType) {
            case 'SourceUnit': {
                const f = this.fields(SCHEMAS.SourceUnit, value, id, nodeType);
                return { ...base, nodeType, absolutePath: f.absolutePath, license: f.license, nodes: this.list(f.nodes, SOURCE_UNIT_MEMBER_KINDS) };
            }
            case 'PragmaDirective':
                return { ...base, nodeType, literals: this.fields(SCHEMAS.PragmaDirective, value, id, nodeType).literals };
            case 'ImportDirective': {
                const f = this.fields(SCHEMAS.ImportDirective, value, id, nodeType);
                return { ...base, nodeType, file: f.file, unitAlias: f.unitAlias, symbolAliases: f.symbolAliases };
            }
            case 'StructuredDocumentation':
                return { ...base, nodeType, text: this.fields(SCHEMAS.StructuredDocumentation, value, id, nodeType).text };
            case 'ContractDefinition': {
                const f = this.fields(SCHEMAS.ContractDefinition, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    name: f.name,
                    contractKind: f.contractKind,
                    abstract: f.abstract,
                    baseContracts: this.list(f.baseContracts, ['InheritanceSpecifier']),
                    nodes: this.list(f.nodes, CONTRACT_MEMBER_KINDS),
                    documentation: this.optional(f.documentation, ['StructuredDocumentation'])
                };
            }
            case 'InheritanceSpecifier': {
                const f = this.fields(SCHEMAS.InheritanceSpecifier, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    baseName: this.expect(f.baseName, ['IdentifierPath']),
                    arguments: f.arguments === null ? null : this.list(f.arguments, EXPRESSION_KINDS)
                };
            }
            case 'FunctionDefinition': {
                const f = this.fields(SCHEMAS.FunctionDefinition, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    name: f.name,
                    kind: f.kind,
                    visibility: f.visibility,
                    stateMutability: f.stateMutability,
                    virtual: f.virtual,
                    overrides: this.optional(f.overrides, ['OverrideSpecifier']),
                    parameters: this.expect(f.parameters, ['ParameterList']),
                    returnParameters: this.expect(f.returnParameters, ['ParameterList']),
                    modifiers: this.list(f.modifiers, ['ModifierInvocation']),
                    body: this.optional(f.body, ['Block']),
                    implemented: f.implemented,
                    documentation: this.optional(f.documentation, ['StructuredDocumentation'])
                };
            }
            case 'ModifierDefinition': {
                const f = this.fields(SCHEMAS.ModifierDefinition, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    name: f.name,
                    visibility: f.visibility,
                    virtual: f.virtual,
                    overrides: this.optional(f.overrides, ['OverrideSpecifier']),
                    parameters: this.expect(f.parameters, ['ParameterList']),
                    body: this.optional(f.body, ['Block']),
                    documentation: this.optional(f.documentation, ['StructuredDocumentation'])
                };
            }
            case 'ModifierInvocation': {
                const f = this.fields(SCHEMAS.ModifierInvocation, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    modifierName: this.expect(f.modifierName, ['IdentifierPath']),
                    arguments: f.arguments === null ? null : this.list(f.arguments, EXPRESSION_KINDS)
                };
            }
            case 'OverrideSpecifier':
                return { ...base, nodeType, overrides: this.list(this.fields(SCHEMAS.OverrideSpecifier, value, id, nodeType).overrides, ['IdentifierPath']) };
            case 'ParameterList':
                return { ...base, nodeType, parameters: this.list(this.fields(SCHEMAS.ParameterList, value, id, nodeType).parameters, ['VariableDeclaration']) };
            case 'VariableDeclaration': {
                const f = this.fields(SCHEMAS.VariableDeclaration, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    name: f.name,
                    typeName: this.expect(f.typeName, TYPE_NAME_KINDS),
                    constant: f.constant,
                    mutability: f.mutability,
                    stateVariable: f.stateVariable,
                    storageLocation: f.storageLocation,
                    visibility: f.visibility,
                    value: this.optional(f.value, EXPRESSION_KINDS),
                    indexed: f.indexed,
                    overrides: this.optional(f.overrides, ['OverrideSpecifier']),
                    documentation: this.optional(f.documentation, ['StructuredDocumentation'])
                };
            }
            case 'EventDefinition': {
                const f = this.fields(SCHEMAS.EventDefinition, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    name: f.name,
                    anonymous: f.anonymous,
                    parameters: this.expect(f.parameters, ['ParameterList']),
                    documentation: this.optional(f.documentation, ['StructuredDocumentation'])
                };
            }
            case 'ErrorDefinition': {
                const f = this.fields(SCHEMAS.ErrorDefinition, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    name: f.name,
                    parameters: this.expect(f.parameters, ['ParameterList']),
                    documentation: this.optional(f.documentation, ['StructuredDocumentation'])
                };
            }
            case 'StructDefinition': {
                const f = this.fields(SCHEMAS.StructDefinition, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    name: f.name,
                    members: this.list(f.members, ['VariableDeclaration']),
                    documentation: this.optional(f.documentation, ['StructuredDocumentation'])
                };
            }
            case 'EnumDefinition': {
                const f = this.fields(SCHEMAS.EnumDefinition, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    name: f.name,
                    members: this.list(f.members, ['EnumValue']),
                    documentation: this.optional(f.documentation, ['StructuredDocumentation'])
                };
            }
            case 'EnumValue':
                return { ...base, nodeType, name: this.fields(SCHEMAS.EnumValue, value, id, nodeType).name };
            case 'ElementaryTypeName': {
                const f = this.fields(SCHEMAS.ElementaryTypeName, value, id, nodeType);
                return { ...base, nodeType, name: f.name, stateMutability: f.stateMutability };
            }
            case 'IdentifierPath':
                return { ...base, nodeType, name: this.fields(SCHEMAS.IdentifierPath, value, id, nodeType).name };
            case 'UserDefinedTypeName':
                return { ...base, nodeType, pathNode: this.expect(this.fields(SCHEMAS.UserDefinedTypeName, value, id, nodeType).pathNode, ['IdentifierPath']) };
            case 'ArrayTypeName': {
                const f = this.fields(SCHEMAS.ArrayTypeName, value, id, nodeType);
                return { ...base, nodeType, baseType: this.expect(f.baseType, TYPE_NAME_KINDS), length: this.optional(f.length, EXPRESSION_KINDS) };
            }
            case 'Mapping': {
                const f = this.fields(SCHEMAS.Mapping, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    keyType: this.expect(f.keyType, TYPE_NAME_KINDS),
                    keyName: f.keyName,
                    valueType: this.expect(f.valueType, TYPE_NAME_KINDS),
                    valueName: f.valueName
                };
            }
            case 'Block':
            case 'UncheckedBlock':
                return { ...base, nodeType, statements: this.list(this.fields(SCHEMAS.Block, value, id, nodeType).statements, STATEMENT_KINDS) };
            case 'ExpressionStatement':
                return { ...base, nodeType, expression: this.expect(this.fields(SCHEMAS.ExpressionStatement, value, id, nodeType).expression, EXPRESSION_KINDS) };
            case 'VariableDeclarationStatement': {
                const f = this.fields(SCHEMAS.VariableDeclarationStatement, value, id, nodeType);
                const declarations = f.declarations.map(declaration => this.optional(declaration, ['VariableDeclaration']));
                for (const assigned of f.assignments) {
                    if (assigned !== null && !declarations.some(declaration => declaration?.id === assigned)) {
                        throw new InterchangeError(`${nodeType} ${id}: assignment ${assigned} names no declaration of the statement.`);
                    }
                }
                return { ...base, nodeType, assignments: f.assignments, declarations, initialValue: this.optional(f.initialValue, EXPRESSION_KINDS) };
            }
            case 'IfStatement': {
                const f = this.fields(SCHEMAS.IfStatement, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    condition: this.expect(f.condition, EXPRESSION_KINDS),
                    trueBody: this.expect(f.trueBody, STATEMENT_KINDS),
                    falseBody: this.optional(f.falseBody, STATEMENT_KINDS)
                };
            }
            case 'ForStatement': {
                const f = this.fields(SCHEMAS.ForStatement, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    initializationExpression: this.optional(f.initializationExpression, ['VariableDeclarationStatement', 'ExpressionStatement']),
                    condition: this.optional(f.condition, EXPRESSION_KINDS),
                    loopExpression: this.optional(f.loopExpression, ['ExpressionStatement']),
                    body: this.expect(f.body, STATEMENT_KINDS)
                };
            }
            case 'WhileStatement':
            case 'DoWhileStatement': {
                const f = this.fields(SCHEMAS.Loop, value, id, nodeType);
                return { ...base, nodeType, condition: this.expect(f.condition, EXPRESSION_KINDS), body: this.expect(f.body, STATEMENT_KINDS) };
            }
            case 'Return':
                return { ...base, nodeType, expression: this.optional(this.fields(SCHEMAS.Return, value, id, nodeType).expression, EXPRESSION_KINDS) };
            case 'EmitStatement':
                return { ...base, nodeType, eventCall: this.expect(this.fields(SCHEMAS.EmitStatement, value, id, nodeType).eventCall, ['FunctionCall']) };
            case 'RevertStatement':
                return { ...base, nodeType, errorCall: this.expect(this.fields(SCHEMAS.RevertStatement, value, id, nodeType).errorCall, ['FunctionCall']) };
            case 'Break':
            case 'Continue':
            case 'PlaceholderStatement':
                return { ...base, nodeType };
            case 'Identifier':
                return { ...base, nodeType, name: this.fields(SCHEMAS.Identifier, value, id, nodeType).name };
            case 'MemberAccess': {
                const f = this.fields(SCHEMAS.MemberAccess, value, id, nodeType);
                return { ...base, nodeType, expression: this.expect(f.expression, EXPRESSION_KINDS), memberName: f.memberName };
            }
            case 'IndexAccess': {
                const f = this.fields(SCHEMAS.IndexAccess, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    baseExpression: this.expect(f.baseExpression, EXPRESSION_KINDS),
                    indexExpression: this.optional(f.indexExpression, EXPRESSION_KINDS)
                };
            }
            case 'FunctionCall': {
                const f = this.fields(SCHEMAS.FunctionCall, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    expression: this.expect(f.expression, EXPRESSION_KINDS),
                    arguments: this.list(f.arguments, EXPRESSION_KINDS),
                    names: f.names
                };
            }
            case 'Assignment': {
                const f = this.fields(SCHEMAS.Assignment, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    operator: f.operator,
                    leftHandSide: this.expect(f.leftHandSide, EXPRESSION_KINDS),
                    rightHandSide: this.expect(f.rightHandSide, EXPRESSION_KINDS)
                };
            }
            case 'BinaryOperation': {
                const f = this.fields(SCHEMAS.BinaryOperation, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    operator: f.operator,
                    leftExpression: this.expect(f.leftExpression, EXPRESSION_KINDS),
                    rightExpression: this.expect(f.rightExpression, EXPRESSION_KINDS)
                };
            }
            case 'UnaryOperation': {
                const f = this.fields(SCHEMAS.UnaryOperation, value, id, nodeType);
                return { ...base, nodeType, operator: f.operator, prefix: f.prefix, subExpression: this.expect(f.subExpression, EXPRESSION_KINDS) };
            }
            case 'Conditional': {
                const f = this.fields(SCHEMAS.Conditional, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    condition: this.expect(f.condition, EXPRESSION_KINDS),
                    trueExpression: this.expect(f.trueExpression, EXPRESSION_KINDS),
                    falseExpression: this.expect(f.falseExpression, EXPRESSION_KINDS)
                };
            }
            case 'Literal': {
                const f = this.fields(SCHEMAS.Literal, value, id, nodeType);
                return { ...base, nodeType, kind: f.kind, value: f.value, subdenomination: f.subdenomination };
            }
            case 'TupleExpression': {
                const f = this.fields(SCHEMAS.TupleExpression, value, id, nodeType);
                return {
                    ...base,
                    nodeType,
                    components: f.components.map(component => this.optional(component, EXPRESSION_KINDS)),
                    isInlineArray: f.isInlineArray
                };
            }
            case 'ElementaryTypeNameExpression':
                return { ...base, nodeType, typeName: this.expect(this.fields(SCHEMAS.TypeNameWrapper, value, id, nodeType).typeName, ['ElementaryTypeName']) };
            case 'NewExpression':
                return { ...base, nodeType, typeName: this.expect(this.fields(SCHEMAS.TypeNameWrapper, value, id, nodeType).typeName, TYPE_NAME_KINDS) };
        }
    }
}
