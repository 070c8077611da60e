/**
 * Syntax tree of one compilation unit.
 *
 * Node kinds and field names follow the compiler's AST JSON layout so that the
 * interchange documents stay readable by existing Solidity tooling. Nodes
 * carry syntax only; everything the analysis derives lives in the
 * annotation store, keyed by node id.
 */

/**
 * Byte range of a node inside its source unit
 */
export interface SourceRange {
    start: number;
    length: number;
    sourceIndex: number;
}

export interface BaseNode {
    id: number;
    src: SourceRange;
}

export type ContractKind = 'contract' | 'interface' | 'library';
export type Visibility = 'external' | 'public' | 'internal' | 'private' | 'default';
export type StateMutability = 'pure' | 'view' | 'nonpayable' | 'payable';
export type FunctionKind = 'function' | 'constructor' | 'fallback' | 'receive' | 'freeFunction';
export type StorageLocation = 'default' | 'storage' | 'memory' | 'calldata';
export type Mutability = 'mutable' | 'immutable' | 'constant';
export type LiteralKind = 'number' | 'bool' | 'string' | 'hexString' | 'unicodeString';

// ============ Source unit level ============

export interface SourceUnit extends BaseNode {
    nodeType: 'SourceUnit';
    absolutePath: string;
    license: string | null;
    nodes: SourceUnitMember[];
}

export type SourceUnitMember =
    | PragmaDirective
    | ImportDirective
    | ContractDefinition
    | FunctionDefinition
    | StructDefinition
    | EnumDefinition
    | ErrorDefinition
    | VariableDeclaration;

export interface PragmaDirective extends BaseNode {
    nodeType: 'PragmaDirective';
    literals: string[];
}

export interface SymbolAlias {
    foreign: string;
    local: string | null;
}

export interface ImportDirective extends BaseNode {
    nodeType: 'ImportDirective';
    file: string;
    unitAlias: string;
    symbolAliases: SymbolAlias[];
}

export interface StructuredDocumentation extends BaseNode {
    nodeType: 'StructuredDocumentation';
    text: string;
}

// ============ Declarations ============

export interface ContractDefinition extends BaseNode {
    nodeType: 'ContractDefinition';
    name: string;
    contractKind: ContractKind;
    abstract: boolean;
    baseContracts: InheritanceSpecifier[];
    nodes: ContractMember[];
    documentation: StructuredDocumentation | null;
}

export type ContractMember =
    | FunctionDefinition
    | ModifierDefinition
    | VariableDeclaration
    | StructDefinition
    | EnumDefinition
    | EventDefinition
    | ErrorDefinition;

export interface InheritanceSpecifier extends BaseNode {
    nodeType: 'InheritanceSpecifier';
    baseName: IdentifierPath;
    arguments: Expression[] | null;
}

export interface FunctionDefinition extends BaseNode {
    nodeType: 'FunctionDefinition';
    name: string;
    kind: FunctionKind;
    visibility: Visibility;
    stateMutability: StateMutability;
    virtual: boolean;
    overrides: OverrideSpecifier | null;
    parameters: ParameterList;
    returnParameters: ParameterList;
    modifiers: ModifierInvocation[];
    body: Block | null;
    implemented: boolean;
    documentation: StructuredDocumentation | null;
}

export interface ModifierDefinition extends BaseNode {
    nodeType: 'ModifierDefinition';
    name: string;
    visibility: Visibility;
    virtual: boolean;
    overrides: OverrideSpecifier | null;
    parameters: ParameterList;
    body: Block | null;
    documentation: StructuredDocumentation | null;
}

export interface ModifierInvocation extends BaseNode {
    nodeType: 'ModifierInvocation';
    modifierName: IdentifierPath;
    arguments: Expression[] | null;
}

export interface OverrideSpecifier extends BaseNode {
    nodeType: 'OverrideSpecifier';
    overrides: IdentifierPath[];
}

export interface ParameterList extends BaseNode {
    nodeType: 'ParameterList';
    parameters: VariableDeclaration[];
}

export interface VariableDeclaration extends BaseNode {
    nodeType: 'VariableDeclaration';
    name: string;
    typeName: TypeName;
    constant: boolean;
    mutability: Mutability;
    stateVariable: boolean;
    storageLocation: StorageLocation;
    visibility: Visibility;
    value: Expression | null;
    indexed: boolean;
    overrides: OverrideSpecifier | null;
    documentation: StructuredDocumentation | null;
}

export interface EventDefinition extends BaseNode {
    nodeType: 'EventDefinition';
    name: string;
    anonymous: boolean;
    parameters: ParameterList;
    documentation: StructuredDocumentation | null;
}

export interface ErrorDefinition extends BaseNode {
    nodeType: 'ErrorDefinition';
    name: string;
    parameters: ParameterList;
    documentation: StructuredDocumentation | null;
}

export interface StructDefinition extends BaseNode {
    nodeType: 'StructDefinition';
    name: string;
    members: VariableDeclaration[];
    documentation: StructuredDocumentation | null;
}

export interface EnumDefinition extends BaseNode {
    nodeType: 'EnumDefinition';
    name: string;
    members: EnumValue[];
    documentation: StructuredDocumentation | null;
}

export interface EnumValue extends BaseNode {
    nodeType: 'EnumValue';
    name: string;
}

// ============ Type names ============

export type TypeName = ElementaryTypeName | UserDefinedTypeName | ArrayTypeName | Mapping;

export interface ElementaryTypeName extends BaseNode {
    nodeType: 'ElementaryTypeName';
    name: string;
    stateMutability: 'payable' | 'nonpayable' | null;
}

export interface IdentifierPath extends BaseNode {
    nodeType: 'IdentifierPath';
    name: string;
}

export interface UserDefinedTypeName extends BaseNode {
    nodeType: 'UserDefinedTypeName';
    pathNode: IdentifierPath;
}

export interface ArrayTypeName extends BaseNode {
    nodeType: 'ArrayTypeName';
    baseType: TypeName;
    length: Expression | null;
}

export interface Mapping extends BaseNode {
    nodeType: 'Mapping';
    keyType: TypeName;
    keyName: string;
    valueType: TypeName;
    valueName: string;
}

// ============ Statements ============

export type Statement =
    | Block
    | UncheckedBlock
    | ExpressionStatement
    | VariableDeclarationStatement
    | IfStatement
    | ForStatement
    | WhileStatement
    | DoWhileStatement
    | Return
    | EmitStatement
    | RevertStatement
    | Break
    | Continue
    | PlaceholderStatement;

export interface Block extends BaseNode {
    nodeType: 'Block';
    statements: Statement[];
}

export interface UncheckedBlock extends BaseNode {
    nodeType: 'UncheckedBlock';
    statements: Statement[];
}

export interface ExpressionStatement extends BaseNode {
    nodeType: 'ExpressionStatement';
    expression: Expression;
}

export interface VariableDeclarationStatement extends BaseNode {
    nodeType: 'VariableDeclarationStatement';
    assignments: (number | null)[];
    declarations: (VariableDeclaration | null)[];
    initialValue: Expression | null;
}

export interface IfStatement extends BaseNode {
    nodeType: 'IfStatement';
    condition: Expression;
    trueBody: Statement;
    falseBody: Statement | null;
}

export interface ForStatement extends BaseNode {
    nodeType: 'ForStatement';
    initializationExpression: VariableDeclarationStatement | ExpressionStatement | null;
    condition: Expression | null;
    loopExpression: ExpressionStatement | null;
    body: Statement;
}

export interface WhileStatement extends BaseNode {
    nodeType: 'WhileStatement';
    condition: Expression;
    body: Statement;
}

export interface DoWhileStatement extends BaseNode {
    nodeType: 'DoWhileStatement';
    condition: Expression;
    body: Statement;
}

export interface Return extends BaseNode {
    nodeType: 'Return';
    expression: Expression | null;
}

export interface EmitStatement extends BaseNode {
    nodeType: 'EmitStatement';
    eventCall: FunctionCall;
}

export interface RevertStatement extends BaseNode {
    nodeType: 'RevertStatement';
    errorCall: FunctionCall;
}

export interface Break extends BaseNode {
    nodeType: 'Break';
}

export interface Continue extends BaseNode {
    nodeType: 'Continue';
}

export interface PlaceholderStatement extends BaseNode {
    nodeType: 'PlaceholderStatement';
}

// ============ Expressions ============

export type Expression =
    | Identifier
    | MemberAccess
    | IndexAccess
    | FunctionCall
    | Assignment
    | BinaryOperation
    | UnaryOperation
    | Conditional
    | Literal
    | TupleExpression
    | ElementaryTypeNameExpression
    | NewExpression;

export interface Identifier extends BaseNode {
    nodeType: 'Identifier';
    name: string;
}

export interface MemberAccess extends BaseNode {
    nodeType: 'MemberAccess';
    expression: Expression;
    memberName: string;
}

export interface IndexAccess extends BaseNode {
    nodeType: 'IndexAccess';
    baseExpression: Expression;
    indexExpression: Expression | null;
}

export interface FunctionCall extends BaseNode {
    nodeType: 'FunctionCall';
    expression: Expression;
    arguments: Expression[];
    names: string[];
}

export interface Assignment extends BaseNode {
    nodeType: 'Assignment';
    operator: string;
    leftHandSide: Expression;
    rightHandSide: Expression;
}

export interface BinaryOperation extends BaseNode {
    nodeType: 'BinaryOperation';
    operator: string;
    leftExpression: Expression;
    rightExpression: Expression;
}

export interface UnaryOperation extends BaseNode {
    nodeType: 'UnaryOperation';
    operator: string;
    prefix: boolean;
    subExpression: Expression;
}

export interface Conditional extends BaseNode {
    nodeType: 'Conditional';
    condition: Expression;
    trueExpression: Expression;
    falseExpression: Expression;
}

export interface Literal extends BaseNode {
    nodeType: 'Literal';
    kind: LiteralKind;
    value: string;
    subdenomination: string | null;
}

export interface TupleExpression extends BaseNode {
    nodeType: 'TupleExpression';
    components: (Expression | null)[];
    isInlineArray: boolean;
}

export interface ElementaryTypeNameExpression extends BaseNode {
    nodeType: 'ElementaryTypeNameExpression';
    typeName: ElementaryTypeName;
}

export interface NewExpression extends BaseNode {
    nodeType: 'NewExpression';
    typeName: TypeName;
}

// ============ Unions ============

export type Declaration =
    | ContractDefinition
    | FunctionDefinition
    | ModifierDefinition
    | VariableDeclaration
    | EventDefinition
    | ErrorDefinition
    | StructDefinition
    | EnumDefinition
    | EnumValue;

export type AstNode =
    | SourceUnit
    | PragmaDirective
    | ImportDirective
    | StructuredDocumentation
    | ContractDefinition
    | InheritanceSpecifier
    | FunctionDefinition
    | ModifierDefinition
    | ModifierInvocation
    | OverrideSpecifier
    | ParameterList
    | VariableDeclaration
    | EventDefinition
    | ErrorDefinition
    | StructDefinition
    | EnumDefinition
    | EnumValue
    | TypeName
    | IdentifierPath
    | Statement
    | Expression;

export type NodeType = AstNode['nodeType'];

/**
 * Declarations that introduce a scope of their own
 */
export type ScopeNode =
    | SourceUnit
    | ContractDefinition
    | FunctionDefinition
    | ModifierDefinition
    | EventDefinition
    | ErrorDefinition
    | StructDefinition
    | EnumDefinition
    | Block
    | UncheckedBlock
    | ForStatement;

const DECLARATION_TYPES: ReadonlySet<string> = new Set([
    'ContractDefinition',
    'FunctionDefinition',
    'ModifierDefinition',
    'VariableDeclaration',
    'EventDefinition',
    'ErrorDefinition',
    'StructDefinition',
    'EnumDefinition',
    'EnumValue'
]);

const SCOPE_TYPES: ReadonlySet<string> = new Set([
    'SourceUnit',
    'ContractDefinition',
    'FunctionDefinition',
    'ModifierDefinition',
    'EventDefinition',
    'ErrorDefinition',
    'StructDefinition',
    'EnumDefinition',
    'Block',
    'UncheckedBlock',
    'ForStatement'
]);

export function isDeclaration(node: AstNode): node is Declaration {
    return DECLARATION_TYPES.has(node.nodeType);
}

export function isScopeNode(node: AstNode): node is ScopeNode {
    return SCOPE_TYPES.has(node.nodeType);
}

/**
 * Format a range the way the compiler writes `src` attributes
 */
export function formatSourceRange(range: SourceRange): string {
    return `${range.start}:${range.length}:${range.sourceIndex}`;
}

export function isNodeType<K extends NodeType>(node: AstNode, type: K): node is Extract<AstNode, { nodeType: K }> {
    return node.nodeType === type;
}
