import {
    AstNode,
    ContractDefinition,
    Declaration,
    Expression,
    FunctionDefinition,
    StorageLocation,
    StructDefinition,
    TypeName,
    VariableDeclaration
} from '../types/ast';
import { ASTTraverser } from '../parser/astTraverser';
import { AnalysisUnit } from './analysisUnit';
import { ConstantEvaluator } from './constantEvaluator';
import { MagicVariableDeclaration } from './globalContext';
import { isInteger } from './rational';
import {
    DataLocation,
    FunctionType,
    SolType,
    arrayOf,
    containsMapping,
    elementaryType,
    typeOf,
    typeString,
    withLocation
} from './typeSystem';

type VariableContext =
    | 'state'
    | 'fileLevel'
    | 'structMember'
    | 'eventParameter'
    | 'parameter'
    | 'returnParameter'
    | 'local';

/**
 * Assigns a type to every type name and declaration, and checks that
 * declared types are well-formed and placed in a valid data location.
 */
export class DeclarationTypeChecker {
    private readonly evaluator: ConstantEvaluator;

    constructor(private readonly unit: AnalysisUnit) {
        this.evaluator = new ConstantEvaluator(unit);
    }

    check(): void {
        const traverser = new ASTTraverser();
        traverser.traverse(this.unit.sourceUnit, {
            leave: (node, parent) => {
                switch (node.nodeType) {
                    case 'ElementaryTypeName':
                    case 'UserDefinedTypeName':
                    case 'ArrayTypeName':
                    case 'Mapping':
                        this.unit.annotations.setType(node.id, this.typeNameType(node));
                        break;
                    case 'VariableDeclaration':
                        this.unit.annotations.setType(node.id, this.variableType(node, parent));
                        break;
                }
            }
        });

        traverser.traverse(this.unit.sourceUnit, {
            enter: node => {
                switch (node.nodeType) {
                    case 'ContractDefinition':
                    case 'StructDefinition':
                    case 'EnumDefinition':
                    case 'EnumValue':
                    case 'FunctionDefinition':
                    case 'ModifierDefinition':
                    case 'EventDefinition':
                    case 'ErrorDefinition':
                        this.unit.annotations.setType(node.id, this.declarationType(node));
                        break;
                }
            }
        });

        for (const node of this.unit.sourceUnit.nodes) {
            if (node.nodeType === 'StructDefinition') {
                this.checkRecursion(node);
            } else if (node.nodeType === 'ContractDefinition') {
                for (const member of node.nodes) {
                    if (member.nodeType === 'StructDefinition') {
                        this.checkRecursion(member);
                    }
                }
            }
        }
    }

    // ============ Type names ============

    private typeNameType(typeName: TypeName): SolType {
        switch (typeName.nodeType) {
            case 'ElementaryTypeName': {
                const type = elementaryType(typeName.name, typeName.stateMutability);
                if (!type) {
                    throw this.unit.sink.fatal('TypeError', `Invalid type name "${typeName.name}".`, typeName.src);
                }
                return withLocation(type, 'storage', true);
            }
            case 'UserDefinedTypeName': {
                const id = this.unit.annotations.referencedDeclaration.get(typeName.pathNode.id);
                const declaration = id === undefined ? null : this.unit.declaration(id);
                if (declaration) {
                    const type = this.userDefinedType(declaration);
                    if (type) {
                        return type;
                    }
                }
                throw this.unit.sink.fatal(
                    'TypeError',
                    'Name has to refer to a struct, enum or contract.',
                    typeName.src
                );
            }
            case 'ArrayTypeName': {
                const base = this.unit.annotations.requireType(typeName.baseType.id);
                return arrayOf(withLocation(base, 'storage', false), this.arrayLength(typeName.length), 'storage', true);
            }
            case 'Mapping': {
                const key = this.unit.annotations.requireType(typeName.keyType.id);
                const value = this.unit.annotations.requireType(typeName.valueType.id);
                const validKey = key.category === 'integer' ||
                    key.category === 'bool' ||
                    key.category === 'address' ||
                    key.category === 'fixedBytes' ||
                    key.category === 'contract' ||
                    key.category === 'enum' ||
                    (key.category === 'array' && key.kind !== 'array');
                if (!validKey) {
                    this.unit.sink.report(
                        'TypeError',
                        'Only elementary types, contract types or enums are allowed as mapping keys.',
                        typeName.keyType.src
                    );
                }
                return {
                    category: 'mapping',
                    key: withLocation(key, 'memory', true),
                    value: withLocation(value, 'storage', false)
                };
            }
        }
    }

    /**
     * Type a user-defined name denotes when used as a type
     */
    private userDefinedType(declaration: Declaration | MagicVariableDeclaration): SolType | null {
        switch (declaration.nodeType) {
            case 'ContractDefinition':
                return contractTypeOf(declaration);
            case 'StructDefinition':
                return {
                    category: 'struct',
                    declaration: declaration.id,
                    name: declaration.name,
                    canonicalName: this.unit.canonicalName(declaration),
                    location: 'storage',
                    isPointer: true
                };
            case 'EnumDefinition':
                return {
                    category: 'enum',
                    declaration: declaration.id,
                    name: declaration.name,
                    canonicalName: this.unit.canonicalName(declaration)
                };
            default:
                return null;
        }
    }

    private arrayLength(length: Expression | null): bigint | null {
        if (length === null) {
            return null;
        }
        const value = this.evaluator.evaluate(length);
        if (!value) {
            throw this.unit.sink.fatal(
                'TypeError',
                'Invalid array length, expected integer literal or constant expression.',
                length.src
            );
        }
        if (!isInteger(value)) {
            throw this.unit.sink.fatal('TypeError', 'Array with fractional length specified.', length.src);
        }
        if (value.num === 0n) {
            throw this.unit.sink.fatal('TypeError', 'Array with zero length specified.', length.src);
        }
        if (value.num < 0n) {
            throw this.unit.sink.fatal('TypeError', 'Array with negative length specified.', length.src);
        }
        return value.num;
    }

    // ============ Variables ============

    private variableType(variable: VariableDeclaration, parent: AstNode | null): SolType {
        const declared = this.unit.annotations.requireType(variable.typeName.id);
        const context = this.variableContext(variable, parent);
        const isReference = declared.category === 'array' || declared.category === 'struct' || declared.category === 'mapping';

        if (!isReference) {
            if (variable.storageLocation !== 'default') {
                this.unit.sink.report(
                    'TypeError',
                    `Data location can only be specified for array, struct or mapping types, but "${variable.storageLocation}" was given.`,
                    variable.src
                );
            }
            return declared;
        }

        let location: DataLocation;
        let isPointer = true;
        switch (context) {
            case 'state':
                location = variable.mutability === 'mutable' ? 'storage' : 'memory';
                isPointer = location !== 'storage';
                break;
            case 'structMember':
                location = 'storage';
                isPointer = false;
                break;
            case 'fileLevel':
            case 'eventParameter':
                location = 'memory';
                break;
            default:
                location = this.explicitLocation(variable, context, parent);
                break;
        }

        const structMembers = (id: number) => this.structMemberTypes(id);
        if (location !== 'storage' && containsMapping(declared, structMembers)) {
            this.unit.sink.report(
                'TypeError',
                `Type ${typeString(declared, true)} is only valid in storage because it contains a (nested) mapping.`,
                variable.src
            );
        }
        return withLocation(declared, location, isPointer);
    }

    private explicitLocation(variable: VariableDeclaration, context: VariableContext, parent: AstNode | null): DataLocation {
        const function_ = parent && parent.nodeType === 'ParameterList' ? this.unit.parentOf(parent) : null;
        const visibility = function_ && function_.nodeType === 'FunctionDefinition' ? function_.visibility : 'internal';
        const external = visibility === 'external';
        const allowed: DataLocation[] = visibility === 'external' || visibility === 'public'
            ? ['memory', 'calldata']
            : ['storage', 'memory', 'calldata'];

        if (variable.storageLocation !== 'default' && allowed.includes(variable.storageLocation)) {
            return variable.storageLocation;
        }

        const what = context === 'local'
            ? 'variable'
            : `${context === 'returnParameter' ? 'return parameter' : 'parameter'} in ${external ? 'external function' : 'function'}`;
        this.unit.sink.report(
            'TypeError',
            `Data location must be ${describeLocations(allowed)} for ${what}, but ${describeGiven(variable.storageLocation)}.`,
            variable.src
        );
        return allowed.includes('storage') ? 'storage' : 'memory';
    }

    private variableContext(variable: VariableDeclaration, parent: AstNode | null): VariableContext {
        if (variable.stateVariable) {
            return 'state';
        }
        if (!parent) {
            return 'fileLevel';
        }
        switch (parent.nodeType) {
            case 'SourceUnit':
                return 'fileLevel';
            case 'StructDefinition':
                return 'structMember';
            case 'ParameterList': {
                const owner = this.unit.parentOf(parent);
                if (owner && (owner.nodeType === 'EventDefinition' || owner.nodeType === 'ErrorDefinition')) {
                    return 'eventParameter';
                }
                if (owner && owner.nodeType === 'FunctionDefinition' && owner.returnParameters.id === parent.id) {
                    return 'returnParameter';
                }
                return 'parameter';
            }
            default:
                return 'local';
        }
    }

    private structMemberTypes(id: number): SolType[] {
        const struct = this.unit.find(id, 'StructDefinition');
        if (!struct) {
            return [];
        }
        return struct.members.map(member => this.unit.annotations.typeOf(member.typeName.id)).filter(isDefined);
    }

    // ============ Declarations ============

    private declarationType(
        declaration: Exclude<Declaration, VariableDeclaration>
    ): SolType {
        switch (declaration.nodeType) {
            case 'ContractDefinition':
                return typeOf(contractTypeOf(declaration));
            case 'StructDefinition':
            case 'EnumDefinition': {
                const type = this.userDefinedType(declaration);
                if (!type) {
                    throw this.unit.sink.fatal('InternalCompilerError', 'User-defined type expected.', declaration.src);
                }
                return typeOf(type);
            }
            case 'EnumValue': {
                const enumDefinition = this.unit.parentOf(declaration);
                const type = enumDefinition ? this.unit.annotations.typeOf(enumDefinition.id) : undefined;
                if (!type || type.category !== 'type') {
                    throw this.unit.sink.fatal('InternalCompilerError', 'Enum value outside of an enum.', declaration.src);
                }
                return type.actual;
            }
            case 'FunctionDefinition':
                return functionTypeOf(this.unit, declaration);
            case 'ModifierDefinition':
                return {
                    category: 'modifier',
                    parameters: this.parameterTypes(declaration.parameters.parameters),
                    declaration: declaration.id
                };
            case 'EventDefinition':
            case 'ErrorDefinition':
                return {
                    category: 'function',
                    kind: declaration.nodeType === 'EventDefinition' ? 'event' : 'error',
                    parameters: this.parameterTypes(declaration.parameters.parameters),
                    returns: [],
                    parameterNames: declaration.parameters.parameters.map(param => param.name),
                    mutability: declaration.nodeType === 'EventDefinition' ? 'nonpayable' : 'pure',
                    declaration: declaration.id,
                    variadic: false
                };
        }
    }

    private parameterTypes(parameters: VariableDeclaration[]): SolType[] {
        return parameters.map(param => this.unit.annotations.requireType(param.id));
    }

    // ============ Structs ============

    private checkRecursion(struct: StructDefinition): void {
        const visiting = new Set<number>();
        const reaches = (current: StructDefinition): boolean => {
            if (visiting.has(current.id)) {
                return current.id === struct.id;
            }
            visiting.add(current.id);
            for (const member of current.members) {
                const next = this.directStructDependency(member.typeName);
                if (next && reaches(next)) {
                    return true;
                }
            }
            return false;
        };
        visiting.add(struct.id);
        for (const member of struct.members) {
            const next = this.directStructDependency(member.typeName);
            if (next && (next.id === struct.id || reaches(next))) {
                this.unit.sink.report('TypeError', 'Recursive struct definition.', struct.src);
                return;
            }
        }
    }

    /**
     * Struct a member embeds by value (not through a dynamic array or mapping)
     */
    private directStructDependency(typeName: TypeName): StructDefinition | null {
        if (typeName.nodeType === 'UserDefinedTypeName') {
            const id = this.unit.annotations.referencedDeclaration.get(typeName.pathNode.id);
            return id === undefined ? null : this.unit.find(id, 'StructDefinition');
        }
        if (typeName.nodeType === 'ArrayTypeName' && typeName.length !== null) {
            return this.directStructDependency(typeName.baseType);
        }
        return null;
    }
}

export function contractTypeOf(contract: ContractDefinition): SolType {
    return {
        category: 'contract',
        declaration: contract.id,
        name: contract.name,
        contractKind: contract.contractKind,
        isSuper: false
    };
}

/**
 * Internal (or, for external functions, external) function type of a
 * function definition
 */
export function functionTypeOf(unit: AnalysisUnit, function_: FunctionDefinition): FunctionType {
    return {
        category: 'function',
        kind: function_.visibility === 'external' ? 'external' : 'internal',
        parameters: function_.parameters.parameters.map(param => unit.annotations.requireType(param.id)),
        returns: function_.returnParameters.parameters.map(param => unit.annotations.requireType(param.id)),
        parameterNames: function_.parameters.parameters.map(param => param.name),
        mutability: function_.stateMutability,
        declaration: function_.id,
        variadic: false
    };
}

function describeLocations(locations: DataLocation[]): string {
    const quoted = locations.map(location => `"${location}"`);
    if (quoted.length === 1) {
        return quoted[0];
    }
    return `${quoted.slice(0, -1).join(', ')} or ${quoted[quoted.length - 1]}`;
}

function describeGiven(location: StorageLocation): string {
    return location === 'default' ? 'none was given' : `"${location}" was given`;
}

function isDefined<T>(value: T | undefined): value is T {
    return value !== undefined;
}
