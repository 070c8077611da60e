import {
    Assignment,
    BinaryOperation,
    Conditional,
    ContractDefinition,
    ElementaryTypeNameExpression,
    Expression,
    FunctionCall,
    FunctionDefinition,
    Identifier,
    IndexAccess,
    InheritanceSpecifier,
    Literal,
    MemberAccess,
    ModifierDefinition,
    ModifierInvocation,
    NewExpression,
    Statement,
    StructDefinition,
    TupleExpression,
    UnaryOperation,
    VariableDeclaration,
    VariableDeclarationStatement
} from '../types/ast';
import { AnalysisUnit } from './analysisUnit';
import { InternalFault } from './annotations';
import { ConstantEvaluator } from './constantEvaluator';
import { SUPER_ID, THIS_ID } from './globalContext';
import { isInteger, parseNumberLiteral } from './rational';
import {
    ADDRESS,
    BOOL,
    ContractType,
    FunctionType,
    SolType,
    StructType,
    TupleType,
    UINT256,
    binaryOperatorResult,
    builtinFunction,
    bytesType,
    commonType,
    elementaryType,
    fixedBytes,
    integer,
    isComparisonOperator,
    isExplicitlyConvertible,
    isImplicitlyConvertible,
    mobileType,
    rationalType,
    stringType,
    tuple,
    typeOf,
    typeString,
    unaryOperatorResult,
    withLocation
} from './typeSystem';

/**
 * Placeholder type of an expression that already produced an error.
 * Checks involving it stay silent so one mistake yields one diagnostic.
 */
const INVALID: TupleType = { category: 'tuple', components: [] };

interface ExpressionContext {
    /** The expression is written to */
    lvalue?: boolean;
    /** Argument types when the expression is the callee of a call */
    args?: SolType[];
}

interface MemberCandidate {
    type: SolType;
    declaration: number | null;
    lvalue: boolean;
    pure: boolean;
}

const ADDRESS_MEMBERS: ReadonlyMap<string, SolType> = new Map<string, SolType>([
    ['balance', UINT256],
    ['code', bytesType('memory')],
    ['codehash', fixedBytes(32)],
    ['call', builtinFunction('bareCall', [bytesType('memory')], [BOOL, bytesType('memory')], 'payable')],
    ['delegatecall', builtinFunction('bareDelegateCall', [bytesType('memory')], [BOOL, bytesType('memory')], 'nonpayable')],
    ['staticcall', builtinFunction('bareStaticCall', [bytesType('memory')], [BOOL, bytesType('memory')], 'view')]
]);

const PAYABLE_MEMBERS: ReadonlyMap<string, SolType> = new Map<string, SolType>([
    ['transfer', builtinFunction('transfer', [UINT256], [], 'nonpayable')],
    ['send', builtinFunction('send', [UINT256], [BOOL], 'nonpayable')]
]);

const ABI_MEMBERS: ReadonlyMap<string, SolType> = new Map<string, SolType>([
    ['encode', builtinFunction('abiEncode', [], [bytesType('memory')], 'pure', true)],
    ['encodePacked', builtinFunction('abiEncodePacked', [], [bytesType('memory')], 'pure', true)],
    ['encodeWithSelector', builtinFunction('abiEncodeWithSelector', [fixedBytes(4)], [bytesType('memory')], 'pure', true)],
    ['encodeWithSignature', builtinFunction('abiEncodeWithSignature', [stringType('memory')], [bytesType('memory')], 'pure', true)],
    ['decode', builtinFunction('abiDecode', [bytesType('memory')], [], 'pure', true)]
]);

/**
 * Types every expression and checks statements, calls, conversions and
 * member lookups against the declared types.
 */
export class TypeChecker {
    private contract: ContractDefinition | null = null;
    private function_: FunctionDefinition | ModifierDefinition | null = null;
    private readonly evaluator: ConstantEvaluator;

    constructor(private readonly unit: AnalysisUnit) {
        this.evaluator = new ConstantEvaluator(unit);
    }

    check(): void {
        for (const member of this.unit.sourceUnit.nodes) {
            switch (member.nodeType) {
                case 'ContractDefinition':
                    this.checkContract(member);
                    break;
                case 'FunctionDefinition':
                    this.checkFunction(member);
                    break;
                case 'VariableDeclaration':
                    this.checkVariableInitialiser(member);
                    break;
            }
        }
    }

    // ============ Declarations ============

    private checkContract(contract: ContractDefinition): void {
        this.contract = contract;
        for (const specifier of contract.baseContracts) {
            this.checkBaseConstructorArguments(specifier);
        }
        for (const member of contract.nodes) {
            switch (member.nodeType) {
                case 'VariableDeclaration':
                    this.checkVariableInitialiser(member);
                    break;
                case 'FunctionDefinition':
                    this.checkFunction(member);
                    break;
                case 'ModifierDefinition':
                    this.function_ = member;
                    if (member.body) {
                        this.block(member.body.statements);
                    }
                    this.function_ = null;
                    break;
            }
        }
        this.contract = null;
    }

    private checkBaseConstructorArguments(specifier: InheritanceSpecifier): void {
        if (specifier.arguments === null) {
            return;
        }
        const argTypes = specifier.arguments.map(arg => this.expression(arg));
        const id = this.unit.annotations.referencedDeclaration.get(specifier.baseName.id);
        const base = id === undefined ? null : this.unit.find(id, 'ContractDefinition');
        if (!base) {
            return;
        }
        this.checkArguments(
            specifier.arguments,
            argTypes,
            this.constructorParameters(base),
            'constructor call',
            specifier.src
        );
    }

    private checkFunction(function_: FunctionDefinition): void {
        this.function_ = function_;
        for (const invocation of function_.modifiers) {
            this.checkModifierInvocation(invocation, function_);
        }
        if (function_.body) {
            this.block(function_.body.statements);
        }
        this.function_ = null;
    }

    private checkModifierInvocation(invocation: ModifierInvocation, function_: FunctionDefinition): void {
        const args = invocation.arguments ?? [];
        const argTypes = args.map(arg => this.expression(arg));
        const id = this.unit.annotations.referencedDeclaration.get(invocation.modifierName.id);
        const declaration = id === undefined ? null : this.unit.declaration(id);

        let parameters: SolType[];
        let what: string;
        if (declaration && declaration.nodeType === 'ModifierDefinition') {
            parameters = declaration.parameters.parameters.map(param => this.unit.annotations.requireType(param.id));
            what = 'modifier invocation';
        } else if (
            declaration &&
            declaration.nodeType === 'ContractDefinition' &&
            function_.kind === 'constructor' &&
            this.contract &&
            this.unit.isBaseContract(this.contract.id, declaration.id)
        ) {
            parameters = this.constructorParameters(declaration);
            what = 'constructor call';
        } else {
            this.unit.sink.report('TypeError', 'Referenced declaration is neither modifier nor base class.', invocation.src);
            return;
        }
        this.checkArguments(args, argTypes, parameters, what, invocation.src);
    }

    private checkVariableInitialiser(variable: VariableDeclaration): void {
        if (!variable.value) {
            return;
        }
        this.expectType(variable.value, this.unit.annotations.requireType(variable.id));
    }

    private constructorParameters(contract: ContractDefinition): SolType[] {
        const constructor = contract.nodes.find(
            (member): member is FunctionDefinition => member.nodeType === 'FunctionDefinition' && member.kind === 'constructor'
        );
        return constructor
            ? constructor.parameters.parameters.map(param => this.unit.annotations.requireType(param.id))
            : [];
    }

    // ============ Statements ============

    private block(statements: Statement[]): void {
        for (const statement of statements) {
            this.statement(statement);
        }
    }

    private statement(statement: Statement): void {
        switch (statement.nodeType) {
            case 'Block':
            case 'UncheckedBlock':
                this.block(statement.statements);
                break;
            case 'ExpressionStatement':
                this.expression(statement.expression);
                break;
            case 'VariableDeclarationStatement':
                this.variableDeclarationStatement(statement);
                break;
            case 'IfStatement':
                this.expectType(statement.condition, BOOL);
                this.statement(statement.trueBody);
                if (statement.falseBody) {
                    this.statement(statement.falseBody);
                }
                break;
            case 'ForStatement':
                if (statement.initializationExpression) {
                    this.statement(statement.initializationExpression);
                }
                if (statement.condition) {
                    this.expectType(statement.condition, BOOL);
                }
                if (statement.loopExpression) {
                    this.statement(statement.loopExpression);
                }
                this.statement(statement.body);
                break;
            case 'WhileStatement':
                this.expectType(statement.condition, BOOL);
                this.statement(statement.body);
                break;
            case 'DoWhileStatement':
                this.statement(statement.body);
                this.expectType(statement.condition, BOOL);
                break;
            case 'Return':
                this.returnStatement(statement.expression, statement.src);
                break;
            case 'EmitStatement':
                this.expression(statement.eventCall);
                if (this.typed(statement.eventCall.expression) && !this.calls(statement.eventCall, 'event')) {
                    this.unit.sink.report('TypeError', 'Expression has to be an event invocation.', statement.eventCall.src);
                }
                break;
            case 'RevertStatement':
                this.expression(statement.errorCall);
                if (this.typed(statement.errorCall.expression) && !this.calls(statement.errorCall, 'error')) {
                    this.unit.sink.report('TypeError', 'Expression has to be an error.', statement.errorCall.src);
                }
                break;
            case 'Break':
            case 'Continue':
            case 'PlaceholderStatement':
                break;
        }
    }

    /**
     * Whether an expression got a type without reporting an error
     */
    private typed(expression: Expression): boolean {
        const type = this.unit.annotations.typeOf(expression.id);
        return type !== undefined && type !== INVALID;
    }

    private calls(call: FunctionCall, kind: 'event' | 'error'): boolean {
        const type = this.unit.annotations.typeOf(call.expression.id);
        return type !== undefined && type.category === 'function' && type.kind === kind;
    }

    private variableDeclarationStatement(statement: VariableDeclarationStatement): void {
        if (!statement.initialValue) {
            return;
        }
        const declared = statement.declarations.map(declaration =>
            declaration ? this.unit.annotations.requireType(declaration.id) : null);

        if (declared.length === 1) {
            const [type] = declared;
            if (type) {
                this.expectType(statement.initialValue, type);
            }
            return;
        }

        const value = this.expression(statement.initialValue);
        if (value === INVALID) {
            return;
        }
        const components = value.category === 'tuple' ? value.components : [value];
        if (components.length !== declared.length) {
            this.unit.sink.report(
                'TypeError',
                `Different number of components on the left hand side (${declared.length}) than on the right hand side (${components.length}).`,
                statement.src
            );
            return;
        }
        declared.forEach((type, index) => {
            const component = components[index];
            if (type && component && !this.convertible(component, type)) {
                this.unit.sink.report(
                    'TypeError',
                    `Type ${typeString(component)} is not implicitly convertible to expected type ${typeString(type)}.`,
                    statement.src
                );
            }
        });
    }

    private returnStatement(expression: Expression | null, src: Statement['src']): void {
        const returns = this.function_ && this.function_.nodeType === 'FunctionDefinition'
            ? this.function_.returnParameters.parameters.map(param => this.unit.annotations.requireType(param.id))
            : [];
        if (!expression) {
            return;
        }
        const type = this.expression(expression);
        if (type === INVALID) {
            return;
        }
        if (returns.length === 0) {
            this.unit.sink.report(
                'TypeError',
                'Different number of arguments in return statement than in returns declaration.',
                src
            );
            return;
        }
        if (returns.length === 1) {
            if (!this.convertible(type, returns[0])) {
                this.unit.sink.report(
                    'TypeError',
                    `Return argument type ${typeString(type)} is not implicitly convertible to expected type (type of first return variable) ${typeString(returns[0])}.`,
                    expression.src
                );
            }
            return;
        }
        if (!this.convertible(type, tuple(returns))) {
            this.unit.sink.report(
                'TypeError',
                type.category === 'tuple' && type.components.length !== returns.length
                    ? 'Different number of arguments in return statement than in returns declaration.'
                    : `Return argument type ${typeString(type)} is not implicitly convertible to expected type ${typeString(tuple(returns))}.`,
                expression.src
            );
        }
    }

    // ============ Expressions ============

    private expectType(expression: Expression, expected: SolType): SolType {
        const actual = this.expression(expression);
        if (actual !== INVALID && !this.convertible(actual, expected)) {
            this.unit.sink.report(
                'TypeError',
                `Type ${typeString(actual)} is not implicitly convertible to expected type ${typeString(expected)}.`,
                expression.src
            );
        }
        return actual;
    }

    private expression(expression: Expression, context: ExpressionContext = {}): SolType {
        const type = this.computeType(expression, context);
        this.unit.annotations.setType(expression.id, type);
        if (context.lvalue && expression.nodeType !== 'TupleExpression') {
            this.unit.annotations.lValueRequested.add(expression.id);
            if (type !== INVALID && !this.unit.annotations.isLValue.has(expression.id)) {
                this.reportNotLValue(expression);
            }
        }
        return type;
    }

    private computeType(expression: Expression, context: ExpressionContext): SolType {
        switch (expression.nodeType) {
            case 'Identifier':
                return this.identifier(expression, context.args ?? null);
            case 'MemberAccess':
                return this.memberAccess(expression, context.args ?? null);
            case 'IndexAccess':
                return this.indexAccess(expression);
            case 'FunctionCall':
                return this.functionCall(expression);
            case 'Assignment':
                return this.assignment(expression);
            case 'BinaryOperation':
                return this.binaryOperation(expression);
            case 'UnaryOperation':
                return this.unaryOperation(expression);
            case 'Conditional':
                return this.conditional(expression);
            case 'Literal':
                return this.literal(expression);
            case 'TupleExpression':
                return this.tupleExpression(expression, context.lvalue ?? false);
            case 'ElementaryTypeNameExpression':
                return this.elementaryTypeNameExpression(expression);
            case 'NewExpression':
                return this.newExpression(expression);
        }
    }

    private identifier(identifier: Identifier, args: SolType[] | null): SolType {
        const overloads = this.unit.annotations.overloadedDeclarations.get(identifier.id);
        if (overloads) {
            const candidates = overloads.map(id => this.candidateFor(id));
            const selected = this.selectOverload(candidates, args, identifier);
            if (!selected) {
                return INVALID;
            }
            if (selected.declaration !== null) {
                this.unit.annotations.referencedDeclaration.set(identifier.id, selected.declaration);
            }
            return selected.type;
        }

        const id = this.unit.annotations.referencedDeclaration.get(identifier.id);
        if (id === undefined) {
            throw new InternalFault(`Identifier "${identifier.name}" was not resolved.`);
        }
        if (id === THIS_ID || id === SUPER_ID) {
            if (!this.contract) {
                return this.reportType(`"${identifier.name}" used outside of a contract.`, identifier);
            }
            return { ...this.contractType(this.contract), isSuper: id === SUPER_ID };
        }
        const candidate = this.candidateFor(id);
        if (candidate.lvalue) {
            this.unit.annotations.isLValue.add(identifier.id);
        }
        if (candidate.pure) {
            this.unit.annotations.isPure.add(identifier.id);
        }
        return candidate.type;
    }

    /**
     * Type a reference to a declaration takes, and whether it can be
     * assigned to
     */
    private candidateFor(id: number): MemberCandidate {
        const declaration = this.unit.declaration(id);
        if (!declaration) {
            throw new InternalFault(`Reference to unknown declaration ${id}.`);
        }
        if (declaration.nodeType === 'MagicVariableDeclaration') {
            if (!declaration.type) {
                throw new InternalFault(`Builtin "${declaration.name}" has no fixed type.`);
            }
            return { type: declaration.type, declaration: id, lvalue: false, pure: false };
        }
        const type = this.unit.annotations.requireType(id);
        if (declaration.nodeType === 'VariableDeclaration') {
            return {
                type,
                declaration: id,
                lvalue: this.isAssignable(declaration),
                pure: declaration.constant
            };
        }
        return { type, declaration: id, lvalue: false, pure: type.category === 'type' };
    }

    private isAssignable(variable: VariableDeclaration): boolean {
        if (variable.mutability === 'constant') {
            return false;
        }
        if (variable.mutability === 'immutable') {
            return this.function_ !== null &&
                this.function_.nodeType === 'FunctionDefinition' &&
                this.function_.kind === 'constructor';
        }
        return true;
    }

    /**
     * Pick the one candidate whose parameters accept the argument types
     */
    private selectOverload(
        candidates: MemberCandidate[],
        args: SolType[] | null,
        node: Expression
    ): MemberCandidate | null {
        if (candidates.length === 1) {
            return candidates[0];
        }
        if (args === null) {
            this.unit.sink.report('TypeError', 'No matching declaration found after variable lookup.', node.src);
            return null;
        }
        const matching = candidates.filter(candidate => {
            const type = candidate.type;
            if (type.category !== 'function' || type.parameters.length !== args.length) {
                return false;
            }
            return type.parameters.every((param, index) => this.convertible(args[index], param));
        });
        if (matching.length === 1) {
            return matching[0];
        }
        this.unit.sink.report(
            'TypeError',
            matching.length === 0
                ? 'No matching declaration found after argument-dependent lookup.'
                : 'No unique declaration found after argument-dependent lookup.',
            node.src
        );
        return null;
    }

    // ============ Member access ============

    private memberAccess(access: MemberAccess, args: SolType[] | null): SolType {
        const base = this.expression(access.expression);
        if (base === INVALID) {
            return INVALID;
        }
        const candidates = this.memberCandidates(base, access);
        if (candidates.length === 0) {
            return this.reportType(
                `Member "${access.memberName}" not found or not visible after argument-dependent lookup in ${typeString(base)}.`,
                access
            );
        }
        const selected = this.selectOverload(candidates, args, access);
        if (!selected) {
            return INVALID;
        }
        if (selected.declaration !== null) {
            this.unit.annotations.referencedDeclaration.set(access.id, selected.declaration);
        }
        if (selected.lvalue) {
            this.unit.annotations.isLValue.add(access.id);
        }
        if (selected.pure || (this.unit.annotations.isPure.has(access.expression.id) && selected.type.category === 'type')) {
            this.unit.annotations.isPure.add(access.id);
        }
        return selected.type;
    }

    private memberCandidates(base: SolType, access: MemberAccess): MemberCandidate[] {
        const name = access.memberName;
        const plain = (type: SolType, lvalue = false): MemberCandidate[] => [{ type, declaration: null, lvalue, pure: false }];

        switch (base.category) {
            case 'struct': {
                const struct = this.unit.find(base.declaration, 'StructDefinition');
                const member = struct?.members.find(candidate => candidate.name === name);
                if (!member) {
                    return [];
                }
                const memberType = this.unit.annotations.requireType(member.id);
                return [{
                    type: withLocation(memberType, base.location, base.location === 'storage' ? false : true),
                    declaration: member.id,
                    lvalue: base.location !== 'calldata',
                    pure: false
                }];
            }
            case 'address': {
                const member = ADDRESS_MEMBERS.get(name) ?? (base.payable ? PAYABLE_MEMBERS.get(name) : undefined);
                if (member) {
                    return plain(member);
                }
                const payableOnly = PAYABLE_MEMBERS.get(name);
                if (payableOnly) {
                    this.unit.sink.report(
                        'TypeError',
                        '"send" and "transfer" are only available for objects of type "address payable", not "address".',
                        access.src
                    );
                    return plain(payableOnly);
                }
                return [];
            }
            case 'array': {
                if (name === 'length') {
                    return plain(UINT256);
                }
                const dynamicStorage = base.location === 'storage' && base.length === null && base.kind !== 'string';
                if (!dynamicStorage) {
                    return [];
                }
                const element = base.base ?? fixedBytes(1);
                if (name === 'push') {
                    return plain(builtinFunction('arrayPush', [withLocation(element, 'memory', true)], [], 'nonpayable'));
                }
                if (name === 'pop') {
                    return plain(builtinFunction('arrayPop', [], [], 'nonpayable'));
                }
                return [];
            }
            case 'fixedBytes':
                return name === 'length' ? plain(integer(false, 8)) : [];
            case 'magic': {
                const member = base.kind === 'abi' ? ABI_MEMBERS.get(name) : this.unit.globals.magicMember(base.kind, name);
                return member ? plain(member) : [];
            }
            case 'function':
                if (base.kind === 'external' && name === 'selector') {
                    return plain(fixedBytes(4));
                }
                if (base.kind === 'external' && name === 'address') {
                    return plain(ADDRESS);
                }
                return [];
            case 'contract':
                return base.isSuper ? this.superMembers(name) : this.externalMembers(base, name);
            case 'type':
                return this.staticMembers(base.actual, name);
            default:
                return [];
        }
    }

    /**
     * Functions and getters callable on a contract instance
     */
    private externalMembers(base: ContractType, name: string): MemberCandidate[] {
        const contract = this.unit.contract(base.declaration);
        const seen = new Set<string>();
        const result: MemberCandidate[] = [];
        for (const owner of this.unit.linearization(contract)) {
            for (const member of owner.nodes) {
                if (member.name !== name) continue;
                let type: FunctionType | null = null;
                if (
                    member.nodeType === 'FunctionDefinition' &&
                    member.kind === 'function' &&
                    (member.visibility === 'public' || member.visibility === 'external')
                ) {
                    type = { ...this.functionType(member.id), kind: 'external' };
                } else if (member.nodeType === 'VariableDeclaration' && member.visibility === 'public') {
                    type = this.getterType(member);
                }
                if (!type) continue;
                const key = type.parameters.map(param => typeString(param, true)).join(',');
                if (seen.has(key)) continue;
                seen.add(key);
                result.push({ type, declaration: member.id, lvalue: false, pure: false });
            }
        }
        return result;
    }

    /**
     * Functions of `super`: the first implementation of each signature
     * after the current contract in its linearisation
     */
    private superMembers(name: string): MemberCandidate[] {
        if (!this.contract) {
            return [];
        }
        const seen = new Set<string>();
        const result: MemberCandidate[] = [];
        for (const owner of this.unit.linearization(this.contract).slice(1)) {
            for (const member of owner.nodes) {
                if (member.nodeType !== 'FunctionDefinition' || member.name !== name || member.kind !== 'function') continue;
                if (member.visibility === 'private' || !member.implemented) continue;
                const type = { ...this.functionType(member.id), kind: 'internal' as const };
                const key = type.parameters.map(param => typeString(param, true)).join(',');
                if (seen.has(key)) continue;
                seen.add(key);
                result.push({ type, declaration: member.id, lvalue: false, pure: false });
            }
        }
        return result;
    }

    /**
     * Members reachable through a type name: enum values, and the
     * declarations of a contract
     */
    private staticMembers(actual: SolType, name: string): MemberCandidate[] {
        if (actual.category === 'array' && actual.kind !== 'array' && name === 'concat') {
            const type = actual.kind === 'string'
                ? builtinFunction('stringConcat', [], [stringType('memory')], 'pure', true)
                : builtinFunction('bytesConcat', [], [bytesType('memory')], 'pure', true);
            return [{ type, declaration: null, lvalue: false, pure: false }];
        }
        if (actual.category === 'enum') {
            const definition = this.unit.find(actual.declaration, 'EnumDefinition');
            const value = definition?.members.find(member => member.name === name);
            return value ? [{ type: actual, declaration: value.id, lvalue: false, pure: true }] : [];
        }
        if (actual.category !== 'contract') {
            return [];
        }
        const contract = this.unit.contract(actual.declaration);
        const inherited = this.contract !== null && this.unit.isBaseContract(this.contract.id, contract.id);
        const result: MemberCandidate[] = [];
        for (const member of contract.nodes) {
            if (member.name !== name) continue;
            switch (member.nodeType) {
                case 'FunctionDefinition':
                    if (member.kind !== 'function') continue;
                    if (contract.contractKind === 'library' ? member.visibility === 'private' : !inherited) continue;
                    if (member.visibility === 'private' && this.contract?.id !== contract.id) continue;
                    result.push({ type: this.functionType(member.id), declaration: member.id, lvalue: false, pure: false });
                    break;
                case 'VariableDeclaration':
                    if (!member.constant && !inherited) continue;
                    result.push({
                        type: this.unit.annotations.requireType(member.id),
                        declaration: member.id,
                        lvalue: inherited && this.isAssignable(member),
                        pure: member.constant
                    });
                    break;
                default:
                    result.push({
                        type: this.unit.annotations.requireType(member.id),
                        declaration: member.id,
                        lvalue: false,
                        pure: member.nodeType !== 'ModifierDefinition'
                    });
                    break;
            }
        }
        return result;
    }

    private functionType(id: number): FunctionType {
        const type = this.unit.annotations.requireType(id);
        if (type.category !== 'function') {
            throw new InternalFault(`Declaration ${id} does not have a function type.`);
        }
        return type;
    }

    /**
     * External accessor a public state variable generates
     */
    private getterType(variable: VariableDeclaration): FunctionType {
        const parameters: SolType[] = [];
        let type = this.unit.annotations.requireType(variable.id);
        for (;;) {
            if (type.category === 'mapping') {
                parameters.push(withLocation(type.key, 'memory', true));
                type = type.value;
            } else if (type.category === 'array' && type.kind === 'array' && type.base) {
                parameters.push(UINT256);
                type = type.base;
            } else {
                break;
            }
        }
        let returns: SolType[];
        if (type.category === 'struct') {
            const struct = this.unit.find(type.declaration, 'StructDefinition');
            returns = (struct?.members ?? [])
                .map(member => this.unit.annotations.requireType(member.id))
                .filter(member => member.category !== 'mapping' && !(member.category === 'array' && member.kind === 'array'))
                .map(member => withLocation(member, 'memory', true));
        } else {
            returns = [withLocation(type, 'memory', true)];
        }
        return {
            category: 'function',
            kind: 'external',
            parameters,
            returns,
            parameterNames: parameters.map(() => ''),
            mutability: 'view',
            declaration: variable.id,
            variadic: false
        };
    }

    // ============ Index access ============

    private indexAccess(access: IndexAccess): SolType {
        const base = this.expression(access.baseExpression);
        if (base === INVALID) {
            if (access.indexExpression) {
                this.expression(access.indexExpression);
            }
            return INVALID;
        }

        if (base.category === 'type') {
            let length: bigint | null = null;
            if (access.indexExpression) {
                this.expression(access.indexExpression);
                const value = this.evaluator.evaluate(access.indexExpression);
                if (!value || !isInteger(value) || value.num <= 0n) {
                    return this.reportType('Integer constant expected.', access.indexExpression);
                }
                length = value.num;
            }
            this.unit.annotations.isPure.add(access.id);
            return typeOf({
                category: 'array',
                kind: 'array',
                base: withLocation(base.actual, 'memory', true),
                length,
                location: 'memory',
                isPointer: true
            });
        }

        if (!access.indexExpression) {
            return this.reportType('Index expression cannot be omitted.', access);
        }

        switch (base.category) {
            case 'array': {
                if (base.kind === 'string') {
                    this.expression(access.indexExpression);
                    return this.reportType('Index access for string is not possible.', access);
                }
                this.expectType(access.indexExpression, UINT256);
                if (base.location !== 'calldata') {
                    this.unit.annotations.isLValue.add(access.id);
                }
                return base.base ?? fixedBytes(1);
            }
            case 'mapping':
                this.expectType(access.indexExpression, base.key);
                this.unit.annotations.isLValue.add(access.id);
                return base.value;
            case 'fixedBytes':
                this.expectType(access.indexExpression, UINT256);
                return fixedBytes(1);
            default:
                this.expression(access.indexExpression);
                return this.reportType(
                    `Indexed expression has to be a type, mapping or array (is ${typeString(base)})`,
                    access.baseExpression
                );
        }
    }

    // ============ Calls ============

    private functionCall(call: FunctionCall): SolType {
        const argTypes = call.arguments.map(arg => this.expression(arg));
        const callee = this.expression(call.expression, { args: argTypes });
        if (callee === INVALID || argTypes.includes(INVALID)) {
            return INVALID;
        }

        if (callee.category === 'type') {
            if (callee.actual.category === 'struct') {
                this.unit.annotations.functionCallKind.set(call.id, 'structConstructorCall');
                return this.structConstructorCall(call, callee.actual, argTypes);
            }
            this.unit.annotations.functionCallKind.set(call.id, 'typeConversion');
            return this.typeConversion(call, callee.actual, argTypes);
        }

        this.unit.annotations.functionCallKind.set(call.id, 'functionCall');
        if (callee.category !== 'function') {
            return this.reportType('Type is not callable', call);
        }
        return this.callFunction(call, callee, argTypes);
    }

    private structConstructorCall(call: FunctionCall, struct: StructType, argTypes: SolType[]): SolType {
        const definition: StructDefinition | null = this.unit.find(struct.declaration, 'StructDefinition');
        if (!definition) {
            throw new InternalFault(`Struct ${struct.declaration} not found.`);
        }
        const memberTypes = definition.members.map(member => withLocation(this.unit.annotations.requireType(member.id), 'memory', true));
        if (memberTypes.some(type => type.category === 'mapping')) {
            return this.reportType('Struct containing a (nested) mapping cannot be constructed.', call);
        }
        if (argTypes.length !== memberTypes.length) {
            return this.reportType(
                `Wrong argument count for struct constructor: ${argTypes.length} arguments given but expected ${memberTypes.length}.`,
                call
            );
        }
        const ordered = this.orderNamedArguments(call, argTypes, definition.members.map(member => member.name));
        if (ordered) {
            ordered.forEach((type, index) => {
                if (!this.convertible(type, memberTypes[index])) {
                    this.reportInvalidArgument(call.arguments[index], type, memberTypes[index], 'struct constructor');
                }
            });
        }
        return withLocation(struct, 'memory', true);
    }

    private typeConversion(call: FunctionCall, target: SolType, argTypes: SolType[]): SolType {
        if (argTypes.length !== 1 || call.names.length > 0) {
            return this.reportType('Exactly one argument expected for explicit type conversion.', call);
        }
        const [argument] = argTypes;
        let result = target;
        if (target.category === 'array' && argument.category === 'array') {
            result = withLocation(target, argument.location, true);
        }
        if (!isExplicitlyConvertible(argument, result, (derived, base) => this.unit.isBaseContract(derived, base))) {
            this.unit.sink.report(
                'TypeError',
                `Explicit type conversion not allowed from "${typeString(argument)}" to "${typeString(result)}".`,
                call.src
            );
        }
        if (this.unit.annotations.isPure.has(call.arguments[0].id)) {
            this.unit.annotations.isPure.add(call.id);
        }
        return result;
    }

    private callFunction(call: FunctionCall, callee: FunctionType, argTypes: SolType[]): SolType {
        const parent = this.unit.parentOf(call);
        if (callee.kind === 'event' && parent?.nodeType !== 'EmitStatement') {
            this.unit.sink.report('TypeError', 'Event invocations have to be prefixed by "emit".', call.src);
        }
        if (callee.kind === 'error' && parent?.nodeType !== 'RevertStatement') {
            this.unit.sink.report(
                'TypeError',
                'Errors can only be used with revert statements: "revert MyError();".',
                call.src
            );
        }

        switch (callee.kind) {
            case 'arrayPush':
                if (argTypes.length === 0) {
                    this.unit.annotations.isLValue.add(call.id);
                    return withLocation(callee.parameters[0], 'storage', false);
                }
                this.checkArguments(call.arguments, argTypes, callee.parameters, 'function call', call.src);
                return tuple([]);
            case 'abiDecode':
                return this.abiDecode(call, argTypes);
            case 'stringConcat':
            case 'bytesConcat':
                return this.concat(call, callee, argTypes);
        }

        if (callee.variadic) {
            if (argTypes.length < callee.parameters.length) {
                return this.reportType(
                    `Wrong argument count for function call: ${argTypes.length} arguments given but expected at least ${callee.parameters.length}.`,
                    call
                );
            }
            callee.parameters.forEach((param, index) => {
                if (!this.convertible(argTypes[index], param)) {
                    this.reportInvalidArgument(call.arguments[index], argTypes[index], param, 'function call');
                }
            });
            return this.returnType(callee);
        }

        if (call.names.length > 0) {
            if (argTypes.length !== callee.parameters.length) {
                return this.reportArgumentCount(call, argTypes.length, callee.parameters.length);
            }
            const ordered = this.orderNamedArguments(call, argTypes, callee.parameterNames);
            if (ordered) {
                ordered.forEach((type, index) => {
                    if (!this.convertible(type, callee.parameters[index])) {
                        this.reportInvalidArgument(call, type, callee.parameters[index], 'function call');
                    }
                });
            }
        } else {
            this.checkArguments(call.arguments, argTypes, callee.parameters, 'function call', call.src);
        }

        if (callee.mutability === 'pure' && callee.kind !== 'internal' && callee.kind !== 'external' &&
            call.arguments.every(arg => this.unit.annotations.isPure.has(arg.id))) {
            this.unit.annotations.isPure.add(call.id);
        }
        return this.returnType(callee);
    }

    private returnType(callee: FunctionType): SolType {
        return callee.returns.length === 1 ? callee.returns[0] : tuple(callee.returns);
    }

    /**
     * `string.concat` takes strings; `bytes.concat` takes bytes and fixed-size byte arrays
     */
    private concat(call: FunctionCall, callee: FunctionType, argTypes: SolType[]): SolType {
        const accepted = callee.kind === 'stringConcat' ? stringType('memory') : bytesType('memory');
        argTypes.forEach((type, index) => {
            if (type === INVALID || this.convertible(type, accepted)) return;
            if (callee.kind === 'bytesConcat' && type.category === 'fixedBytes') return;
            this.reportInvalidArgument(call.arguments[index], type, accepted, 'function call');
        });
        return this.returnType(callee);
    }

    private abiDecode(call: FunctionCall, argTypes: SolType[]): SolType {
        if (argTypes.length !== 2) {
            return this.reportType(
                `This function takes two arguments, but ${argTypes.length} were provided.`,
                call
            );
        }
        if (!this.convertible(argTypes[0], bytesType('memory'))) {
            this.reportInvalidArgument(call.arguments[0], argTypes[0], bytesType('memory'), 'function call');
        }
        const decodedTypes = argTypes[1];
        const typeArguments = decodedTypes.category === 'tuple' ? decodedTypes.components : [decodedTypes];
        const results: SolType[] = [];
        for (const component of typeArguments) {
            if (!component || component.category !== 'type') {
                return this.reportType('The second argument to "abi.decode" has to be a tuple of types.', call.arguments[1]);
            }
            results.push(withLocation(component.actual, 'memory', true));
        }
        return results.length === 1 ? results[0] : tuple(results);
    }

    /**
     * Argument types in parameter order for a call with named arguments,
     * or null after reporting a naming error
     */
    private orderNamedArguments(call: FunctionCall, argTypes: SolType[], parameterNames: string[]): SolType[] | null {
        if (call.names.length === 0) {
            return argTypes;
        }
        const ordered: SolType[] = [];
        const seen = new Set<string>();
        for (const name of call.names) {
            if (seen.has(name)) {
                this.unit.sink.report('TypeError', `Duplicate named argument "${name}".`, call.src);
                return null;
            }
            seen.add(name);
        }
        for (const parameterName of parameterNames) {
            const index = call.names.indexOf(parameterName);
            if (index < 0) {
                const unmatched = call.names.find(name => !parameterNames.includes(name)) ?? parameterName;
                this.unit.sink.report('TypeError', `Named argument "${unmatched}" does not match function declaration.`, call.src);
                return null;
            }
            ordered.push(argTypes[index]);
        }
        return ordered;
    }

    private checkArguments(
        args: Expression[],
        argTypes: SolType[],
        parameters: SolType[],
        what: string,
        src: Expression['src']
    ): void {
        if (argTypes.length !== parameters.length) {
            this.unit.sink.report(
                'TypeError',
                `Wrong argument count for ${what}: ${argTypes.length} arguments given but expected ${parameters.length}.`,
                src
            );
            return;
        }
        argTypes.forEach((type, index) => {
            if (type !== INVALID && !this.convertible(type, parameters[index])) {
                this.reportInvalidArgument(args[index], type, parameters[index], what);
            }
        });
    }

    private reportArgumentCount(call: FunctionCall, given: number, expected: number): SolType {
        return this.reportType(
            `Wrong argument count for function call: ${given} arguments given but expected ${expected}.`,
            call
        );
    }

    private reportInvalidArgument(node: Expression, from: SolType, to: SolType, what: string): void {
        this.unit.sink.report(
            'TypeError',
            `Invalid type for argument in ${what}. Invalid implicit conversion from ${typeString(from)} to ${typeString(to)} requested.`,
            node.src
        );
    }

    private newExpression(expression: NewExpression): SolType {
        const created = this.unit.annotations.requireType(expression.typeName.id);
        if (created.category === 'contract') {
            const contract = this.unit.contract(created.declaration);
            if (contract.contractKind === 'interface') {
                return this.reportType('Cannot instantiate an interface.', expression);
            }
            if (contract.abstract || this.unit.annotations.fullyImplemented.get(contract.id) === false) {
                return this.reportType('Cannot instantiate an abstract contract.', expression);
            }
            return {
                category: 'function',
                kind: 'creation',
                parameters: this.constructorParameters(contract),
                returns: [created],
                parameterNames: [],
                mutability: 'payable',
                declaration: null,
                variadic: false
            };
        }
        if (created.category === 'array') {
            if (created.length !== null) {
                return this.reportType(
                    'Length has to be placed in parentheses after the array type for new expression.',
                    expression
                );
            }
            return builtinFunction('creation', [UINT256], [withLocation(created, 'memory', true)], 'pure');
        }
        return this.reportType('Contract or array type expected.', expression);
    }

    // ============ Operators ============

    private assignment(assignment: Assignment): SolType {
        const target = this.expression(assignment.leftHandSide, { lvalue: true });
        const value = this.expression(assignment.rightHandSide);
        if (target === INVALID || value === INVALID) {
            return target;
        }
        if (containsMappingType(target)) {
            return this.reportType('Types in storage containing (nested) mappings cannot be assigned to.', assignment);
        }
        if (assignment.operator === '=') {
            if (target.category === 'tuple') {
                this.checkTupleAssignment(assignment, target, value);
            } else if (!this.convertible(value, target)) {
                this.unit.sink.report(
                    'TypeError',
                    `Type ${typeString(value)} is not implicitly convertible to expected type ${typeString(target)}.`,
                    assignment.rightHandSide.src
                );
            }
            return target;
        }

        const operator = assignment.operator.slice(0, -1);
        const result = binaryOperatorResult(operator, target, value);
        if (!result || !this.convertible(result, target)) {
            this.unit.sink.report(
                'TypeError',
                `Operator ${operator} not compatible with types ${typeString(target)} and ${typeString(value)}.`,
                assignment.src
            );
        }
        return target;
    }

    private checkTupleAssignment(assignment: Assignment, target: TupleType, value: SolType): void {
        const components = value.category === 'tuple' ? value.components : [value];
        if (components.length !== target.components.length) {
            this.unit.sink.report(
                'TypeError',
                `Different number of components on the left hand side (${target.components.length}) than on the right hand side (${components.length}).`,
                assignment.src
            );
            return;
        }
        target.components.forEach((component, index) => {
            const source = components[index];
            if (component && source && !this.convertible(source, component)) {
                this.unit.sink.report(
                    'TypeError',
                    `Type ${typeString(source)} is not implicitly convertible to expected type ${typeString(component)}.`,
                    assignment.rightHandSide.src
                );
            }
        });
    }

    private binaryOperation(operation: BinaryOperation): SolType {
        const left = this.expression(operation.leftExpression);
        const right = this.expression(operation.rightExpression);
        if (left === INVALID || right === INVALID) {
            return INVALID;
        }
        const result = binaryOperatorResult(operation.operator, left, right);
        if (!result) {
            return this.reportType(
                `Built-in binary operator ${operation.operator} cannot be applied to types ${typeString(left)} and ${typeString(right)}.`,
                operation
            );
        }
        if (this.unit.annotations.isPure.has(operation.leftExpression.id) && this.unit.annotations.isPure.has(operation.rightExpression.id)) {
            this.unit.annotations.isPure.add(operation.id);
        }
        return isComparisonOperator(operation.operator) ? BOOL : result;
    }

    private unaryOperation(operation: UnaryOperation): SolType {
        const modifies = operation.operator === '++' || operation.operator === '--' || operation.operator === 'delete';
        const operand = this.expression(operation.subExpression, { lvalue: modifies });
        if (operand === INVALID) {
            return INVALID;
        }
        if (operation.operator === '-' && operand.category === 'integer' && !operand.signed) {
            return this.reportType('Unary negation is only allowed for signed integers.', operation);
        }
        const result = unaryOperatorResult(operation.operator, operand);
        if (!result) {
            return this.reportType(
                `Unary operator ${operation.operator} cannot be applied to type ${typeString(operand)}.`,
                operation
            );
        }
        if (!modifies && this.unit.annotations.isPure.has(operation.subExpression.id)) {
            this.unit.annotations.isPure.add(operation.id);
        }
        return result;
    }

    private conditional(conditional: Conditional): SolType {
        this.expectType(conditional.condition, BOOL);
        const whenTrue = this.expression(conditional.trueExpression);
        const whenFalse = this.expression(conditional.falseExpression);
        if (whenTrue === INVALID || whenFalse === INVALID) {
            return INVALID;
        }
        const trueMobile = mobileType(whenTrue);
        const falseMobile = mobileType(whenFalse);
        const common = trueMobile && falseMobile ? commonType(trueMobile, falseMobile) : null;
        if (!common) {
            return this.reportType(
                `True expression's type ${typeString(whenTrue)} does not match false expression's type ${typeString(whenFalse)}.`,
                conditional
            );
        }
        const pure = [conditional.condition, conditional.trueExpression, conditional.falseExpression]
            .every(part => this.unit.annotations.isPure.has(part.id));
        if (pure) {
            this.unit.annotations.isPure.add(conditional.id);
        }
        return common;
    }

    // ============ Primary expressions ============

    private literal(literal: Literal): SolType {
        this.unit.annotations.isPure.add(literal.id);
        switch (literal.kind) {
            case 'bool':
                return BOOL;
            case 'number': {
                if (/^0x[0-9a-fA-F]{40}$/.test(literal.value) && literal.subdenomination === null) {
                    return ADDRESS;
                }
                const value = parseNumberLiteral(literal.value, literal.subdenomination);
                if (!value) {
                    return this.reportType('Invalid rational number.', literal);
                }
                const hex = /^0x([0-9a-fA-F_]+)$/.exec(literal.value);
                return rationalType(value, hex ? hex[1].replace(/_/g, '').length : null);
            }
            case 'hexString':
                return { category: 'stringLiteral', value: literal.value.replace(/_/g, '').toLowerCase(), hex: true };
            case 'string':
            case 'unicodeString':
                return { category: 'stringLiteral', value: literal.value, hex: false };
        }
    }

    private tupleExpression(expression: TupleExpression, lvalue: boolean): SolType {
        if (expression.isInlineArray) {
            return this.inlineArray(expression);
        }
        const components: (SolType | null)[] = [];
        let pure = true;
        for (const component of expression.components) {
            if (!component) {
                if (!lvalue && expression.components.length > 1) {
                    this.unit.sink.report('TypeError', 'Tuple component cannot be empty.', expression.src);
                }
                components.push(null);
                pure = false;
                continue;
            }
            const type = this.expression(component, { lvalue });
            if (type === INVALID) {
                return INVALID;
            }
            components.push(type);
            pure = pure && this.unit.annotations.isPure.has(component.id);
        }
        if (pure) {
            this.unit.annotations.isPure.add(expression.id);
        }
        if (components.length === 1) {
            const [single] = components;
            const [inner] = expression.components;
            if (single && inner) {
                if (this.unit.annotations.isLValue.has(inner.id)) {
                    this.unit.annotations.isLValue.add(expression.id);
                }
                return single;
            }
        }
        if (lvalue) {
            this.unit.annotations.isLValue.add(expression.id);
        }
        return tuple(components);
    }

    private inlineArray(expression: TupleExpression): SolType {
        let element: SolType | null = null;
        let pure = true;
        for (const component of expression.components) {
            if (!component) {
                return this.reportType('Inline array components cannot be empty.', expression);
            }
            const type = this.expression(component);
            if (type === INVALID) {
                return INVALID;
            }
            pure = pure && this.unit.annotations.isPure.has(component.id);
            const mobile = mobileType(type);
            if (!mobile) {
                return this.reportType(`Invalid mobile type in inline array.`, component);
            }
            element = element === null ? mobile : commonType(element, mobile);
            if (element === null) {
                return this.reportType('Unable to deduce common type for array elements.', expression);
            }
        }
        if (element === null) {
            return this.reportType('Unable to deduce common type for array elements.', expression);
        }
        if (pure) {
            this.unit.annotations.isPure.add(expression.id);
        }
        return {
            category: 'array',
            kind: 'array',
            base: withLocation(element, 'memory', true),
            length: BigInt(expression.components.length),
            location: 'memory',
            isPointer: true
        };
    }

    private elementaryTypeNameExpression(expression: ElementaryTypeNameExpression): SolType {
        const type = elementaryType(expression.typeName.name, expression.typeName.stateMutability);
        if (!type) {
            return this.reportType(`Invalid type name "${expression.typeName.name}".`, expression);
        }
        this.unit.annotations.isPure.add(expression.id);
        return typeOf(type);
    }

    // ============ Helpers ============

    private contractType(contract: ContractDefinition): ContractType {
        return {
            category: 'contract',
            declaration: contract.id,
            name: contract.name,
            contractKind: contract.contractKind,
            isSuper: false
        };
    }

    private convertible(from: SolType, to: SolType): boolean {
        return isImplicitlyConvertible(from, to, (derived, base) => this.unit.isBaseContract(derived, base));
    }

    private reportNotLValue(expression: Expression): void {
        const id = this.unit.annotations.referencedDeclaration.get(expression.id);
        const variable = id === undefined ? null : this.unit.find(id, 'VariableDeclaration');
        let message = 'Expression has to be an lvalue.';
        if (variable && variable.mutability === 'constant') {
            message = 'Cannot assign to a constant variable.';
        } else if (variable && variable.mutability === 'immutable') {
            message = 'Cannot write to immutable here: Immutable variables can only be initialized inline or assigned directly in the constructor.';
        } else if (expression.nodeType === 'IndexAccess' || expression.nodeType === 'MemberAccess') {
            const base = this.unit.annotations.typeOf(
                expression.nodeType === 'IndexAccess' ? expression.baseExpression.id : expression.expression.id
            );
            if (base && (base.category === 'array' || base.category === 'struct') && base.location === 'calldata') {
                message = base.category === 'array' ? 'Calldata arrays are read-only.' : 'Calldata structs are read-only.';
            }
        }
        this.unit.sink.report('TypeError', message, expression.src);
    }

    private reportType(message: string, node: { src: Expression['src'] }): SolType {
        this.unit.sink.report('TypeError', message, node.src);
        return INVALID;
    }
}

function containsMappingType(type: SolType): boolean {
    if (type.category === 'mapping') {
        return true;
    }
    return type.category === 'tuple' && type.components.some(component => component !== null && containsMappingType(component));
}
