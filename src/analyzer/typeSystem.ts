import { StateMutability } from '../types/ast';
import { Rational, bitLength, compare, foldBinary, foldUnary, isInteger, rational, readableBigint } from './rational';

export type DataLocation = 'storage' | 'memory' | 'calldata';

export interface IntegerType {
    category: 'integer';
    signed: boolean;
    bits: number;
}

export interface RationalType {
    category: 'rational';
    value: Rational;
    /** Digit count of a hex number literal, null for anything else */
    hexDigits: number | null;
}

export interface BoolType {
    category: 'bool';
}

export interface AddressType {
    category: 'address';
    payable: boolean;
}

export interface FixedBytesType {
    category: 'fixedBytes';
    bytes: number;
}

export interface StringLiteralType {
    category: 'stringLiteral';
    value: string;
    hex: boolean;
}

export interface ArrayType {
    category: 'array';
    kind: 'array' | 'bytes' | 'string';
    base: SolType | null;
    length: bigint | null;
    location: DataLocation;
    isPointer: boolean;
}

export interface MappingType {
    category: 'mapping';
    key: SolType;
    value: SolType;
}

export interface ContractType {
    category: 'contract';
    declaration: number;
    name: string;
    contractKind: 'contract' | 'interface' | 'library';
    isSuper: boolean;
}

export interface StructType {
    category: 'struct';
    declaration: number;
    name: string;
    canonicalName: string;
    location: DataLocation;
    isPointer: boolean;
}

export interface EnumType {
    category: 'enum';
    declaration: number;
    name: string;
    canonicalName: string;
}

export type FunctionTypeKind =
    | 'internal'
    | 'external'
    | 'declaration'
    | 'event'
    | 'error'
    | 'creation'
    | 'send'
    | 'transfer'
    | 'bareCall'
    | 'bareDelegateCall'
    | 'bareStaticCall'
    | 'arrayPush'
    | 'arrayPop'
    | 'require'
    | 'assert'
    | 'revert'
    | 'keccak256'
    | 'sha256'
    | 'ecrecover'
    | 'gasleft'
    | 'blockhash'
    | 'addmod'
    | 'mulmod'
    | 'abiEncode'
    | 'abiEncodePacked'
    | 'abiEncodeWithSelector'
    | 'abiEncodeWithSignature'
    | 'abiDecode'
    | 'stringConcat'
    | 'bytesConcat';

export interface FunctionType {
    category: 'function';
    kind: FunctionTypeKind;
    parameters: SolType[];
    returns: SolType[];
    parameterNames: string[];
    mutability: StateMutability;
    declaration: number | null;
    /** Accepts any number of arguments of any type */
    variadic: boolean;
}

export interface ModifierType {
    category: 'modifier';
    parameters: SolType[];
    declaration: number;
}

export interface TypeType {
    category: 'type';
    actual: SolType;
}

export interface MagicType {
    category: 'magic';
    kind: 'message' | 'block' | 'transaction' | 'abi';
}

export interface TupleType {
    category: 'tuple';
    components: (SolType | null)[];
}

export type SolType =
    | IntegerType
    | RationalType
    | BoolType
    | AddressType
    | FixedBytesType
    | StringLiteralType
    | ArrayType
    | MappingType
    | ContractType
    | StructType
    | EnumType
    | FunctionType
    | ModifierType
    | TypeType
    | MagicType
    | TupleType;

// ============ Constructors ============

export const BOOL: BoolType = { category: 'bool' };
export const ADDRESS: AddressType = { category: 'address', payable: false };
export const ADDRESS_PAYABLE: AddressType = { category: 'address', payable: true };
export const UINT256: IntegerType = { category: 'integer', signed: false, bits: 256 };
export const EMPTY_TUPLE: TupleType = { category: 'tuple', components: [] };

export function integer(signed: boolean, bits: number): IntegerType {
    return { category: 'integer', signed, bits };
}

export function fixedBytes(bytes: number): FixedBytesType {
    return { category: 'fixedBytes', bytes };
}

export function rationalType(value: Rational, hexDigits: number | null = null): RationalType {
    return { category: 'rational', value, hexDigits };
}

export function bytesType(location: DataLocation, isPointer = true): ArrayType {
    return { category: 'array', kind: 'bytes', base: null, length: null, location, isPointer };
}

export function stringType(location: DataLocation, isPointer = true): ArrayType {
    return { category: 'array', kind: 'string', base: null, length: null, location, isPointer };
}

export function arrayOf(base: SolType, length: bigint | null, location: DataLocation, isPointer = true): ArrayType {
    return { category: 'array', kind: 'array', base, length, location, isPointer };
}

export function typeOf(actual: SolType): TypeType {
    return { category: 'type', actual };
}

export function tuple(components: (SolType | null)[]): TupleType {
    return { category: 'tuple', components };
}

/**
 * Function type of a builtin or synthesised member
 */
export function builtinFunction(
    kind: FunctionTypeKind,
    parameters: SolType[],
    returns: SolType[],
    mutability: StateMutability,
    variadic = false
): FunctionType {
    return {
        category: 'function',
        kind,
        parameters,
        returns,
        parameterNames: parameters.map(() => ''),
        mutability,
        declaration: null,
        variadic
    };
}

/**
 * Map an elementary type keyword to its type. Returns null for keywords
 * that are not types.
 */
export function elementaryType(name: string, stateMutability: 'payable' | 'nonpayable' | null): SolType | null {
    const normalised = normaliseElementaryName(name);
    if (normalised === 'bool') {
        return BOOL;
    }
    if (normalised === 'address') {
        return stateMutability === 'payable' ? ADDRESS_PAYABLE : ADDRESS;
    }
    if (normalised === 'string') {
        return stringType('memory');
    }
    if (normalised === 'bytes') {
        return bytesType('memory');
    }
    const intMatch = /^(u?)int(\d+)$/.exec(normalised);
    if (intMatch) {
        const bits = Number(intMatch[2]);
        if (bits < 8 || bits > 256 || bits % 8 !== 0) {
            return null;
        }
        return integer(intMatch[1] !== 'u', bits);
    }
    const bytesMatch = /^bytes(\d+)$/.exec(normalised);
    if (bytesMatch) {
        const size = Number(bytesMatch[1]);
        if (size < 1 || size > 32) {
            return null;
        }
        return fixedBytes(size);
    }
    return null;
}

export function normaliseElementaryName(name: string): string {
    switch (name) {
        case 'uint':
            return 'uint256';
        case 'int':
            return 'int256';
        case 'byte':
            return 'bytes1';
        default:
            return name;
    }
}

// ============ Rendering ============

function locationIdentifier(location: DataLocation, isPointer: boolean): string {
    if (location === 'storage') {
        return isPointer ? '_storage_ptr' : '_storage';
    }
    return location === 'memory' ? '_memory_ptr' : '_calldata_ptr';
}

function locationString(location: DataLocation, isPointer: boolean): string {
    if (location === 'storage') {
        return isPointer ? ' storage pointer' : ' storage ref';
    }
    return ` ${location}`;
}

function identifierList(types: (SolType | null)[]): string {
    return `$_${types.map(type => (type ? typeIdentifier(type) : '')).join('_$_')}_$`;
}

function rationalIdentifier(value: Rational): string {
    const sign = value.num < 0n ? 'minus_' : '';
    const num = value.num < 0n ? -value.num : value.num;
    return `t_rational_${sign}${num}_by_${value.den}`;
}

function hexOfUtf8(value: string): string {
    return Buffer.from(value, 'utf8').toString('hex');
}

/**
 * Machine-readable type name in the compiler's `t_...` form
 */
export function typeIdentifier(type: SolType): string {
    switch (type.category) {
        case 'integer':
            return `t_${type.signed ? 'int' : 'uint'}${type.bits}`;
        case 'rational':
            return rationalIdentifier(type.value);
        case 'bool':
            return 't_bool';
        case 'address':
            return type.payable ? 't_address_payable' : 't_address';
        case 'fixedBytes':
            return `t_bytes${type.bytes}`;
        case 'stringLiteral':
            return `t_stringliteral_${type.hex ? type.value : hexOfUtf8(type.value)}`;
        case 'array': {
            const suffix = locationIdentifier(type.location, type.isPointer);
            if (type.kind !== 'array' || type.base === null) {
                return `t_${type.kind}${suffix}`;
            }
            const length = type.length === null ? 'dyn' : type.length.toString();
            return `t_array${identifierList([type.base])}${length}${suffix}`;
        }
        case 'mapping':
            return `t_mapping${identifierList([type.key, type.value])}`;
        case 'contract':
            return `t_${type.isSuper ? 'super' : 'contract'}$_${type.name}_$${type.declaration}`;
        case 'struct':
            return `t_struct$_${type.name}_$${type.declaration}${locationIdentifier(type.location, type.isPointer)}`;
        case 'enum':
            return `t_enum$_${type.name}_$${type.declaration}`;
        case 'function':
            return `t_function_${functionKindIdentifier(type.kind)}_${type.mutability}${identifierList(type.parameters)}returns${identifierList(type.returns)}`;
        case 'modifier':
            return `t_modifier${identifierList(type.parameters)}`;
        case 'type':
            return `t_type${identifierList([type.actual])}`;
        case 'magic':
            return `t_magic_${type.kind}`;
        case 'tuple':
            return `t_tuple${identifierList(type.components)}`;
    }
}

function functionKindIdentifier(kind: FunctionTypeKind): string {
    switch (kind) {
        case 'declaration':
            return 'declaration';
        case 'bareCall':
            return 'barecall';
        case 'bareDelegateCall':
            return 'baredelegatecall';
        case 'bareStaticCall':
            return 'barestaticcall';
        case 'arrayPush':
            return 'arraypush';
        case 'arrayPop':
            return 'arraypop';
        case 'abiEncode':
            return 'abiencode';
        case 'abiEncodePacked':
            return 'abiencodepacked';
        case 'abiEncodeWithSelector':
            return 'abiencodewithselector';
        case 'abiEncodeWithSignature':
            return 'abiencodewithsignature';
        case 'abiDecode':
            return 'abidecode';
        case 'stringConcat':
            return 'stringconcat';
        case 'bytesConcat':
            return 'bytesconcat';
        default:
            return kind;
    }
}

/**
 * Human-readable type name as diagnostics print it
 */
export function typeString(type: SolType, withoutLocation = false): string {
    switch (type.category) {
        case 'integer':
            return `${type.signed ? 'int' : 'uint'}${type.bits}`;
        case 'rational':
            if (isInteger(type.value)) {
                return `int_const ${readableBigint(type.value.num)}`;
            }
            return `rational_const ${readableBigint(type.value.num)} / ${readableBigint(type.value.den)}`;
        case 'bool':
            return 'bool';
        case 'address':
            return type.payable ? 'address payable' : 'address';
        case 'fixedBytes':
            return `bytes${type.bytes}`;
        case 'stringLiteral':
            return type.hex ? `literal_string hex"${type.value}"` : `literal_string ${JSON.stringify(type.value)}`;
        case 'array': {
            const location = withoutLocation ? '' : locationString(type.location, type.isPointer);
            if (type.kind !== 'array' || type.base === null) {
                return `${type.kind}${location}`;
            }
            const length = type.length === null ? '' : type.length.toString();
            return `${typeString(type.base, withoutLocation)}[${length}]${location}`;
        }
        case 'mapping':
            return `mapping(${typeString(type.key, true)} => ${typeString(type.value, true)})`;
        case 'contract':
            return `${type.contractKind === 'library' ? 'library' : 'contract'} ${type.isSuper ? 'super ' : ''}${type.name}`;
        case 'struct':
            return `struct ${type.canonicalName}${withoutLocation ? '' : locationString(type.location, type.isPointer)}`;
        case 'enum':
            return `enum ${type.canonicalName}`;
        case 'function': {
            let text = `function (${type.parameters.map(param => typeString(param)).join(',')})`;
            if (type.mutability !== 'nonpayable') {
                text += ` ${type.mutability}`;
            }
            if (type.kind === 'external') {
                text += ' external';
            }
            if (type.returns.length > 0) {
                text += ` returns (${type.returns.map(ret => typeString(ret)).join(',')})`;
            }
            return text;
        }
        case 'modifier':
            return `modifier (${type.parameters.map(param => typeString(param)).join(',')})`;
        case 'type':
            return `type(${typeString(type.actual)})`;
        case 'magic':
            return MAGIC_NAMES[type.kind];
        case 'tuple':
            return `tuple(${type.components.map(component => (component ? typeString(component) : '')).join(',')})`;
    }
}

const MAGIC_NAMES: Record<MagicType['kind'], string> = {
    message: 'msg',
    block: 'block',
    transaction: 'tx',
    abi: 'abi'
};

export function sameType(left: SolType, right: SolType): boolean {
    return typeIdentifier(left) === typeIdentifier(right);
}

// ============ Classification ============

export function isValueType(type: SolType): boolean {
    switch (type.category) {
        case 'integer':
        case 'bool':
        case 'address':
        case 'fixedBytes':
        case 'enum':
        case 'contract':
            return true;
        case 'function':
            return type.kind === 'internal' || type.kind === 'external';
        default:
            return false;
    }
}

export function isReferenceType(type: SolType): type is ArrayType | StructType {
    return type.category === 'array' || type.category === 'struct';
}

export function containsMapping(type: SolType, structMembers: (id: number) => SolType[]): boolean {
    const seen = new Set<number>();
    const visit = (current: SolType): boolean => {
        if (current.category === 'mapping') {
            return true;
        }
        if (current.category === 'array' && current.base) {
            return visit(current.base);
        }
        if (current.category === 'struct') {
            if (seen.has(current.declaration)) {
                return false;
            }
            seen.add(current.declaration);
            return structMembers(current.declaration).some(visit);
        }
        return false;
    };
    return visit(type);
}

/**
 * Copy of a reference type at another data location
 */
export function withLocation(type: SolType, location: DataLocation, isPointer: boolean): SolType {
    if (type.category === 'array') {
        return {
            ...type,
            base: type.base ? withLocation(type.base, location, location === 'storage' ? false : true) : null,
            location,
            isPointer
        };
    }
    if (type.category === 'struct') {
        return { ...type, location, isPointer };
    }
    return type;
}

/**
 * Smallest integer type able to hold an integral constant
 */
export function integerForRational(value: Rational): IntegerType | null {
    if (!isInteger(value)) {
        return null;
    }
    const negative = value.num < 0n;
    const magnitude = negative ? -value.num - 1n : value.num;
    const bits = bitLength(magnitude) + (negative ? 1 : 0);
    const rounded = Math.max(8, Math.ceil(bits / 8) * 8);
    if (rounded > 256) {
        return null;
    }
    return integer(negative, rounded);
}

/**
 * Type a literal-derived value takes when stored in a variable
 */
export function mobileType(type: SolType): SolType | null {
    if (type.category === 'rational') {
        return integerForRational(type.value);
    }
    if (type.category === 'stringLiteral') {
        return stringType('memory');
    }
    if (type.category === 'tuple') {
        const components: (SolType | null)[] = [];
        for (const component of type.components) {
            if (component === null) {
                components.push(null);
                continue;
            }
            const mobile = mobileType(component);
            if (!mobile) {
                return null;
            }
            components.push(mobile);
        }
        return tuple(components);
    }
    return type;
}

function rationalFits(value: Rational, target: IntegerType): boolean {
    if (!isInteger(value)) {
        return false;
    }
    const bits = BigInt(target.bits);
    const min = target.signed ? -(1n << (bits - 1n)) : 0n;
    const max = target.signed ? (1n << (bits - 1n)) - 1n : (1n << bits) - 1n;
    return value.num >= min && value.num <= max;
}

function locationConvertible(from: DataLocation, fromPointer: boolean, to: DataLocation, toPointer: boolean): boolean {
    if (to === 'memory') {
        return true;
    }
    if (to === 'storage') {
        if (toPointer) {
            return from === 'storage';
        }
        return true;
    }
    return from === 'calldata';
}

/**
 * Whether a value of type `from` may be used where `to` is expected
 * without an explicit conversion
 */
export function isImplicitlyConvertible(
    from: SolType,
    to: SolType,
    isBaseContract: (derived: number, base: number) => boolean = () => false
): boolean {
    switch (from.category) {
        case 'integer':
            return to.category === 'integer' && from.signed === to.signed && from.bits <= to.bits;
        case 'rational':
            if (to.category === 'integer') {
                return rationalFits(from.value, to);
            }
            if (to.category === 'fixedBytes') {
                return from.value.num === 0n || from.hexDigits === to.bytes * 2;
            }
            return to.category === 'rational' && compare(from.value, to.value) === 0;
        case 'bool':
            return to.category === 'bool';
        case 'address':
            return to.category === 'address' && (from.payable || !to.payable);
        case 'fixedBytes':
            return to.category === 'fixedBytes' && from.bytes <= to.bytes;
        case 'stringLiteral':
            if (to.category === 'array') {
                return to.kind === 'bytes' || (to.kind === 'string' && !from.hex);
            }
            if (to.category === 'fixedBytes') {
                return literalByteLength(from) <= to.bytes;
            }
            return to.category === 'stringLiteral' && to.value === from.value;
        case 'array': {
            if (to.category !== 'array' || to.kind !== from.kind) {
                return false;
            }
            if (!locationConvertible(from.location, from.isPointer, to.location, to.isPointer)) {
                return false;
            }
            if (from.kind !== 'array') {
                return true;
            }
            if (from.length !== to.length) {
                return false;
            }
            if (from.base && to.base) {
                return typeIdentifier(withLocation(from.base, 'memory', true)) ===
                    typeIdentifier(withLocation(to.base, 'memory', true));
            }
            return true;
        }
        case 'struct':
            return to.category === 'struct' &&
                to.declaration === from.declaration &&
                locationConvertible(from.location, from.isPointer, to.location, to.isPointer);
        case 'contract':
            if (to.category === 'contract' && !from.isSuper && !to.isSuper) {
                return from.declaration === to.declaration || isBaseContract(from.declaration, to.declaration);
            }
            return false;
        case 'enum':
            return to.category === 'enum' && to.declaration === from.declaration;
        case 'tuple':
            if (to.category !== 'tuple' || to.components.length !== from.components.length) {
                return false;
            }
            return from.components.every((component, index) => {
                const target = to.components[index];
                if (component === null || target === null || target === undefined) {
                    return component === null || target === null;
                }
                return isImplicitlyConvertible(component, target, isBaseContract);
            });
        default:
            return sameType(from, to);
    }
}

/**
 * Length in bytes of the data a string literal denotes
 */
export function literalByteLength(literal: StringLiteralType): number {
    return literal.hex ? literal.value.length / 2 : Buffer.byteLength(literal.value, 'utf8');
}

/**
 * Whether `T(x)` is a valid conversion for a value of type `from`
 */
export function isExplicitlyConvertible(
    from: SolType,
    to: SolType,
    isBaseContract: (derived: number, base: number) => boolean = () => false
): boolean {
    if (isImplicitlyConvertible(from, to, isBaseContract)) {
        return true;
    }
    switch (from.category) {
        case 'integer':
            if (to.category === 'integer') {
                return true;
            }
            if (to.category === 'address') {
                return !from.signed && from.bits === 160;
            }
            if (to.category === 'fixedBytes') {
                return from.bits === to.bytes * 8;
            }
            return to.category === 'enum';
        case 'rational':
            if (to.category === 'integer') {
                return isInteger(from.value);
            }
            if (to.category === 'address') {
                return isInteger(from.value) && from.value.num >= 0n && bitLength(from.value.num) <= 160;
            }
            if (to.category === 'fixedBytes') {
                return isInteger(from.value) && from.value.num >= 0n && bitLength(from.value.num) <= to.bytes * 8;
            }
            if (to.category === 'enum') {
                return isInteger(from.value) && from.value.num >= 0n;
            }
            return false;
        case 'address':
            if (to.category === 'integer') {
                return !to.signed && to.bits === 160;
            }
            if (to.category === 'fixedBytes') {
                return to.bytes === 20;
            }
            return to.category === 'contract' || to.category === 'address';
        case 'fixedBytes':
            if (to.category === 'integer') {
                return to.bits === from.bytes * 8;
            }
            if (to.category === 'address') {
                return from.bytes === 20;
            }
            return to.category === 'fixedBytes';
        case 'contract':
            return to.category === 'address' || (to.category === 'contract' && isBaseContract(to.declaration, from.declaration));
        case 'enum':
            return to.category === 'integer';
        case 'array':
            if (from.kind === 'bytes' && to.category === 'array' && to.kind === 'string') {
                return locationConvertible(from.location, from.isPointer, to.location, to.isPointer);
            }
            if (from.kind === 'string' && to.category === 'array' && to.kind === 'bytes') {
                return locationConvertible(from.location, from.isPointer, to.location, to.isPointer);
            }
            if (from.kind === 'bytes' && to.category === 'fixedBytes') {
                return from.location !== 'storage';
            }
            return false;
        case 'bool':
            return false;
        default:
            return false;
    }
}

// ============ Operators ============

/**
 * Type both operands are converted to before a binary operation
 */
export function commonType(left: SolType, right: SolType): SolType | null {
    if (left.category === 'rational' && right.category === 'rational') {
        return left;
    }
    if (isImplicitlyConvertible(right, left)) {
        return left.category === 'rational' || left.category === 'stringLiteral' ? mobileType(left) : left;
    }
    if (isImplicitlyConvertible(left, right)) {
        return right.category === 'rational' || right.category === 'stringLiteral' ? mobileType(right) : right;
    }
    if (left.category === 'rational') {
        const mobile = mobileType(left);
        if (mobile && isImplicitlyConvertible(mobile, right)) {
            return right;
        }
    }
    if (right.category === 'rational') {
        const mobile = mobileType(right);
        if (mobile && isImplicitlyConvertible(mobile, left)) {
            return left;
        }
    }
    return null;
}

const COMPARISON_OPERATORS = new Set(['==', '!=', '<', '>', '<=', '>=']);
const ARITHMETIC_OPERATORS = new Set(['+', '-', '*', '/', '%', '**']);
const BITWISE_OPERATORS = new Set(['&', '|', '^']);
const SHIFT_OPERATORS = new Set(['<<', '>>']);

export function isComparisonOperator(operator: string): boolean {
    return COMPARISON_OPERATORS.has(operator);
}

/**
 * Result type of `left <operator> right`, or null when the operator is not
 * defined for the operands
 */
export function binaryOperatorResult(operator: string, left: SolType, right: SolType): SolType | null {
    if (operator === '&&' || operator === '||') {
        return left.category === 'bool' && right.category === 'bool' ? BOOL : null;
    }

    if (left.category === 'rational' && right.category === 'rational') {
        if (COMPARISON_OPERATORS.has(operator)) {
            return BOOL;
        }
        const folded = foldBinary(operator, left.value, right.value);
        return folded ? rationalType(folded) : null;
    }

    if (SHIFT_OPERATORS.has(operator) || operator === '**') {
        return shiftOrExpResult(operator, left, right);
    }

    const common = commonType(left, right);
    if (!common) {
        return null;
    }

    if (COMPARISON_OPERATORS.has(operator)) {
        const ordered = operator !== '==' && operator !== '!=';
        switch (common.category) {
            case 'integer':
            case 'fixedBytes':
            case 'address':
            case 'enum':
            case 'contract':
                return BOOL;
            case 'bool':
                return ordered ? null : BOOL;
            case 'function':
                return !ordered && (common.kind === 'internal' || common.kind === 'external') ? BOOL : null;
            default:
                return null;
        }
    }
    if (ARITHMETIC_OPERATORS.has(operator)) {
        return common.category === 'integer' ? common : null;
    }
    if (BITWISE_OPERATORS.has(operator)) {
        return common.category === 'integer' || common.category === 'fixedBytes' ? common : null;
    }
    return null;
}

function shiftOrExpResult(operator: string, left: SolType, right: SolType): SolType | null {
    const rightOk = right.category === 'integer'
        ? !right.signed
        : right.category === 'rational' && isInteger(right.value) && right.value.num >= 0n;
    if (!rightOk) {
        return null;
    }
    if (left.category === 'integer' || (left.category === 'fixedBytes' && operator !== '**')) {
        return left;
    }
    if (left.category === 'rational') {
        if (right.category === 'rational') {
            const folded = foldBinary(operator, left.value, right.value);
            return folded ? rationalType(folded) : null;
        }
        const mobile = mobileType(left);
        return mobile && mobile.category === 'integer' ? mobile : null;
    }
    return null;
}

/**
 * Result type of a unary operator, or null when not applicable
 */
export function unaryOperatorResult(operator: string, operand: SolType): SolType | null {
    switch (operator) {
        case '!':
            return operand.category === 'bool' ? BOOL : null;
        case '-':
            if (operand.category === 'rational') {
                const folded = foldUnary('-', operand.value);
                return folded ? rationalType(folded) : null;
            }
            return operand.category === 'integer' && operand.signed ? operand : null;
        case '~':
            if (operand.category === 'rational') {
                const folded = foldUnary('~', operand.value);
                return folded ? rationalType(folded) : null;
            }
            return operand.category === 'integer' || operand.category === 'fixedBytes' ? operand : null;
        case '++':
        case '--':
            return operand.category === 'integer' ? operand : null;
        case 'delete':
            return operand.category === 'mapping' ? null : EMPTY_TUPLE;
        default:
            return null;
    }
}

export function rationalFromInteger(value: bigint): RationalType {
    return rationalType(rational(value));
}
