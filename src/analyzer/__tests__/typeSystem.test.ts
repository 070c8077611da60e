import { describe, expect, it } from 'vitest';
import { rational } from '../rational';
import {
    ADDRESS,
    ADDRESS_PAYABLE,
    BOOL,
    MappingType,
    UINT256,
    arrayOf,
    binaryOperatorResult,
    commonType,
    elementaryType,
    integer,
    integerForRational,
    isExplicitlyConvertible,
    isImplicitlyConvertible,
    rationalFromInteger,
    rationalType,
    stringType,
    typeIdentifier,
    typeString,
    unaryOperatorResult
} from '../typeSystem';

describe('type rendering', () => {
    it('renders value types', () => {
        expect(typeString(UINT256)).toBe('uint256');
        expect(typeIdentifier(UINT256)).toBe('t_uint256');
        expect(typeString(ADDRESS_PAYABLE)).toBe('address payable');
        expect(typeIdentifier(ADDRESS_PAYABLE)).toBe('t_address_payable');
    });

    it('renders constants', () => {
        expect(typeString(rationalFromInteger(100n))).toBe('int_const 100');
        expect(typeIdentifier(rationalFromInteger(100n))).toBe('t_rational_100_by_1');
        expect(typeString(rationalType(rational(-1n, 2n)))).toBe('rational_const -1 / 2');
        expect(typeIdentifier(rationalType(rational(-1n, 2n)))).toBe('t_rational_minus_1_by_2');
    });

    it('renders reference types with their location', () => {
        expect(typeString(stringType('memory'))).toBe('string memory');
        expect(typeIdentifier(stringType('memory'))).toBe('t_string_memory_ptr');
        expect(typeString(arrayOf(UINT256, 3n, 'storage', false))).toBe('uint256[3] storage ref');
        expect(typeIdentifier(arrayOf(UINT256, 3n, 'storage', false))).toBe('t_array$_t_uint256_$3_storage');
        expect(typeString(arrayOf(UINT256, null, 'calldata'), true)).toBe('uint256[]');
    });

    it('renders mappings', () => {
        const balances: MappingType = { category: 'mapping', key: ADDRESS, value: UINT256 };
        expect(typeString(balances)).toBe('mapping(address => uint256)');
        expect(typeIdentifier(balances)).toBe('t_mapping$_t_address_$_t_uint256_$');
    });
});

describe('elementaryType', () => {
    it('normalises aliases and rejects invalid widths', () => {
        expect(elementaryType('uint', null)).toEqual(UINT256);
        expect(elementaryType('int8', null)).toEqual(integer(true, 8));
        expect(elementaryType('address', 'payable')).toEqual(ADDRESS_PAYABLE);
        expect(elementaryType('int7', null)).toBeNull();
        expect(elementaryType('bytes33', null)).toBeNull();
    });
});

describe('conversions', () => {
    it('picks the smallest integer type for a constant', () => {
        expect(integerForRational(rational(255n))).toEqual(integer(false, 8));
        expect(integerForRational(rational(256n))).toEqual(integer(false, 16));
        expect(integerForRational(rational(-128n))).toEqual(integer(true, 8));
        expect(integerForRational(rational(1n, 2n))).toBeNull();
    });

    it('allows only widening implicit conversions', () => {
        expect(isImplicitlyConvertible(integer(false, 8), UINT256)).toBe(true);
        expect(isImplicitlyConvertible(UINT256, integer(false, 8))).toBe(false);
        expect(isImplicitlyConvertible(integer(true, 8), UINT256)).toBe(false);
        expect(isImplicitlyConvertible(ADDRESS_PAYABLE, ADDRESS)).toBe(true);
        expect(isImplicitlyConvertible(ADDRESS, ADDRESS_PAYABLE)).toBe(false);
        expect(isImplicitlyConvertible(rationalFromInteger(256n), integer(false, 8))).toBe(false);
    });

    it('allows explicit conversions between same-sized representations', () => {
        expect(isExplicitlyConvertible(integer(false, 160), ADDRESS)).toBe(true);
        expect(isExplicitlyConvertible(UINT256, ADDRESS)).toBe(false);
        expect(isExplicitlyConvertible(BOOL, UINT256)).toBe(false);
    });
});

describe('operators', () => {
    it('converts both operands to a common type', () => {
        expect(commonType(UINT256, rationalFromInteger(100n))).toEqual(UINT256);
        expect(commonType(rationalFromInteger(1n), integer(false, 8))).toEqual(integer(false, 8));
        expect(commonType(BOOL, UINT256)).toBeNull();
    });

    it('types binary operations', () => {
        expect(binaryOperatorResult('+', rationalFromInteger(2n), rationalFromInteger(3n))).toEqual(rationalFromInteger(5n));
        expect(binaryOperatorResult('>', UINT256, rationalFromInteger(100n))).toEqual(BOOL);
        expect(binaryOperatorResult('==', BOOL, BOOL)).toEqual(BOOL);
        expect(binaryOperatorResult('<', BOOL, BOOL)).toBeNull();
        expect(binaryOperatorResult('+', BOOL, BOOL)).toBeNull();
        expect(binaryOperatorResult('&&', BOOL, UINT256)).toBeNull();
        expect(binaryOperatorResult('<<', UINT256, integer(true, 8))).toBeNull();
    });

    it('types unary operations', () => {
        expect(unaryOperatorResult('!', BOOL)).toEqual(BOOL);
        expect(unaryOperatorResult('-', UINT256)).toBeNull();
        expect(unaryOperatorResult('-', integer(true, 64))).toEqual(integer(true, 64));
        expect(unaryOperatorResult('-', rationalFromInteger(5n))).toEqual(rationalFromInteger(-5n));
    });
});
