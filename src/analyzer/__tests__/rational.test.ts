import { describe, expect, it } from 'vitest';
import { foldBinary, foldUnary, parseNumberLiteral, rational, readableBigint } from '../rational';

describe('rational', () => {
    it('normalises sign and common factors', () => {
        expect(rational(6n, -4n)).toEqual({ num: -3n, den: 2n });
        expect(rational(0n, 7n)).toEqual({ num: 0n, den: 1n });
    });

    it('rejects a zero denominator', () => {
        expect(() => rational(1n, 0n)).toThrow(RangeError);
    });
});

describe('parseNumberLiteral', () => {
    it('reads decimal, scientific and hex literals', () => {
        expect(parseNumberLiteral('1_000', null)).toEqual({ num: 1000n, den: 1n });
        expect(parseNumberLiteral('2.5', null)).toEqual({ num: 5n, den: 2n });
        expect(parseNumberLiteral('1e3', null)).toEqual({ num: 1000n, den: 1n });
        expect(parseNumberLiteral('25e-1', null)).toEqual({ num: 5n, den: 2n });
        expect(parseNumberLiteral('0xff', null)).toEqual({ num: 255n, den: 1n });
    });

    it('applies subdenominations', () => {
        expect(parseNumberLiteral('1', 'ether')).toEqual({ num: 10n ** 18n, den: 1n });
        expect(parseNumberLiteral('2', 'minutes')).toEqual({ num: 120n, den: 1n });
    });

    it('refuses hex literals with a unit and unknown units', () => {
        expect(parseNumberLiteral('0x10', 'ether')).toBeNull();
        expect(parseNumberLiteral('1', 'fortnights')).toBeNull();
    });
});

describe('foldBinary', () => {
    it('folds exact arithmetic', () => {
        expect(foldBinary('+', rational(1n, 2n), rational(1n, 3n))).toEqual({ num: 5n, den: 6n });
        expect(foldBinary('/', rational(1n), rational(3n))).toEqual({ num: 1n, den: 3n });
        expect(foldBinary('%', rational(7n), rational(2n))).toEqual({ num: 1n, den: 1n });
        expect(foldBinary('**', rational(2n), rational(-1n))).toEqual({ num: 1n, den: 2n });
        expect(foldBinary('<<', rational(1n), rational(8n))).toEqual({ num: 256n, den: 1n });
    });

    it('returns null where the operation is undefined', () => {
        expect(foldBinary('/', rational(1n), rational(0n))).toBeNull();
        expect(foldBinary('%', rational(1n, 2n), rational(2n))).toBeNull();
        expect(foldBinary('&', rational(1n, 2n), rational(1n))).toBeNull();
        expect(foldBinary('**', rational(2n), rational(5000n))).toBeNull();
    });
});

describe('foldUnary', () => {
    it('negates and complements', () => {
        expect(foldUnary('-', rational(3n, 4n))).toEqual({ num: -3n, den: 4n });
        expect(foldUnary('~', rational(0n))).toEqual({ num: -1n, den: 1n });
        expect(foldUnary('~', rational(1n, 2n))).toBeNull();
    });
});

describe('readableBigint', () => {
    it('abbreviates long values', () => {
        expect(readableBigint(-42n)).toBe('-42');
        expect(readableBigint(10n ** 40n)).toBe('1000...(33 digits omitted)...0000');
    });
});
