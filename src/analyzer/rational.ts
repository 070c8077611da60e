/**
 * Exact rational arithmetic for compile-time constant expressions.
 * Values are kept normalised: the denominator is positive and coprime to
 * the numerator.
 */
export interface Rational {
    readonly num: bigint;
    readonly den: bigint;
}

const MAX_BITS = 4096n;

const SUBDENOMINATIONS: Record<string, bigint> = {
    wei: 1n,
    gwei: 10n ** 9n,
    ether: 10n ** 18n,
    seconds: 1n,
    minutes: 60n,
    hours: 3600n,
    days: 86400n,
    weeks: 604800n
};

export function rational(num: bigint, den: bigint = 1n): Rational {
    if (den === 0n) {
        throw new RangeError('Division by zero in constant');
    }
    if (den < 0n) {
        num = -num;
        den = -den;
    }
    const divisor = gcd(abs(num), den);
    return { num: num / divisor, den: den / divisor };
}

export function isInteger(value: Rational): boolean {
    return value.den === 1n;
}

export function abs(value: bigint): bigint {
    return value < 0n ? -value : value;
}

function gcd(a: bigint, b: bigint): bigint {
    while (b !== 0n) {
        [a, b] = [b, a % b];
    }
    return a === 0n ? 1n : a;
}

export function bitLength(value: bigint): number {
    let bits = 0;
    let rest = abs(value);
    while (rest > 0n) {
        rest >>= 1n;
        bits++;
    }
    return bits;
}

/**
 * Parse the text of a number literal, applying an optional
 * subdenomination. Returns null for malformed literals.
 */
export function parseNumberLiteral(text: string, subdenomination: string | null): Rational | null {
    const cleaned = text.replace(/_/g, '');
    let value: Rational;
    if (/^0x[0-9a-fA-F]+$/.test(cleaned)) {
        if (subdenomination !== null) {
            return null;
        }
        value = rational(BigInt(cleaned));
    } else {
        const match = /^(\d*)(?:\.(\d*))?(?:[eE](-?\d+))?$/.exec(cleaned);
        if (!match || (match[1] === '' && (match[2] ?? '') === '')) {
            return null;
        }
        const whole = match[1] === '' ? '0' : match[1];
        const fraction = match[2] ?? '';
        const exponent = match[3] === undefined ? 0 : Number(match[3]);
        if (Math.abs(exponent) > Number(MAX_BITS)) {
            return null;
        }
        let num = BigInt(whole + fraction);
        let den = 10n ** BigInt(fraction.length);
        if (exponent >= 0) {
            num *= 10n ** BigInt(exponent);
        } else {
            den *= 10n ** BigInt(-exponent);
        }
        value = rational(num, den);
    }
    if (subdenomination !== null) {
        const factor = SUBDENOMINATIONS[subdenomination];
        if (factor === undefined) {
            return null;
        }
        value = rational(value.num * factor, value.den);
    }
    return value;
}

function tooLarge(value: Rational): boolean {
    return BigInt(bitLength(value.num)) > MAX_BITS || BigInt(bitLength(value.den)) > MAX_BITS;
}

/**
 * Fold a binary operator over two constants. Returns null when the
 * operation is undefined for the operands or the result grows unbounded.
 */
export function foldBinary(operator: string, left: Rational, right: Rational): Rational | null {
    let result: Rational;
    switch (operator) {
        case '+':
            result = rational(left.num * right.den + right.num * left.den, left.den * right.den);
            break;
        case '-':
            result = rational(left.num * right.den - right.num * left.den, left.den * right.den);
            break;
        case '*':
            result = rational(left.num * right.num, left.den * right.den);
            break;
        case '/':
            if (right.num === 0n) {
                return null;
            }
            result = rational(left.num * right.den, left.den * right.num);
            break;
        case '%':
            if (right.num === 0n || !isInteger(left) || !isInteger(right)) {
                return null;
            }
            result = rational(left.num % right.num);
            break;
        case '**': {
            if (!isInteger(right)) {
                return null;
            }
            const exponent = abs(right.num);
            if (exponent > MAX_BITS && abs(left.num) !== 1n && left.num !== 0n) {
                return null;
            }
            if (BigInt(bitLength(left.num)) * exponent > MAX_BITS) {
                return null;
            }
            const num = left.num ** exponent;
            const den = left.den ** exponent;
            if (right.num < 0n) {
                if (num === 0n) {
                    return null;
                }
                result = rational(den, num);
            } else {
                result = rational(num, den);
            }
            break;
        }
        case '<<':
            if (!isInteger(left) || !isInteger(right) || right.num < 0n || right.num > MAX_BITS) {
                return null;
            }
            result = rational(left.num << right.num);
            break;
        case '>>':
            if (!isInteger(left) || !isInteger(right) || right.num < 0n) {
                return null;
            }
            result = rational(right.num > MAX_BITS ? (left.num < 0n ? -1n : 0n) : left.num >> right.num);
            break;
        case '&':
        case '|':
        case '^':
            if (!isInteger(left) || !isInteger(right)) {
                return null;
            }
            result = rational(
                operator === '&' ? left.num & right.num : operator === '|' ? left.num | right.num : left.num ^ right.num
            );
            break;
        default:
            return null;
    }
    return tooLarge(result) ? null : result;
}

export function foldUnary(operator: string, value: Rational): Rational | null {
    switch (operator) {
        case '-':
            return rational(-value.num, value.den);
        case '~':
            return isInteger(value) ? rational(~value.num) : null;
        default:
            return null;
    }
}

export function compare(left: Rational, right: Rational): number {
    const difference = left.num * right.den - right.num * left.den;
    return difference < 0n ? -1 : difference > 0n ? 1 : 0;
}

/**
 * Decimal rendering used in type strings; long values keep their first
 * and last four digits.
 */
export function readableBigint(value: bigint): string {
    const digits = abs(value).toString();
    const sign = value < 0n ? '-' : '';
    if (digits.length > 32) {
        const omitted = digits.length - 8;
        return `${sign}${digits.slice(0, 4)}...(${omitted} digits omitted)...${digits.slice(-4)}`;
    }
    return sign + digits;
}
