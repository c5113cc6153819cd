/**
 * printf-style number formatting for output values.
 *
 * Supports %[flags][width][.precision]conversion with flags "-+ 0#" and
 * conversions f F e E g G d i, plus literal text and "%%". A number format
 * must contain exactly one conversion. Values are rounded from their exact
 * binary value with ties to even, as C's printf does.
 */

export type Conversion = 'f' | 'F' | 'e' | 'E' | 'g' | 'G' | 'd' | 'i';

export interface FormatSpec {
    leftAlign: boolean;
    plusSign: boolean;
    spaceSign: boolean;
    zeroPad: boolean;
    alternate: boolean;
    width: number | undefined;
    precision: number | undefined;
    conversion: Conversion;
}

type Token =
    | { kind: 'text'; text: string }
    | { kind: 'spec'; spec: FormatSpec };

const CONVERSIONS: readonly string[] = ['f', 'F', 'e', 'E', 'g', 'G', 'd', 'i'];

function isConversion(value: string): value is Conversion {
    return CONVERSIONS.includes(value);
}

const MAX_PRECISION = 100;

const SPEC_PATTERN = /%(%|([-+ 0#]*)(\d+)?(?:\.(\d*))?([fFeEgGdi]))/g;

function tokenize(format: string): Token[] {
    const tokens: Token[] = [];
    let last = 0;

    for (const match of format.matchAll(SPEC_PATTERN)) {
        const index = match.index ?? 0;
        if (index > last) {
            tokens.push({ kind: 'text', text: format.slice(last, index) });
        }
        last = index + match[0].length;

        if (match[1] === '%') {
            tokens.push({ kind: 'text', text: '%' });
            continue;
        }

        const precision = match[4] !== undefined ? Number(match[4] || '0') : undefined;
        if (precision !== undefined && precision > MAX_PRECISION) {
            throw new Error(`Precision ${precision} in format "${format}" exceeds ${MAX_PRECISION}`);
        }

        const flags = match[2] ?? '';
        const conversion = match[5];
        if (!isConversion(conversion)) {
            throw new Error(`Unsupported conversion in format "${format}"`);
        }
        tokens.push({
            kind: 'spec',
            spec: {
                leftAlign: flags.includes('-'),
                plusSign: flags.includes('+'),
                spaceSign: flags.includes(' '),
                zeroPad: flags.includes('0'),
                alternate: flags.includes('#'),
                width: match[3] !== undefined ? Number(match[3]) : undefined,
                precision,
                conversion,
            },
        });
    }

    if (last < format.length) {
        tokens.push({ kind: 'text', text: format.slice(last) });
    }

    // Any '%' left once the recognised directives are removed is unsupported
    if (format.replace(SPEC_PATTERN, '').includes('%')) {
        throw new Error(`Unsupported conversion in format "${format}"`);
    }
    return tokens;
}

// value = digits / 10^scale, exactly
interface ExactDecimal {
    digits: bigint;
    scale: number;
}

/**
 * Exact decimal expansion of a finite, non-negative double, read from its
 * IEEE 754 bits. Every double is a dyadic rational, so the expansion is finite.
 */
function exactDecimal(magnitude: number): ExactDecimal {
    const view = new DataView(new ArrayBuffer(8));
    view.setFloat64(0, magnitude);
    const bits = view.getBigUint64(0);
    const biasedExponent = Number((bits >> 52n) & 0x7ffn);
    let mantissa = bits & 0xfffffffffffffn;
    let exponent = -1074;
    if (biasedExponent !== 0) {
        mantissa |= 1n << 52n;
        exponent = biasedExponent - 1075;
    }
    if (exponent >= 0) {
        return { digits: mantissa << BigInt(exponent), scale: 0 };
    }
    // m / 2^k == m * 5^k / 10^k
    return { digits: mantissa * 5n ** BigInt(-exponent), scale: -exponent };
}

// Round to `scale` decimal places (negative = tens, hundreds, ...), ties to even
function roundToScale(value: ExactDecimal, scale: number): bigint {
    if (scale >= value.scale) {
        return value.digits * 10n ** BigInt(scale - value.scale);
    }
    const divisor = 10n ** BigInt(value.scale - scale);
    const quotient = value.digits / divisor;
    const twiceRemainder = (value.digits % divisor) * 2n;
    if (twiceRemainder > divisor || (twiceRemainder === divisor && quotient % 2n === 1n)) {
        return quotient + 1n;
    }
    return quotient;
}

function placePoint(digits: bigint, precision: number, alternate: boolean): string {
    const text = digits.toString().padStart(precision + 1, '0');
    const whole = text.slice(0, text.length - precision);
    if (precision === 0) return alternate ? `${whole}.` : whole;
    return `${whole}.${text.slice(text.length - precision)}`;
}

function fixed(magnitude: number, precision: number, alternate: boolean): string {
    return placePoint(roundToScale(exactDecimal(magnitude), precision), precision, alternate);
}

// precision + 1 significant digits and the decimal exponent of the first one
function scientificParts(magnitude: number, precision: number): { digits: bigint; exponent: number } {
    const value = exactDecimal(magnitude);
    if (value.digits === 0n) return { digits: 0n, exponent: 0 };

    let exponent = value.digits.toString().length - 1 - value.scale;
    let digits = roundToScale(value, precision - exponent);
    // 9.96 -> 10.0: one digit too many after rounding up
    if (digits.toString().length > precision + 1) {
        digits /= 10n;
        exponent += 1;
    }
    return { digits, exponent };
}

// C prints at least two exponent digits: 1.5e+01, not 1.5e+1
function exponential(magnitude: number, precision: number, alternate: boolean): string {
    const { digits, exponent } = scientificParts(magnitude, precision);
    const mantissa = placePoint(digits, precision, alternate);
    const sign = exponent < 0 ? '-' : '+';
    return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
}

function stripTrailingZeros(text: string): string {
    const [mantissa, exponent] = text.split('e');
    if (!mantissa.includes('.')) return text;
    const trimmed = mantissa.replace(/0+$/, '').replace(/\.$/, '');
    return exponent !== undefined ? `${trimmed}e${exponent}` : trimmed;
}

function general(magnitude: number, precision: number, alternate: boolean): string {
    const p = precision === 0 ? 1 : precision;
    const { exponent } = scientificParts(magnitude, p - 1);
    const text = p > exponent && exponent >= -4
        ? fixed(magnitude, p - 1 - exponent, alternate)
        : exponential(magnitude, p - 1, alternate);
    return alternate ? text : stripTrailingZeros(text);
}

function formatMagnitude(magnitude: number, spec: FormatSpec): string {
    if (Number.isNaN(magnitude)) return 'nan';
    if (!Number.isFinite(magnitude)) return 'inf';

    switch (spec.conversion) {
        case 'f':
        case 'F':
            return fixed(magnitude, spec.precision ?? 6, spec.alternate);
        case 'e':
        case 'E':
            return exponential(magnitude, spec.precision ?? 6, spec.alternate);
        case 'g':
        case 'G':
            return general(magnitude, spec.precision ?? 6, spec.alternate);
        case 'd':
        case 'i': {
            const digits = BigInt(Math.trunc(magnitude)).toString();
            return spec.precision !== undefined ? digits.padStart(spec.precision, '0') : digits;
        }
    }
}

function applySpec(value: number, spec: FormatSpec): string {
    const negative = value < 0 || Object.is(value, -0);
    let body = formatMagnitude(Math.abs(value), spec);
    if (spec.conversion === 'F' || spec.conversion === 'E' || spec.conversion === 'G') {
        body = body.toUpperCase();
    }

    let sign = '';
    if (negative && !Number.isNaN(value)) sign = '-';
    else if (spec.plusSign) sign = '+';
    else if (spec.spaceSign) sign = ' ';

    const width = spec.width ?? 0;
    const length = sign.length + body.length;
    if (length >= width) return sign + body;

    const padding = width - length;
    if (spec.leftAlign) return sign + body + ' '.repeat(padding);
    if (spec.zeroPad && Number.isFinite(value)) return sign + '0'.repeat(padding) + body;
    return ' '.repeat(padding) + sign + body;
}

/**
 * Compile a format with exactly one numeric conversion into a formatter.
 */
export function compileNumberFormat(format: string): (value: number) => string {
    const tokens = tokenize(format);
    const specCount = tokens.filter(t => t.kind === 'spec').length;
    if (specCount !== 1) {
        throw new Error(`Format "${format}" must contain exactly one numeric conversion, found ${specCount}`);
    }

    return (value: number): string =>
        tokens.map(t => (t.kind === 'text' ? t.text : applySpec(value, t.spec))).join('');
}
