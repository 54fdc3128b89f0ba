import { Decimal } from 'decimal.js';

// Every money and quantity value goes through this constructor.
// 40 significant digits keep quantity x price products exact.
export const Dec = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });

export const ZERO = new Dec(0);
export const ONE = new Dec(1);

export function toDecimal(value: Decimal.Value): Decimal {
    return new Dec(value);
}

/**
 * Parses a loosely typed value (number, numeric string or Decimal).
 * Returns null for anything that is not a finite number.
 */
export function parseDecimal(value: unknown): Decimal | null {
    if (Decimal.isDecimal(value)) {
        return value.isFinite() ? new Dec(value) : null;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value) ? new Dec(value) : null;
    }
    if (typeof value === 'string') {
        const trimmed = value.trim();
        if (trimmed === '') return null;
        try {
            const d = new Dec(trimmed);
            return d.isFinite() ? d : null;
        } catch {
            return null;
        }
    }
    return null;
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
    let total = ZERO;
    for (const v of values) total = total.plus(v);
    return total;
}

export function clampDecimal(value: Decimal, min: Decimal, max: Decimal): Decimal {
    if (value.lt(min)) return min;
    if (value.gt(max)) return max;
    return value;
}

export const minDecimal = (a: Decimal, b: Decimal): Decimal => (a.lte(b) ? a : b);
export const maxDecimal = (a: Decimal, b: Decimal): Decimal => (a.gte(b) ? a : b);

// Fixed notation without trailing zeros, e.g. 2.500000 -> "2.5".
export function formatQuantity(value: Decimal, decimals: number): string {
    return value.toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP).toFixed();
}

export function formatMoney(value: Decimal, decimals = 2): string {
    return value.toFixed(decimals, Decimal.ROUND_HALF_UP);
}
