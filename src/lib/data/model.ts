import type { Decimal } from 'decimal.js';
import { ZERO } from '../decimal';

// --- Types ---

// Single Lot Structure: one acquisition that is still (partly) open
export interface Lot {
    id: string; // `${symbol}#${n}`, n = ordinal of the buy for that symbol
    symbol: string;
    quantity: Decimal; // open quantity, always > 0
    unitCost: Decimal; // cost basis per unit
    acquiredAt: Date;
}

// A lot ready for the optimizer: priced and with its taxable gain attached
export interface CandidateLot extends Lot {
    price: Decimal;
    exemptionRate: Decimal;
    rawGainPerUnit: Decimal; // price - unitCost
    gainPerUnit: Decimal; // taxable part of rawGainPerUnit; negative for a loss
}

// --- Helpers ---

export function gainPerUnit(lot: Lot, price: Decimal): Decimal {
    return price.minus(lot.unitCost);
}

export function totalGain(lot: Lot, price: Decimal, qtySold: Decimal): Decimal {
    if (qtySold.lt(ZERO) || qtySold.gt(lot.quantity)) {
        throw new Error(`Cannot sell ${qtySold.toFixed()} of lot ${lot.id} holding ${lot.quantity.toFixed()}`);
    }
    return qtySold.times(gainPerUnit(lot, price));
}
