import { MissingPriceError } from '../errors';
import { ONE, ZERO } from '../decimal';
import type { ExemptionRates, PriceTable } from '../types';
import { gainPerUnit, type CandidateLot, type Lot } from './model';

const NO_EXEMPTIONS: ExemptionRates = new Map();

/**
 * Prices every lot and attaches its signed taxable gain per unit.
 * The taxable gain is the raw gain reduced by the symbol's exemption rate.
 */
export function annotateGains(
    lots: readonly Lot[],
    prices: PriceTable,
    exemptionRates: ExemptionRates = NO_EXEMPTIONS
): CandidateLot[] {
    return lots
        .filter(lot => lot.quantity.gt(ZERO))
        .map(lot => {
            const price = prices.get(lot.symbol);
            if (!price) throw new MissingPriceError(lot.symbol);

            const exemptionRate = exemptionRates.get(lot.symbol) ?? ZERO;
            const rawGainPerUnit = gainPerUnit(lot, price);
            return {
                ...lot,
                price,
                exemptionRate,
                rawGainPerUnit,
                gainPerUnit: rawGainPerUnit.times(ONE.minus(exemptionRate)),
            };
        });
}
