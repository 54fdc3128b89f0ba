import { toDecimal } from '../decimal';
import type { CandidateLot } from '../data/model';

// Candidate lot built from plain numbers; the symbol is the part of the id before '#'.
export const candidate = (
    id: string,
    quantity: number | string,
    unitCost: number | string,
    price: number | string,
    acquiredAt = '2020-01-01',
    exemptionRate = 0
): CandidateLot => {
    const rawGainPerUnit = toDecimal(price).minus(unitCost);
    const rate = toDecimal(exemptionRate);
    return {
        id,
        symbol: id.split('#')[0],
        quantity: toDecimal(quantity),
        unitCost: toDecimal(unitCost),
        acquiredAt: new Date(`${acquiredAt}T00:00:00`),
        price: toDecimal(price),
        exemptionRate: rate,
        rawGainPerUnit,
        gainPerUnit: rawGainPerUnit.times(toDecimal(1).minus(rate)),
    };
};

// Two lots: A gains 5 per unit (10 units), B gains 20 per unit (4 units)
export const twoLots = (): CandidateLot[] => [
    candidate('A#1', 10, 100, 105, '2020-01-01'),
    candidate('B#1', 4, 50, 70, '2020-02-01'),
];

// [quantity, unitCost, price] of a mixed set of gain and loss lots
export const MIXED_LOTS: [number, number, number][] = [
    [3, 10, 14],
    [5, 20, 22],
    [2, 7, 13],
    [4, 30, 27],
    [1, 50, 58],
    [6, 5, 6],
    [2, 40, 35],
];

export const mixedLots = (): CandidateLot[] =>
    MIXED_LOTS.map(([q, cost, price], i) => candidate(`L${i + 1}#1`, q, cost, price, `2020-01-0${i + 1}`));
