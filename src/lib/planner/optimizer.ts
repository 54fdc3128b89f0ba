import { Decimal } from 'decimal.js';
import type { CandidateLot } from '../data/model';
import { NoFeasiblePlanError, SearchBudgetExceededError } from '../errors';
import { clampDecimal, maxDecimal, minDecimal, sumDecimals, toDecimal, ZERO } from '../decimal';

// --- Types ---

// 'cost': sold quantity x unit cost basis. 'proceeds': sold quantity x current price.
export type VolumeMeasure = 'cost' | 'proceeds';

export interface OptimizerOptions {
    tolerance?: Decimal.Value; // allowed |achieved - target|
    allowPartial?: boolean; // false: whole lots only
    maxTrades?: number;
    maxNodes?: number; // search budget
    quantityDecimals?: number; // resolution of a partial sale
    volumeMeasure?: VolumeMeasure;
}

export const DEFAULT_MAX_NODES = 2_000_000;
export const DEFAULT_QUANTITY_DECIMALS = 6;

export interface SaleEntry {
    lot: CandidateLot;
    quantity: Decimal;
    gain: Decimal;
    volume: Decimal;
    partial: boolean;
}

export interface SalePlan {
    target: Decimal;
    entries: SaleEntry[]; // in candidate input order
    tradeCount: number;
    totalGain: Decimal;
    totalVolume: Decimal;
}

export interface SearchStats {
    nodesVisited: number;
    exhaustive: boolean;
}

export interface OptimizationResult {
    plan: SalePlan;
    stats: SearchStats;
    warning?: SearchBudgetExceededError; // set when the budget ran out after a plan was found
}

interface SearchSettings {
    tolerance: Decimal;
    allowPartial: boolean;
    maxTrades: number;
    maxNodes: number;
    quantityDecimals: number;
    volumeMeasure: VolumeMeasure;
}

interface OrderedLot {
    lot: CandidateLot;
    position: number; // index in the caller's candidate list
    gain: Decimal; // whole-lot gain
    unitVolume: Decimal;
    volume: Decimal; // whole-lot volume
}

// --- Helpers ---

const compareIds = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Deterministic search order: biggest whole-lot impact first, so that targets
 * are reached with few lots early and the trade-count bound tightens fast.
 */
function orderCandidates(candidates: readonly CandidateLot[], volumeMeasure: VolumeMeasure): OrderedLot[] {
    return candidates
        .map((lot, position) => {
            const unitVolume = volumeMeasure === 'cost' ? lot.unitCost : lot.price;
            return {
                lot,
                position,
                gain: lot.quantity.times(lot.gainPerUnit),
                unitVolume,
                volume: lot.quantity.times(unitVolume),
            };
        })
        .filter(o => !o.lot.gainPerUnit.isZero() && o.lot.quantity.gt(ZERO))
        .sort((a, b) =>
            b.gain.abs().cmp(a.gain.abs())
            || b.lot.gainPerUnit.abs().cmp(a.lot.gainPerUnit.abs())
            || a.lot.acquiredAt.getTime() - b.lot.acquiredAt.getTime()
            || compareIds(a.lot.id, b.lot.id)
            || a.position - b.position
        );
}

/**
 * Smallest quantity of a lot (on the 10^-decimals grid) whose gain brings the
 * remaining `needed` gain within `tolerance`. When the tolerance band holds no
 * grid point, the nearest grid point to the exact quantity is used.
 * Returns null when no quantity in (0, available] works, or when the band
 * already contains 0 (the other lots reach the target without this one).
 */
export function solvePartialQuantity(
    needed: Decimal,
    tolerance: Decimal,
    gainPerUnit: Decimal,
    available: Decimal,
    decimals: number
): Decimal | null {
    if (gainPerUnit.isZero()) return null;

    const a = needed.minus(tolerance).div(gainPerUnit);
    const b = needed.plus(tolerance).div(gainPerUnit);
    const lowQty = minDecimal(a, b);
    const highQty = maxDecimal(a, b);
    if (lowQty.lte(ZERO)) return null;

    let qty = lowQty.toDecimalPlaces(decimals, Decimal.ROUND_UP);
    if (qty.gt(highQty)) {
        qty = needed.div(gainPerUnit).toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP);
    }
    if (qty.lte(ZERO) || qty.gt(available)) return null;
    return qty;
}

// --- Search ---

/**
 * Depth-first branch and bound over the ordered lots. For every lot the
 * branches are: sell it whole, sell part of it (at most one partial lot per
 * plan), leave it. Plans compare by trade count, then volume; a tie keeps the
 * plan found first.
 */
class SaleSearch {
    private readonly lots: OrderedLot[];
    private readonly suffixMin: Decimal[]; // most negative gain lots [i..] can add
    private readonly suffixMax: Decimal[]; // most positive gain lots [i..] can add

    // Current selection
    private readonly whole: number[] = [];
    private partial: number | null = null;
    private wholeGain: Decimal = ZERO;
    private wholeVolume: Decimal = ZERO;

    best: SalePlan | null = null;
    closestGain: Decimal = ZERO;
    nodesVisited = 0;
    aborted = false;

    constructor(
        candidates: readonly CandidateLot[],
        private readonly target: Decimal,
        private readonly settings: SearchSettings
    ) {
        this.lots = orderCandidates(candidates, settings.volumeMeasure);

        const n = this.lots.length;
        this.suffixMin = new Array<Decimal>(n + 1).fill(ZERO);
        this.suffixMax = new Array<Decimal>(n + 1).fill(ZERO);
        for (let i = n - 1; i >= 0; i--) {
            const gain = this.lots[i].gain;
            this.suffixMin[i] = this.suffixMin[i + 1].plus(minDecimal(gain, ZERO));
            this.suffixMax[i] = this.suffixMax[i + 1].plus(maxDecimal(gain, ZERO));
        }
    }

    run(): void {
        // The empty selection covers |target| <= tolerance
        if (!this.evaluate()) this.explore(0);
    }

    private get tradeCount(): number {
        return this.whole.length + (this.partial === null ? 0 : 1);
    }

    private explore(index: number): void {
        if (this.aborted || index >= this.lots.length) return;
        if (!this.canAddTrade() || !this.withinReach(index)) return;

        this.nodesVisited++;
        if (this.nodesVisited > this.settings.maxNodes) {
            this.aborted = true;
            return;
        }

        const o = this.lots[index];

        // 1. Sell the whole lot
        this.whole.push(index);
        this.wholeGain = this.wholeGain.plus(o.gain);
        this.wholeVolume = this.wholeVolume.plus(o.volume);
        if (!this.evaluate()) this.explore(index + 1);
        this.whole.pop();
        this.wholeGain = this.wholeGain.minus(o.gain);
        this.wholeVolume = this.wholeVolume.minus(o.volume);

        // 2. Sell part of it
        if (!this.aborted && this.settings.allowPartial && this.partial === null) {
            this.partial = index;
            if (!this.evaluate()) this.explore(index + 1);
            this.partial = null;
        }

        // 3. Leave it
        this.explore(index + 1);
    }

    private canAddTrade(): boolean {
        const next = this.tradeCount + 1;
        if (next > this.settings.maxTrades) return false;
        if (!this.best || next < this.best.tradeCount) return true;
        // Volume only grows from here
        return next === this.best.tradeCount && this.wholeVolume.lt(this.best.totalVolume);
    }

    private withinReach(index: number): boolean {
        let low = this.wholeGain.plus(this.suffixMin[index]);
        let high = this.wholeGain.plus(this.suffixMax[index]);
        if (this.partial !== null) {
            const gain = this.lots[this.partial].gain;
            low = low.plus(minDecimal(gain, ZERO));
            high = high.plus(maxDecimal(gain, ZERO));
        }

        const { tolerance } = this.settings;
        if (this.target.plus(tolerance).lt(low)) {
            this.noteClosest(low.minus(this.suffixMin[index]).plus(this.cappedSuffix(index, false)));
            return false;
        }
        if (this.target.minus(tolerance).gt(high)) {
            this.noteClosest(high.minus(this.suffixMax[index]).plus(this.cappedSuffix(index, true)));
            return false;
        }
        return true;
    }

    // Largest gain (or loss) lots [index..] can add within the remaining trade slots
    private cappedSuffix(index: number, positive: boolean): Decimal {
        const gains = this.lots.slice(index)
            .map(o => o.gain)
            .filter(g => (positive ? g.gt(ZERO) : g.lt(ZERO)));
        const slots = Math.max(this.settings.maxTrades - this.tradeCount, 0);
        if (gains.length <= slots) return positive ? this.suffixMax[index] : this.suffixMin[index];
        return sumDecimals(gains.sort((a, b) => b.abs().cmp(a.abs())).slice(0, slots));
    }

    // True when the current selection reaches the target; it is then recorded
    // if it beats the best plan so far.
    private evaluate(): boolean {
        const { tolerance, quantityDecimals } = this.settings;

        if (this.partial === null) {
            this.noteClosest(this.wholeGain);
            if (this.wholeGain.minus(this.target).abs().gt(tolerance)) return false;
            this.consider(this.buildPlan(null));
            return true;
        }

        const o = this.lots[this.partial];
        const needed = this.target.minus(this.wholeGain);
        const qty = solvePartialQuantity(needed, tolerance, o.lot.gainPerUnit, o.lot.quantity, quantityDecimals);
        if (qty === null) {
            const reachable = clampDecimal(needed, minDecimal(o.gain, ZERO), maxDecimal(o.gain, ZERO));
            this.noteClosest(this.wholeGain.plus(reachable));
            return false;
        }
        this.consider(this.buildPlan(qty));
        return true;
    }

    private consider(plan: SalePlan): void {
        const best = this.best;
        if (
            !best
            || plan.tradeCount < best.tradeCount
            || (plan.tradeCount === best.tradeCount && plan.totalVolume.lt(best.totalVolume))
        ) {
            this.best = plan;
        }
    }

    private noteClosest(gain: Decimal): void {
        if (gain.minus(this.target).abs().lt(this.closestGain.minus(this.target).abs())) {
            this.closestGain = gain;
        }
    }

    private buildPlan(partialQty: Decimal | null): SalePlan {
        const picked: { position: number; entry: SaleEntry }[] = this.whole.map(i => {
            const o = this.lots[i];
            return {
                position: o.position,
                entry: { lot: o.lot, quantity: o.lot.quantity, gain: o.gain, volume: o.volume, partial: false },
            };
        });

        if (this.partial !== null && partialQty !== null) {
            const o = this.lots[this.partial];
            picked.push({
                position: o.position,
                entry: {
                    lot: o.lot,
                    quantity: partialQty,
                    gain: partialQty.times(o.lot.gainPerUnit),
                    volume: partialQty.times(o.unitVolume),
                    partial: partialQty.lt(o.lot.quantity),
                },
            });
        }

        const entries = picked.sort((a, b) => a.position - b.position).map(p => p.entry);
        return {
            target: this.target,
            entries,
            tradeCount: entries.length,
            totalGain: sumDecimals(entries.map(e => e.gain)),
            totalVolume: sumDecimals(entries.map(e => e.volume)),
        };
    }
}

/**
 * Finds the sale plan that realizes `target` (within the tolerance) with the
 * fewest trades, then the lowest volume.
 *
 * @throws NoFeasiblePlanError when no selection reaches the target
 * @throws SearchBudgetExceededError when the budget runs out before any plan is found
 */
export function optimizeSales(
    candidates: readonly CandidateLot[],
    target: Decimal.Value,
    options: OptimizerOptions = {}
): OptimizationResult {
    const settings: SearchSettings = {
        tolerance: toDecimal(options.tolerance ?? 0),
        allowPartial: options.allowPartial ?? true,
        maxTrades: options.maxTrades ?? Number.POSITIVE_INFINITY,
        maxNodes: options.maxNodes ?? DEFAULT_MAX_NODES,
        quantityDecimals: options.quantityDecimals ?? DEFAULT_QUANTITY_DECIMALS,
        volumeMeasure: options.volumeMeasure ?? 'cost',
    };
    if (settings.tolerance.lt(ZERO)) {
        throw new RangeError(`Tolerance must not be negative, got ${settings.tolerance.toFixed()}`);
    }

    const targetValue = toDecimal(target);
    const search = new SaleSearch(candidates, targetValue, settings);
    search.run();

    const stats: SearchStats = { nodesVisited: search.nodesVisited, exhaustive: !search.aborted };
    if (search.aborted) {
        const warning = new SearchBudgetExceededError(search.nodesVisited, search.best);
        if (!search.best) throw warning;
        return { plan: search.best, stats, warning };
    }
    if (!search.best) throw new NoFeasiblePlanError(targetValue, search.closestGain);
    return { plan: search.best, stats };
}
