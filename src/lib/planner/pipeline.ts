import type { Decimal } from 'decimal.js';
import { annotateGains } from '../data/gains';
import { buildLots } from '../data/ledger';
import type { ExemptionRates, PriceTable, RawTradeRecord } from '../types';
import { optimizeSales, type OptimizationResult, type OptimizerOptions } from './optimizer';

export interface PlanSalesInput {
    records: readonly RawTradeRecord[];
    prices: PriceTable;
    exemptionRates?: ExemptionRates;
    target: Decimal.Value;
    options?: OptimizerOptions;
}

// Trade records -> open lots -> priced candidates -> optimal plan
export function planSales(input: PlanSalesInput): OptimizationResult {
    const lots = buildLots(input.records);
    const candidates = annotateGains(lots, input.prices, input.exemptionRates);
    return optimizeSales(candidates, input.target, input.options);
}
