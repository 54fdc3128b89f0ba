import type { Decimal } from 'decimal.js';
import { formatMoney, formatQuantity } from '../decimal';
import { DEFAULT_QUANTITY_DECIMALS, type SaleEntry, type SalePlan } from './optimizer';

export interface ReportOptions {
    currency?: string;
    quantityDecimals?: number;
}

export interface SaleEntryJson {
    symbol: string;
    lotId: string;
    quantity: string;
    partial: boolean;
    price: string;
    gain: string;
    taxableGain: string;
    volume: string;
}

export interface SalePlanJson {
    target: string;
    tradeCount: number;
    totalGain: string;
    totalVolume: string;
    entries: SaleEntryJson[];
}

const rawGain = (entry: SaleEntry) => entry.quantity.times(entry.lot.rawGainPerUnit);

function formatEntry(entry: SaleEntry, currency: string, quantityDecimals: number): string {
    const { lot } = entry;
    const money = (value: Decimal) => `${formatMoney(value)} ${currency}`;
    const qty = formatQuantity(entry.quantity, quantityDecimals);
    const scope = entry.partial ? `partial of ${formatQuantity(lot.quantity, quantityDecimals)}` : 'whole';
    const taxable = lot.exemptionRate.isZero() ? '' : ` (taxable ${money(entry.gain)})`;
    return `  SELL ${qty} ${lot.symbol} (lot ${lot.id}, ${scope}) at ${money(lot.price)}: `
        + `gain ${money(rawGain(entry))}${taxable}, volume ${money(entry.volume)}`;
}

/**
 * Human readable sale plan: a summary line, then one line per trade.
 */
export function formatSalePlan(plan: SalePlan, options: ReportOptions = {}): string {
    const currency = options.currency ?? 'EUR';
    const quantityDecimals = options.quantityDecimals ?? DEFAULT_QUANTITY_DECIMALS;
    const target = `${formatMoney(plan.target)} ${currency}`;

    if (plan.tradeCount === 0) {
        return `Sale plan: no sales needed (target ${target})`;
    }

    const trades = plan.tradeCount === 1 ? '1 trade' : `${plan.tradeCount} trades`;
    const header = `Sale plan: ${trades}, volume ${formatMoney(plan.totalVolume)} ${currency}, `
        + `taxable gain ${formatMoney(plan.totalGain)} ${currency} (target ${target})`;
    return [header, ...plan.entries.map(e => formatEntry(e, currency, quantityDecimals))].join('\n');
}

export function salePlanToJson(plan: SalePlan): SalePlanJson {
    return {
        target: plan.target.toFixed(),
        tradeCount: plan.tradeCount,
        totalGain: plan.totalGain.toFixed(),
        totalVolume: plan.totalVolume.toFixed(),
        entries: plan.entries.map(e => ({
            symbol: e.lot.symbol,
            lotId: e.lot.id,
            quantity: e.quantity.toFixed(),
            partial: e.partial,
            price: e.lot.price.toFixed(),
            gain: rawGain(e).toFixed(),
            taxableGain: e.gain.toFixed(),
            volume: e.volume.toFixed(),
        })),
    };
}
