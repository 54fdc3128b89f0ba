import type { Decimal } from 'decimal.js';
import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { MalformedRecordError } from '../errors';
import { parseDecimal, sumDecimals, ZERO } from '../decimal';
import type { RawTradeRecord, TradeSide } from '../types';
import type { Lot } from './model';

interface ParsedTrade {
    index: number; // position in the caller's record list
    symbol: string;
    side: TradeSide;
    quantity: Decimal;
    unitPrice: Decimal;
    timestamp: Date;
}

const decimalField = (check: (d: Decimal) => boolean, message: string) =>
    z.unknown().transform((value, ctx) => {
        const d = parseDecimal(value);
        if (d === null) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is missing or not a number' });
            return z.NEVER;
        }
        if (!check(d)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message });
            return z.NEVER;
        }
        return d;
    });

const timestampField = z.unknown().transform((value, ctx) => {
    const date = value instanceof Date ? value : typeof value === 'string' ? parseISO(value.trim()) : null;
    if (!date || !isValid(date)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is missing or not an ISO-8601 date' });
        return z.NEVER;
    }
    return date;
});

const tradeRecordSchema = z.object({
    symbol: z.string({ required_error: 'is missing' }).trim().min(1, 'is empty'),
    side: z.enum(['buy', 'sell'], { errorMap: () => ({ message: "must be 'buy' or 'sell'" }) }),
    quantity: decimalField(d => d.gt(ZERO), 'must be positive'),
    unitPrice: decimalField(d => d.gte(ZERO), 'must not be negative'),
    timestamp: timestampField,
});

function parseRecord(raw: RawTradeRecord, index: number): ParsedTrade {
    const result = tradeRecordSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue.path.join('.');
        throw new MalformedRecordError(index, field ? `${field} ${issue.message}` : issue.message);
    }
    return { index, ...result.data };
}

/**
 * Consumes `sell.quantity` from the open lots, oldest first.
 * The first lot that is not fully consumed is split.
 */
function consumeFifo(open: Lot[], sell: ParsedTrade): Lot[] {
    const openQty = sumDecimals(open.map(l => l.quantity));
    if (sell.quantity.gt(openQty)) {
        throw new MalformedRecordError(
            sell.index,
            `sell of ${sell.quantity.toFixed()} ${sell.symbol} exceeds the open quantity of ${openQty.toFixed()}`
        );
    }

    const remaining: Lot[] = [];
    let toSell = sell.quantity;
    for (const lot of open) {
        if (toSell.isZero()) {
            remaining.push(lot);
        } else if (lot.quantity.lte(toSell)) {
            toSell = toSell.minus(lot.quantity);
        } else {
            remaining.push({ ...lot, quantity: lot.quantity.minus(toSell) });
            toSell = ZERO;
        }
    }
    return remaining;
}

/**
 * Replays buy/sell records into the lots that are still open.
 * Symbols keep their first-appearance order; lots are in acquisition order.
 */
export function buildLots(records: readonly RawTradeRecord[]): Lot[] {
    const bySymbol = new Map<string, ParsedTrade[]>();
    records.forEach((raw, index) => {
        const trade = parseRecord(raw, index);
        const trades = bySymbol.get(trade.symbol);
        if (trades) {
            trades.push(trade);
        } else {
            bySymbol.set(trade.symbol, [trade]);
        }
    });

    const lots: Lot[] = [];
    bySymbol.forEach((trades, symbol) => {
        // Array.prototype.sort is stable: same-timestamp trades keep record order
        const chronological = [...trades].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
        let open: Lot[] = [];
        let buys = 0;
        for (const trade of chronological) {
            if (trade.side === 'buy') {
                buys++;
                open.push({
                    id: `${symbol}#${buys}`,
                    symbol,
                    quantity: trade.quantity,
                    unitCost: trade.unitPrice,
                    acquiredAt: trade.timestamp,
                });
            } else {
                open = consumeFifo(open, trade);
            }
        }
        lots.push(...open);
    });
    return lots;
}
