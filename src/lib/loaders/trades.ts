import type { Decimal } from 'decimal.js';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { parseDecimal, ONE, ZERO } from '../decimal';
import { InvalidInputError } from '../errors';
import type { ExemptionRates, LedgerFile, RawTradeRecord } from '../types';
import { describeZodError, readJsonFile, readTextFile } from './files';

export interface TradeLedgerData {
    records: RawTradeRecord[];
    exemptionRates: ExemptionRates;
}

// Record fields stay loose here; buildLots reports bad records with their index.
const ledgerTradeSchema = z.object({
    side: z.unknown(),
    quantity: z.unknown(),
    unitPrice: z.unknown(),
    timestamp: z.unknown(),
});

const ledgerFileSchema = z.record(
    z.string(),
    z.object({
        exemptionRate: z.number().min(0).lt(1).optional(),
        trades: z.array(ledgerTradeSchema),
    })
);

// Exact shape of a ledger written by the statement importer
const strictLedgerFileSchema = z.record(
    z.string(),
    z.object({
        exemptionRate: z.number().min(0).lt(1).optional(),
        trades: z.array(z.object({
            side: z.enum(['buy', 'sell']),
            quantity: z.union([z.number(), z.string()]),
            unitPrice: z.union([z.number(), z.string()]),
            timestamp: z.string(),
        })),
    })
);

const csvRowSchema = z.object({
    symbol: z.string().optional(),
    side: z.string().optional(),
    quantity: z.string().optional(),
    unit_price: z.string().optional(),
    timestamp: z.string().optional(),
    exemption_rate: z.string().optional(),
});

/**
 * Ledger JSON: `{ "<symbol>": { "exemptionRate"?: number, "trades": [...] } }`
 * with trades `{ side, quantity, unitPrice, timestamp }`.
 */
export function parseTradeLedger(json: unknown, source = 'trade ledger'): TradeLedgerData {
    const result = ledgerFileSchema.safeParse(json);
    if (!result.success) throw new InvalidInputError(source, describeZodError(result.error));

    const records: RawTradeRecord[] = [];
    const exemptionRates = new Map<string, Decimal>();
    for (const [key, entry] of Object.entries(result.data)) {
        // Same symbol buildLots derives from the records
        const symbol = key.trim();
        if (entry.exemptionRate !== undefined) {
            exemptionRates.set(symbol, parseDecimal(entry.exemptionRate) ?? ZERO);
        }
        entry.trades.forEach(trade => records.push({
            symbol,
            side: trade.side,
            quantity: trade.quantity,
            unitPrice: trade.unitPrice,
            timestamp: trade.timestamp,
        }));
    }
    return { records, exemptionRates };
}

export function parseLedgerFile(json: unknown, source = 'trade ledger'): LedgerFile {
    const result = strictLedgerFileSchema.safeParse(json);
    if (!result.success) throw new InvalidInputError(source, describeZodError(result.error));
    return result.data;
}

/**
 * Trade CSV with the header `symbol,side,quantity,unit_price,timestamp`
 * and an optional `exemption_rate` column (first non-empty value per symbol wins).
 */
export function parseTradeCsv(text: string, source = 'trade CSV'): TradeLedgerData {
    let rows: unknown;
    try {
        rows = parse(text, { columns: true, skip_empty_lines: true, trim: true });
    } catch (e) {
        throw new InvalidInputError(source, e instanceof Error ? e.message : String(e));
    }

    const result = z.array(csvRowSchema).safeParse(rows);
    if (!result.success) throw new InvalidInputError(source, describeZodError(result.error));

    const exemptionRates = new Map<string, Decimal>();
    const records = result.data.map((row, index): RawTradeRecord => {
        if (row.symbol && row.exemption_rate && !exemptionRates.has(row.symbol)) {
            const rate = parseDecimal(row.exemption_rate);
            if (!rate || rate.lt(ZERO) || rate.gte(ONE)) {
                throw new InvalidInputError(source, `row ${index + 1}: exemption_rate must be in [0, 1)`);
            }
            exemptionRates.set(row.symbol, rate);
        }
        return {
            symbol: row.symbol,
            side: row.side,
            quantity: row.quantity,
            unitPrice: row.unit_price,
            timestamp: row.timestamp,
        };
    });
    return { records, exemptionRates };
}

export async function readTradeLedger(path: string): Promise<TradeLedgerData> {
    if (path.toLowerCase().endsWith('.csv')) {
        return parseTradeCsv(await readTextFile(path), path);
    }
    return parseTradeLedger(await readJsonFile(path), path);
}
