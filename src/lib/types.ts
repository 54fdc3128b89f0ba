import type { Decimal } from 'decimal.js';

export type TradeSide = 'buy' | 'sell';

export interface TradeRecord {
    symbol: string;
    side: TradeSide;
    quantity: Decimal.Value;
    unitPrice: Decimal.Value;
    timestamp: string | Date; // ISO-8601 when a string
}

// A record as it arrives from a loader. buildLots validates it.
export type RawTradeRecord = Partial<Record<keyof TradeRecord, unknown>>;

// Current price per symbol, one snapshot per run
export type PriceTable = ReadonlyMap<string, Decimal>;

// Fraction of the gain that is tax-exempt, per symbol (0 <= rate < 1)
export type ExemptionRates = ReadonlyMap<string, Decimal>;

// --- Ledger file (JSON) ---

export interface LedgerTrade {
    side: TradeSide;
    quantity: number | string;
    unitPrice: number | string;
    timestamp: string;
}

export interface LedgerSymbol {
    exemptionRate?: number;
    trades: LedgerTrade[];
}

export type LedgerFile = Record<string, LedgerSymbol>;
