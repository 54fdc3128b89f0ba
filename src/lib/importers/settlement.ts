import { compareAsc, format, isValid, parse, parseISO } from 'date-fns';
import { InvalidInputError } from '../errors';
import type { LedgerFile, LedgerTrade, TradeSide } from '../types';

/**
 * Parsing of bank settlement statements ("Wertpapierabrechnung", DKB layout),
 * given as the plain text extracted from the statement PDF.
 */

export interface Settlement {
    symbol: string; // WKN
    side: TradeSide;
    quantity: string;
    unitPrice: string;
    timestamp: string; // local time, yyyy-MM-ddTHH:mm:ss
    exemptionRate: number;
}

export interface MergeResult {
    ledger: LedgerFile;
    added: Settlement[];
    skipped: Settlement[]; // same symbol and timestamp already in the ledger
}

const DATE_TIME_PATTERN = /Schlusstag\/-Zeit\s+(\d{2}\.\d{2}\.\d{4}\s+\d{2}:\d{2}:\d{2})/;
const DATE_PATTERN = /Schlusstag\s+(\d{2}\.\d{2}\.\d{4})/;
const WKN_PATTERN = /\((\w{6})\)/;
const PIECES_PATTERN = /Stück\s+(\d[\d.]*(?:,\d+)?)/;
const PRICE_PATTERN = /Ausführungskurs\s+(\d[\d.]*(?:,\d+)?)\s+EUR/;

// Equity funds: 30% of the gain is tax-exempt
const ETF_EXEMPTION_RATE = 0.3;

// German number format: "1.234,5" -> "1234.5"
export function parseGermanNumber(value: string): string {
    return value.replace(/\./g, '').replace(',', '.');
}

export function detectSettlementSide(fileName: string): TradeSide | null {
    if (!fileName.includes('Wertpapierabrechnung')) return null;
    if (fileName.startsWith('Kauf_')) return 'buy';
    if (fileName.startsWith('Verkauf_')) return 'sell';
    return null;
}

function parseTimestamp(text: string, source: string): string {
    const dateTime = DATE_TIME_PATTERN.exec(text);
    // Without a time the trade counts as done at the end of the day
    const raw = dateTime
        ? dateTime[1].replace(/\s+/g, ' ')
        : `${DATE_PATTERN.exec(text)?.[1] ?? ''} 23:59:59`;
    const parsed = parse(raw, 'dd.MM.yyyy HH:mm:ss', new Date(0));
    if (!isValid(parsed)) throw new InvalidInputError(source, 'no trade date (Schlusstag) found');
    return format(parsed, "yyyy-MM-dd'T'HH:mm:ss");
}

function requireMatch(pattern: RegExp, text: string, source: string, what: string): string {
    const match = pattern.exec(text);
    if (!match) throw new InvalidInputError(source, `no ${what} found`);
    return match[1];
}

export function parseSettlementText(text: string, side: TradeSide, source = 'settlement'): Settlement {
    return {
        symbol: requireMatch(WKN_PATTERN, text, source, 'WKN'),
        side,
        quantity: parseGermanNumber(requireMatch(PIECES_PATTERN, text, source, 'quantity (Stück)')),
        unitPrice: parseGermanNumber(requireMatch(PRICE_PATTERN, text, source, 'price (Ausführungskurs)')),
        timestamp: parseTimestamp(text, source),
        exemptionRate: text.includes('ETF') ? ETF_EXEMPTION_RATE : 0,
    };
}

const byTimestamp = (a: LedgerTrade, b: LedgerTrade) => compareAsc(parseISO(a.timestamp), parseISO(b.timestamp));

/**
 * Adds settlements to a ledger. A trade whose symbol and timestamp are already
 * present is skipped. Symbols come out sorted, trades in chronological order.
 */
export function mergeSettlements(ledger: LedgerFile, settlements: readonly Settlement[]): MergeResult {
    const merged = new Map(Object.entries(ledger).map(([symbol, entry]) => [
        symbol,
        { ...entry, trades: [...entry.trades] },
    ]));
    const added: Settlement[] = [];
    const skipped: Settlement[] = [];

    for (const s of settlements) {
        let entry = merged.get(s.symbol);
        if (!entry) {
            entry = { exemptionRate: s.exemptionRate, trades: [] };
            merged.set(s.symbol, entry);
        }
        if (entry.trades.some(t => t.timestamp === s.timestamp)) {
            skipped.push(s);
            continue;
        }
        entry.trades.push({
            side: s.side,
            quantity: Number(s.quantity),
            unitPrice: Number(s.unitPrice),
            timestamp: s.timestamp,
        });
        added.push(s);
    }

    const sorted: LedgerFile = {};
    [...merged.keys()].sort().forEach(symbol => {
        const entry = merged.get(symbol);
        if (entry) sorted[symbol] = { ...entry, trades: [...entry.trades].sort(byTimestamp) };
    });
    return { ledger: sorted, added, skipped };
}
