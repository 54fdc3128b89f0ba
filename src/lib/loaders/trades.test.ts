import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { buildLots } from '../data/ledger';
import { InvalidInputError } from '../errors';
import { parseLedgerFile, parseTradeCsv, parseTradeLedger, readTradeLedger } from './trades';

describe('parseTradeLedger', () => {
    it('flattens the ledger into records and exemption rates', () => {
        const { records, exemptionRates } = parseTradeLedger({
            A0RPWH: {
                exemptionRate: 0.3,
                trades: [{ side: 'buy', quantity: 2, unitPrice: '10.5', timestamp: '2021-01-01T09:00:00' }],
            },
            '840400': { trades: [] },
        });

        expect(records).toEqual([
            { symbol: 'A0RPWH', side: 'buy', quantity: 2, unitPrice: '10.5', timestamp: '2021-01-01T09:00:00' },
        ]);
        expect(exemptionRates.get('A0RPWH')?.toFixed()).toBe('0.3');
        expect(exemptionRates.has('840400')).toBe(false);
    });

    it('trims symbol keys', () => {
        const { records, exemptionRates } = parseTradeLedger({
            ' A0RPWH ': {
                exemptionRate: 0.3,
                trades: [{ side: 'buy', quantity: 1, unitPrice: 1, timestamp: '2021-01-01' }],
            },
        });

        expect(records[0].symbol).toBe('A0RPWH');
        expect(exemptionRates.get('A0RPWH')?.toFixed()).toBe('0.3');
        expect(buildLots(records)[0].symbol).toBe('A0RPWH');
    });

    it('leaves trade validation to buildLots', () => {
        const { records } = parseTradeLedger({ A: { trades: [{ side: 'short', quantity: 1, unitPrice: 1, timestamp: 'x' }] } });
        expect(() => buildLots(records)).toThrow("Malformed trade record #0: side must be 'buy' or 'sell'");
    });

    it('rejects an exemption rate of 1 or more', () => {
        expect(() => parseTradeLedger({ A: { exemptionRate: 1, trades: [] } }))
            .toThrow('trade ledger: A.exemptionRate: Number must be less than 1');
    });

    it('rejects a document that is not a ledger', () => {
        expect(() => parseTradeLedger([1, 2], 'trades.json')).toThrow(InvalidInputError);
        expect(() => parseTradeLedger({ A: { trades: 'none' } })).toThrow(InvalidInputError);
    });
});

describe('parseLedgerFile', () => {
    it('accepts a ledger written by the importer', () => {
        const ledger = { A: { exemptionRate: 0, trades: [{ side: 'sell', quantity: 1.5, unitPrice: 20, timestamp: '2021-01-01T09:00:00' }] } };
        expect(parseLedgerFile(ledger)).toEqual(ledger);
    });

    it('rejects unknown sides', () => {
        expect(() => parseLedgerFile({ A: { trades: [{ side: 'gift', quantity: 1, unitPrice: 1, timestamp: '2021-01-01' }] } }))
            .toThrow(InvalidInputError);
    });
});

describe('parseTradeCsv', () => {
    const csv = [
        'symbol,side,quantity,unit_price,timestamp,exemption_rate',
        'A,buy,10,100,2021-01-01,',
        '',
        'ETF1,buy,2.5,40,2021-02-01,0.3',
        'ETF1,sell,1,45,2021-03-01,0.15',
    ].join('\n');

    it('reads one record per row', () => {
        const { records } = parseTradeCsv(csv);

        expect(records).toEqual([
            { symbol: 'A', side: 'buy', quantity: '10', unitPrice: '100', timestamp: '2021-01-01' },
            { symbol: 'ETF1', side: 'buy', quantity: '2.5', unitPrice: '40', timestamp: '2021-02-01' },
            { symbol: 'ETF1', side: 'sell', quantity: '1', unitPrice: '45', timestamp: '2021-03-01' },
        ]);
        expect(buildLots(records).map(l => `${l.id} ${l.quantity.toFixed()}`)).toEqual(['A#1 10', 'ETF1#1 1.5']);
    });

    it('takes the first exemption rate of a symbol', () => {
        const { exemptionRates } = parseTradeCsv(csv);

        expect([...exemptionRates.keys()]).toEqual(['ETF1']);
        expect(exemptionRates.get('ETF1')?.toFixed()).toBe('0.3');
    });

    it('rejects an exemption rate outside [0, 1)', () => {
        const bad = 'symbol,side,quantity,unit_price,timestamp,exemption_rate\nA,buy,1,1,2021-01-01,1.5';
        expect(() => parseTradeCsv(bad)).toThrow('trade CSV: row 1: exemption_rate must be in [0, 1)');
    });

    it('rejects rows with a wrong number of columns', () => {
        expect(() => parseTradeCsv('symbol,side\nA,buy,1')).toThrow(InvalidInputError);
    });
});

describe('readTradeLedger', () => {
    let dir = '';

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), 'ledger-'));
        await writeFile(join(dir, 'trades.json'), JSON.stringify({
            A: { trades: [{ side: 'buy', quantity: 1, unitPrice: 1, timestamp: '2021-01-01' }] },
        }));
        await writeFile(join(dir, 'trades.CSV'), 'symbol,side,quantity,unit_price,timestamp\nB,buy,1,1,2021-01-01\n');
        await writeFile(join(dir, 'broken.json'), '{ "A": ');
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('reads JSON ledgers', async () => {
        const { records } = await readTradeLedger(join(dir, 'trades.json'));
        expect(records.map(r => r.symbol)).toEqual(['A']);
    });

    it('reads CSV by extension', async () => {
        const { records } = await readTradeLedger(join(dir, 'trades.CSV'));
        expect(records.map(r => r.symbol)).toEqual(['B']);
    });

    it('reports unreadable and invalid files', async () => {
        await expect(readTradeLedger(join(dir, 'missing.json'))).rejects.toThrow('cannot read file (ENOENT)');
        await expect(readTradeLedger(join(dir, 'broken.json'))).rejects.toThrow(/not valid JSON/);
    });
});
