import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { InvalidInputError } from '../errors';
import { parseSettlementText } from './settlement';
import { extractPdfText, listStatementFiles, readStatementText } from './statements';
import { buildTextPdf, ETF_BUY_LINES } from './testPdf';

const etfBuy = {
    symbol: 'A0RPWH',
    side: 'buy',
    quantity: '12.5',
    unitPrice: '1234.56',
    timestamp: '2021-03-05T09:04:12',
    exemptionRate: 0.3,
};

describe('extractPdfText', () => {
    it('returns the text of the first page', async () => {
        const text = await extractPdfText(buildTextPdf(ETF_BUY_LINES));

        expect(text).toContain('Ausführungskurs 1.234,56 EUR');
        expect(parseSettlementText(text, 'buy')).toEqual(etfBuy);
    });

    it('rejects data that is not a PDF', async () => {
        const data = new Uint8Array(Buffer.from('Wertpapierabrechnung Kauf', 'latin1'));
        await expect(extractPdfText(data, 'Kauf.pdf')).rejects.toThrow(InvalidInputError);
    });
});

describe('statement files', () => {
    let dir = '';

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), 'statements-'));
        await writeFile(join(dir, 'Kauf_Wertpapierabrechnung_2021_03_05.pdf'), buildTextPdf(ETF_BUY_LINES));
        await writeFile(join(dir, 'Verkauf_Wertpapierabrechnung_2021_09_01.TXT'), 'text');
        await writeFile(join(dir, 'Kauf_Wertpapierabrechnung_2021_01_01.csv'), 'text');
        await writeFile(join(dir, 'Kontoauszug_2021.pdf'), 'text');
        await mkdir(join(dir, 'empty'));
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('lists statements by name and extension', async () => {
        const { statements, skipped } = await listStatementFiles(dir);

        expect(statements).toEqual([
            { path: join(dir, 'Kauf_Wertpapierabrechnung_2021_03_05.pdf'), side: 'buy' },
            { path: join(dir, 'Verkauf_Wertpapierabrechnung_2021_09_01.TXT'), side: 'sell' },
        ]);
        expect(skipped).toEqual([
            join(dir, 'Kauf_Wertpapierabrechnung_2021_01_01.csv'),
            join(dir, 'Kontoauszug_2021.pdf'),
            join(dir, 'empty'),
        ]);
    });

    it('reads PDF and text statements', async () => {
        const pdfText = await readStatementText(join(dir, 'Kauf_Wertpapierabrechnung_2021_03_05.pdf'));
        expect(parseSettlementText(pdfText, 'buy')).toEqual(etfBuy);

        expect(await readStatementText(join(dir, 'Verkauf_Wertpapierabrechnung_2021_09_01.TXT'))).toBe('text');
    });

    it('reports a missing directory as invalid input', async () => {
        await expect(listStatementFiles(join(dir, 'missing'))).rejects.toThrow(/cannot read directory \(ENOENT\)/);
    });
});
