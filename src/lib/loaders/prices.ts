import type { Decimal } from 'decimal.js';
import { z } from 'zod';
import { parseDecimal, ZERO } from '../decimal';
import { InvalidInputError } from '../errors';
import type { PriceTable } from '../types';
import { describeZodError, readJsonFile } from './files';

const priceFileSchema = z.record(z.string(), z.union([z.number(), z.string()]));

// Prices JSON: `{ "<symbol>": <price> }`, every price positive
export function parsePriceTable(json: unknown, source = 'price table'): PriceTable {
    const result = priceFileSchema.safeParse(json);
    if (!result.success) throw new InvalidInputError(source, describeZodError(result.error));

    const prices = new Map<string, Decimal>();
    for (const [symbol, raw] of Object.entries(result.data)) {
        const price = parseDecimal(raw);
        if (!price || price.lte(ZERO)) {
            throw new InvalidInputError(source, `price for ${symbol} must be a positive number, got ${JSON.stringify(raw)}`);
        }
        prices.set(symbol, price);
    }
    return prices;
}

export async function readPriceTable(path: string): Promise<PriceTable> {
    return parsePriceTable(await readJsonFile(path), path);
}
