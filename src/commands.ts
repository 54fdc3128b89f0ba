import { access, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { loadConfig, resolvePlanSettings, type PlanFlags } from './lib/config';
import { isSalePlannerError, type SalePlannerError } from './lib/errors';
import { mergeSettlements, parseSettlementText, type Settlement } from './lib/importers/settlement';
import { listStatementFiles, readStatementText } from './lib/importers/statements';
import { readJsonFile } from './lib/loaders/files';
import { readPriceTable } from './lib/loaders/prices';
import { parseLedgerFile, readTradeLedger } from './lib/loaders/trades';
import { planSales } from './lib/planner/pipeline';
import { formatSalePlan, salePlanToJson } from './lib/planner/report';
import type { LedgerFile } from './lib/types';

export interface ImportFlags {
    inputDirectory: string;
    outputFile: string;
    merge?: boolean;
}

export const EXIT_CODES: Record<SalePlannerError['kind'], number> = {
    'malformed-record': 2,
    'missing-price': 2,
    'invalid-input': 2,
    'no-feasible-plan': 3,
    'search-budget-exceeded': 4,
};

export const exitCodeFor = (e: unknown): number => (isSalePlannerError(e) ? EXIT_CODES[e.kind] : 1);

export async function runPlan(flags: PlanFlags, env: NodeJS.ProcessEnv = process.env): Promise<void> {
    const settings = resolvePlanSettings(loadConfig(env), flags);
    const [ledger, prices] = await Promise.all([
        readTradeLedger(settings.tradesFile),
        readPriceTable(settings.pricesFile),
    ]);

    const result = planSales({
        records: ledger.records,
        prices,
        exemptionRates: ledger.exemptionRates,
        target: settings.target,
        options: settings.optimizer,
    });
    if (result.warning) {
        console.warn(`Planner: ${result.warning.message}`);
    }

    if (settings.json) {
        console.log(JSON.stringify({ ...salePlanToJson(result.plan), exhaustive: result.stats.exhaustive }, null, 2));
    } else {
        console.log(formatSalePlan(result.plan, {
            currency: settings.currency,
            quantityDecimals: settings.optimizer.quantityDecimals,
        }));
    }
}

async function loadExistingLedger(path: string): Promise<LedgerFile> {
    try {
        await access(path);
    } catch {
        console.log(`Import: ${path} does not exist yet, starting a new ledger`);
        return {};
    }
    return parseLedgerFile(await readJsonFile(path), path);
}

export async function runImport(flags: ImportFlags): Promise<void> {
    const ledger = flags.merge ? await loadExistingLedger(flags.outputFile) : {};
    const { statements, skipped } = await listStatementFiles(flags.inputDirectory);
    skipped.forEach(path => console.log(`Import: Skipping ${path}...`));

    const settlements: Settlement[] = [];
    for (const { path, side } of statements) {
        console.log(`Import: Processing ${path}...`);
        settlements.push(parseSettlementText(await readStatementText(path), side, path));
    }

    const result = mergeSettlements(ledger, settlements);
    result.added.forEach(s => console.log(`Import: Added ${s.side} on ${s.timestamp} to ${s.symbol}`));
    result.skipped.forEach(s => console.warn(`Import: Skipping duplicate trade on ${s.timestamp} to ${s.symbol}`));

    await mkdir(dirname(flags.outputFile), { recursive: true });
    await writeFile(flags.outputFile, `${JSON.stringify(result.ledger, null, 2)}\n`, 'utf8');
    console.log(`Import: Wrote ${Object.keys(result.ledger).length} symbols to ${flags.outputFile}`);
}
