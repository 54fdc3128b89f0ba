import type { Decimal } from 'decimal.js';
import { z } from 'zod';
import { parseDecimal, ZERO } from './decimal';
import { InvalidInputError } from './errors';
import { describeZodError } from './loaders/files';
import { DEFAULT_MAX_NODES, DEFAULT_QUANTITY_DECIMALS, type OptimizerOptions, type VolumeMeasure } from './planner/optimizer';

export interface PlannerConfig {
    tradesFile: string;
    pricesFile: string;
    target: Decimal;
    tolerance: Decimal;
    maxNodes: number;
    quantityDecimals: number;
    currency: string;
}

const decimalString = (name: string, check: (d: Decimal) => boolean, rule: string) =>
    z.string().transform((value, ctx) => {
        const d = parseDecimal(value);
        if (!d || !check(d)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} ${rule}` });
            return z.NEVER;
        }
        return d;
    });

const envSchema = z.object({
    SALE_PLANNER_TRADES_FILE: z.string().min(1).default('data/trades.json'),
    SALE_PLANNER_PRICES_FILE: z.string().min(1).default('data/current_prices.json'),
    SALE_PLANNER_TARGET: decimalString('target', () => true, 'must be a number').default('1000'),
    SALE_PLANNER_TOLERANCE: decimalString('tolerance', d => d.gte(ZERO), 'must be a non-negative number').default('0'),
    SALE_PLANNER_MAX_NODES: z.coerce.number().int().positive().default(DEFAULT_MAX_NODES),
    SALE_PLANNER_QUANTITY_DECIMALS: z.coerce.number().int().min(0).max(12).default(DEFAULT_QUANTITY_DECIMALS),
    SALE_PLANNER_CURRENCY: z.string().min(1).default('EUR'),
});

// Reads SALE_PLANNER_* variables; unset ones fall back to the defaults above.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) throw new InvalidInputError('environment', describeZodError(result.error));
    const c = result.data;
    return {
        tradesFile: c.SALE_PLANNER_TRADES_FILE,
        pricesFile: c.SALE_PLANNER_PRICES_FILE,
        target: c.SALE_PLANNER_TARGET,
        tolerance: c.SALE_PLANNER_TOLERANCE,
        maxNodes: c.SALE_PLANNER_MAX_NODES,
        quantityDecimals: c.SALE_PLANNER_QUANTITY_DECIMALS,
        currency: c.SALE_PLANNER_CURRENCY,
    };
}

// --- Command line overrides ---

// Option values as commander hands them over (strings, or booleans for flags)
export interface PlanFlags {
    inputFile?: string;
    pricesFile?: string;
    desiredProfit?: string;
    tolerance?: string;
    maxTrades?: string;
    maxNodes?: string;
    quantityDecimals?: string;
    wholeLots?: boolean;
    volume?: string;
    currency?: string;
    json?: boolean;
}

export interface PlanSettings {
    tradesFile: string;
    pricesFile: string;
    target: Decimal;
    currency: string;
    json: boolean;
    optimizer: OptimizerOptions;
}

const flagsSchema = z.object({
    desiredProfit: decimalString('--desired-profit', () => true, 'must be a number').optional(),
    tolerance: decimalString('--tolerance', d => d.gte(ZERO), 'must be a non-negative number').optional(),
    maxTrades: z.coerce.number().int().positive().optional(),
    maxNodes: z.coerce.number().int().positive().optional(),
    quantityDecimals: z.coerce.number().int().min(0).max(12).optional(),
    volume: z.enum(['cost', 'proceeds']).optional(),
});

export function resolvePlanSettings(config: PlannerConfig, flags: PlanFlags): PlanSettings {
    const result = flagsSchema.safeParse(flags);
    if (!result.success) throw new InvalidInputError('command line', describeZodError(result.error));
    const f = result.data;
    const volumeMeasure: VolumeMeasure = f.volume ?? 'cost';
    const quantityDecimals = f.quantityDecimals ?? config.quantityDecimals;

    return {
        tradesFile: flags.inputFile ?? config.tradesFile,
        pricesFile: flags.pricesFile ?? config.pricesFile,
        target: f.desiredProfit ?? config.target,
        currency: flags.currency ?? config.currency,
        json: flags.json ?? false,
        optimizer: {
            tolerance: f.tolerance ?? config.tolerance,
            allowPartial: !flags.wholeLots,
            maxTrades: f.maxTrades,
            maxNodes: f.maxNodes ?? config.maxNodes,
            quantityDecimals,
            volumeMeasure,
        },
    };
}
