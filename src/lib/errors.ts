import type { Decimal } from 'decimal.js';
import type { SalePlan } from './planner/optimizer';

export type SalePlannerErrorKind =
    | 'malformed-record'
    | 'missing-price'
    | 'no-feasible-plan'
    | 'search-budget-exceeded'
    | 'invalid-input';

export abstract class SalePlannerError extends Error {
    abstract readonly kind: SalePlannerErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class MalformedRecordError extends SalePlannerError {
    readonly kind = 'malformed-record';

    constructor(
        public readonly recordIndex: number,
        public readonly reason: string
    ) {
        super(`Malformed trade record #${recordIndex}: ${reason}`);
    }
}

export class MissingPriceError extends SalePlannerError {
    readonly kind = 'missing-price';

    constructor(public readonly symbol: string) {
        super(`No current price for ${symbol}`);
    }
}

export class NoFeasiblePlanError extends SalePlannerError {
    readonly kind = 'no-feasible-plan';

    constructor(
        public readonly target: Decimal,
        public readonly closestGain: Decimal
    ) {
        super(`No combination of lots reaches a gain of ${target.toFixed()} (closest achievable: ${closestGain.toFixed()})`);
    }
}

export class SearchBudgetExceededError extends SalePlannerError {
    readonly kind = 'search-budget-exceeded';

    constructor(
        public readonly nodesVisited: number,
        public readonly bestPlan: SalePlan | null
    ) {
        super(bestPlan
            ? `Search stopped after ${nodesVisited} nodes; the plan found so far may not be optimal`
            : `Search stopped after ${nodesVisited} nodes without finding a plan`);
    }
}

// Bad files, bad configuration, bad command line values.
export class InvalidInputError extends SalePlannerError {
    readonly kind = 'invalid-input';

    constructor(
        public readonly source: string,
        detail: string
    ) {
        super(`${source}: ${detail}`);
    }
}

export function isSalePlannerError(e: unknown): e is SalePlannerError {
    return e instanceof SalePlannerError;
}
