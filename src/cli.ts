import 'dotenv/config';
import { Command } from 'commander';
import { exitCodeFor, runImport, runPlan, type ImportFlags } from './commands';
import type { PlanFlags } from './lib/config';
import { isSalePlannerError } from './lib/errors';

const program = new Command();

program
    .name('sale-planner')
    .description('Choose the lots to sell to realize a target taxable profit with few trades and low volume');

program
    .command('plan', { isDefault: true })
    .description('compute the optimal sale plan')
    .option('-i, --input-file <path>', 'trade ledger (JSON or CSV)')
    .option('-p, --prices-file <path>', 'JSON file with current prices')
    .option('-d, --desired-profit <amount>', 'taxable profit to realize (negative to realize a loss)')
    .option('-e, --tolerance <amount>', 'allowed deviation from the desired profit')
    .option('--max-trades <n>', 'never plan more than n trades')
    .option('--max-nodes <n>', 'search budget in visited nodes')
    .option('--quantity-decimals <n>', 'decimals of a partially sold quantity')
    .option('--whole-lots', 'only sell whole lots')
    .option('--volume <measure>', 'volume to minimize: cost or proceeds')
    .option('--currency <code>', 'currency label for the report')
    .option('--json', 'print the plan as JSON')
    .action((flags: PlanFlags) => runPlan(flags));

program
    .command('import')
    .description('import settlement statements (PDF or extracted text) into a trade ledger')
    .option('-i, --input-directory <path>', 'directory with the statement files', 'input/dkb')
    .option('-o, --output-file <path>', 'ledger JSON to write', 'data/trades.json')
    .option('-m, --merge', 'merge with the existing ledger')
    .action((flags: ImportFlags) => runImport(flags));

program.parseAsync(process.argv).catch((e: unknown) => {
    if (isSalePlannerError(e)) {
        console.error(`Error: ${e.message}`);
    } else {
        console.error('Unexpected failure', e);
    }
    process.exitCode = exitCodeFor(e);
});
