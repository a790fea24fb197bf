/**
 * CLI Interface for the Option Edge Calculator
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import chalk from 'chalk';
import { applyOverrides, loadConfig } from '../config/index.js';
import { evaluate } from '../evaluation/evaluate.js';
import { startServer } from '../api/server.js';
import { formatWithSign } from '../utils/decimal.js';
import { FIELDS } from '../core/constants.js';
import { pricingLogger, apiLogger } from '../utils/logger.js';
import type { EvaluationResult, RawFields, Recommendation } from '../core/types.js';

interface PriceCommandOptions {
  spot: string;
  strike: string;
  volatility: string;
  rate: string;
  days: string;
  market: string;
  type: string;
  symbol?: string;
  expiry?: string;
}

const RECOMMENDATION_COLORS: Record<Recommendation, (text: string) => string> = {
  'Strong Buy': chalk.green.bold,
  'Consider Buy': chalk.green,
  Neutral: chalk.gray,
  'Consider Sell': chalk.red,
  'Strong Sell': chalk.red.bold,
};

export function toFields(options: PriceCommandOptions): RawFields {
  return {
    [FIELDS.SPOT_PRICE]: options.spot,
    [FIELDS.STRIKE_PRICE]: options.strike,
    [FIELDS.VOLATILITY]: options.volatility,
    [FIELDS.RISK_FREE_RATE]: options.rate,
    [FIELDS.TIME_TO_EXPIRY]: options.days,
    [FIELDS.MARKET_PRICE]: options.market,
    [FIELDS.OPTION_TYPE]: options.type,
    [FIELDS.SYMBOL]: options.symbol,
    [FIELDS.EXPIRY_DATE]: options.expiry,
  };
}

export function renderResultTable(result: EvaluationResult): string {
  const table = new Table({
    head: [chalk.cyan('Field'), chalk.cyan('Value')],
    style: { head: [], border: [] },
  });

  if (result.symbol) table.push(['Symbol', result.symbol]);
  if (result.expiryDate) table.push(['Expiry', result.expiryDate]);
  table.push(
    ['Type', result.optionType],
    ['Market price', result.marketPrice.toFixed(2)],
    ['Theoretical price', result.theoreticalPrice.toFixed(2)],
    ['Edge', formatWithSign(result.edge)],
    ['Recommendation', RECOMMENDATION_COLORS[result.recommendation](result.recommendation)]
  );

  return table.toString();
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('option-edge')
    .description('Black-Scholes fair value and trading signal for European options')
    .version('1.0.0');

  program
    .command('price')
    .description('Price an option and compare it to the market')
    .requiredOption('--spot <price>', 'Spot price of the underlying')
    .requiredOption('--strike <price>', 'Strike price')
    .requiredOption('--volatility <percent>', 'Annualized volatility in percent, e.g. 20')
    .requiredOption('--rate <percent>', 'Risk-free rate in percent, e.g. 5')
    .requiredOption('--days <days>', 'Days to expiry')
    .requiredOption('--market <price>', 'Observed market price of the option')
    .option('--type <type>', 'call or put', 'call')
    .option('--symbol <symbol>', 'Underlying symbol')
    .option('--expiry <date>', 'Expiry date')
    .action((options: PriceCommandOptions) => {
      const outcome = evaluate(toFields(options), { logger: pricingLogger });

      if (!outcome.success) {
        console.error(chalk.red(`❌ ${outcome.error.message}`));
        process.exitCode = 1;
        return;
      }

      console.log(renderResultTable(outcome.data));
    });

  program
    .command('serve')
    .description('Start the calculator web form and JSON API')
    .option('--port <port>', 'Port to listen on')
    .action(async (options: { port?: string }) => {
      const config = applyOverrides(loadConfig({ forceReload: true }), options);
      await startServer(config, apiLogger);
      console.log(chalk.green(`✓ Listening on port ${config.server.port}`));
    });

  return program;
}

export async function runCLI(argv: string[]): Promise<void> {
  await buildProgram().parseAsync(argv, { from: 'user' });
}
