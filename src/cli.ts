#!/usr/bin/env node
import { Command } from 'commander';
import { compareCommand } from './commands/compare.js';
import { amortizeCommand } from './commands/amortize.js';
import { sweepCommand } from './commands/sweep.js';
import { AssumptionValidationError, ConfigFileError } from './config/collect.js';
import { DEFAULT_ASSUMPTIONS, DEFAULT_RENT_OUT, PROPERTY_TYPES } from './config/defaults.js';
import { theme } from './formatters/colors.js';

const d = DEFAULT_ASSUMPTIONS;
const r = DEFAULT_RENT_OUT;
const pct = (n: number) => +(n * 100).toFixed(3);

function withAssumptionOptions(command: Command): Command {
  return command
    .option('--config <file>', 'JSON file of assumption overrides (rates as decimals)')
    .option('--type <type>', `Property type: coop or condo (default: ${d.propertyType})`)
    .option('--price <n>', `Home price in USD (default: ${d.homePrice})`)
    .option('--down <n>', `Down payment % (default: ${pct(d.downPaymentRate)})`)
    .option('--rate <n>', `Mortgage rate % (default: ${pct(d.mortgageRate)})`)
    .option('--term <n>', `Loan term in years (default: ${d.loanTermYears})`)
    .option('--fees <n>', `Monthly maintenance / common charges (default: ${d.monthlyFees})`)
    .option(
      '--closing <n>',
      `Buyer closing costs % (default: ${pct(PROPERTY_TYPES.coop.closingCostRate)} co-op, ${pct(PROPERTY_TYPES.condo.closingCostRate)} condo)`,
    )
    .option('--rent <n>', `Equivalent monthly rent, year 1 (default: ${d.monthlyRent})`)
    .option('--years <n>', `Time horizon in years, 1-30 (default: ${d.horizonYears})`)
    .option('--appreciation <n>', `Annual property appreciation % (default: ${pct(d.appreciationRate)})`)
    .option('--return-rate <n>', `Annual investment return % (default: ${pct(d.investmentReturnRate)})`)
    .option('--rent-growth <n>', `Annual rent growth % (default: ${pct(d.rentGrowthRate)})`)
    .option('--fee-growth <n>', `Annual fee and property tax growth % (default: ${pct(d.feeGrowthRate)})`)
    .option('--selling <n>', `Selling costs % of future value (default: ${pct(d.sellingCostRate)})`)
    .option('--tax-portion <n>', `Co-op: property tax share of fees % (default: ${pct(d.propertyTaxPortionRate)})`)
    .option('--property-tax <n>', 'Separate annual property tax in USD (condo bill, or co-op override)')
    .option('--marginal-tax <n>', `Combined marginal income tax % (default: ${pct(d.marginalTaxRate)})`)
    .option('--capital-gains-tax <n>', `Long-term capital gains tax % (default: ${pct(d.capitalGainsTaxRate)})`)
    .option('--recapture-tax <n>', `Depreciation recapture tax % (default: ${pct(d.recaptureTaxRate)})`)
    .option('--standard-deduction <n>', `Standard deduction (default: ${d.standardDeduction})`)
    .option('--interest-cap <n>', `Mortgage interest deduction principal limit (default: ${d.mortgageInterestCap})`)
    .option('--salt-cap <n>', `SALT deduction cap (default: ${d.saltCap})`)
    .option('--rent-out', 'Model buying, living in, then renting out (condo only)')
    .option('--years-occupied <n>', `Rent-out: years lived in before renting (default: ${r.yearsOccupied})`)
    .option('--vacancy <n>', `Rent-out: vacancy % (default: ${pct(r.vacancyRate)})`)
    .option('--management <n>', `Rent-out: management fee % of rent (default: ${pct(r.managementFeeRate)})`)
    .option('--landlord-cost <n>', `Rent-out: extra annual landlord costs (default: ${r.annualLandlordCost})`)
    .option('--land-value <n>', `Rent-out: land share of price % (default: ${pct(r.landValueFraction)})`);
}

/**
 * Report input errors as messages instead of stack traces.
 */
function guarded<A extends unknown[]>(action: (...args: A) => void): (...args: A) => void {
  return (...args: A) => {
    try {
      action(...args);
    } catch (err) {
      if (err instanceof AssumptionValidationError) {
        console.error(theme.negative('Invalid assumptions:'));
        for (const issue of err.issues) console.error(theme.negative(`  • ${issue}`));
      } else if (err instanceof ConfigFileError) {
        console.error(theme.negative(`Could not load config ${err.message}`));
      } else {
        throw err;
      }
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name('rent-vs-buy')
  .description('Compare buying, renting & investing, and buying to rent out (NYC condo/co-op)')
  .version('1.0.0');

withAssumptionOptions(
  program.command('compare').description('Compare the net financial gain of each housing strategy'),
)
  .option('--markdown <path>', 'Also write a Markdown report to this path')
  .action(guarded(compareCommand));

withAssumptionOptions(program.command('amortize').description('Show the yearly amortization schedule of the mortgage'))
  .option('--schedule-years <n>', 'Number of years to show (default: loan term)')
  .action(guarded(amortizeCommand));

withAssumptionOptions(
  program.command('sweep <csv>').description('Compare many assumption variants, one per CSV row'),
).action(guarded(sweepCommand));

program.parse();
