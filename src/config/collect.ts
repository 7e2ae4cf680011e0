import { readFileSync } from 'node:fs';
import type { AssumptionSet, PropertyType } from '../types.js';
import { DEFAULT_ASSUMPTIONS, DEFAULT_RENT_OUT, defaultsFor } from './defaults.js';
import {
  validateAssumptions,
  validateOverrides,
  type AssumptionOverrides,
  type ValidationResult,
} from './schema.js';

export class ConfigFileError extends Error {
  constructor(
    readonly filePath: string,
    message: string,
  ) {
    super(`${filePath}: ${message}`);
    this.name = 'ConfigFileError';
  }
}

export class AssumptionValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid assumptions:\n  ${issues.join('\n  ')}`);
    this.name = 'AssumptionValidationError';
  }
}

/**
 * Command-line flags shared by every command that builds an assumption set.
 * Rates are given in percent (e.g. "6.5"), amounts in dollars.
 */
export interface AssumptionOptions {
  config?: string;
  type?: string;
  price?: string;
  down?: string;
  rate?: string;
  term?: string;
  fees?: string;
  closing?: string;
  rent?: string;
  years?: string;
  appreciation?: string;
  returnRate?: string;
  rentGrowth?: string;
  feeGrowth?: string;
  selling?: string;
  taxPortion?: string;
  propertyTax?: string;
  marginalTax?: string;
  capitalGainsTax?: string;
  recaptureTax?: string;
  standardDeduction?: string;
  interestCap?: string;
  saltCap?: string;
  rentOut?: boolean;
  yearsOccupied?: string;
  vacancy?: string;
  management?: string;
  landlordCost?: string;
  landValue?: string;
}

/**
 * Read a JSON file of assumption overrides. Rates in the file are decimals.
 */
export function loadConfigFile(filePath: string): AssumptionOverrides {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigFileError(filePath, err instanceof Error ? err.message : String(err));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigFileError(filePath, `not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  const result = validateOverrides(parsed);
  if (!result.ok) throw new ConfigFileError(filePath, result.issues.join('; '));
  return result.value;
}

function num(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function pct(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value) / 100;
}

function defined<T extends Record<string, unknown>>(record: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in record) {
    if (record[key] !== undefined) out[key] = record[key];
  }
  return out;
}

/**
 * Convert command-line flags to decimal overrides. Unparseable numbers come
 * through as NaN so validation reports them against the right field.
 */
export function overridesFromOptions(opts: AssumptionOptions): AssumptionOverrides {
  const rentOut = defined({
    yearsOccupied: num(opts.yearsOccupied),
    vacancyRate: pct(opts.vacancy),
    managementFeeRate: pct(opts.management),
    annualLandlordCost: num(opts.landlordCost),
    landValueFraction: pct(opts.landValue),
  });
  const wantsRentOut = opts.rentOut === true || Object.keys(rentOut).length > 0;

  const raw = defined({
    propertyType: opts.type?.toLowerCase(),
    homePrice: num(opts.price),
    downPaymentRate: pct(opts.down),
    mortgageRate: pct(opts.rate),
    loanTermYears: num(opts.term),
    monthlyFees: num(opts.fees),
    closingCostRate: pct(opts.closing),
    monthlyRent: num(opts.rent),
    horizonYears: num(opts.years),
    appreciationRate: pct(opts.appreciation),
    investmentReturnRate: pct(opts.returnRate),
    rentGrowthRate: pct(opts.rentGrowth),
    feeGrowthRate: pct(opts.feeGrowth),
    sellingCostRate: pct(opts.selling),
    propertyTaxPortionRate: pct(opts.taxPortion),
    annualPropertyTax: num(opts.propertyTax),
    marginalTaxRate: pct(opts.marginalTax),
    capitalGainsTaxRate: pct(opts.capitalGainsTax),
    recaptureTaxRate: pct(opts.recaptureTax),
    standardDeduction: num(opts.standardDeduction),
    mortgageInterestCap: num(opts.interestCap),
    saltCap: num(opts.saltCap),
    rentOut: wantsRentOut ? rentOut : undefined,
  });

  const result = validateOverrides(raw);
  if (!result.ok) throw new AssumptionValidationError(result.issues);
  return result.value;
}

/**
 * Apply overrides on top of a base set. Rent-out fields are merged onto the
 * base's rent-out assumptions, or onto the defaults when the base has none.
 */
export function mergeAssumptions(base: AssumptionSet, overrides: AssumptionOverrides): AssumptionSet {
  const { rentOut, ...rest } = overrides;
  const merged: AssumptionSet = { ...base, ...defined(rest) };
  if (rentOut) {
    merged.rentOut = { ...(base.rentOut ?? DEFAULT_RENT_OUT), ...defined(rentOut) };
  }
  return merged;
}

/**
 * Layer config file and flags over the defaults for the property type.
 * `propertyType` picks the defaults layer ahead of the file and flags.
 */
function layerAssumptions(opts: AssumptionOptions, propertyType?: PropertyType): AssumptionSet {
  const fromFile: AssumptionOverrides = opts.config ? loadConfigFile(opts.config) : {};
  const fromFlags = overridesFromOptions(opts);

  const type = propertyType ?? fromFlags.propertyType ?? fromFile.propertyType ?? DEFAULT_ASSUMPTIONS.propertyType;
  return mergeAssumptions(mergeAssumptions(defaultsFor(type), fromFile), fromFlags);
}

/**
 * Build and validate the assumption set for a run.
 * Precedence: property-type defaults < config file < flags.
 */
export function collectAssumptions(opts: AssumptionOptions): AssumptionSet {
  return ensureValid(layerAssumptions(opts));
}

/**
 * Assumptions for one variant of a run (a sweep row).
 * Precedence: defaults for the variant's property type < config file < flags < variant.
 */
export function variantAssumptions(
  opts: AssumptionOptions,
  overrides: AssumptionOverrides,
): ValidationResult<AssumptionSet> {
  return validateAssumptions(mergeAssumptions(layerAssumptions(opts, overrides.propertyType), overrides));
}

export function ensureValid(assumptions: AssumptionSet): AssumptionSet {
  const result = validateAssumptions(assumptions);
  if (!result.ok) throw new AssumptionValidationError(result.issues);
  return result.value;
}
