/**
 * Zod schemas for assumption input. The engine trusts its AssumptionSet, so
 * every range and cross-field rule is checked here, before a comparison runs.
 */

import { z } from 'zod';
import type { AssumptionSet } from '../types.js';

const amount = z.number().finite().min(0);
const fraction = z.number().finite().min(0).max(1);
const growthRate = z.number().finite().min(-1);

export const PropertyTypeSchema = z.enum(['coop', 'condo']);

export const RentOutSchema = z.object({
  yearsOccupied: z.number().int().min(1),
  vacancyRate: fraction,
  managementFeeRate: fraction,
  annualLandlordCost: amount,
  /** Share of the price that is land and cannot be depreciated. */
  landValueFraction: fraction,
});

const AssumptionFields = z.object({
  propertyType: PropertyTypeSchema,
  homePrice: z.number().finite().positive(),
  downPaymentRate: fraction,
  mortgageRate: fraction,
  loanTermYears: z.number().int().positive(),
  monthlyFees: amount,
  closingCostRate: fraction,
  monthlyRent: amount,
  horizonYears: z.number().int().min(1).max(30),
  /** May be negative; a market can lose value. */
  appreciationRate: growthRate,
  investmentReturnRate: z.number().finite().min(0),
  rentGrowthRate: growthRate,
  feeGrowthRate: growthRate,
  sellingCostRate: fraction,
  propertyTaxPortionRate: fraction,
  annualPropertyTax: amount,
  marginalTaxRate: fraction,
  capitalGainsTaxRate: fraction,
  recaptureTaxRate: fraction,
  standardDeduction: amount,
  mortgageInterestCap: amount,
  saltCap: amount,
  rentOut: RentOutSchema.optional(),
});

export const AssumptionSetSchema: z.ZodType<AssumptionSet> = AssumptionFields.superRefine((a, ctx) => {
  if (!a.rentOut) return;
  if (a.propertyType !== 'condo') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['rentOut'],
      message: 'Renting out is only modeled for condos',
    });
  }
  if (a.rentOut.yearsOccupied >= a.horizonYears) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['rentOut', 'yearsOccupied'],
      message: `Years occupied must be less than the time horizon (${a.horizonYears})`,
    });
  }
});

/** Partial assumptions from a config file, CLI flags or a sweep row. */
export const AssumptionOverridesSchema = AssumptionFields.extend({
  rentOut: RentOutSchema.partial().optional(),
})
  .partial()
  .strict();
export type AssumptionOverrides = z.infer<typeof AssumptionOverridesSchema>;

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; issues: string[] };

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

export function validateAssumptions(input: unknown): ValidationResult<AssumptionSet> {
  const result = AssumptionSetSchema.safeParse(input);
  return result.success ? { ok: true, value: result.data } : { ok: false, issues: formatIssues(result.error) };
}

export function validateOverrides(input: unknown): ValidationResult<AssumptionOverrides> {
  const result = AssumptionOverridesSchema.safeParse(input);
  return result.success ? { ok: true, value: result.data } : { ok: false, issues: formatIssues(result.error) };
}
