/**
 * Impact Report Schema
 *
 * One report per (region, storm, issuance). The report is validated when it
 * is built and again when a previous report is read back for diffing, so a
 * report on disk always has the full, fixed key set below.
 */

import { z } from 'zod';
import { isWindThreshold, type WindThreshold } from '../core/constants.js';

export const REPORT_VERSION = 1;

// ============================================================================
// Building Blocks
// ============================================================================

export const WindThresholdSchema = z.custom<WindThreshold>(
  (value) => typeof value === 'number' && isWindThreshold(value),
  'Unsupported wind threshold'
);

/** Reported counts are truncated to integers */
const CountSchema = z.number().int();

export const PercentageSchema = z.union([z.number().finite().nonnegative(), z.literal('-')]);

export const ChangeDirectionSchema = z.enum(['increased', 'decreased', 'unchanged']);

// ============================================================================
// Sections
// ============================================================================

export const ReportIdentitySchema = z.object({
  region: z.string().min(1),
  regionName: z.string(),
  stormId: z.string().min(1),
  /** ISO-8601 UTC issuance time */
  issuedAt: z.string().datetime(),
  forecastDate: z.string(),
  stormCategory: z.string(),
  maxWindThreshold: WindThresholdSchema,
  expectedLandfall: z.string(),
  nextForecastDate: z.string(),
  reportDate: z.string(),
});

export const ReportTotalsSchema = z.object({
  expectedChildren: CountSchema,
  expectedSchoolAge: CountSchema,
  expectedInfants: CountSchema,
  expectedPopulation: CountSchema,
  expectedSchools: CountSchema,
  expectedHealthCenters: CountSchema,
  /** Threshold the totals were taken at */
  referenceThreshold: WindThresholdSchema,
  cciChildren: CountSchema,
  cciSchoolAge: CountSchema,
  cciInfants: CountSchema,
  cciPopulation: CountSchema,
});

export const ChildrenChangeSchema = z.object({
  direction: ChangeDirectionSchema,
  /** Signed delta, "+N" or "-N" */
  delta: z.string(),
  percentage: PercentageSchema,
});

export const ThresholdBreakdownSchema = z.object({
  threshold: WindThresholdSchema,
  category: z.string(),
  expectedPopulation: CountSchema,
  expectedSchoolAge: CountSchema,
  expectedInfants: CountSchema,
  expectedChildren: CountSchema,
  expectedSchools: CountSchema,
  expectedHealthCenters: CountSchema,
  changePopulation: CountSchema,
  changeSchoolAge: CountSchema,
  changeInfants: CountSchema,
  changeChildren: CountSchema,
  changeSchools: CountSchema,
  changeHealthCenters: CountSchema,
});

export const RankedFacilitySchema = z.object({
  rank: z.number().int().min(1),
  facilityId: z.string(),
  name: z.string(),
  /** Education level for schools, facility type for health facilities */
  detail: z.string(),
  probability: z.number().min(0).max(1),
});

export const FacilityRankingSchema = z.object({
  /** Threshold ranked at; null when no facility data was available */
  threshold: WindThresholdSchema.nullable(),
  facilities: z.array(RankedFacilitySchema),
});

export const FacilityRankingsSchema = z.object({
  schools: FacilityRankingSchema,
  healthCenters: FacilityRankingSchema,
});

const VulnerabilitySplitSchema = z.object({
  urban: CountSchema,
  rural: CountSchema,
  poverty: CountSchema,
  severePoverty: CountSchema,
});

export const VulnerabilitySchema = z.object({
  population: VulnerabilitySplitSchema,
  schoolAge: VulnerabilitySplitSchema,
  infants: VulnerabilitySplitSchema,
});

export const AdminThresholdValueSchema = z.object({
  threshold: WindThresholdSchema,
  value: CountSchema,
  change: CountSchema,
});

export const AdminRowSchema = z.object({
  adminId: z.string(),
  name: z.string(),
  /** One entry per enumerated threshold, ascending */
  values: z.array(AdminThresholdValueSchema),
  cci: CountSchema.optional(),
});

export const AdminBreakdownSchema = z.object({
  population: z.array(AdminRowSchema),
  schoolAge: z.array(AdminRowSchema),
  infants: z.array(AdminRowSchema),
  schools: z.array(AdminRowSchema),
  healthCenters: z.array(AdminRowSchema),
});

// ============================================================================
// Report
// ============================================================================

export const ImpactReportSchema = z.object({
  version: z.literal(REPORT_VERSION),
  identity: ReportIdentitySchema,
  totals: ReportTotalsSchema,
  childrenChange: ChildrenChangeSchema,
  thresholds: z.array(ThresholdBreakdownSchema),
  facilities: FacilityRankingsSchema,
  vulnerability: VulnerabilitySchema,
  admins: AdminBreakdownSchema,
});

export type ChangeDirection = z.infer<typeof ChangeDirectionSchema>;
export type Percentage = z.infer<typeof PercentageSchema>;
export type ReportIdentity = z.infer<typeof ReportIdentitySchema>;
export type ReportTotals = z.infer<typeof ReportTotalsSchema>;
export type ChildrenChange = z.infer<typeof ChildrenChangeSchema>;
export type ThresholdBreakdown = z.infer<typeof ThresholdBreakdownSchema>;
export type RankedFacility = z.infer<typeof RankedFacilitySchema>;
export type FacilityRanking = z.infer<typeof FacilityRankingSchema>;
export type FacilityRankings = z.infer<typeof FacilityRankingsSchema>;
export type Vulnerability = z.infer<typeof VulnerabilitySchema>;
export type VulnerabilitySplit = z.infer<typeof VulnerabilitySplitSchema>;
export type AdminThresholdValue = z.infer<typeof AdminThresholdValueSchema>;
export type AdminRow = z.infer<typeof AdminRowSchema>;
export type AdminBreakdown = z.infer<typeof AdminBreakdownSchema>;
export type ImpactReport = z.infer<typeof ImpactReportSchema>;

/**
 * Parse an unknown value as a report
 *
 * @returns The report, or an error message naming the first invalid path
 */
export function parseReport(
  value: unknown
): { success: true; data: ImpactReport } | { success: false; error: string } {
  const result = ImpactReportSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.errors[0];
    const path = issue?.path.join('.') ?? '';
    return { success: false, error: `${path || '(root)'}: ${issue?.message ?? 'Invalid report'}` };
  }
  return { success: true, data: result.data };
}
