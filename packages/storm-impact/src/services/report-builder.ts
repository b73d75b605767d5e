/**
 * Report Builder
 *
 * Assembles the impact report for one (region, storm, issuance) from the
 * computed tables and the previous issuance's report, then validates it
 * against ImpactReportSchema. A schema violation here is a programming error
 * and throws.
 *
 * When no threshold carries probability in any admin unit the result is
 * NoImpact and no report is produced.
 */

import {
  FORECAST_INTERVAL_HOURS,
  REFERENCE_THRESHOLD,
  STORM_CATEGORIES,
  TOP_FACILITIES_COUNT,
  WIND_THRESHOLDS,
  presentThresholds,
  type WindThreshold,
} from '../core/constants.js';
import type {
  AdminImpactSeries,
  AdminUnit,
  ExpectedImpactLayer,
  ExpectedImpactSeries,
  FacilityProbabilitySeries,
  ForecastKey,
  RegionBoundary,
  SeverityIndexRow,
  Zone,
  ZoneAttribute,
} from '../core/types/index.js';
import { addHours, formatForecastDate, parseIssuance } from '../core/utils/dates.js';
import {
  ImpactReportSchema,
  REPORT_VERSION,
  type AdminRow,
  type ChildrenChange,
  type ImpactReport,
  type ReportTotals,
  type ThresholdBreakdown,
} from '../schemas/report.js';
import { sumExpected } from './expected-impact.js';
import { diffMetric, formatSignedDelta, previousValue } from './forecast-diff.js';
import { rankFacilities } from './risk-ranker.js';
import { computeVulnerability } from './vulnerability.js';

// ============================================================================
// Types
// ============================================================================

export interface ReportInputs {
  readonly region: Pick<RegionBoundary, 'code' | 'name'>;
  readonly key: ForecastKey;
  readonly zones: readonly Zone[];
  readonly admins: readonly AdminUnit[];
  readonly expected: ExpectedImpactSeries;
  readonly adminImpact: AdminImpactSeries;
  readonly zoneSeverity: readonly SeverityIndexRow[];
  readonly adminSeverity: readonly SeverityIndexRow[];
  readonly schools: FacilityProbabilitySeries;
  readonly healthCenters: FacilityProbabilitySeries;
  readonly expectedLandfall: string;
  /** Report of the preceding issuance, null when none exists */
  readonly previous: ImpactReport | null;
  readonly reportDate: Date;
}

export interface ReportBuilderOptions {
  readonly intervalHours?: number;
  readonly topFacilities?: number;
}

export type ReportOutcome =
  | { readonly status: 'report'; readonly report: ImpactReport }
  | { readonly status: 'no-impact'; readonly region: string };

// ============================================================================
// Threshold Selection
// ============================================================================

/**
 * Highest threshold with impact: thresholds are walked in ascending order
 * and the walk stops at the first one with zero summed probability
 *
 * @returns null when the lowest present threshold already has none (NoImpact)
 */
export function maxImpactThreshold(adminImpact: AdminImpactSeries): WindThreshold | null {
  let max: WindThreshold | null = null;
  for (const threshold of WIND_THRESHOLDS) {
    const layer = adminImpact.get(threshold);
    if (!layer) continue;
    const total = layer.rows.reduce((sum, row) => sum + row.probability, 0);
    if (total <= 0) break;
    max = threshold;
  }
  return max;
}

/**
 * Threshold expected totals are reported at: the reference threshold if
 * present, else the lowest present
 */
export function expectedThreshold(expected: ExpectedImpactSeries): WindThreshold | null {
  if (expected.has(REFERENCE_THRESHOLD)) {
    return REFERENCE_THRESHOLD;
  }
  return presentThresholds(expected)[0] ?? null;
}

// ============================================================================
// Sections
// ============================================================================

function truncatedSum(layer: ExpectedImpactLayer, attribute: ZoneAttribute): number {
  return Math.trunc(sumExpected(layer, attribute));
}

function severityTotal(rows: readonly SeverityIndexRow[], pick: (row: SeverityIndexRow) => number | null): number {
  return Math.trunc(rows.reduce((sum, row) => sum + (pick(row) ?? 0), 0));
}

function buildTotals(
  layer: ExpectedImpactLayer,
  threshold: WindThreshold,
  zoneSeverity: readonly SeverityIndexRow[]
): ReportTotals {
  const expectedSchoolAge = truncatedSum(layer, 'schoolAgePopulation');
  const expectedInfants = truncatedSum(layer, 'infantPopulation');
  return {
    expectedChildren: expectedSchoolAge + expectedInfants,
    expectedSchoolAge,
    expectedInfants,
    expectedPopulation: truncatedSum(layer, 'population'),
    expectedSchools: truncatedSum(layer, 'numSchools'),
    expectedHealthCenters: truncatedSum(layer, 'numHealthCenters'),
    referenceThreshold: threshold,
    cciChildren: severityTotal(zoneSeverity, (row) => row.expected.children),
    cciSchoolAge: severityTotal(zoneSeverity, (row) => row.expected.schoolAge),
    cciInfants: severityTotal(zoneSeverity, (row) => row.expected.infants),
    cciPopulation: severityTotal(zoneSeverity, (row) => row.expected.population),
  };
}

export function buildChildrenChange(current: number, previous: ImpactReport | null): ChildrenChange {
  const change = diffMetric(
    current,
    previousValue(previous, (report) => report.totals, (totals) => totals.expectedChildren)
  );
  return {
    direction: change.direction,
    delta: formatSignedDelta(change.delta),
    percentage: change.percentage,
  };
}

function buildThresholdRows(expected: ExpectedImpactSeries, previous: ImpactReport | null): ThresholdBreakdown[] {
  const rows: ThresholdBreakdown[] = [];
  for (const threshold of presentThresholds(expected)) {
    const layer = expected.get(threshold);
    if (!layer) continue;

    const expectedSchoolAge = truncatedSum(layer, 'schoolAgePopulation');
    const expectedInfants = truncatedSum(layer, 'infantPopulation');
    const current = {
      expectedPopulation: truncatedSum(layer, 'population'),
      expectedSchoolAge,
      expectedInfants,
      expectedChildren: expectedSchoolAge + expectedInfants,
      expectedSchools: truncatedSum(layer, 'numSchools'),
      expectedHealthCenters: truncatedSum(layer, 'numHealthCenters'),
    };

    const change = (pick: (row: ThresholdBreakdown) => number, value: number): number =>
      diffMetric(
        value,
        previousValue(previous, (report) => report.thresholds.find((row) => row.threshold === threshold), pick)
      ).delta;

    rows.push({
      threshold,
      category: STORM_CATEGORIES[threshold],
      ...current,
      changePopulation: change((row) => row.expectedPopulation, current.expectedPopulation),
      changeSchoolAge: change((row) => row.expectedSchoolAge, current.expectedSchoolAge),
      changeInfants: change((row) => row.expectedInfants, current.expectedInfants),
      changeChildren: change((row) => row.expectedChildren, current.expectedChildren),
      changeSchools: change((row) => row.expectedSchools, current.expectedSchools),
      changeHealthCenters: change((row) => row.expectedHealthCenters, current.expectedHealthCenters),
    });
  }
  return rows;
}

type AdminSection = 'population' | 'schoolAge' | 'infants' | 'schools' | 'healthCenters';

const ADMIN_SECTION_ATTRIBUTE: Readonly<Record<AdminSection, ZoneAttribute>> = {
  population: 'population',
  schoolAge: 'schoolAgePopulation',
  infants: 'infantPopulation',
  schools: 'numSchools',
  healthCenters: 'numHealthCenters',
};

const ADMIN_SECTION_CCI: Partial<Record<AdminSection, (row: SeverityIndexRow) => number | null>> = {
  population: (row) => row.expected.population,
  schoolAge: (row) => row.expected.schoolAge,
  infants: (row) => row.expected.infants,
};

function buildAdminRows(
  section: AdminSection,
  admins: readonly AdminUnit[],
  adminImpact: AdminImpactSeries,
  adminSeverity: readonly SeverityIndexRow[],
  previous: ImpactReport | null
): AdminRow[] {
  const attribute = ADMIN_SECTION_ATTRIBUTE[section];
  const cciOf = ADMIN_SECTION_CCI[section];
  const severityById = new Map(adminSeverity.map((row) => [row.id, row] as const));

  return admins.map((admin) => {
    const values = WIND_THRESHOLDS.map((threshold) => {
      const row = adminImpact.get(threshold)?.rows.find((candidate) => candidate.adminId === admin.id);
      const value = Math.trunc(row?.expected[attribute] ?? 0);
      const prior = previousValue(
        previous,
        (report) =>
          report.admins[section]
            .find((candidate) => candidate.adminId === admin.id)
            ?.values.find((entry) => entry.threshold === threshold),
        (entry) => entry.value
      );
      return { threshold, value, change: diffMetric(value, prior).delta };
    });

    if (!cciOf) {
      return { adminId: admin.id, name: admin.name, values };
    }
    const severity = severityById.get(admin.id);
    const cci = severity ? cciOf(severity) : null;
    return { adminId: admin.id, name: admin.name, values, cci: Math.trunc(cci ?? 0) };
  });
}

// ============================================================================
// Report
// ============================================================================

export function buildReport(inputs: ReportInputs, options: ReportBuilderOptions = {}): ReportOutcome {
  const intervalHours = options.intervalHours ?? FORECAST_INTERVAL_HOURS;
  const topFacilities = options.topFacilities ?? TOP_FACILITIES_COUNT;

  const maxWind = maxImpactThreshold(inputs.adminImpact);
  const reference = expectedThreshold(inputs.expected);
  const referenceLayer = reference === null ? undefined : inputs.expected.get(reference);
  if (maxWind === null || reference === null || !referenceLayer) {
    return { status: 'no-impact', region: inputs.region.code };
  }

  const issued = parseIssuance(inputs.key.issuedAt);
  const totals = buildTotals(referenceLayer, reference, inputs.zoneSeverity);
  const zonesById = new Map(inputs.zones.map((zone) => [zone.id, zone] as const));
  const adminRows = (section: AdminSection): AdminRow[] =>
    buildAdminRows(section, inputs.admins, inputs.adminImpact, inputs.adminSeverity, inputs.previous);

  const report = ImpactReportSchema.parse({
    version: REPORT_VERSION,
    identity: {
      region: inputs.region.code,
      regionName: inputs.region.name,
      stormId: inputs.key.stormId,
      issuedAt: issued.toISOString(),
      forecastDate: formatForecastDate(issued),
      stormCategory: STORM_CATEGORIES[maxWind],
      maxWindThreshold: maxWind,
      expectedLandfall: inputs.expectedLandfall,
      nextForecastDate: formatForecastDate(addHours(issued, intervalHours)),
      reportDate: formatForecastDate(inputs.reportDate),
    },
    totals,
    childrenChange: buildChildrenChange(totals.expectedChildren, inputs.previous),
    thresholds: buildThresholdRows(inputs.expected, inputs.previous),
    facilities: {
      schools: rankFacilities(inputs.schools, topFacilities),
      healthCenters: rankFacilities(inputs.healthCenters, topFacilities),
    },
    vulnerability: computeVulnerability(referenceLayer, zonesById),
    admins: {
      population: adminRows('population'),
      schoolAge: adminRows('schoolAge'),
      infants: adminRows('infants'),
      schools: adminRows('schools'),
      healthCenters: adminRows('healthCenters'),
    },
  } satisfies ImpactReport);

  return { status: 'report', report };
}
