/**
 * Composite Severity Index (CCI)
 *
 * Summarizes exposure across all thresholds with wind-speed-squared weights.
 * For ascending thresholds t1 < … < tk and a covered amount c(t):
 *
 *   marginal(i) = c(t_i) - c(t_{i+1})      (c(t_{k+1}) = 0)
 *   index       = Σ marginal(i) × t_i² × 1e-6
 *
 * The raw variant covers the full group value wherever probability > 0; the
 * expected variant covers group value × probability. The telescoping
 * difference assigns each person to one severity band only. Covered amounts
 * are first made non-increasing (c(t_i) = max over t_j >= t_i), so a zone
 * exposed only at the top threshold carries its full value at that weight.
 *
 * Every zone must carry an admin assignment before the index is computed.
 */

import {
  SEVERITY_WEIGHT_SCALE,
  presentThresholds,
  type WindThreshold,
} from '../core/constants.js';
import { ConfigurationError } from '../core/errors.js';
import {
  DEMOGRAPHIC_GROUPS,
  groupValue,
  type AdminUnit,
  type DemographicGroup,
  type ProbabilitySeries,
  type SeverityIndexRow,
  type SeverityValues,
  type SeverityVariant,
  type Zone,
} from '../core/types/index.js';
import { aggregateToAdmins, type ColumnSpec } from './hierarchical-aggregator.js';

/**
 * Index for one group value given its probability at each threshold
 *
 * @param probabilities - Probability per threshold, ascending threshold order
 */
export function severityIndex(
  value: number | null,
  probabilities: ReadonlyArray<readonly [WindThreshold, number]>,
  variant: SeverityVariant
): number | null {
  if (value === null) {
    return null;
  }

  const covered = probabilities.map(([, probability]) =>
    variant === 'raw' ? (probability > 0 ? value : 0) : value * probability
  );
  // Exposure at a higher threshold implies exposure below it; keeps every marginal >= 0
  for (let i = covered.length - 2; i >= 0; i--) {
    covered[i] = Math.max(covered[i], covered[i + 1]);
  }

  let index = 0;
  for (let i = 0; i < probabilities.length; i++) {
    const [threshold] = probabilities[i];
    const next = i + 1 < covered.length ? covered[i + 1] : 0;
    const marginal = covered[i] - next;
    index += marginal * threshold * threshold * SEVERITY_WEIGHT_SCALE;
  }
  return index;
}

function groupIndices(
  zone: Zone,
  probabilities: ReadonlyArray<readonly [WindThreshold, number]>,
  variant: SeverityVariant
): SeverityValues {
  const indexFor = (group: DemographicGroup): number | null =>
    severityIndex(groupValue(zone.attributes, group), probabilities, variant);
  return {
    children: indexFor('children'),
    schoolAge: indexFor('schoolAge'),
    infants: indexFor('infants'),
    population: indexFor('population'),
  };
}

/**
 * Zone whose admin assignment is known
 */
export type AssignedZone = Zone & { readonly adminId: string };

function isAssigned(zone: Zone): zone is AssignedZone {
  return zone.adminId !== undefined;
}

/**
 * Fail fast when any zone lacks its admin assignment
 */
export function requireAdminAssignment(zones: readonly Zone[], region?: string): AssignedZone[] {
  const assigned = zones.filter(isAssigned);
  if (assigned.length < zones.length) {
    const unassigned = zones.filter((zone) => !isAssigned(zone)).map((zone) => zone.id);
    throw new ConfigurationError(
      `${unassigned.length} zone(s) have no admin assignment; materialize base zones before computing the severity index`,
      { component: 'severity-index', region, offending: unassigned }
    );
  }
  return assigned;
}

/**
 * Per-zone composite index, 4 groups × 2 variants
 */
export function computeZoneSeverity(
  zones: readonly Zone[],
  probabilities: ProbabilitySeries,
  region?: string
): SeverityIndexRow[] {
  const assigned = requireAdminAssignment(zones, region);

  const thresholds = presentThresholds(probabilities);
  const lookup = new Map<WindThreshold, ReadonlyMap<string, number>>();
  for (const threshold of thresholds) {
    const layer = probabilities.get(threshold);
    if (layer) {
      lookup.set(threshold, new Map(layer.rows.map((row) => [row.zoneId, row.probability] as const)));
    }
  }

  return assigned.map((zone) => {
    const zoneProbabilities = thresholds.map(
      (threshold) => [threshold, lookup.get(threshold)?.get(zone.id) ?? 0] as const
    );
    return {
      id: zone.id,
      adminId: zone.adminId,
      raw: groupIndices(zone, zoneProbabilities, 'raw'),
      expected: groupIndices(zone, zoneProbabilities, 'expected'),
    };
  });
}

type SeverityColumn = `${SeverityVariant}.${DemographicGroup}`;

const SEVERITY_COLUMNS: readonly ColumnSpec<SeverityColumn>[] = DEMOGRAPHIC_GROUPS.flatMap((group) => [
  { column: `raw.${group}` as const, kind: 'sum' as const },
  { column: `expected.${group}` as const, kind: 'sum' as const },
]);

function severityColumns(row: SeverityIndexRow): Record<SeverityColumn, number | null> {
  return {
    'raw.children': row.raw.children,
    'raw.schoolAge': row.raw.schoolAge,
    'raw.infants': row.raw.infants,
    'raw.population': row.raw.population,
    'expected.children': row.expected.children,
    'expected.schoolAge': row.expected.schoolAge,
    'expected.infants': row.expected.infants,
    'expected.population': row.expected.population,
  };
}

/**
 * Sum zone indices per admin unit
 */
export function computeAdminSeverity(
  zoneRows: readonly SeverityIndexRow[],
  admins: readonly AdminUnit[]
): SeverityIndexRow[] {
  const aggregated = aggregateToAdmins(
    zoneRows.map((row) => ({ adminId: row.adminId, values: severityColumns(row) })),
    SEVERITY_COLUMNS,
    admins.map((admin) => admin.id)
  );

  return admins.map((admin) => {
    const values = aggregated.get(admin.id);
    const pick = (variant: SeverityVariant): SeverityValues => ({
      children: values?.get(`${variant}.children`) ?? null,
      schoolAge: values?.get(`${variant}.schoolAge`) ?? null,
      infants: values?.get(`${variant}.infants`) ?? null,
      population: values?.get(`${variant}.population`) ?? null,
    });
    return { id: admin.id, adminId: admin.id, raw: pick('raw'), expected: pick('expected') };
  });
}
