/**
 * Vulnerability Breakdown
 *
 * Splits expected population, school-age and infant totals of the exposed
 * tiles (probability > 0) by settlement class and by wealth band. A tile
 * whose classifying attribute is missing is left out of that split only.
 */

import {
  POVERTY_RWI_THRESHOLD,
  SEVERE_RWI_THRESHOLD,
  URBAN_SMOD_THRESHOLD,
} from '../core/constants.js';
import type { ExpectedImpactLayer, Zone, ZoneAttribute } from '../core/types/index.js';
import type { Vulnerability, VulnerabilitySplit } from '../schemas/report.js';

type SplitBand = keyof VulnerabilitySplit;

const VULNERABILITY_ATTRIBUTES = {
  population: 'population',
  schoolAge: 'schoolAgePopulation',
  infants: 'infantPopulation',
} as const satisfies Record<keyof Vulnerability, ZoneAttribute>;

/**
 * Bands a tile falls into, from its baseline settlement class and wealth index
 */
export function classifyZone(zone: Zone): SplitBand[] {
  const bands: SplitBand[] = [];
  const { smodClass, rwi } = zone.attributes;

  if (smodClass !== null) {
    bands.push(smodClass >= URBAN_SMOD_THRESHOLD ? 'urban' : 'rural');
  }
  if (rwi !== null) {
    if (rwi < SEVERE_RWI_THRESHOLD) {
      bands.push('severePoverty');
    } else if (rwi < POVERTY_RWI_THRESHOLD) {
      bands.push('poverty');
    }
  }
  return bands;
}

function emptySplit(): Record<SplitBand, number> {
  return { urban: 0, rural: 0, poverty: 0, severePoverty: 0 };
}

/**
 * Vulnerability totals from the reference-threshold expected layer
 *
 * Totals are truncated to integers.
 */
export function computeVulnerability(
  layer: ExpectedImpactLayer | undefined,
  zones: ReadonlyMap<string, Zone>
): Vulnerability {
  const totals = {
    population: emptySplit(),
    schoolAge: emptySplit(),
    infants: emptySplit(),
  };

  for (const row of layer?.rows ?? []) {
    if (row.probability <= 0) continue;
    const zone = zones.get(row.zoneId);
    if (!zone) continue;

    const bands = classifyZone(zone);
    for (const group of ['population', 'schoolAge', 'infants'] as const) {
      const value = row.expected[VULNERABILITY_ATTRIBUTES[group]];
      if (value === null) continue;
      for (const band of bands) {
        totals[group][band] += value;
      }
    }
  }

  return {
    population: truncateSplit(totals.population),
    schoolAge: truncateSplit(totals.schoolAge),
    infants: truncateSplit(totals.infants),
  };
}

function truncateSplit(split: Record<SplitBand, number>): VulnerabilitySplit {
  return {
    urban: Math.trunc(split.urban),
    rural: Math.trunc(split.rural),
    poverty: Math.trunc(split.poverty),
    severePoverty: Math.trunc(split.severePoverty),
  };
}
