/**
 * Ensemble Member Severity
 *
 * Per threshold and per ensemble member: facilities inside that member's
 * envelope and the summed exposure of the tiles it touches. Feeds the track
 * views. A metric that cannot be computed is reported as 0 with a warning.
 */

import { FACILITY_BUFFER_METERS, WIND_THRESHOLDS, type WindThreshold } from '../core/constants.js';
import { describeError } from '../core/errors.js';
import type {
  Facility,
  HazardEnvelope,
  MemberSeverityRow,
  MemberSeveritySeries,
  Zone,
  ZoneAttribute,
} from '../core/types/index.js';
import { silentLogger, type PipelineLogger } from '../core/utils/logger.js';
import { facilityToUnit, type SpatialUnit, type ZonalIntersector } from '../providers/zonal-intersector.js';
import { groupEnvelopesByThreshold } from './exceedance-probability.js';

export interface MemberSeverityInput {
  readonly zones: readonly Zone[];
  readonly schools: readonly Facility[];
  readonly healthCenters: readonly Facility[];
  readonly envelopes: readonly HazardEnvelope[];
}

export interface MemberSeverityOptions {
  readonly bufferMeters?: number;
  readonly logger?: PipelineLogger;
}

type TileSums = Pick<MemberSeverityRow, 'population' | 'schoolAgePopulation' | 'infantPopulation' | 'builtSurfaceM2'>;

/**
 * Units covered by each member, inverted from the intersector's per-unit answer
 */
function unitsByMember(
  units: readonly SpatialUnit[],
  envelopes: readonly HazardEnvelope[],
  intersector: ZonalIntersector
): ReadonlyMap<number, readonly string[]> {
  const covering = intersector.coveringMembers(units, envelopes);
  const byMember = new Map<number, string[]>();
  for (const unit of units) {
    for (const member of covering.get(unit.id) ?? []) {
      const bucket = byMember.get(member);
      if (bucket) {
        bucket.push(unit.id);
      } else {
        byMember.set(member, [unit.id]);
      }
    }
  }
  return byMember;
}

export class MemberSeverityCalculator {
  private readonly bufferMeters: number;
  private readonly logger: PipelineLogger;

  constructor(
    private readonly intersector: ZonalIntersector,
    options: MemberSeverityOptions = {}
  ) {
    this.bufferMeters = options.bufferMeters ?? FACILITY_BUFFER_METERS;
    this.logger = options.logger ?? silentLogger;
  }

  compute(input: MemberSeverityInput): MemberSeveritySeries {
    const grouped = groupEnvelopesByThreshold(input.envelopes);
    const zonesById = new Map(input.zones.map((zone) => [zone.id, zone] as const));
    const schoolUnits = input.schools.map((facility) => facilityToUnit(facility, this.bufferMeters));
    const healthUnits = input.healthCenters.map((facility) => facilityToUnit(facility, this.bufferMeters));

    const series = new Map<WindThreshold, MemberSeverityRow[]>();
    for (const threshold of WIND_THRESHOLDS) {
      const envelopes = grouped.get(threshold);
      if (!envelopes) continue;

      const members = [...new Set(envelopes.map((envelope) => envelope.ensembleMember))].sort((a, b) => a - b);
      const schools = this.safeCoverage('schools', threshold, schoolUnits, envelopes);
      const health = this.safeCoverage('health facilities', threshold, healthUnits, envelopes);
      const tiles = this.safeCoverage('tiles', threshold, input.zones, envelopes);

      series.set(
        threshold,
        members.map((member) => ({
          ensembleMember: member,
          schools: schools.get(member)?.length ?? 0,
          healthCenters: health.get(member)?.length ?? 0,
          ...sumTiles(tiles.get(member) ?? [], zonesById),
        }))
      );
    }
    return series;
  }

  private safeCoverage(
    label: string,
    threshold: WindThreshold,
    units: readonly SpatialUnit[],
    envelopes: readonly HazardEnvelope[]
  ): ReadonlyMap<number, readonly string[]> {
    if (units.length === 0) {
      return new Map();
    }
    try {
      return unitsByMember(units, envelopes, this.intersector);
    } catch (error) {
      this.logger.warn(`Member coverage of ${label} failed at ${threshold} kt, reporting 0`, {
        error: describeError(error),
      });
      return new Map();
    }
  }
}

function sumTiles(tileIds: readonly string[], zonesById: ReadonlyMap<string, Zone>): TileSums {
  const sum = (attribute: ZoneAttribute): number =>
    tileIds.reduce((total, id) => total + (zonesById.get(id)?.attributes[attribute] ?? 0), 0);
  return {
    population: sum('population'),
    schoolAgePopulation: sum('schoolAgePopulation'),
    infantPopulation: sum('infantPopulation'),
    builtSurfaceM2: sum('builtSurfaceM2'),
  };
}
