/**
 * Report Sections
 *
 * Flattens one part of an impact report into rows and columns for the
 * output formatters.
 *
 * @module cli/commands/report/sections
 */

import { WIND_THRESHOLDS } from '../../../core/constants.js';
import type { AdminRow, ImpactReport } from '../../../schemas/report.js';
import { formatters, type TableColumn } from '../../lib/output.js';

export const REPORT_SECTIONS = [
  'summary',
  'thresholds',
  'facilities',
  'vulnerability',
  'population',
  'school-age',
  'infants',
  'schools',
  'health',
] as const;

export type ReportSection = (typeof REPORT_SECTIONS)[number];

export function isReportSection(value: string): value is ReportSection {
  return REPORT_SECTIONS.some((section) => section === value);
}

export interface SectionTable {
  readonly rows: Array<Record<string, unknown>>;
  readonly columns: TableColumn[];
}

const ADMIN_SECTIONS = {
  population: 'population',
  'school-age': 'schoolAge',
  infants: 'infants',
  schools: 'schools',
  health: 'healthCenters',
} as const satisfies Partial<Record<ReportSection, keyof ImpactReport['admins']>>;

const count = { align: 'right', formatter: formatters.number } as const;

function summaryTable(report: ImpactReport): SectionTable {
  const { identity, totals, childrenChange } = report;
  const fields: Array<readonly [string, unknown]> = [
    ['Region', `${identity.regionName} (${identity.region})`],
    ['Storm', identity.stormId],
    ['Forecast date', identity.forecastDate],
    ['Category', identity.stormCategory],
    ['Max wind threshold', `${identity.maxWindThreshold} kt`],
    ['Expected landfall', identity.expectedLandfall],
    ['Next forecast', identity.nextForecastDate],
    ['Report date', identity.reportDate],
    ['Reference threshold', `${totals.referenceThreshold} kt`],
    ['Expected population', formatters.number(totals.expectedPopulation)],
    ['Expected children', formatters.number(totals.expectedChildren)],
    ['Expected school-age', formatters.number(totals.expectedSchoolAge)],
    ['Expected infants', formatters.number(totals.expectedInfants)],
    ['Expected schools', formatters.number(totals.expectedSchools)],
    ['Expected health centers', formatters.number(totals.expectedHealthCenters)],
    ['Children change', `${childrenChange.direction} ${childrenChange.delta} (${formatters.percentage(childrenChange.percentage)})`],
    ['CCI children', totals.cciChildren],
    ['CCI school-age', totals.cciSchoolAge],
    ['CCI infants', totals.cciInfants],
    ['CCI population', totals.cciPopulation],
  ];
  return {
    rows: fields.map(([field, value]) => ({ field, value })),
    columns: [
      { key: 'field', header: 'Field' },
      { key: 'value', header: 'Value' },
    ],
  };
}

function thresholdTable(report: ImpactReport): SectionTable {
  return {
    rows: report.thresholds.map((row) => ({ ...row })),
    columns: [
      { key: 'threshold', header: 'Threshold', align: 'right' },
      { key: 'category', header: 'Category' },
      { key: 'expectedPopulation', header: 'Population', ...count },
      { key: 'changePopulation', header: 'Change', ...count },
      { key: 'expectedChildren', header: 'Children', ...count },
      { key: 'changeChildren', header: 'Change', ...count },
      { key: 'expectedSchools', header: 'Schools', ...count },
      { key: 'expectedHealthCenters', header: 'Health', ...count },
    ],
  };
}

function facilityTable(report: ImpactReport): SectionTable {
  const rankings = [
    ['school', report.facilities.schools],
    ['health', report.facilities.healthCenters],
  ] as const;
  return {
    rows: rankings.flatMap(([kind, ranking]) =>
      ranking.facilities.map((facility) => ({ kind, threshold: ranking.threshold, ...facility }))
    ),
    columns: [
      { key: 'kind', header: 'Kind' },
      { key: 'rank', header: 'Rank', align: 'right' },
      { key: 'name', header: 'Name' },
      { key: 'detail', header: 'Detail' },
      { key: 'probability', header: 'Probability', align: 'right', formatter: formatters.probability },
      { key: 'threshold', header: 'Threshold', align: 'right' },
    ],
  };
}

function vulnerabilityTable(report: ImpactReport): SectionTable {
  const groups = [
    ['population', report.vulnerability.population],
    ['school-age', report.vulnerability.schoolAge],
    ['infants', report.vulnerability.infants],
  ] as const;
  return {
    rows: groups.map(([group, split]) => ({ group, ...split })),
    columns: [
      { key: 'group', header: 'Group' },
      { key: 'urban', header: 'Urban', ...count },
      { key: 'rural', header: 'Rural', ...count },
      { key: 'poverty', header: 'Poverty', ...count },
      { key: 'severePoverty', header: 'Severe poverty', ...count },
    ],
  };
}

function adminTable(rows: readonly AdminRow[]): SectionTable {
  const withCci = rows.some((row) => row.cci !== undefined);
  const thresholdColumns: TableColumn[] = WIND_THRESHOLDS.map((threshold) => ({
    key: `t${threshold}`,
    header: `${threshold}kt`,
    ...count,
  }));

  return {
    rows: rows.map((row) => {
      const flat: Record<string, unknown> = { adminId: row.adminId, name: row.name };
      for (const entry of row.values) {
        flat[`t${entry.threshold}`] = entry.value;
      }
      if (row.cci !== undefined) {
        flat.cci = row.cci;
      }
      return flat;
    }),
    columns: [
      { key: 'adminId', header: 'Id' },
      { key: 'name', header: 'Name' },
      ...thresholdColumns,
      ...(withCci ? [{ key: 'cci', header: 'CCI', ...count }] : []),
    ],
  };
}

export function sectionTable(report: ImpactReport, section: ReportSection): SectionTable {
  switch (section) {
    case 'summary':
      return summaryTable(report);
    case 'thresholds':
      return thresholdTable(report);
    case 'facilities':
      return facilityTable(report);
    case 'vulnerability':
      return vulnerabilityTable(report);
    case 'population':
    case 'school-age':
    case 'infants':
    case 'schools':
    case 'health':
      return adminTable(report.admins[ADMIN_SECTIONS[section]]);
  }
}
