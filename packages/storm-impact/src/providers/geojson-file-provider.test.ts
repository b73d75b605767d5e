import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { GeoJsonFileProvider } from './geojson-file-provider.js';
import { MissingDataError } from '../core/errors.js';
import { square } from '../__tests__/utils/fixtures.js';

function collection(features: readonly object[]): string {
  return JSON.stringify({ type: 'FeatureCollection', features });
}

describe('GeoJsonFileProvider', () => {
  let dataDir: string;
  let provider: GeoJsonFileProvider;

  beforeAll(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'storm-impact-provider-'));
    const regionDir = join(dataDir, 'ATL');
    await mkdir(regionDir, { recursive: true });

    await writeFile(
      join(regionDir, 'boundary.geojson'),
      collection([{ type: 'Feature', properties: { name: 'Atlantis' }, geometry: square(0, 0, 2) }])
    );
    await writeFile(
      join(regionDir, 'admin1.geojson'),
      collection([
        { type: 'Feature', properties: { id: 'A1', name: 'North' }, geometry: square(0, 0, 1) },
        { type: 'Feature', properties: { id: 'A2' }, geometry: square(1, 0, 1) },
        { type: 'Feature', properties: { id: 'A3' }, geometry: { type: 'Point', coordinates: [0, 0] } },
      ])
    );
    await writeFile(
      join(regionDir, 'tiles_14.geojson'),
      collection([
        { type: 'Feature', properties: { id: 't1', population: 120, rwi: -0.4 }, geometry: square(0, 0, 0.5) },
        { type: 'Feature', properties: { id: 't2', population: 'unknown' }, geometry: square(0.5, 0, 0.5) },
      ])
    );
    await writeFile(
      join(regionDir, 'schools.geojson'),
      collection([
        {
          type: 'Feature',
          properties: { id: 's1', name: 'North School', level: 'primary' },
          geometry: { type: 'Point', coordinates: [0.5, 0.5] },
        },
      ])
    );
    await writeFile(join(regionDir, 'health.geojson'), '{ not json');

    provider = new GeoJsonFileProvider(dataDir);
  });

  afterAll(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should read the region boundary with its display name', async () => {
    const boundary = await provider.regionBoundary('ATL');

    expect(boundary.code).toBe('ATL');
    expect(boundary.name).toBe('Atlantis');
    expect(boundary.geometry.type).toBe('Polygon');
  });

  it('should read polygonal admin units and name unnamed ones by id', async () => {
    const admins = await provider.adminUnits('ATL');

    expect(admins.map((admin) => [admin.id, admin.name])).toEqual([
      ['A1', 'North'],
      ['A2', 'A2'],
    ]);
  });

  it('should read the tile grid and numeric attribute layers', async () => {
    const grid = await provider.fetchZoneGrid('ATL', 14);
    const population = await provider.fetchAttributeLayer('ATL', 14, 'population');

    expect(grid.map((unit) => unit.id)).toEqual(['t1', 't2']);
    expect([...population]).toEqual([['t1', 120]]);
  });

  it('should report a layer no tile carries as missing', async () => {
    await expect(provider.fetchAttributeLayer('ATL', 14, 'smodClass')).rejects.toBeInstanceOf(MissingDataError);
  });

  it('should read facilities with their detail property', async () => {
    expect(await provider.fetchFacilities('ATL', 'school')).toEqual([
      { id: 's1', kind: 'school', name: 'North School', detail: 'primary', lon: 0.5, lat: 0.5 },
    ]);
  });

  it('should report unreadable or absent files as missing data', async () => {
    await expect(provider.fetchFacilities('ATL', 'healthCenter')).rejects.toBeInstanceOf(MissingDataError);
    await expect(provider.regionBoundary('NOPE')).rejects.toBeInstanceOf(MissingDataError);
  });
});
