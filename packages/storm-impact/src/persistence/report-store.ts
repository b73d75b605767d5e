/**
 * Report Store
 *
 * Reports are written once per (region, storm, issuance) as pretty JSON and
 * read back for diffing the next issuance. An unreadable previous report is
 * treated as absent, with a warning.
 */

import type { ForecastKey } from '../core/types/index.js';
import { silentLogger, type PipelineLogger } from '../core/utils/logger.js';
import { parseReport, type ImpactReport } from '../schemas/report.js';
import type { ReportLookup } from '../services/forecast-diff.js';
import { StorageLayout } from './layout.js';
import type { StorageBackend } from './storage.js';

export class ReportStore implements ReportLookup {
  constructor(
    private readonly storage: StorageBackend,
    private readonly logger: PipelineLogger = silentLogger
  ) {}

  async save(report: ImpactReport): Promise<string> {
    const path = StorageLayout.report(report.identity.region, {
      stormId: report.identity.stormId,
      issuedAt: report.identity.issuedAt,
    });
    await this.storage.writeText(path, JSON.stringify(report, null, 2) + '\n');
    return path;
  }

  async exists(region: string, key: ForecastKey): Promise<boolean> {
    return this.storage.exists(StorageLayout.report(region, key));
  }

  async load(region: string, key: ForecastKey): Promise<ImpactReport | null> {
    return this.read(StorageLayout.report(region, key));
  }

  /**
   * Every readable report, ordered by issuance then region
   */
  async list(): Promise<ImpactReport[]> {
    const directory = StorageLayout.reportsDirectory();
    const names = await this.storage.list(directory);
    const reports: ImpactReport[] = [];
    for (const name of names) {
      if (!name.endsWith('.json')) continue;
      const report = await this.read(`${directory}/${name}`);
      if (report) reports.push(report);
    }
    return reports.sort(
      (a, b) =>
        a.identity.issuedAt.localeCompare(b.identity.issuedAt) || a.identity.region.localeCompare(b.identity.region)
    );
  }

  private async read(path: string): Promise<ImpactReport | null> {
    const content = await this.storage.readText(path);
    if (content === null) {
      return null;
    }

    let value: unknown;
    try {
      value = JSON.parse(content);
    } catch (error) {
      this.logger.warn(`Ignoring unreadable report ${path}`, { error: String(error) });
      return null;
    }

    const parsed = parseReport(value);
    if (!parsed.success) {
      this.logger.warn(`Ignoring invalid report ${path}`, { error: parsed.error });
      return null;
    }
    return parsed.data;
  }
}
