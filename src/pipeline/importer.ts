import { config } from '../config.js';
import type { CategoryLookup, CategoryTable, RawRow } from '../types/location.js';
import type { ImportStore } from '../types/store.js';
import { delayConfirm } from '../utils/confirm.js';
import { logger } from '../utils/logger.js';
import { createReporter, type Reporter } from '../utils/reporter.js';
import { ImportError } from './errors.js';
import { internColumn } from './interner.js';
import { loadLocations, toLookup } from './location-loader.js';
import { loadNeighborhoodIndex } from './neighborhood-index.js';
import { readRowsFromFile } from './row-reader.js';

export type ImportState =
  | 'start'
  | 'check-prereqs'
  | 'overwrite'
  | 'warn-append'
  | 'read-data'
  | 'intern-building-use'
  | 'intern-watershed'
  | 'load-locations'
  | 'done';

export interface ImportOptions {
  /** Path to the survey CSV */
  file: string;
  /** Delete existing locations and watersheds first */
  overwrite?: boolean;
  /** Compute and report everything, write nothing */
  dryRun?: boolean;
  quiet?: boolean;
  /**
   * Called before appending into a non-empty locations table.
   * Resolving false cancels the run. Defaults to a fixed delay.
   */
  confirm?: () => Promise<boolean>;
  reporter?: Reporter;
  onStateChange?: (state: ImportState) => void;
}

export interface ImportSummary {
  rows: number;
  buildingUses: number;
  watersheds: number;
  locations: number;
  skipped: number;
  dryRun: boolean;
}

/**
 * Loads a roof survey CSV: clears or warns about existing data, interns the
 * building use and watershed columns, then bulk inserts locations.
 *
 * Not atomic: a fatal error after an overwrite leaves the old data deleted.
 */
export class Importer {
  private readonly dryRun: boolean;
  private readonly reporter: Reporter;
  private readonly confirm: () => Promise<boolean>;

  constructor(
    private readonly store: ImportStore,
    private readonly options: ImportOptions,
  ) {
    this.dryRun = options.dryRun ?? false;
    this.reporter =
      options.reporter ?? createReporter(logger, { dryRun: this.dryRun, quiet: options.quiet });
    this.confirm = options.confirm ?? delayConfirm(config.IMPORT_CONFIRM_DELAY_MS);
  }

  async run(): Promise<ImportSummary> {
    this.enter('start');

    this.enter('check-prereqs');
    if ((await this.store.countNeighborhoods()) === 0) {
      this.reporter.advise('WARNING: Neighborhoods have not been imported.');
    }

    if (this.options.overwrite) {
      this.enter('overwrite');
      await this.removeExisting();
    } else if ((await this.store.countLocations()) > 0) {
      this.enter('warn-append');
      this.reporter.advise('Importing locations without removing existing records.');
      this.reporter.advise('This will likely FAIL due to duplicate key violations.');
      if (!(await this.confirm())) {
        throw new ImportError('Import cancelled; rerun with --overwrite to replace existing locations');
      }
    }

    this.enter('read-data');
    const rows = await this.readData();

    this.enter('intern-building-use');
    const buildingUses = await internColumn(rows, 'building_use', 'building_uses', this.stepOptions());

    this.enter('intern-watershed');
    const watersheds = await internColumn(rows, 'watershed', 'watersheds', this.stepOptions());

    this.enter('load-locations');
    const result = await loadLocations(
      rows,
      {
        buildingUses: await this.lookup('building_uses', buildingUses),
        watersheds: await this.lookup('watersheds', watersheds),
        neighborhoods: await loadNeighborhoodIndex(this.store),
      },
      this.stepOptions(),
    );

    this.enter('done');
    return {
      rows: rows.length,
      buildingUses: buildingUses.length,
      watersheds: watersheds.length,
      locations: result.locations.length,
      skipped: result.skipped,
      dryRun: this.dryRun,
    };
  }

  private enter(state: ImportState): void {
    logger.debug({ state, file: this.options.file }, 'Import state');
    this.options.onStateChange?.(state);
  }

  private stepOptions() {
    return { store: this.store, reporter: this.reporter, dryRun: this.dryRun };
  }

  private async removeExisting(): Promise<void> {
    this.reporter.info('Removing existing locations...');
    if (!this.dryRun) await this.store.deleteAllLocations();

    // Building uses are kept
    this.reporter.info('Removing existing watersheds...');
    if (!this.dryRun) await this.store.deleteAllWatersheds();
  }

  private async readData(): Promise<RawRow[]> {
    this.reporter.info(`Reading ${this.options.file}...`);
    const rows: RawRow[] = [];
    for await (const row of readRowsFromFile(this.options.file)) {
      rows.push(row);
    }
    this.reporter.info(`Read ${rows.length} rows`);
    return rows;
  }

  /**
   * Lookup for a reference table. In a dry run nothing was inserted, so the
   * values interned this run are stood in with placeholder records.
   */
  private async lookup(table: CategoryTable, interned: readonly string[]): Promise<CategoryLookup> {
    const lookup = toLookup(await this.store.fetchCategoricalValues(table));
    if (this.dryRun) {
      let placeholderId = 0;
      for (const name of interned) {
        if (!lookup.has(name)) lookup.set(name, { id: --placeholderId, name });
      }
    }
    return lookup;
  }
}
