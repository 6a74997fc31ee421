import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Importer, type ImportOptions, type ImportState } from '../../src/pipeline/importer.js';
import { CategoryLookupError, FieldNameError, ImportError } from '../../src/pipeline/errors.js';
import { logger } from '../../src/utils/logger.js';
import { fixturePath } from '../helpers/fixture-loader.js';
import { MemoryStore, recordingReporter, squareNeighborhood } from '../helpers/memory-store.js';

const SAMPLE = fixturePath('surveys', 'sample.csv');

describe('Importer', () => {
  let store: MemoryStore;
  let recorder: ReturnType<typeof recordingReporter>;
  let states: ImportState[];

  function importer(options: Partial<ImportOptions> = {}): Importer {
    return new Importer(store, {
      file: SAMPLE,
      reporter: recorder.reporter,
      confirm: async () => true,
      onStateChange: (state) => states.push(state),
      ...options,
    });
  }

  function advisories(): string[] {
    return recorder.lines.filter((l) => l.level === 'advise').map((l) => l.message);
  }

  beforeEach(() => {
    store = new MemoryStore();
    store.neighborhoods = [squareNeighborhood(7, 'Downtown', [-122.62, 45.49], [-122.59, 45.51])];
    recorder = recordingReporter();
    states = [];
  });

  it('should import the sample survey into an empty store', async () => {
    const summary = await importer().run();

    expect(summary).toEqual({
      rows: 5,
      buildingUses: 4,
      watersheds: 3,
      locations: 3,
      skipped: 2,
      dryRun: false,
    });
    expect(store.tables.building_uses.map((r) => r.name)).toEqual([
      'Commercial',
      'Industrial',
      'Institutional',
      'Multi-Family Residential',
    ]);
    expect(store.tables.watersheds.map((r) => r.name)).toEqual([
      'Columbia Slough',
      'Johnson Creek',
      'Willamette River',
    ]);
    expect(store.locations.map((l) => [l.name, l.point])).toEqual([
      ['Green Roof One', 'POINT(-122.6 45.5)'],
      ['Library Annex', 'POINT(-122.65 45.52)'],
      ['Green Roof One-1', 'POINT(-122.58 45.53)'],
    ]);
    expect(advisories()).toEqual([]);
  });

  it('should link locations to their categories and neighborhood', async () => {
    await importer().run();

    const idOf = (table: 'building_uses' | 'watersheds', name: string) =>
      store.tables[table].find((r) => r.name === name)?.id;
    const [first, second, third] = store.locations;

    expect(first?.buildingUseId).toBe(idOf('building_uses', 'Commercial'));
    expect(first?.watershedId).toBe(idOf('watersheds', 'Willamette River'));
    expect(first?.neighborhoodId).toBe(7);
    expect(second?.neighborhoodId).toBeNull();
    expect(third?.buildingUseId).toBe(idOf('building_uses', 'Multi-Family Residential'));
    expect(third?.watershedId).toBeNull();
  });

  it('should move through the states in order', async () => {
    await importer().run();

    expect(states).toEqual([
      'start',
      'check-prereqs',
      'read-data',
      'intern-building-use',
      'intern-watershed',
      'load-locations',
      'done',
    ]);
  });

  it('should report the same counts in a dry run without writing', async () => {
    const summary = await importer({ dryRun: true }).run();

    expect(summary).toEqual({
      rows: 5,
      buildingUses: 4,
      watersheds: 3,
      locations: 3,
      skipped: 2,
      dryRun: true,
    });
    expect(store.tables.building_uses).toEqual([]);
    expect(store.tables.watersheds).toEqual([]);
    expect(store.locations).toEqual([]);
    expect(store.calls).toEqual([]);
  });

  it('should remove locations and watersheds but keep building uses on overwrite', async () => {
    const legacyUse = store.seedCategory('building_uses', 'Legacy Use');
    const oldWatershed = store.seedCategory('watersheds', 'Old Watershed');
    store.locations = [
      {
        id: 100,
        name: 'Old Roof',
        slug: 'old-roof',
        point: 'POINT(-122.7 45.6)',
        buildingUseId: legacyUse.id,
        watershedId: oldWatershed.id,
        neighborhoodId: null,
      },
    ];

    await importer({ overwrite: true }).run();

    expect(store.calls.slice(0, 2)).toEqual(['deleteAllLocations', 'deleteAllWatersheds']);
    expect(store.locations.map((l) => l.name)).toEqual(['Green Roof One', 'Library Annex', 'Green Roof One-1']);
    expect(store.tables.watersheds.map((r) => r.name)).not.toContain('Old Watershed');
    expect(store.tables.building_uses.map((r) => r.name)).toContain('Legacy Use');
    expect(store.tables.building_uses).toHaveLength(5);
    expect(states).toContain('overwrite');
  });

  it('should leave existing data alone in an overwrite dry run', async () => {
    store.seedCategory('watersheds', 'Old Watershed');

    await importer({ overwrite: true, dryRun: true }).run();

    expect(store.calls).toEqual([]);
    expect(store.tables.watersheds.map((r) => r.name)).toEqual(['Old Watershed']);
  });

  describe('appending to existing locations', () => {
    beforeEach(() => {
      const use = store.seedCategory('building_uses', 'Legacy Use');
      store.locations = [
        {
          id: 100,
          name: 'Old Roof',
          slug: 'old-roof',
          point: 'POINT(-122.7 45.6)',
          buildingUseId: use.id,
          watershedId: null,
          neighborhoodId: null,
        },
      ];
    });

    it('should warn and ask for confirmation before going ahead', async () => {
      const confirm = vi.fn(async () => true);

      const summary = await importer({ confirm }).run();

      expect(confirm).toHaveBeenCalledOnce();
      expect(advisories()).toEqual([
        'Importing locations without removing existing records.',
        'This will likely FAIL due to duplicate key violations.',
      ]);
      expect(summary.locations).toBe(3);
      expect(store.locations).toHaveLength(4);
      expect(states.slice(0, 4)).toEqual(['start', 'check-prereqs', 'warn-append', 'read-data']);
    });

    it('should stop without writing when confirmation is refused', async () => {
      const run = importer({ confirm: async () => false }).run();

      await expect(run).rejects.toBeInstanceOf(ImportError);
      await expect(run).rejects.toThrow('Import cancelled; rerun with --overwrite to replace existing locations');
      expect(store.calls).toEqual([]);
      expect(states).not.toContain('read-data');
    });

    it('should fail on names that already exist in the store', async () => {
      store.locations = store.locations.map((l) => ({ ...l, name: 'Library Annex', slug: 'library-annex' }));

      await expect(importer().run()).rejects.toThrow(
        'duplicate key value violates unique constraint "locations_name_key"',
      );
    });
  });

  it('should warn when neighborhoods have not been imported', async () => {
    store.neighborhoods = [];

    const summary = await importer({ quiet: true }).run();

    expect(advisories()).toEqual(['WARNING: Neighborhoods have not been imported.']);
    expect(summary.locations).toBe(3);
    expect(store.locations.every((l) => l.neighborhoodId === null)).toBe(true);
  });

  it('should fail a second run without overwrite on existing building uses', async () => {
    await importer().run();
    store.locations = [];

    await expect(importer().run()).rejects.toThrow(
      'duplicate key value violates unique constraint "building_uses_name_key"',
    );
  });

  it('should abort when a row has no building use', async () => {
    const run = importer({ file: fixturePath('surveys', 'missing-use.csv') }).run();

    await expect(run).rejects.toBeInstanceOf(CategoryLookupError);
    await expect(run).rejects.toThrow(/^Expected a value for building_use in /);
    expect(store.locations).toEqual([]);
  });

  it('should abort on a header that is not a valid identifier', async () => {
    await expect(importer({ file: fixturePath('surveys', 'bad-header.csv') }).run()).rejects.toBeInstanceOf(
      FieldNameError,
    );
    expect(store.calls).toEqual([]);
  });

  describe('default reporter', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    function captureLogger() {
      return {
        info: vi.spyOn(logger, 'info').mockImplementation(() => {}),
        warn: vi.spyOn(logger, 'warn').mockImplementation(() => {}),
      };
    }

    it('should prefix progress with [DRY RUN] in a dry run', async () => {
      const { info, warn } = captureLogger();

      await new Importer(store, { file: SAMPLE, dryRun: true }).run();

      expect(info).toHaveBeenCalledWith('[DRY RUN] Extracting building_use values...');
      expect(info).toHaveBeenCalledWith('[DRY RUN] Creating 3 locations...');
      expect(warn).toHaveBeenCalledWith(
        '[DRY RUN] Coordinates not set for location "Depot Roof": POINT(null 45.49); skipping',
      );
    });

    it('should only log advisories when quiet', async () => {
      const { info, warn } = captureLogger();
      store.neighborhoods = [];

      await new Importer(store, { file: SAMPLE, quiet: true }).run();

      expect(info).not.toHaveBeenCalled();
      expect(warn.mock.calls).toEqual([['WARNING: Neighborhoods have not been imported.']]);
    });
  });
});
