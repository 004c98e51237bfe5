import { Test } from '@nestjs/testing';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { DimensionMismatchError } from '../common/errors/skyvision.errors';
import { writeJsonFile } from '../common/utils/file.util';
import { EntityStore } from '../modules/catalog/entity-store';
import { EntityLoaderService, absoluteUrl } from '../modules/pipeline/entity-loader.service';
import { MEDIA_COLUMNS } from '../modules/pipeline/media-table';
import { EmbeddingRecord } from '../types/entity.types';
import { TEST_AIRLINES, TEST_AIRPORTS, unitVector as unit } from './support/fixtures';
import { InMemoryEntityStore } from './support/in-memory-entity.store';
import { makeTempDir, removeTempDir, testConfigModule } from './support/test-config';

describe('EntityLoaderService', () => {
  let workDir: string;
  let processedDir: string;
  let urlsCsv: string;
  let store: InMemoryEntityStore;
  let loader: EntityLoaderService;

  beforeEach(async () => {
    workDir = await makeTempDir();
    processedDir = join(workDir, 'processed');
    urlsCsv = join(workDir, 'image_urls.csv');
    store = new InMemoryEntityStore(8);

    await writeJsonFile(join(processedDir, 'airports.json'), TEST_AIRPORTS);
    await writeJsonFile(join(processedDir, 'airlines.json'), TEST_AIRLINES);
    await writeEmbeddings('airports.json', [
      { id: 1, source: 'image', vector: unit(0) },
      { id: 2, source: 'text', vector: unit(2) },
    ]);
    await writeEmbeddings('airlines.json', [{ id: 100, source: 'text', vector: unit(3) }]);
    await writeFile(
      urlsCsv,
      [
        MEDIA_COLUMNS.join(','),
        'airport,1,/media/airport_1.jpg,CC-BY,Test Photographer,glass,"modern, green,modern"',
        'airline,100,https://img.test/logo-sv.png,CC0,,,',
      ].join('\n'),
    );

    const moduleRef = await Test.createTestingModule({
      imports: [testConfigModule()],
      providers: [EntityLoaderService, { provide: EntityStore, useValue: store }],
    }).compile();
    loader = moduleRef.get(EntityLoaderService);
  });

  afterEach(async () => {
    await removeTempDir(workDir);
  });

  async function writeEmbeddings(name: string, records: EmbeddingRecord[]): Promise<void> {
    await writeJsonFile(join(processedDir, 'embeddings', name), records);
  }

  it('should resolve media URLs against the public base URL', () => {
    expect(absoluteUrl('/media/a.jpg', 'https://cdn.test/')).toBe('https://cdn.test/media/a.jpg');
    expect(absoluteUrl('media/a.jpg', 'https://cdn.test')).toBe('https://cdn.test/media/a.jpg');
    expect(absoluteUrl('https://img.test/a.jpg', 'https://cdn.test')).toBe('https://img.test/a.jpg');
    expect(absoluteUrl('/media/a.jpg', null)).toBe('/media/a.jpg');
    expect(absoluteUrl('  ', 'https://cdn.test')).toBeNull();
  });

  it('should upsert records with metadata, media URLs and vectors', async () => {
    const counts = await loader.load({
      processedDir,
      urlsCsv,
      publicBaseUrl: 'http://localhost:3000',
    });

    expect(counts.airport).toEqual({ inserted: 2, updated: 0, failed: 0, skipped: 0, errors: [] });
    expect(counts.airline).toEqual({ inserted: 1, updated: 0, failed: 0, skipped: 1, errors: [] });

    expect(store.tables.airport.get(1)).toEqual({
      ...TEST_AIRPORTS[0],
      url: 'http://localhost:3000/media/airport_1.jpg',
      metadata: {
        style: 'glass',
        tags: ['green', 'modern'],
        license: 'CC-BY',
        attribution: 'Test Photographer',
      },
      embedding: unit(0),
    });
    expect(store.tables.airport.get(2)).toMatchObject({ url: null, metadata: null });
    expect(store.tables.airline.get(100)).toMatchObject({
      url: 'https://img.test/logo-sv.png',
      metadata: { license: 'CC0' },
    });
    expect(store.tables.airline.has(101)).toBe(false);
  });

  it('should overwrite existing rows on a second load', async () => {
    await loader.load({ processedDir, urlsCsv });
    await writeJsonFile(join(processedDir, 'airports.json'), [
      { ...TEST_AIRPORTS[0], name: 'Renamed Airport' },
      TEST_AIRPORTS[1],
    ]);

    const counts = await loader.load({ processedDir, urlsCsv });

    expect(counts.airport).toMatchObject({ inserted: 0, updated: 2 });
    expect(store.tables.airport.size).toBe(2);
    expect(store.tables.airport.get(1)?.name).toBe('Renamed Airport');
  });

  it('should count a failing chunk as failed and still write later chunks', async () => {
    store.failOnId = 1;

    const counts = await loader.load({ processedDir, urlsCsv, chunkSize: 1 });

    expect(counts.airport.inserted).toBe(1);
    expect(counts.airport.failed).toBe(1);
    expect(counts.airport.errors).toEqual([
      "airports ids 1..1: Duplicate entry '1' for key 'iata'",
    ]);
    expect(store.tables.airport.has(1)).toBe(false);
    expect(store.tables.airport.has(2)).toBe(true);
  });

  it('should refuse to write when the column width differs from the configured dimension', async () => {
    store.columnWidth = 512;

    await expect(loader.load({ processedDir, urlsCsv })).rejects.toBeInstanceOf(
      DimensionMismatchError,
    );
    expect(store.upsertCalls).toBe(0);
  });

  it('should refuse to write when any vector has the wrong length', async () => {
    await writeEmbeddings('airlines.json', [{ id: 100, source: 'text', vector: [1, 0, 0] }]);

    await expect(loader.load({ processedDir, urlsCsv })).rejects.toThrow(
      'airline 100: embedding dimension 3 != configured 8',
    );
    expect(store.upsertCalls).toBe(0);
  });
});
