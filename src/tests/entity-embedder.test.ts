import { Test } from '@nestjs/testing';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { ModelLoadError } from '../common/errors/skyvision.errors';
import { writeJsonFile } from '../common/utils/file.util';
import { CLIP_BACKEND_LOADER } from '../modules/embedding/clip-backend';
import { EmbeddingService } from '../modules/embedding/embedding.service';
import { EntityEmbedderService, textPrompt } from '../modules/pipeline/entity-embedder.service';
import { MEDIA_COLUMNS } from '../modules/pipeline/media-table';
import { FakeClipLoader, FakeClipOptions, fakePng } from './support/fake-clip.loader';
import { TEST_AIRLINES, TEST_AIRPORTS } from './support/fixtures';
import { makeTempDir, removeTempDir, testConfigModule } from './support/test-config';

describe('EntityEmbedderService', () => {
  let workDir: string;
  let processedDir: string;
  let mediaDir: string;
  let urlsCsv: string;

  beforeEach(async () => {
    workDir = await makeTempDir();
    processedDir = join(workDir, 'processed');
    mediaDir = join(workDir, 'media');
    urlsCsv = join(workDir, 'image_urls.csv');
    await mkdir(mediaDir, { recursive: true });
    await writeJsonFile(join(processedDir, 'airports.json'), TEST_AIRPORTS);
    await writeJsonFile(join(processedDir, 'airlines.json'), TEST_AIRLINES);
  });

  afterEach(async () => {
    await removeTempDir(workDir);
  });

  async function createEmbedder(options: FakeClipOptions = {}) {
    const loader = new FakeClipLoader(options);
    const moduleRef = await Test.createTestingModule({
      imports: [testConfigModule()],
      providers: [
        EmbeddingService,
        EntityEmbedderService,
        { provide: CLIP_BACKEND_LOADER, useValue: loader },
      ],
    }).compile();
    return { embedder: moduleRef.get(EntityEmbedderService), loader };
  }

  async function readEmbeddingFile(name: string): Promise<unknown> {
    return JSON.parse(await readFile(join(processedDir, 'embeddings', name), 'utf-8'));
  }

  it('should build descriptive prompts per kind', () => {
    expect(textPrompt(TEST_AIRPORTS[0])).toBe(
      'Test Airport, Test City, Testland. airport, architecture, travel, terminals, runways.',
    );
    expect(textPrompt(TEST_AIRLINES[0])).toBe(
      'SkyVision Airways airline logo, brand identity, typography, colors, Testland',
    );
    expect(textPrompt({ ...TEST_AIRLINES[0], country: null })).toBe(
      'SkyVision Airways airline logo, brand identity, typography, colors',
    );
  });

  it('should prefer cached images and fall back to text when an image is unusable', async () => {
    // the localized table takes precedence over the input table
    await writeFile(urlsCsv, `${MEDIA_COLUMNS.join(',')}\n`);
    await writeFile(
      join(workDir, 'image_urls_local.csv'),
      [
        MEDIA_COLUMNS.join(','),
        'airport,1,/media/airport_1.png,,,,',
        'airport,2,/media/airport_2.png,,,,',
        'airline,100,/media/airline_100.png,,,,',
      ].join('\n'),
    );
    await writeFile(join(mediaDir, 'airport_1.png'), fakePng([0, 0, 5]));
    await writeFile(join(mediaDir, 'airport_2.png'), Buffer.from('corrupted bytes'));

    const { embedder } = await createEmbedder();
    const counts = await embedder.embed({ processedDir, urlsCsv, mediaDir, preferImage: true });

    expect(counts).toEqual({
      airport: { text: 1, image: 1, failed: 0, imageErrors: 1 },
      airline: { text: 2, image: 0, failed: 0, imageErrors: 1 },
    });

    const airports = await readEmbeddingFile('airports.json');
    expect(airports).toEqual([
      { id: 1, source: 'image', vector: [0, 0, 1, 0, 0, 0, 0, 0] },
      { id: 2, source: 'text', vector: expect.any(Array) },
    ]);
    const airlines = await readEmbeddingFile('airlines.json');
    expect(airlines).toEqual([
      { id: 100, source: 'text', vector: expect.any(Array) },
      { id: 101, source: 'text', vector: expect.any(Array) },
    ]);
  });

  it('should embed only text when images are not preferred', async () => {
    await writeFile(urlsCsv, `${MEDIA_COLUMNS.join(',')}\nairport,1,/media/airport_1.png,,,,\n`);
    await writeFile(join(mediaDir, 'airport_1.png'), fakePng([1]));

    const { embedder, loader } = await createEmbedder();
    const counts = await embedder.embed({ processedDir, urlsCsv, mediaDir, preferImage: false });

    expect(counts.airport).toEqual({ text: 2, image: 0, failed: 0, imageErrors: 0 });
    expect(loader.imageCalls).toBe(0);
  });

  it('should write vectors of the configured dimension', async () => {
    const { embedder } = await createEmbedder();
    await embedder.embed({ processedDir, urlsCsv, mediaDir, preferImage: true });

    const airports = await readEmbeddingFile('airports.json');
    expect(Array.isArray(airports)).toBe(true);
    if (Array.isArray(airports)) {
      for (const record of airports) {
        expect(record.vector).toHaveLength(8);
      }
    }
  });

  it('should count entities whose text cannot be embedded as failed', async () => {
    await writeJsonFile(join(processedDir, 'airlines.json'), [
      TEST_AIRLINES[0],
      { ...TEST_AIRLINES[1], name: 'Broken #fail Air' },
    ]);

    const { embedder } = await createEmbedder({ failTextMarker: '#fail' });
    const counts = await embedder.embed({ processedDir, urlsCsv, mediaDir, preferImage: false });

    expect(counts.airline).toEqual({ text: 1, image: 0, failed: 1, imageErrors: 0 });
    expect(await readEmbeddingFile('airlines.json')).toEqual([
      { id: 100, source: 'text', vector: expect.any(Array) },
    ]);
  });

  it('should fail with ModelLoadError before writing anything', async () => {
    const { embedder } = await createEmbedder({ failLoad: true });

    await expect(
      embedder.embed({ processedDir, urlsCsv, mediaDir, preferImage: true }),
    ).rejects.toBeInstanceOf(ModelLoadError);
    await expect(readFile(join(processedDir, 'embeddings', 'airports.json'))).rejects.toThrow();
  });
});
