import { Test } from '@nestjs/testing';
import { ModelUnavailableError, QueryError } from '../common/errors/skyvision.errors';
import { EntityStore } from '../modules/catalog/entity-store';
import { CLIP_BACKEND_LOADER } from '../modules/embedding/clip-backend';
import { EmbeddingService } from '../modules/embedding/embedding.service';
import { SearchService } from '../modules/search/search.service';
import { FakeClipLoader, FakeClipOptions, fakePng } from './support/fake-clip.loader';
import { seedCatalog } from './support/fixtures';
import { InMemoryEntityStore } from './support/in-memory-entity.store';
import { testConfigModule } from './support/test-config';

// Payload byte on axis 0 ("glass") and axis 3 ("logo")
const GLASS_IMAGE = fakePng([9]);
const LOGO_IMAGE = fakePng([0, 0, 0, 9]);

describe('SearchService', () => {
  let store: InMemoryEntityStore;
  let service: SearchService;

  async function createService(options: FakeClipOptions = {}): Promise<SearchService> {
    store = new InMemoryEntityStore();
    seedCatalog(store);
    const moduleRef = await Test.createTestingModule({
      imports: [testConfigModule()],
      providers: [
        EmbeddingService,
        SearchService,
        { provide: CLIP_BACKEND_LOADER, useValue: new FakeClipLoader(options) },
        { provide: EntityStore, useValue: store },
      ],
    }).compile();
    return moduleRef.get(SearchService);
  }

  beforeEach(async () => {
    service = await createService();
  });

  describe('searchText', () => {
    it('should rank the glass airport first for "glass facades"', async () => {
      const result = await service.searchText('glass facades');

      expect(result.count).toBe(3);
      expect(result.degraded).toBe(false);
      expect(result.hits.map((hit) => hit.id)).toEqual([1, 2, 3]);
      expect(result.hits[0]).toEqual({
        id: 1,
        kind: 'airport',
        name: 'Test Airport',
        city: 'Test City',
        country: 'Testland',
        iata: 'TST',
        icao: 'TST1',
        url: 'https://img.test/a1.jpg',
        metadata: { style: 'glass', tags: ['green', 'modern'] },
        distance: 0,
      });
    });

    it('should rank by distance whether or not an entity has an image', async () => {
      const result = await service.searchText('garden');

      // airport 3 has no image and still ranks ahead of airport 1, which has one
      expect(result.hits.map((hit) => [hit.id, hit.url])).toEqual([
        [3, null],
        [1, 'https://img.test/a1.jpg'],
        [2, null],
      ]);
    });

    it('should boost metadata keyword matches for "modern glass architecture"', async () => {
      const result = await service.searchText('modern glass architecture');
      const ids = result.hits.map((hit) => hit.id);

      expect(ids[0]).toBe(1);
      expect(ids.indexOf(1)).toBeLessThan(ids.indexOf(2));
      expect(store.queries[0].keywords).toEqual(['glass', 'modern']);
    });

    it('should apply filters before ranking', async () => {
      const result = await service.searchText('glass', { filters: { country: 'Testland' } });

      expect(result.hits.map((hit) => hit.id)).toEqual([1, 3]);
      expect(result.hits.every((hit) => hit.country === 'Testland')).toBe(true);
    });

    it('should drop blank filters and honour k', async () => {
      const result = await service.searchText('glass', { k: 1, filters: { country: '  ' } });

      expect(result.hits.map((hit) => hit.id)).toEqual([1]);
      expect(store.queries[0]).toMatchObject({ kind: 'airport', limit: 1, filters: {} });
    });

    it('should reject an empty query', async () => {
      await expect(service.searchText('   ')).rejects.toThrow(
        new QueryError('Query text must not be empty'),
      );
    });

    it('should reject k outside 1..1000', async () => {
      await expect(service.searchText('glass', { k: 0 })).rejects.toBeInstanceOf(QueryError);
      await expect(service.searchText('glass', { k: 1001 })).rejects.toBeInstanceOf(QueryError);
    });

    it('should reject airport-only filters on airlines', async () => {
      await expect(
        service.searchText('logo', { kind: 'airline', filters: { city: 'Test City' } }),
      ).rejects.toThrow('Filters not supported for airlines: city');
    });

    it('should reject inverted coordinate ranges', async () => {
      await expect(
        service.searchText('glass', { filters: { minLatitude: 50, maxLatitude: 10 } }),
      ).rejects.toThrow('minLatitude must not exceed maxLatitude');
    });

    it('should surface an unavailable model as ModelUnavailableError', async () => {
      service = await createService({ failLoad: true });

      await expect(service.searchText('glass')).rejects.toBeInstanceOf(ModelUnavailableError);
    });
  });

  describe('searchImage', () => {
    it('should search airlines by default', async () => {
      const result = await service.searchImage(LOGO_IMAGE);

      expect(result.hits.map((hit) => [hit.id, hit.kind])).toEqual([
        [100, 'airline'],
        [101, 'airline'],
      ]);
      expect(result.hits[0].distance).toBe(0);
    });

    it('should reject a corrupted image as a query error', async () => {
      await expect(service.searchImage(Buffer.from('not an image'))).rejects.toThrow(
        'Image could not be embedded: Unsupported or corrupted image',
      );
    });
  });

  describe('searchHybrid', () => {
    it('should equal the text search when weight is 1', async () => {
      const hybrid = await service.searchHybrid('garden', { image: GLASS_IMAGE, weight: 1 });
      const text = await service.searchText('garden', { kind: 'airport' });

      expect(hybrid).toEqual(text);
    });

    it('should equal the image search when weight is 0', async () => {
      const hybrid = await service.searchHybrid('garden', { image: GLASS_IMAGE, weight: 0 });
      const image = await service.searchImage(GLASS_IMAGE, { kind: 'airport' });

      expect(hybrid).toEqual(image);
      expect(hybrid.hits[0].id).toBe(1);
    });

    it('should keep searching airports when weight is 0 and no kind is given', async () => {
      const hybrid = await service.searchHybrid('garden', { image: LOGO_IMAGE, weight: 0 });

      expect(hybrid.hits.map((hit) => hit.kind)).toEqual(['airport', 'airport', 'airport']);
      expect(store.queries[0]).toMatchObject({ kind: 'airport', terms: [{ weight: 1 }] });

      const airlines = await service.searchImage(LOGO_IMAGE);
      expect(airlines.hits[0]).toMatchObject({ id: 100, kind: 'airline' });
    });

    it('should blend text and image distances by weight', async () => {
      const result = await service.searchHybrid('garden', { image: GLASS_IMAGE, weight: 0.8 });

      expect(result.hits.map((hit) => hit.id)).toEqual([3, 1, 2]);
      expect(result.hits[0].distance).toBeCloseTo(0.2);
      expect(result.hits[1].distance).toBeCloseTo(0.8);
      expect(result.hits[2].distance).toBeCloseTo(1);

      const [query] = store.queries;
      expect(query.terms).toHaveLength(2);
      expect(query.terms[0].weight).toBe(0.8);
      expect(query.terms[1].weight).toBeCloseTo(0.2);
    });

    it('should fall back to text ranking when the image cannot be embedded', async () => {
      const result = await service.searchHybrid('glass facades', {
        image: Buffer.from('not an image'),
      });

      expect(result.degraded).toBe(true);
      expect(result.hits.map((hit) => hit.id)).toEqual([1, 2, 3]);
      expect(store.queries[0].terms).toHaveLength(1);
    });

    it('should use the image alone when there is no text', async () => {
      const result = await service.searchHybrid('', { image: GLASS_IMAGE });

      expect(result.hits[0]).toMatchObject({ id: 1, kind: 'airport' });
    });

    it('should require text or an image and a weight within 0..1', async () => {
      await expect(service.searchHybrid('  ', {})).rejects.toThrow(
        'Provide query text, an image, or both',
      );
      await expect(
        service.searchHybrid('glass', { image: GLASS_IMAGE, weight: 1.5 }),
      ).rejects.toThrow('weight must be between 0 and 1');
    });
  });
});
