import { Test } from '@nestjs/testing';
import { NestExpressApplication } from '@nestjs/platform-express';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import request from 'supertest';
import { configureApp } from '../app.setup';
import { EntityStore } from '../modules/catalog/entity-store';
import { CLIP_BACKEND_LOADER } from '../modules/embedding/clip-backend';
import { ImageFetcher } from '../modules/fetch/image-fetcher';
import { HealthModule } from '../modules/health/health.module';
import { MediaModule } from '../modules/media/media.module';
import { SearchModule } from '../modules/search/search.module';
import { FakeClipLoader, FakeClipOptions, fakePng } from './support/fake-clip.loader';
import { FakeImageFetcher, imageReply } from './support/fake-image.fetcher';
import { seedCatalog } from './support/fixtures';
import { InMemoryEntityStore } from './support/in-memory-entity.store';
import { makeTempDir, removeTempDir, testConfigModule } from './support/test-config';

const GLASS_IMAGE = fakePng([9]);
const LOGO_IMAGE = fakePng([0, 0, 0, 9]);

interface TestApp {
  app: NestExpressApplication;
  store: InMemoryEntityStore;
  fetcher: FakeImageFetcher;
}

async function createApp(mediaDir: string, clip: FakeClipOptions = {}): Promise<TestApp> {
  const store = new InMemoryEntityStore();
  seedCatalog(store);
  const fetcher = new FakeImageFetcher();

  const moduleRef = await Test.createTestingModule({
    imports: [
      testConfigModule({ app: { mediaDir }, embedding: { loadOnStart: true } }),
      SearchModule,
      HealthModule,
      MediaModule,
    ],
  })
    .overrideProvider(EntityStore)
    .useValue(store)
    .overrideProvider(CLIP_BACKEND_LOADER)
    .useValue(new FakeClipLoader(clip))
    .overrideProvider(ImageFetcher)
    .useValue(fetcher)
    .compile();

  const app = moduleRef.createNestApplication<NestExpressApplication>({ logger: false });
  configureApp(app);
  await app.init();
  return { app, store, fetcher };
}

function ids(body: { data: { hits: Array<{ id: number }> } }): number[] {
  return body.data.hits.map((hit) => hit.id);
}

describe('SkyVision API (e2e)', () => {
  let mediaDir: string;
  let testApp: TestApp;

  beforeAll(async () => {
    mediaDir = await makeTempDir();
    await writeFile(join(mediaDir, 'airport_1.jpg'), GLASS_IMAGE);
    testApp = await createApp(mediaDir);
  });

  afterAll(async () => {
    await testApp.app.close();
    await removeTempDir(mediaDir);
  });

  function http() {
    return request(testApp.app.getHttpServer());
  }

  describe('health', () => {
    it('GET /api/healthz should report liveness', async () => {
      const response = await http().get('/api/healthz');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'success',
        code: '200',
        message: 'OK',
        data: { service: 'skyvision', ok: true },
      });
    });

    it('GET /api/readyz should report database, model and row counts', async () => {
      const response = await http().get('/api/readyz');

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        service: 'skyvision',
        ready: true,
        database: { ok: true, error: null },
        model: { model: 'test/clip', dimensions: 8, loaded: true, error: null },
        counts: { airport: 3, airline: 2 },
      });
    });

    it('GET /api/readyz should answer 503 when the database is unreachable', async () => {
      testApp.store.reachable = false;
      try {
        const response = await http().get('/api/readyz');

        expect(response.status).toBe(503);
        expect(response.body).toMatchObject({
          status: 'error',
          code: '503',
          data: {
            ready: false,
            database: { ok: false, error: 'connect ECONNREFUSED 127.0.0.1:3306' },
          },
        });
      } finally {
        testApp.store.reachable = true;
      }
    });
  });

  describe('POST /api/search/text', () => {
    it('should return ranked hits in the success envelope', async () => {
      const response = await http().post('/api/search/text').send({ query: 'glass facades' });

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('success');
      expect(response.body.data.count).toBe(3);
      expect(ids(response.body)).toEqual([1, 2, 3]);
    });

    it('should apply nested filters', async () => {
      const response = await http()
        .post('/api/search/text')
        .send({ query: 'glass', k: 5, filters: { country: 'Testland', hasImage: true } });

      expect(response.status).toBe(200);
      expect(ids(response.body)).toEqual([1]);
    });

    it('should map an empty query to 400', async () => {
      const response = await http().post('/api/search/text').send({ query: '' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        status: 'error',
        code: '400',
        error: 'QUERY_ERROR',
        message: 'Query text must not be empty',
        data: null,
      });
    });

    it('should reject invalid and unknown fields', async () => {
      const invalidK = await http().post('/api/search/text').send({ query: 'glass', k: 0 });
      expect(invalidK.status).toBe(400);
      expect(invalidK.body.message).toBe('k must not be less than 1');
      expect(invalidK.body.error).toBe('BAD_REQUEST');

      const unknown = await http().post('/api/search/text').send({ query: 'glass', limit: 3 });
      expect(unknown.status).toBe(400);
      expect(unknown.body.message).toBe('property limit should not exist');
    });

    it('should hide unexpected failures behind a generic 500', async () => {
      jest
        .spyOn(testApp.store, 'search')
        .mockRejectedValueOnce(new Error('Lost connection to MariaDB server'));

      const response = await http().post('/api/search/text').send({ query: 'glass' });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        status: 'error',
        code: '500',
        error: 'INTERNAL_ERROR',
        message: 'Internal server error',
        data: null,
      });
    });
  });

  describe('POST /api/search/image', () => {
    it('should rank airlines by the uploaded image', async () => {
      const response = await http()
        .post('/api/search/image')
        .attach('file', LOGO_IMAGE, { filename: 'logo.png', contentType: 'image/png' })
        .field('k', '1');

      expect(response.status).toBe(200);
      expect(response.body.data.hits).toEqual([
        {
          id: 100,
          kind: 'airline',
          name: 'SkyVision Airways',
          city: null,
          country: 'Testland',
          iata: 'SV',
          icao: 'SVN',
          url: 'https://img.test/logo-sv.png',
          metadata: { license: 'CC-BY' },
          distance: 0,
        },
      ]);
    });

    it('should accept flat filter fields', async () => {
      const response = await http()
        .post('/api/search/image')
        .attach('file', GLASS_IMAGE, { filename: 'glass.png', contentType: 'image/png' })
        .field('kind', 'airport')
        .field('hasImage', 'false');

      expect(response.status).toBe(200);
      expect(ids(response.body)).toEqual([2, 3]);
    });

    it('should require a file', async () => {
      const response = await http().post('/api/search/image').field('k', '3');

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('An image file is required (multipart field "file")');
    });

    it('should reject a corrupted upload with 400', async () => {
      const response = await http()
        .post('/api/search/image')
        .attach('file', Buffer.from('not an image'), { filename: 'x.png', contentType: 'image/png' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('QUERY_ERROR');
    });
  });

  describe('POST /api/search/hybrid', () => {
    it('should blend text and a base64 image', async () => {
      const response = await http()
        .post('/api/search/hybrid')
        .send({
          query: 'garden',
          imageBase64: `data:image/png;base64,${GLASS_IMAGE.toString('base64')}`,
          weight: 0.8,
        });

      expect(response.status).toBe(200);
      expect(response.body.data.degraded).toBe(false);
      expect(ids(response.body)).toEqual([3, 1, 2]);
    });

    it('should flag a degraded text-only ranking when the image is unusable', async () => {
      const response = await http()
        .post('/api/search/hybrid')
        .send({ query: 'glass facades', imageBase64: Buffer.from('junk').toString('base64') });

      expect(response.status).toBe(200);
      expect(response.body.data.degraded).toBe(true);
      expect(ids(response.body)).toEqual([1, 2, 3]);
    });

    it('should reject a weight outside 0..1', async () => {
      const response = await http()
        .post('/api/search/hybrid')
        .send({ query: 'glass', weight: 2 });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('weight must not be greater than 1');
    });
  });

  describe('media', () => {
    it('GET /api/media-check should describe a cached file', async () => {
      const response = await http().get('/api/media-check').query({ filename: 'airport_1.jpg' });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        ok: true,
        path: '/media/airport_1.jpg',
        size: GLASS_IMAGE.length,
      });
    });

    it('GET /api/media-check should reject traversal and report missing files', async () => {
      const traversal = await http().get('/api/media-check').query({ filename: '../secret.txt' });
      expect(traversal.status).toBe(400);

      const missing = await http().get('/api/media-check').query({ filename: 'nope.jpg' });
      expect(missing.status).toBe(404);
      expect(missing.body.message).toBe('Media file not found: nope.jpg');
    });

    it('GET /media/* should serve cached files without caching', async () => {
      const response = await http().get('/media/airport_1.jpg');

      expect(response.status).toBe(200);
      expect(response.headers['cache-control']).toBe('no-cache');
      expect(Buffer.compare(response.body, GLASS_IMAGE)).toBe(0);
    });

    it('GET /api/proxy should relay upstream images', async () => {
      testApp.fetcher.reply('https://img.test/a1.jpg', imageReply(GLASS_IMAGE, 'image/jpeg'));

      const response = await http().get('/api/proxy').query({ u: 'https://img.test/a1.jpg' });

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('image/jpeg');
      expect(Buffer.compare(response.body, GLASS_IMAGE)).toBe(0);
    });

    it('GET /api/proxy should map bad URLs, upstream errors and unreachable hosts', async () => {
      testApp.fetcher.reply('https://img.test/gone.jpg', {
        status: 404,
        contentType: 'text/html',
        data: Buffer.from('gone'),
      });

      const notHttp = await http().get('/api/proxy').query({ u: 'ftp://img.test/a.jpg' });
      expect(notHttp.status).toBe(400);

      const upstream = await http().get('/api/proxy').query({ u: 'https://img.test/gone.jpg' });
      expect(upstream.status).toBe(404);
      expect(upstream.body.message).toBe('Upstream returned 404');

      const unreachable = await http().get('/api/proxy').query({ u: 'https://nowhere.test/a.jpg' });
      expect(unreachable.status).toBe(502);
    });
  });

  describe('without an embedding model', () => {
    let degradedApp: TestApp;

    beforeAll(async () => {
      degradedApp = await createApp(mediaDir, { failLoad: true });
    });

    afterAll(async () => {
      await degradedApp.app.close();
    });

    it('should answer searches with 503', async () => {
      const response = await request(degradedApp.app.getHttpServer())
        .post('/api/search/text')
        .send({ query: 'glass' });

      expect(response.status).toBe(503);
      expect(response.body).toEqual({
        status: 'error',
        code: '503',
        error: 'MODEL_UNAVAILABLE',
        message:
          'Embedding model is unavailable: Failed to load embedding model test/clip: model test/clip not found',
        data: null,
      });
    });

    it('should report not ready', async () => {
      const response = await request(degradedApp.app.getHttpServer()).get('/api/readyz');

      expect(response.status).toBe(503);
      expect(response.body.data.model).toEqual({
        model: 'test/clip',
        dimensions: 8,
        loaded: false,
        error: 'model test/clip not found',
      });
    });
  });
});
