import { Test } from '@nestjs/testing';
import {
  EmbeddingError,
  ModelLoadError,
  ModelUnavailableError,
} from '../common/errors/skyvision.errors';
import { CLIP_BACKEND_LOADER } from '../modules/embedding/clip-backend';
import { EmbeddingService } from '../modules/embedding/embedding.service';
import { FakeClipLoader, FakeClipOptions, fakePng } from './support/fake-clip.loader';
import { TestConfig, testConfigModule } from './support/test-config';

async function createService(options: FakeClipOptions = {}, config: TestConfig = {}) {
  const loader = new FakeClipLoader(options);
  const moduleRef = await Test.createTestingModule({
    imports: [testConfigModule(config)],
    providers: [EmbeddingService, { provide: CLIP_BACKEND_LOADER, useValue: loader }],
  }).compile();
  return { service: moduleRef.get(EmbeddingService), loader };
}

describe('EmbeddingService', () => {
  it('should load the model once for concurrent callers', async () => {
    const { service, loader } = await createService();

    await Promise.all([service.load(), service.load(), service.embedText('glass')]);

    expect(loader.loads).toBe(1);
    expect(service.isAvailable()).toBe(true);
    expect(service.getStatus()).toEqual({
      model: 'test/clip',
      dimensions: 8,
      loaded: true,
      error: null,
    });
  });

  it('should return L2-normalized text vectors in input order', async () => {
    const { service } = await createService();

    const [glass, garden] = await service.embedTexts(['glass glass', 'garden']);

    expect(glass).toEqual([1, 0, 0, 0, 0, 0, 0, 0]);
    expect(garden).toEqual([0, 1, 0, 0, 0, 0, 0, 0]);
  });

  it('should embed texts in batches of the configured size', async () => {
    const { service, loader } = await createService();

    const vectors = await service.embedTexts(['a', 'b', 'c', 'd', 'e']);

    expect(vectors).toHaveLength(5);
    // the first call is the dimension probe made while loading
    expect(loader.textCalls.map((batch) => batch.length)).toEqual([1, 4, 1]);
  });

  it('should produce unit vectors of the production width', async () => {
    const { service } = await createService({ dimensions: 512 }, { embedding: { dimensions: 512 } });

    const text = await service.embedText('glass garden');
    const image = await service.embedImage(fakePng([3, 4]));

    expect(service.getStatus()).toMatchObject({ dimensions: 512, loaded: true });
    expect(text).toHaveLength(512);
    expect(text[0]).toBeCloseTo(Math.SQRT1_2);
    expect(text[1]).toBeCloseTo(Math.SQRT1_2);
    expect(text.slice(2).every((x) => x === 0)).toBe(true);
    expect(image).toHaveLength(512);
    expect(image.slice(0, 2)).toEqual([0.6, 0.8]);
    expect(Math.hypot(...image)).toBeCloseTo(1);
  });

  it('should reject a model whose output width differs from the configured dimension', async () => {
    const { service } = await createService({ dimensions: 4 });

    await expect(service.load()).rejects.toBeInstanceOf(ModelLoadError);
    expect(service.getStatus()).toMatchObject({
      loaded: false,
      error: 'model produces 4-d vectors, EMBEDDING_DIM is 8',
    });
  });

  it('should raise ModelUnavailableError while the model cannot be loaded', async () => {
    const { service } = await createService({ failLoad: true });

    await expect(service.embedText('glass')).rejects.toBeInstanceOf(ModelUnavailableError);
    expect(service.isAvailable()).toBe(false);
    expect(service.getStatus().error).toBe('model test/clip not found');
  });

  it('should reject empty text', async () => {
    const { service } = await createService();

    await expect(service.embedTexts(['glass', '   '])).rejects.toThrow('Text cannot be empty');
  });

  it('should embed a valid image into a unit vector', async () => {
    const { service } = await createService();

    const vector = await service.embedImage(fakePng([0, 3, 4]));

    expect(vector).toEqual([0, 0.6, 0.8, 0, 0, 0, 0, 0]);
  });

  it('should reject unsupported, empty and oversized images with EmbeddingError', async () => {
    const { service, loader } = await createService();

    await expect(service.embedImage(Buffer.from('not an image'))).rejects.toThrow(
      new EmbeddingError('Unsupported or corrupted image'),
    );
    await expect(service.embedImage(Buffer.alloc(0))).rejects.toThrow('Image is empty');
    await expect(service.embedImage(fakePng([1, 2, 3]), 4)).rejects.toBeInstanceOf(EmbeddingError);
    expect(loader.imageCalls).toBe(0);
  });

  it('should wrap backend failures as EmbeddingError', async () => {
    const { service } = await createService({ failTextMarker: '#fail' });

    await expect(service.embedText('glass #fail')).rejects.toThrow(
      'Failed to embed text: tokenizer failure',
    );
  });
});
