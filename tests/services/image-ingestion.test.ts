import { ImageTransientError, ImageValidationError } from '../../src/errors';
import type { ImageDownloader } from '../../src/services/image-downloader.service';
import {
  ImageIngestionService,
  summarizeIngestion,
} from '../../src/services/image-ingestion.service';
import type { ImageNormalizer } from '../../src/services/image-normalizer.service';
import { FakeObjectStore } from '../helpers/fake-object-store';

const PROPERTY_ID = '65e1a0c0f1d2c3b4a5968778';
const BASE = 'https://img01.suumo.com/front/gazo/bukken/12345678';
const LOCATION = 'https://storage.googleapis.com/test-bucket/images';

const OPTIONS = { folder: 'images', concurrency: 4, maxRetries: 2, retryDelayMs: 0 };

function imageBytes(url: string): Buffer {
  return Buffer.from(`jpeg:${url}`);
}

describe('ImageIngestionService', () => {
  let store: FakeObjectStore;
  let download: jest.Mock<Promise<Buffer>, [string, AbortSignal?]>;
  let downloader: ImageDownloader;
  let normalizer: ImageNormalizer;
  let service: ImageIngestionService;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    store = new FakeObjectStore();
    download = jest.fn<Promise<Buffer>, [string, AbortSignal?]>(async (url: string) => imageBytes(url));
    downloader = { download };
    normalizer = { normalize: jest.fn(async (input: Buffer) => input) };
    service = new ImageIngestionService(store, downloader, normalizer, OPTIONS);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should upload new images and return their locations in order', async () => {
    const urls = [`${BASE}/0001.jpg`, `${BASE}/0002.jpg`, `${BASE}/0003.jpg`];

    const locations = await service.ingest(PROPERTY_ID, urls);

    expect(locations).toEqual([
      `${LOCATION}/0001.jpg`,
      `${LOCATION}/0002.jpg`,
      `${LOCATION}/0003.jpg`,
    ]);
    expect(store.stored.get('images/0002.jpg')).toEqual(imageBytes(`${BASE}/0002.jpg`));
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith(`Uploaded 3 new images for property ${PROPERTY_ID}`);
  });

  it('should not upload anything on a second run with the same URLs', async () => {
    const urls = [`${BASE}/0001.jpg`, `${BASE}/0002.jpg`];

    const first = await service.ingest(PROPERTY_ID, urls);
    logSpy.mockClear();
    const second = await service.ingest(PROPERTY_ID, urls);

    expect(second).toEqual(first);
    expect(store.puts).toEqual(['images/0001.jpg', 'images/0002.jpg']);
    expect(download).toHaveBeenCalledTimes(2);
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should report a partial update when some images fail', async () => {
    store.stored.set('images/0002.jpg', imageBytes('old'));
    store.stored.set('images/0004.jpg', imageBytes('old'));
    download.mockImplementation(async (url: string) => {
      if (url.endsWith('0003.jpg')) {
        throw new ImageTransientError('socket hang up');
      }
      return imageBytes(url);
    });
    const urls = [
      `${BASE}/0001.jpg`,
      `${BASE}/0002.jpg`,
      `${BASE}/0003.jpg`,
      `${BASE}/0004.jpg`,
      `${BASE}/0005.jpg`,
    ];

    const report = await service.ingestWithReport(PROPERTY_ID, urls);

    expect(report).toEqual({
      locations: [
        `${LOCATION}/0001.jpg`,
        `${LOCATION}/0002.jpg`,
        `${LOCATION}/0004.jpg`,
        `${LOCATION}/0005.jpg`,
      ],
      existing: 2,
      uploaded: 2,
      failed: [{ url: `${BASE}/0003.jpg`, reason: 'socket hang up' }],
    });
    // One attempt plus two retries
    expect(download.mock.calls.filter(([url]) => url.endsWith('0003.jpg'))).toHaveLength(3);
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith(
      `Partial update for property ${PROPERTY_ID}: 2 of 5 already existed, 2 uploaded, 1 failed`
    );
  });

  it('should not retry validation failures', async () => {
    download.mockRejectedValue(new ImageValidationError('Invalid content type "text/html"'));

    const locations = await service.ingest(PROPERTY_ID, [`${BASE}/0001.jpg`, `${BASE}/0002.jpg`]);

    expect(locations).toEqual([]);
    expect(download).toHaveBeenCalledTimes(2);
    expect(store.puts).toEqual([]);
    expect(errorSpy).toHaveBeenCalledWith(`Failed to ingest all 2 images for property ${PROPERTY_ID}`);
  });

  it('should count images rejected by the normalizer as failed', async () => {
    normalizer.normalize = jest.fn(async () => {
      throw new ImageValidationError('Image too small: 40x30');
    });

    const report = await service.ingestWithReport(PROPERTY_ID, [`${BASE}/0001.jpg`]);

    expect(report.failed).toEqual([{ url: `${BASE}/0001.jpg`, reason: 'Image too small: 40x30' }]);
  });

  it('should upload again when the existence check fails', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(store, 'exists').mockRejectedValue(new Error('403 Forbidden'));

    const locations = await service.ingest(PROPERTY_ID, [`${BASE}/0001.jpg`]);

    expect(locations).toEqual([`${LOCATION}/0001.jpg`]);
    expect(store.puts).toEqual(['images/0001.jpg']);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('should fetch an image once when several URLs map to the same blob', async () => {
    const resized = 'https://img01.suumo.com/jj/resizeImage?src=gazo%2Fbukken%2F12345678%2F0001.jpg';

    const locations = await service.ingest(PROPERTY_ID, [
      `${resized}&w=437&h=328`,
      `${resized}&w=1024&h=768`,
    ]);

    expect(locations).toEqual([
      `${LOCATION}/12345678_0001.jpg`,
      `${LOCATION}/12345678_0001.jpg`,
    ]);
    expect(download).toHaveBeenCalledTimes(1);
  });

  it('should keep a repeated URL at each of its positions', async () => {
    store.stored.set('images/b.jpg', imageBytes('old'));
    download.mockImplementation(async (url: string) => {
      if (url.endsWith('c.jpg')) {
        throw new ImageValidationError('Invalid status code 404');
      }
      return imageBytes(url);
    });

    const report = await service.ingestWithReport(PROPERTY_ID, [
      `${BASE}/a.jpg`,
      `${BASE}/b.jpg`,
      `${BASE}/a.jpg`,
      `${BASE}/c.jpg`,
    ]);

    expect(report).toEqual({
      locations: [`${LOCATION}/a.jpg`, `${LOCATION}/b.jpg`, `${LOCATION}/a.jpg`],
      existing: 1,
      uploaded: 2,
      failed: [{ url: `${BASE}/c.jpg`, reason: 'Invalid status code 404' }],
    });
    expect(download).toHaveBeenCalledTimes(2);
    expect(store.puts).toEqual(['images/a.jpg']);
    expect(logSpy).toHaveBeenCalledWith(
      `Partial update for property ${PROPERTY_ID}: 1 of 4 already existed, 2 uploaded, 1 failed`
    );
  });

  it('should stop without uploading once the signal is aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('Job stopped');
    download.mockImplementation(async (url: string) => {
      controller.abort(reason);
      return imageBytes(url);
    });

    const result = service.ingest(PROPERTY_ID, [`${BASE}/0001.jpg`], controller.signal);

    await expect(result).rejects.toBe(reason);
    expect(store.puts).toEqual([]);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should keep the number of downloads in flight within the bound', async () => {
    let inFlight = 0;
    let peak = 0;
    download.mockImplementation(async (url: string) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setImmediate(resolve));
      inFlight--;
      return imageBytes(url);
    });
    service = new ImageIngestionService(store, downloader, normalizer, { ...OPTIONS, concurrency: 2 });
    const urls = Array.from({ length: 6 }, (_, index) => `${BASE}/000${index}.jpg`);

    const locations = await service.ingest(PROPERTY_ID, urls);

    expect(locations).toHaveLength(6);
    expect(peak).toBe(2);
  });

  it('should return nothing for an empty list', async () => {
    await expect(service.ingest(PROPERTY_ID, [])).resolves.toEqual([]);
    expect(logSpy).not.toHaveBeenCalled();
  });
});

describe('summarizeIngestion', () => {
  const report = (existing: number, uploaded: number, failed: number) => ({
    locations: [],
    existing,
    uploaded,
    failed: Array.from({ length: failed }, (_, index) => ({ url: `u${index}`, reason: 'x' })),
  });

  it('should stay silent when every image already existed', () => {
    expect(summarizeIngestion('p1', report(3, 0, 0))).toBeNull();
  });

  it('should report both counts for a mix without failures', () => {
    expect(summarizeIngestion('p1', report(2, 1, 0))).toEqual({
      level: 'log',
      message: 'Stored 1 new images for property p1 (2 already existed)',
    });
  });

  it('should report a partial update when failures are mixed with uploads only', () => {
    expect(summarizeIngestion('p1', report(0, 3, 1))).toEqual({
      level: 'log',
      message: 'Partial update for property p1: 0 of 4 already existed, 3 uploaded, 1 failed',
    });
  });
});
