import { CONFIG } from './config';
import { AxiosImageDownloader } from './services/image-downloader.service';
import { ImageIngestionService } from './services/image-ingestion.service';
import { SharpImageNormalizer } from './services/image-normalizer.service';
import { S3ObjectStore } from './services/object-store.service';
import { QueueListenerService } from './services/queue-listener.service';
import { MongoStore } from './services/record-store.service';
import { ScrapeJobService } from './services/scrape-job.service';
import { UpsertPipeline } from './services/upsert-pipeline.service';

async function main() {
  console.log('Starting listing scrape worker...');
  console.log(`Environment: ${CONFIG.nodeEnv}`);
  console.log(`MongoDB: ${CONFIG.mongodb.database}`);
  console.log(`Redis: ${CONFIG.redis.host}:${CONFIG.redis.port}`);
  console.log(`Object store: ${CONFIG.storage.bucket}/${CONFIG.storage.folder}`);

  const store = MongoStore.fromConfig();
  let queueListener: QueueListenerService | null = null;
  let statsTimer: NodeJS.Timeout | null = null;

  const cleanup = async (): Promise<void> => {
    try {
      if (statsTimer) {
        clearInterval(statsTimer);
      }
      if (queueListener) {
        await queueListener.close();
      }
      await store.close();
      console.log('Cleanup completed');
    } catch (error) {
      console.error('Error during cleanup:', error);
    }
  };

  try {
    await store.connect();

    const pipeline = new UpsertPipeline(store.collections());
    const images = new ImageIngestionService(
      S3ObjectStore.fromConfig(),
      new AxiosImageDownloader(),
      new SharpImageNormalizer()
    );
    queueListener = new QueueListenerService(new ScrapeJobService({ pipeline, images }));

    await queueListener.start();

    // Print queue stats every 30 seconds
    const listener = queueListener;
    statsTimer = setInterval(() => {
      Promise.all([listener.getQueueStats(), store.getStats()])
        .then(([queueStats, storeStats]) => {
          console.log('Queue Stats:', queueStats);
          console.log('MongoDB Stats:', storeStats);
        })
        .catch((error: unknown) => {
          console.error('Failed to get stats:', error);
        });
    }, 30000);

    console.log('Listing scrape worker is running');
  } catch (error) {
    console.error('Fatal error:', error);
    await cleanup();
    process.exit(1);
  }

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down...`);
    cleanup()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
