import { Queue, UnrecoverableError, Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { CONFIG } from '../config';
import {
  InvalidJobDataError,
  JobTimeoutError,
  MalformedWorkUnitError,
} from '../errors';
import type { ScrapeJobData, ScrapeJobResult } from '../types';
import { parseJobData } from './scrape-job.service';
import type { ScrapeJobService } from './scrape-job.service';

export interface QueueStats {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
}

type ScrapeJob = Pick<Job<unknown, ScrapeJobResult>, 'id' | 'data'>;

/**
 * Job processor for the scrape queue. Failures that another attempt cannot
 * fix are marked unrecoverable.
 */
export function createScrapeProcessor(
  scrapeJobs: Pick<ScrapeJobService, 'run'>
): (job: ScrapeJob) => Promise<ScrapeJobResult> {
  return async (job) => {
    console.log(`Processing job ${job.id}...`);
    try {
      return await scrapeJobs.run(job.data);
    } catch (error) {
      if (
        error instanceof InvalidJobDataError ||
        error instanceof JobTimeoutError ||
        error instanceof MalformedWorkUnitError
      ) {
        throw new UnrecoverableError(error.message);
      }
      throw error;
    }
  };
}

export class QueueListenerService {
  private queue: Queue<ScrapeJobData, ScrapeJobResult>;
  private worker: Worker<unknown, ScrapeJobResult> | null = null;

  constructor(private readonly scrapeJobs: ScrapeJobService) {
    this.queue = new Queue<ScrapeJobData, ScrapeJobResult>(CONFIG.queue.name, {
      connection: {
        host: CONFIG.redis.host,
        port: CONFIG.redis.port,
      },
    });
  }

  async start(): Promise<void> {
    this.worker = new Worker<unknown, ScrapeJobResult>(
      CONFIG.queue.name,
      createScrapeProcessor(this.scrapeJobs),
      {
        connection: {
          host: CONFIG.redis.host,
          port: CONFIG.redis.port,
        },
        concurrency: CONFIG.queue.concurrency,
        lockDuration: CONFIG.queue.jobTimeoutMs,
      }
    );

    this.worker.on('completed', (job, result) => {
      console.log(
        `✅ Job ${job.id} ${result.status}: ${result.propertyName} (${result.imageCount} images)`
      );
    });

    this.worker.on('failed', (job, error) => {
      console.error(`❌ Job ${job?.id} failed: ${error.message}`);
    });

    this.worker.on('error', (error) => {
      console.error('Queue worker error:', error);
    });

    await this.worker.waitUntilReady();
    console.log(`Queue listener started for: ${CONFIG.queue.name}`);
  }

  /**
   * Producer side, used by the chat webhook to request a scrape
   */
  async enqueue(data: ScrapeJobData): Promise<string | undefined> {
    const payload = parseJobData(data);
    const job = await this.queue.add('scrape', payload, {
      removeOnComplete: 1000,
      removeOnFail: 5000,
    });
    return job.id;
  }

  async close(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
      this.worker = null;
    }
    await this.queue.close();
    console.log('Queue listener closed');
  }

  async getQueueStats(): Promise<QueueStats> {
    const [waiting, active, completed, failed] = await Promise.all([
      this.queue.getWaitingCount(),
      this.queue.getActiveCount(),
      this.queue.getCompletedCount(),
      this.queue.getFailedCount(),
    ]);

    return { waiting, active, completed, failed };
  }
}
