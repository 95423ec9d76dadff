import { config } from 'dotenv';

config();

export const CONFIG = {
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
  },
  mongodb: {
    uri: process.env.MONGODB_URI || 'mongodb://localhost:27017',
    database: process.env.MONGODB_DATABASE || 'listing_watch',
    collections: {
      properties: process.env.COLLECTION_PROPERTIES || 'properties',
      userProperties: process.env.COLLECTION_USER_PROPERTIES || 'user_properties',
      propertyOverviews: process.env.COLLECTION_PROPERTY_OVERVIEWS || 'property_overviews',
      commonOverviews: process.env.COLLECTION_COMMON_OVERVIEWS || 'common_overviews',
    },
  },
  storage: {
    bucket: process.env.STORAGE_BUCKET || 'listing-watch',
    folder: process.env.STORAGE_FOLDER || 'images',
    // GCS speaks the S3 XML API with HMAC keys, so one client covers both
    endpoint: process.env.STORAGE_ENDPOINT || 'https://storage.googleapis.com',
    region: process.env.STORAGE_REGION || 'auto',
    accessKeyId: process.env.STORAGE_ACCESS_KEY_ID || '',
    secretAccessKey: process.env.STORAGE_SECRET_ACCESS_KEY || '',
    publicUrl: process.env.STORAGE_PUBLIC_URL || 'https://storage.googleapis.com',
  },
  images: {
    quality: parseInt(process.env.IMAGE_QUALITY || '50', 10),
    minDimension: 50,
    concurrency: parseInt(process.env.IMAGE_CONCURRENCY || '4', 10),
    maxRetries: 2,
    retryDelayMs: 2000,
    timeoutMs: 30000,
    referer: 'https://suumo.jp/',
  },
  scraper: {
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
    timeoutMs: parseInt(process.env.SCRAPER_TIMEOUT_MS || '30000', 10),
  },
  nodeEnv: process.env.NODE_ENV || 'development',
  queue: {
    name: process.env.QUEUE_NAME || 'scrape-queue',
    jobTimeoutMs: parseInt(process.env.JOB_TIMEOUT_MS || '300000', 10),
    concurrency: 1,
  },
} as const;
