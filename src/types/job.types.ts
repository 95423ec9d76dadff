/**
 * Queue payload as produced by the chat webhook
 */
export interface ScrapeJobData {
  url: string;
  lineUserId: string;
  checkOnly?: boolean;
  timestamp?: string | number;
}

export interface ScrapeJobResult {
  status: 'stored' | 'checked';
  url: string;
  propertyId?: string;
  propertyName: string;
  imageCount: number;
}

export interface FetchedPage {
  status: number;
  // Final URL after redirects
  url: string;
  html: string;
}

export interface IngestionReport {
  locations: string[];
  existing: number;
  uploaded: number;
  failed: Array<{ url: string; reason: string }>;
}
