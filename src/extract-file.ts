import { readFileSync } from 'fs';
import { resolve } from 'path';
import type { PageFetcher } from './services/page-fetcher.service';
import { ListingSpider } from './services/listing-spider.service';

/**
 * Runs the listing extraction over a saved HTML page (no network, no DB).
 *
 *   npm run extract -- ./page.html https://suumo.jp/ms/shinchiku/tokyo/sc_shinjuku/nc_12345678/
 */
async function extract() {
  const [file, url = 'https://suumo.jp/saved-page/'] = process.argv.slice(2);
  if (!file) {
    console.error('Usage: extract-file <page.html> [listing-url]');
    process.exit(1);
  }

  const html = readFileSync(resolve(file), 'utf-8');
  const fetcher: PageFetcher = {
    fetch: async (requestedUrl) => ({ status: 200, url: requestedUrl, html }),
  };

  console.log(`=== Extracting ${file} (No DB) ===\n`);

  const spider = new ListingSpider(url, 'U-local-extract', { fetcher });
  const unit = await spider.crawl();
  if (!unit) {
    console.error('❌ Extraction failed:', spider.lastFailure?.message);
    process.exit(1);
  }

  console.log(`✓ Name: ${unit.property.name}`);
  console.log(`✓ Active: ${unit.property.is_active}`);
  console.log(`✓ Images: ${unit.property.image_urls?.length ?? 0}`);
  console.log('\n📦 Property overview:');
  console.log(JSON.stringify(unit.property_overview, null, 2));
  console.log('\n📦 Common overview:');
  console.log(JSON.stringify(unit.common_overview, null, 2));

  console.log('\n✅ Extraction completed successfully!');
}

extract().catch((error) => {
  console.error('❌ Extraction failed:', error);
  process.exit(1);
});
