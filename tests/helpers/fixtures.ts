import { readFileSync } from 'fs';
import { join } from 'path';

export function loadFixture(name: string): string {
  return readFileSync(join(__dirname, '../fixtures', name), 'utf-8');
}

export const LISTING_URL = 'https://suumo.jp/ms/shinchiku/tokyo/sc_shinjuku/nc_12345678/';
export const LINE_USER_ID = 'U0123456789abcdef0123456789abcdef';
