import type { ListingCollections } from '../../src/services/record-store.service';
import type {
  CommonOverviewRecord,
  PropertyOverviewRecord,
  PropertyRecord,
  UserPropertyRecord,
  WorkUnit,
} from '../../src/types';
import { nextAggregationAt } from '../../src/utils/schedule';
import { InMemoryCollection } from './in-memory-collection';
import { LINE_USER_ID, LISTING_URL } from './fixtures';

export interface InMemoryCollections extends ListingCollections {
  properties: InMemoryCollection<PropertyRecord>;
  userProperties: InMemoryCollection<UserPropertyRecord>;
  propertyOverviews: InMemoryCollection<PropertyOverviewRecord>;
  commonOverviews: InMemoryCollection<CommonOverviewRecord>;
}

export function createInMemoryCollections(): InMemoryCollections {
  return {
    properties: new InMemoryCollection<PropertyRecord>('properties', [['url']]),
    userProperties: new InMemoryCollection<UserPropertyRecord>('user_properties', [
      ['line_user_id', 'property_id'],
    ]),
    propertyOverviews: new InMemoryCollection<PropertyOverviewRecord>('property_overviews', [
      ['property_id'],
    ]),
    commonOverviews: new InMemoryCollection<CommonOverviewRecord>('common_overviews', [
      ['property_id'],
    ]),
  };
}

export function buildWorkUnit(at: Date, overrides: Partial<WorkUnit> = {}): WorkUnit {
  return {
    property: {
      name: 'パークテスト新宿',
      url: LISTING_URL,
      is_active: true,
      image_urls: ['https://img01.suumo.com/front/gazo/a/1.jpg'],
      created_at: at,
      updated_at: at,
    },
    user_property: {
      line_user_id: LINE_USER_ID,
      last_aggregated_at: at,
      next_aggregated_at: nextAggregationAt(at),
      first_succeeded_at: at,
      last_succeeded_at: at,
      created_at: at,
      updated_at: at,
    },
    property_overview: {
      price: '5800万円～7200万円',
      floor_plan: '2LDK・3LDK',
      created_at: at,
      updated_at: at,
    },
    common_overview: {
      location: '東京都新宿区西新宿１',
      transportation: ['JR山手線「新宿」駅 徒歩5分'],
      created_at: at,
      updated_at: at,
    },
    ...overrides,
  };
}
