import type {
  CommonOverviewData,
  OverviewValue,
  PropertyOverviewData,
  RawOverview,
} from '../../types/listing.types';

/**
 * Source-site labels used to locate fields and sections on a listing page.
 */
export const ELEMENT_KEYS = {
  PROPERTY_NAME: '物件名',
  APARTMENT_SUFFIX: ' 　【マンション】',
  TRAFFIC: '交通',
  COMMON_OVERVIEW: '共通概要',
} as const;

export const UNKNOWN_PROPERTY_NAME = '物件名不明';

export const PROPERTY_OVERVIEW_TRANSLATION_MAP = {
  販売スケジュール: 'sales_schedule',
  イベント情報: 'event_information',
  販売戸数: 'number_of_units_for_sale',
  最多価格帯: 'highest_price_range',
  価格: 'price',
  管理費: 'maintenance_fee',
  // 修繕積立金 is the running reserve for major repairs; 修繕積立基金 is the
  // one-off lump sum for the first major repair. Keep them apart.
  修繕積立金: 'repair_reserve_fund',
  修繕積立基金: 'first_repair_reserve_fund',
  諸費用: 'other_expenses',
  間取り: 'floor_plan',
  専有面積: 'area',
  その他面積: 'other_area',
  引渡可能時期: 'delivery_time',
  '完成時期(築年月)': 'completion_time',
  所在階: 'floor',
  向き: 'direction',
  エネルギー消費性能: 'energy_consumption_performance',
  断熱性能: 'insulation_performance',
  目安光熱費: 'estimated_utility_cost',
  リフォーム: 'renovation',
  その他制限事項: 'other_restrictions',
  'その他概要・特記事項': 'other_overview_and_special_notes',
} as const;

export const COMMON_OVERVIEW_TRANSLATION_MAP = {
  所在地: 'location',
  交通: 'transportation',
  総戸数: 'total_units',
  '構造・階建て': 'structure_floors',
  敷地面積: 'site_area',
  敷地の権利形態: 'site_ownership_type',
  用途地域: 'usage_area',
  駐車場: 'parking_lot',
} as const;

export type PropertyOverviewKey =
  (typeof PROPERTY_OVERVIEW_TRANSLATION_MAP)[keyof typeof PROPERTY_OVERVIEW_TRANSLATION_MAP];
export type CommonOverviewKey =
  (typeof COMMON_OVERVIEW_TRANSLATION_MAP)[keyof typeof COMMON_OVERVIEW_TRANSLATION_MAP];

function hasOwnLabel<M extends object>(map: M, label: string): label is Extract<keyof M, string> {
  return Object.prototype.hasOwnProperty.call(map, label);
}

function asScalar(value: OverviewValue): string {
  return Array.isArray(value) ? value.join(' ') : value;
}

function asList(value: OverviewValue): string[] {
  return Array.isArray(value) ? value : [value];
}

/**
 * Rename raw labels to property-overview keys. Unknown labels are dropped.
 */
export function translatePropertyOverview(raw: RawOverview): PropertyOverviewData {
  const translated: PropertyOverviewData = {};
  for (const [label, value] of Object.entries(raw)) {
    if (hasOwnLabel(PROPERTY_OVERVIEW_TRANSLATION_MAP, label)) {
      translated[PROPERTY_OVERVIEW_TRANSLATION_MAP[label]] = asScalar(value);
    }
  }
  return translated;
}

/**
 * Rename raw labels to common-overview keys. Transportation is always a list.
 */
export function translateCommonOverview(raw: RawOverview): CommonOverviewData {
  const translated: CommonOverviewData = {};
  for (const [label, value] of Object.entries(raw)) {
    if (!hasOwnLabel(COMMON_OVERVIEW_TRANSLATION_MAP, label)) {
      continue;
    }
    const key = COMMON_OVERVIEW_TRANSLATION_MAP[label];
    if (key === 'transportation') {
      translated.transportation = asList(value);
    } else {
      translated[key] = asScalar(value);
    }
  }
  return translated;
}
