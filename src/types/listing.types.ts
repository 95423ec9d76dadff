import type { ObjectId } from 'mongodb';
import type {
  CommonOverviewKey,
  PropertyOverviewKey,
} from '../services/listing-strategies/suumo.translations';

/**
 * Listing Types
 */

export type OverviewValue = string | string[];

/**
 * Overview table as found on the page, keyed by the raw source label
 */
export type RawOverview = Record<string, OverviewValue>;

export type PropertyOverviewData = Partial<Record<PropertyOverviewKey, string>>;

export type CommonOverviewData = Partial<
  Record<Exclude<CommonOverviewKey, 'transportation'>, string>
> & {
  transportation?: string[];
};

interface Timestamps {
  created_at: Date;
  updated_at: Date;
}

export interface PropertyRecord extends Timestamps {
  name: string;
  url: string;
  is_active: boolean;
  // Raw source URLs from the spider, object-store locations once ingested
  image_urls?: string[];
}

export interface UserPropertyFields extends Timestamps {
  line_user_id: string;
  last_aggregated_at: Date;
  next_aggregated_at: Date;
  first_succeeded_at: Date;
  last_succeeded_at: Date;
}

export interface UserPropertyRecord extends UserPropertyFields {
  property_id: ObjectId;
}

export type PropertyOverviewFields = PropertyOverviewData & Timestamps;
export type PropertyOverviewRecord = PropertyOverviewFields & { property_id: ObjectId };

export type CommonOverviewFields = CommonOverviewData & Timestamps;
export type CommonOverviewRecord = CommonOverviewFields & { property_id: ObjectId };

/**
 * One scrape's output. Every group except the property is optional and the
 * pipeline only writes the groups that are present.
 */
export interface WorkUnit {
  property: PropertyRecord;
  user_property?: UserPropertyFields;
  property_overview?: PropertyOverviewFields;
  common_overview?: CommonOverviewFields;
}

export interface PersistedWorkUnit extends WorkUnit {
  propertyId: ObjectId;
}

export type WorkUnitGroup = keyof WorkUnit;
