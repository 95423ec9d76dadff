import { ObjectId } from 'mongodb';
import type { Document } from 'mongodb';
import { z } from 'zod';
import { MalformedWorkUnitError, PersistenceError } from '../errors';
import type {
  CommonOverviewFields,
  PersistedWorkUnit,
  PropertyOverviewFields,
  PropertyRecord,
  UserPropertyFields,
  WorkUnit,
  WorkUnitGroup,
} from '../types';
import { nextAggregationAt } from '../utils/schedule';
import { isDuplicateKeyError } from './record-store.service';
import type { ListingCollections, RecordCollection } from './record-store.service';

const flatValueSchema = z.union([
  z.string(),
  z.array(z.string()),
  z.boolean(),
  z.date(),
  z.instanceof(ObjectId),
  z.null(),
]);

const flatRecordSchema = z.record(flatValueSchema);

const WORK_UNIT_GROUPS: WorkUnitGroup[] = [
  'property',
  'user_property',
  'property_overview',
  'common_overview',
];

/**
 * Every present field group must be a flat record. Anything else means the
 * extraction produced a broken unit.
 */
export function assertFlatWorkUnit(unit: WorkUnit): void {
  for (const group of WORK_UNIT_GROUPS) {
    const fields: unknown = unit[group];
    if (fields === undefined && group !== 'property') {
      continue;
    }

    const result = flatRecordSchema.safeParse(fields);
    if (!result.success) {
      const issue = result.error.issues[0];
      const path = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new MalformedWorkUnitError(group, `${issue.message}${path}`);
    }
  }
}

/**
 * UpsertPipeline
 * Persists one work unit across the four listing collections, in dependency
 * order: property, subscription, property overview, common overview.
 * Creation timestamps are never overwritten.
 */
export class UpsertPipeline {
  constructor(
    private readonly collections: ListingCollections,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * An aborted `signal` stops the unit before its next collection write
   */
  async process(unit: WorkUnit, signal?: AbortSignal): Promise<PersistedWorkUnit> {
    assertFlatWorkUnit(unit);

    // Image locations are written by the image step only
    const { image_urls: _sourceImages, ...scraped } = unit.property;
    signal?.throwIfAborted();
    const propertyId = await this.upsertProperty(scraped);

    if (unit.user_property) {
      signal?.throwIfAborted();
      await this.upsertUserProperty(unit.user_property, propertyId);
    }
    if (unit.property_overview) {
      signal?.throwIfAborted();
      await this.upsertPropertyOverview(unit.property_overview, propertyId);
    }
    if (unit.common_overview) {
      signal?.throwIfAborted();
      await this.upsertCommonOverview(unit.common_overview, propertyId);
    }

    console.log(`✅ Stored property ${propertyId.toHexString()} (${unit.property.url})`);

    return { ...unit, propertyId };
  }

  /**
   * Find the property by URL and update it, or insert it. `image_urls` is
   * written when present; new records start with an empty list otherwise.
   */
  async upsertProperty(property: PropertyRecord): Promise<ObjectId> {
    const { created_at: _createdAt, ...fields } = property;
    const currentTime = this.now();

    return this.upsertBy(
      this.collections.properties,
      { url: property.url },
      { image_urls: [], ...property },
      { ...fields, updated_at: currentTime }
    );
  }

  private async upsertUserProperty(
    subscription: UserPropertyFields,
    propertyId: ObjectId
  ): Promise<ObjectId> {
    const {
      first_succeeded_at: _firstSucceededAt,
      last_succeeded_at: _lastSucceededAt,
      created_at: _createdAt,
      ...fields
    } = subscription;
    const currentTime = this.now();

    return this.upsertBy(
      this.collections.userProperties,
      { line_user_id: subscription.line_user_id, property_id: propertyId },
      { ...subscription, property_id: propertyId },
      {
        ...fields,
        property_id: propertyId,
        last_succeeded_at: currentTime,
        last_aggregated_at: currentTime,
        next_aggregated_at: nextAggregationAt(currentTime),
        updated_at: currentTime,
      }
    );
  }

  private async upsertPropertyOverview(
    overview: PropertyOverviewFields,
    propertyId: ObjectId
  ): Promise<ObjectId> {
    const { created_at: _createdAt, ...fields } = overview;

    return this.upsertBy(
      this.collections.propertyOverviews,
      { property_id: propertyId },
      { ...overview, property_id: propertyId },
      { ...fields, updated_at: this.now() }
    );
  }

  private async upsertCommonOverview(
    overview: CommonOverviewFields,
    propertyId: ObjectId
  ): Promise<ObjectId> {
    const { created_at: _createdAt, ...fields } = overview;

    return this.upsertBy(
      this.collections.commonOverviews,
      { property_id: propertyId },
      { ...overview, property_id: propertyId },
      { ...fields, updated_at: this.now() }
    );
  }

  /**
   * Find-then-update-or-insert. An insert that loses a race on a unique
   * index is turned into an update of the record that won.
   */
  private async upsertBy<T extends Document>(
    collection: RecordCollection<T>,
    filter: Partial<T>,
    record: T,
    changes: Partial<T>
  ): Promise<ObjectId> {
    const existingId = await this.guard(collection, 'find', () => collection.findId(filter));
    if (existingId) {
      await this.guard(collection, 'update', () => collection.updateById(existingId, changes));
      return existingId;
    }

    try {
      return await collection.insertOne(record);
    } catch (error) {
      if (!isDuplicateKeyError(error)) {
        throw new PersistenceError(collection.name, 'insert', error);
      }

      const racedId = await this.guard(collection, 'find', () => collection.findId(filter));
      if (!racedId) {
        throw new PersistenceError(collection.name, 'insert', error);
      }

      console.warn(
        `⚠️  Concurrent insert into ${collection.name}, updating ${racedId.toHexString()} instead`
      );
      await this.guard(collection, 'update', () => collection.updateById(racedId, changes));
      return racedId;
    }
  }

  private async guard<R>(
    collection: { name: string },
    operation: 'find' | 'update',
    action: () => Promise<R>
  ): Promise<R> {
    try {
      return await action();
    } catch (error) {
      throw new PersistenceError(collection.name, operation, error);
    }
  }
}
