import { MongoClient, MongoServerError } from 'mongodb';
import type { Collection, Db, Document, ObjectId } from 'mongodb';
import { CONFIG } from '../config';
import type {
  CommonOverviewRecord,
  PropertyOverviewRecord,
  PropertyRecord,
  UserPropertyRecord,
} from '../types';

/**
 * The slice of a collection the upsert pipeline needs
 */
export interface RecordCollection<T extends Document> {
  readonly name: string;
  findId(filter: Partial<T>): Promise<ObjectId | null>;
  insertOne(doc: T): Promise<ObjectId>;
  updateById(id: ObjectId, changes: Partial<T>): Promise<void>;
}

export interface ListingCollections {
  properties: RecordCollection<PropertyRecord>;
  userProperties: RecordCollection<UserPropertyRecord>;
  propertyOverviews: RecordCollection<PropertyOverviewRecord>;
  commonOverviews: RecordCollection<CommonOverviewRecord>;
}

export interface StoreStats {
  properties: number;
  activeProperties: number;
  userProperties: number;
  propertyOverviews: number;
  commonOverviews: number;
}

export function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof MongoServerError && error.code === 11000;
}

export class MongoRecordCollection<T extends Document> implements RecordCollection<T> {
  constructor(private readonly collection: Collection<Document>) {}

  get name(): string {
    return this.collection.collectionName;
  }

  async findId(filter: Partial<T>): Promise<ObjectId | null> {
    const found = await this.collection.findOne(filter, { projection: { _id: 1 } });
    return found ? found._id : null;
  }

  async insertOne(doc: T): Promise<ObjectId> {
    // The driver writes _id back onto the object it is given
    const result = await this.collection.insertOne({ ...doc });
    return result.insertedId;
  }

  async updateById(id: ObjectId, changes: Partial<T>): Promise<void> {
    await this.collection.updateOne({ _id: id }, { $set: changes });
  }
}

/**
 * MongoStore
 * Owns the database handle for the four listing collections. The client is
 * created by the caller and handed in.
 */
export class MongoStore {
  private db: Db | null = null;

  constructor(
    private readonly client: MongoClient,
    private readonly databaseName: string = CONFIG.mongodb.database
  ) {}

  static fromConfig(): MongoStore {
    return new MongoStore(new MongoClient(CONFIG.mongodb.uri));
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
      this.db = this.client.db(this.databaseName);

      await this.createIndexes();

      console.log(`Connected to MongoDB: ${this.databaseName}`);
    } catch (error) {
      console.error('Failed to connect to MongoDB:', error);
      throw error;
    }
  }

  private async createIndexes(): Promise<void> {
    const db = this.requireDb();
    const names = CONFIG.mongodb.collections;

    await db.collection(names.properties).createIndex({ url: 1 }, { unique: true });
    await db
      .collection(names.userProperties)
      .createIndex({ line_user_id: 1, property_id: 1 }, { unique: true });
    await db.collection(names.propertyOverviews).createIndex({ property_id: 1 }, { unique: true });
    await db.collection(names.commonOverviews).createIndex({ property_id: 1 }, { unique: true });

    // Scheduler query for due subscriptions
    await db.collection(names.userProperties).createIndex({ next_aggregated_at: 1 });

    console.log('MongoDB indexes created');
  }

  collections(): ListingCollections {
    const db = this.requireDb();
    const names = CONFIG.mongodb.collections;

    return {
      properties: new MongoRecordCollection<PropertyRecord>(db.collection(names.properties)),
      userProperties: new MongoRecordCollection<UserPropertyRecord>(
        db.collection(names.userProperties)
      ),
      propertyOverviews: new MongoRecordCollection<PropertyOverviewRecord>(
        db.collection(names.propertyOverviews)
      ),
      commonOverviews: new MongoRecordCollection<CommonOverviewRecord>(
        db.collection(names.commonOverviews)
      ),
    };
  }

  async getStats(): Promise<StoreStats> {
    const db = this.requireDb();
    const names = CONFIG.mongodb.collections;

    const [properties, activeProperties, userProperties, propertyOverviews, commonOverviews] =
      await Promise.all([
        db.collection(names.properties).countDocuments(),
        db.collection(names.properties).countDocuments({ is_active: true }),
        db.collection(names.userProperties).countDocuments(),
        db.collection(names.propertyOverviews).countDocuments(),
        db.collection(names.commonOverviews).countDocuments(),
      ]);

    return { properties, activeProperties, userProperties, propertyOverviews, commonOverviews };
  }

  async close(): Promise<void> {
    await this.client.close();
    this.db = null;
    console.log('MongoDB connection closed');
  }

  private requireDb(): Db {
    if (!this.db) {
      throw new Error('MongoDB not connected. Call connect() first.');
    }
    return this.db;
  }
}
