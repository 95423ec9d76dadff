import { MongoServerError, ObjectId } from 'mongodb';
import type { Document } from 'mongodb';
import type { RecordCollection } from '../../src/services/record-store.service';

type StoredDocument<T> = T & { _id: ObjectId };

function sameValue(left: unknown, right: unknown): boolean {
  if (left instanceof ObjectId && right instanceof ObjectId) {
    return left.equals(right);
  }
  if (left instanceof Date && right instanceof Date) {
    return left.getTime() === right.getTime();
  }
  return left === right;
}

function matches(doc: Document, filter: Document): boolean {
  return Object.entries(filter).every(([key, value]) => sameValue(doc[key], value));
}

/**
 * In-process stand-in for a Mongo collection, with optional unique keys
 */
export class InMemoryCollection<T extends Document> implements RecordCollection<T> {
  readonly docs: Array<StoredDocument<T>> = [];
  readonly calls = { find: 0, insert: 0, update: 0 };

  constructor(
    readonly name: string,
    private readonly uniqueKeys: string[][] = []
  ) {}

  async findId(filter: Partial<T>): Promise<ObjectId | null> {
    this.calls.find++;
    const found = this.docs.find((doc) => matches(doc, filter));
    return found ? found._id : null;
  }

  async insertOne(doc: T): Promise<ObjectId> {
    this.calls.insert++;
    for (const keys of this.uniqueKeys) {
      const clash = this.docs.some((stored) =>
        keys.every((key) => sameValue(stored[key], doc[key]))
      );
      if (clash) {
        throw new MongoServerError({ message: 'E11000 duplicate key error', code: 11000 });
      }
    }

    const _id = new ObjectId();
    this.docs.push({ ...doc, _id });
    return _id;
  }

  async updateById(id: ObjectId, changes: Partial<T>): Promise<void> {
    this.calls.update++;
    const index = this.docs.findIndex((doc) => doc._id.equals(id));
    if (index >= 0) {
      this.docs[index] = { ...this.docs[index], ...changes };
    }
  }

  byId(id: ObjectId): StoredDocument<T> | undefined {
    return this.docs.find((doc) => doc._id.equals(id));
  }
}
