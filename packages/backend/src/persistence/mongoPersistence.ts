import { createEmptyStoreSnapshot, validateStoreSnapshot, type StoreSnapshot } from '@switchyard/domain';
import type { Collection, MongoClient } from 'mongodb';
import type { PersistenceAdapter } from './index.js';

type MongoPersistenceOptions = {
  uri: string;
  database: string;
  collection: string;
};

type SnapshotDocument = {
  _id: string;
  snapshot: StoreSnapshot;
};

export const SNAPSHOT_DOCUMENT_ID = 'switchyard';

export const createMongoPersistence = ({
  uri,
  database,
  collection
}: MongoPersistenceOptions): PersistenceAdapter => {
  let clientPromise: Promise<MongoClient> | null = null;

  const getCollection = async (): Promise<Collection<SnapshotDocument>> => {
    if (!clientPromise) {
      clientPromise = import('mongodb').then(({ MongoClient: Mongo }) =>
        Mongo.connect(uri, {
          serverSelectionTimeoutMS: 5_000
        })
      );
      // A failed connection is retried on the next call instead of being cached.
      clientPromise.catch(() => {
        clientPromise = null;
      });
    }

    const client = await clientPromise;
    return client.db(database).collection<SnapshotDocument>(collection);
  };

  return {
    async load() {
      const col = await getCollection();
      const document = await col.findOne({ _id: SNAPSHOT_DOCUMENT_ID });

      return document ? validateStoreSnapshot(document.snapshot) : createEmptyStoreSnapshot();
    },
    async save(snapshot) {
      const col = await getCollection();

      await col.replaceOne(
        { _id: SNAPSHOT_DOCUMENT_ID },
        { snapshot: validateStoreSnapshot(snapshot) },
        { upsert: true }
      );
    }
  };
};
