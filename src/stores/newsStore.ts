import { MongoClient, type AnyBulkWriteOperation, type Collection, type Filter } from 'mongodb';
import { StoreError } from '../errors.js';
import type { NewsDocument, SentimentLabel, SentimentScore } from '../types.js';

export interface NewsStoreQuery {
  ticker?: string;
  /** Omitted: any publication time. */
  since?: Date;
  limit: number;
  sentiment?: SentimentLabel;
}

/**
 * Document Store contract: news documents keyed by provider article id.
 */
export interface NewsStore {
  /** Documents published at or after `since`, newest first. */
  queryRecent(query: NewsStoreQuery): Promise<NewsDocument[]>;
  /** Stored documents among `providerIds`, whatever their tickers or age. */
  findByProviderIds(providerIds: string[]): Promise<NewsDocument[]>;
  /**
   * Insert documents that are new; for existing ids only the ticker association grows.
   * Stored sentiment is never overwritten.
   */
  upsertByProviderId(documents: NewsDocument[]): Promise<void>;
}

type StoredNewsDocument = {
  _id: string;
  publishedAt: Date;
  source: string;
  url: string;
  title: string;
  summary: string;
  tickers: string[];
  sentiment: SentimentScore;
  ingestedAt: Date;
};

export class MongoNewsStore implements NewsStore {
  private readonly collection: Collection<StoredNewsDocument>;

  constructor(
    private readonly client: MongoClient,
    database: string,
    collectionName: string,
  ) {
    this.collection = client.db(database).collection<StoredNewsDocument>(collectionName);
  }

  static fromUri(uri: string, database: string, collectionName: string): MongoNewsStore {
    return new MongoNewsStore(new MongoClient(uri), database, collectionName);
  }

  async ensureIndexes(): Promise<void> {
    try {
      await this.collection.createIndex({ tickers: 1, publishedAt: -1 });
      await this.collection.createIndex({ publishedAt: -1 });
    } catch (err) {
      throw new StoreError('news', 'Failed to create news indexes', { cause: err });
    }
  }

  async queryRecent(query: NewsStoreQuery): Promise<NewsDocument[]> {
    const filter: Filter<StoredNewsDocument> = {};
    if (query.since) filter.publishedAt = { $gte: query.since };
    if (query.ticker) filter.tickers = query.ticker;
    if (query.sentiment) filter['sentiment.label'] = query.sentiment;

    try {
      const docs = await this.collection
        .find(filter)
        .sort({ publishedAt: -1 })
        .limit(query.limit)
        .toArray();
      return docs.map(fromStored);
    } catch (err) {
      throw new StoreError('news', 'News query failed', { cause: err });
    }
  }

  async findByProviderIds(providerIds: string[]): Promise<NewsDocument[]> {
    if (!providerIds.length) return [];
    try {
      const docs = await this.collection.find({ _id: { $in: providerIds } }).toArray();
      return docs.map(fromStored);
    } catch (err) {
      throw new StoreError('news', `News lookup failed for ${providerIds.length} ids`, { cause: err });
    }
  }

  async upsertByProviderId(documents: NewsDocument[]): Promise<void> {
    if (!documents.length) return;
    const operations: AnyBulkWriteOperation<StoredNewsDocument>[] = documents.map((doc) => {
      const { _id, tickers, ...immutable } = toStored(doc);
      return {
        updateOne: {
          filter: { _id },
          update: {
            $setOnInsert: immutable,
            $addToSet: { tickers: { $each: tickers } },
          },
          upsert: true,
        },
      };
    });

    try {
      await this.collection.bulkWrite(operations, { ordered: false });
    } catch (err) {
      throw new StoreError('news', `News upsert failed for ${documents.length} documents`, { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

function toStored(doc: NewsDocument): StoredNewsDocument {
  return {
    _id: doc.providerId,
    publishedAt: new Date(doc.publishedAt),
    source: doc.source,
    url: doc.url,
    title: doc.title,
    summary: doc.summary,
    tickers: doc.tickers,
    sentiment: doc.sentiment,
    ingestedAt: new Date(doc.ingestedAt),
  };
}

function fromStored(doc: StoredNewsDocument): NewsDocument {
  return {
    providerId: doc._id,
    publishedAt: doc.publishedAt.toISOString(),
    source: doc.source,
    url: doc.url,
    title: doc.title,
    summary: doc.summary,
    tickers: doc.tickers,
    sentiment: doc.sentiment,
    ingestedAt: doc.ingestedAt.toISOString(),
  };
}
