/**
 * Snapshot Repository - caches assembled dashboard snapshots
 *
 * Snapshots are keyed by ticker, range and trend window and expire after a
 * TTL. The DynamoDB table relies on its TTL attribute for cleanup; reads
 * also check expiry since DynamoDB deletes expired items lazily.
 */

import { DynamoDB } from 'aws-sdk';
import { documentClient } from '../db/client';
import { KeySchemas, TableNames } from '../db/tables';
import { DashboardSnapshot } from '../types/dashboard';

/**
 * Snapshot cache contract
 */
export interface SnapshotStore {
  get(key: string): Promise<DashboardSnapshot | null>;
  put(key: string, snapshot: DashboardSnapshot, ttlSeconds: number): Promise<void>;
  invalidate(key: string): Promise<void>;
}

/**
 * Subset of the DocumentClient used by the store
 */
export interface SnapshotTableClient {
  get(params: DynamoDB.DocumentClient.GetItemInput): { promise(): Promise<DynamoDB.DocumentClient.GetItemOutput> };
  put(params: DynamoDB.DocumentClient.PutItemInput): { promise(): Promise<DynamoDB.DocumentClient.PutItemOutput> };
  delete(params: DynamoDB.DocumentClient.DeleteItemInput): { promise(): Promise<DynamoDB.DocumentClient.DeleteItemOutput> };
}

/**
 * Serialized snapshot for DynamoDB storage
 */
interface SerializedSnapshot {
  cacheKey: string;
  snapshotId: string;
  ticker: string;
  /** JSON serialized DashboardSnapshot */
  snapshot: string;
  /** Epoch seconds */
  expiresAt: number;
}

/**
 * Cache key for a ticker, range and trend window
 */
export function snapshotKey(ticker: string, rangeStart: string, rangeEnd: string, trendWindowMs: number): string {
  return `${ticker.toUpperCase()}#${rangeStart}#${rangeEnd}#${trendWindowMs}`;
}

export function serializeSnapshot(
  key: string,
  snapshot: DashboardSnapshot,
  ttlSeconds: number,
  nowMs: number = Date.now()
): SerializedSnapshot {
  return {
    cacheKey: key,
    snapshotId: snapshot.snapshotId,
    ticker: snapshot.ticker,
    snapshot: JSON.stringify(snapshot),
    expiresAt: Math.floor(nowMs / 1000) + ttlSeconds
  };
}

export function deserializeSnapshot(item: DynamoDB.DocumentClient.AttributeMap): DashboardSnapshot | null {
  if (typeof item.snapshot !== 'string') {
    return null;
  }
  const snapshot: DashboardSnapshot = JSON.parse(item.snapshot);
  return snapshot;
}

/**
 * DynamoDB-backed snapshot store
 */
export class DynamoSnapshotStore implements SnapshotStore {
  constructor(
    private readonly client: SnapshotTableClient = documentClient,
    private readonly tableName: string = TableNames.SNAPSHOTS,
    private readonly now: () => number = Date.now
  ) {}

  async get(key: string): Promise<DashboardSnapshot | null> {
    const result = await this.client.get({
      TableName: this.tableName,
      Key: { [KeySchemas.SNAPSHOTS.partitionKey]: key }
    }).promise();

    if (!result.Item) {
      return null;
    }

    const expiresAt = result.Item[KeySchemas.SNAPSHOTS.ttlAttribute];
    if (typeof expiresAt === 'number' && expiresAt * 1000 <= this.now()) {
      return null;
    }

    return deserializeSnapshot(result.Item);
  }

  async put(key: string, snapshot: DashboardSnapshot, ttlSeconds: number): Promise<void> {
    await this.client.put({
      TableName: this.tableName,
      Item: serializeSnapshot(key, snapshot, ttlSeconds, this.now())
    }).promise();
  }

  async invalidate(key: string): Promise<void> {
    await this.client.delete({
      TableName: this.tableName,
      Key: { [KeySchemas.SNAPSHOTS.partitionKey]: key }
    }).promise();
  }
}

/** Entries kept by InMemorySnapshotStore unless configured otherwise */
export const DEFAULT_MEMORY_ENTRIES = 10;

/**
 * Process-local snapshot store for tests and single-instance use
 *
 * Holds at most maxEntries snapshots; the oldest write is evicted first.
 */
export class InMemorySnapshotStore implements SnapshotStore {
  private readonly entries = new Map<string, { snapshot: DashboardSnapshot; expiresAtMs: number }>();

  constructor(
    private readonly now: () => number = Date.now,
    private readonly maxEntries: number = DEFAULT_MEMORY_ENTRIES
  ) {}

  async get(key: string): Promise<DashboardSnapshot | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAtMs <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.snapshot;
  }

  async put(key: string, snapshot: DashboardSnapshot, ttlSeconds: number): Promise<void> {
    const now = this.now();
    this.entries.delete(key);
    for (const [entryKey, entry] of this.entries) {
      if (entry.expiresAtMs <= now) {
        this.entries.delete(entryKey);
      }
    }

    // Map iteration follows insertion order, so the first key is the oldest write
    for (const oldestKey of this.entries.keys()) {
      if (this.entries.size < this.maxEntries) {
        break;
      }
      this.entries.delete(oldestKey);
    }

    this.entries.set(key, { snapshot, expiresAtMs: now + ttlSeconds * 1000 });
  }

  async invalidate(key: string): Promise<void> {
    this.entries.delete(key);
  }

  size(): number {
    return this.entries.size;
  }
}
