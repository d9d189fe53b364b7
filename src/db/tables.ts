/**
 * DynamoDB table configuration for the sentiment dashboard
 */

/**
 * Table name constants - use environment variables for flexibility across environments
 */
export const TableNames = {
  SNAPSHOTS: process.env.SNAPSHOTS_TABLE || 'sentiment-snapshots'
} as const;

/**
 * Key schema definitions for each table
 */
export const KeySchemas = {
  /**
   * Snapshots Table
   * - Partition Key: cacheKey (ticker#rangeStart#rangeEnd#window)
   * - TTL attribute: expiresAt (epoch seconds)
   */
  SNAPSHOTS: {
    partitionKey: 'cacheKey',
    ttlAttribute: 'expiresAt'
  }
} as const;
