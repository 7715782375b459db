/**
 * Attachment directory sharding
 *
 * Org-attach stores a node's files under attachments/<bucket>/<leaf>/, where
 * the bucket is a short prefix of the node identifier. Buckets keep any one
 * directory from collecting every attachment folder in the repository.
 */

export const BUCKET_LENGTH = 2;

/**
 * Bucket segment for an identifier (its first two characters).
 */
export function attachmentBucket(id: string): string {
  return id.slice(0, BUCKET_LENGTH);
}

/**
 * True when the bucket is a case-sensitive prefix of the leaf name.
 */
export function isShardConsistent(bucket: string, leaf: string): boolean {
  return bucket.length === BUCKET_LENGTH && leaf.startsWith(bucket);
}
