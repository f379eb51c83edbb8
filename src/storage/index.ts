/**
 * Storage Module
 *
 * Responsibilities:
 * - Define StorageAdapter interface
 * - Implement S3StorageAdapter using AWS SDK v3
 * - Implement MemoryStorageAdapter for testing
 * - Handle artifact CRUD operations
 * - Manage metadata and checksums
 *
 * Storage paths (one audit record per query):
 * - queries/{query_id}/request.json
 * - queries/{query_id}/attempts.json
 * - queries/{query_id}/synthesis.json
 * - queries/{query_id}/report.md
 *
 * Usage:
 * const storage = new S3StorageAdapter({ bucket: 'query-audit' });
 * await storage.save(queryId, 'synthesis', content);
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import type { ArtifactMetadata, ArtifactType, QueryId, StorageAdapter } from '../types/index.js';

export type { ArtifactMetadata, ArtifactType, StorageAdapter };

/**
 * Map artifact type to file name
 */
export const ARTIFACT_FILE_NAMES: Record<ArtifactType, string> = {
  request: 'request.json',
  attempts: 'attempts.json',
  synthesis: 'synthesis.json',
  report: 'report.md',
};

const DEFAULT_CONTENT_TYPES: Record<ArtifactType, string> = {
  request: 'application/json',
  attempts: 'application/json',
  synthesis: 'application/json',
  report: 'text/markdown',
};

/**
 * Artifact type stored under a file name, if any
 */
export function artifactTypeForFile(fileName: string): ArtifactType | null {
  for (const [type, name] of Object.entries(ARTIFACT_FILE_NAMES)) {
    if (name === fileName && isArtifactType(type)) {
      return type;
    }
  }
  return null;
}

function isArtifactType(value: string): value is ArtifactType {
  return value in ARTIFACT_FILE_NAMES;
}

/**
 * S3 configuration for storage adapter
 */
export interface S3Config {
  /** S3 bucket name */
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'queries') */
  prefix?: string;
  /** Custom S3 endpoint for local development or alternative S3-compatible services */
  endpoint?: string;
  /** AWS credentials (optional if using IAM roles or environment variables) */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean;
  /** Preconfigured client; the options above are ignored when set */
  client?: S3Client;
}

/**
 * Calculate MD5 checksum for content
 *
 * @param content - String or Buffer content
 * @returns MD5 hash as hex string
 */
function calculateChecksum(content: string | Buffer): string {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return createHash('md5').update(buffer).digest('hex');
}

/**
 * Get content size in bytes
 *
 * @param content - String or Buffer content
 * @returns Size in bytes
 */
function getContentSize(content: string | Buffer): number {
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.length;
}

/**
 * S3 implementation of StorageAdapter using AWS SDK v3
 *
 * Provides durable audit storage for query runs.
 */
export class S3StorageAdapter implements StorageAdapter {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  /**
   * Create a new S3StorageAdapter
   *
   * @param config - S3 configuration options
   */
  constructor(config: S3Config) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'queries';

    if (config.client) {
      this.client = config.client;
      return;
    }

    // Build S3 client configuration
    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };

    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }

    if (config.credentials) {
      clientConfig.credentials = config.credentials;
    }

    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = new S3Client(clientConfig);
  }

  /**
   * Generate S3 key for artifact
   */
  getKey(queryId: QueryId, artifactType: ArtifactType): string {
    return `${this.prefix}/${queryId}/${ARTIFACT_FILE_NAMES[artifactType]}`;
  }

  /**
   * Save artifact to S3
   *
   * @param metadata - Extra S3 metadata; `contentType` overrides the default content type
   */
  async save(
    queryId: QueryId,
    artifactType: ArtifactType,
    content: string | Buffer,
    metadata?: Record<string, string>
  ): Promise<ArtifactMetadata> {
    const key = this.getKey(queryId, artifactType);
    const now = new Date().toISOString();
    const checksum = calculateChecksum(content);
    const size = getContentSize(content);
    const contentType = metadata?.contentType ?? DEFAULT_CONTENT_TYPES[artifactType];

    // Build S3 metadata
    const s3Metadata: Record<string, string> = {
      'query-id': queryId,
      'artifact-type': artifactType,
      'created-at': now,
      checksum,
    };

    // Add custom metadata
    if (metadata) {
      for (const [k, v] of Object.entries(metadata)) {
        if (k !== 'contentType') {
          s3Metadata[k] = v;
        }
      }
    }

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: content,
        ContentType: contentType,
        Metadata: s3Metadata,
      })
    );

    return {
      queryId,
      artifactType,
      fileName: ARTIFACT_FILE_NAMES[artifactType],
      createdAt: now,
      contentType,
      size,
      checksum,
    };
  }

  /**
   * Load artifact from S3
   *
   * @throws Error if artifact not found
   */
  async load(
    queryId: QueryId,
    artifactType: ArtifactType
  ): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(queryId, artifactType),
      })
    );

    if (!response.Body) {
      throw new Error(`Artifact not found: ${queryId}/${artifactType}`);
    }

    // Convert stream to string
    const content = await response.Body.transformToString();

    const metadata: ArtifactMetadata = {
      queryId,
      artifactType,
      fileName: ARTIFACT_FILE_NAMES[artifactType],
      createdAt: response.Metadata?.['created-at'] ?? new Date().toISOString(),
      contentType: response.ContentType ?? DEFAULT_CONTENT_TYPES[artifactType],
    };

    if (response.ContentLength !== undefined) {
      metadata.size = response.ContentLength;
    }

    if (response.Metadata?.checksum) {
      metadata.checksum = response.Metadata.checksum;
    }

    return { content, metadata };
  }

  /**
   * Check if artifact exists in S3
   */
  async exists(queryId: QueryId, artifactType: ArtifactType): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(queryId, artifactType),
        })
      );
      return true;
    } catch (error: unknown) {
      // Check for "not found" errors
      if (
        error instanceof Error &&
        (error.name === 'NotFound' ||
          error.name === 'NoSuchKey' ||
          error.message.includes('404') ||
          error.message.includes('Not Found'))
      ) {
        return false;
      }
      // Re-throw unexpected errors
      throw error;
    }
  }

  /**
   * List all artifacts for a query
   */
  async list(queryId: QueryId): Promise<ArtifactMetadata[]> {
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: `${this.prefix}/${queryId}/`,
      })
    );

    const artifacts: ArtifactMetadata[] = [];
    for (const obj of response.Contents ?? []) {
      const fileName = obj.Key?.split('/').pop() ?? '';
      const artifactType = artifactTypeForFile(fileName);
      if (!artifactType) continue;

      const metadata: ArtifactMetadata = {
        queryId,
        artifactType,
        fileName,
        createdAt: obj.LastModified?.toISOString() ?? new Date().toISOString(),
        contentType: DEFAULT_CONTENT_TYPES[artifactType],
      };
      if (obj.Size !== undefined) {
        metadata.size = obj.Size;
      }
      artifacts.push(metadata);
    }
    return artifacts;
  }

  /**
   * Delete artifact(s) from S3
   *
   * @param artifactType - Specific artifact to delete; all of the query's artifacts when omitted
   */
  async delete(queryId: QueryId, artifactType?: ArtifactType): Promise<void> {
    const types = artifactType
      ? [artifactType]
      : (await this.list(queryId)).map((artifact) => artifact.artifactType);

    for (const type of types) {
      await this.client.send(
        new DeleteObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(queryId, type),
        })
      );
    }
  }
}

/**
 * In-memory storage adapter for testing and development
 *
 * Provides the same interface as S3StorageAdapter but stores
 * artifacts in memory. Useful for unit tests and local development.
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private store: Map<string, { content: string | Buffer; metadata: ArtifactMetadata }> = new Map();

  /**
   * Generate storage key
   *
   * @param queryId - Query identifier
   * @param artifactType - Type of artifact
   * @returns Storage key
   */
  private getKey(queryId: QueryId, artifactType: ArtifactType): string {
    return `${queryId}/${artifactType}`;
  }

  /**
   * Save artifact to memory
   *
   * @param queryId - Query identifier
   * @param artifactType - Type of artifact
   * @param content - Content to save
   * @param metadata - Optional additional metadata
   * @returns Artifact metadata
   */
  async save(
    queryId: QueryId,
    artifactType: ArtifactType,
    content: string | Buffer,
    metadata?: Record<string, string>
  ): Promise<ArtifactMetadata> {
    const key = this.getKey(queryId, artifactType);
    const now = new Date().toISOString();
    const checksum = calculateChecksum(content);
    const size = getContentSize(content);
    const contentType = metadata?.contentType ?? DEFAULT_CONTENT_TYPES[artifactType];

    const artifactMetadata: ArtifactMetadata = {
      queryId,
      artifactType,
      fileName: ARTIFACT_FILE_NAMES[artifactType],
      createdAt: now,
      contentType,
      size,
      checksum,
    };

    this.store.set(key, { content, metadata: artifactMetadata });

    return artifactMetadata;
  }

  /**
   * Load artifact from memory
   *
   * @param queryId - Query identifier
   * @param artifactType - Type of artifact to load
   * @returns Content and metadata
   * @throws Error if artifact not found
   */
  async load(
    queryId: QueryId,
    artifactType: ArtifactType
  ): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const key = this.getKey(queryId, artifactType);
    const item = this.store.get(key);

    if (!item) {
      throw new Error(`Artifact not found: ${queryId}/${artifactType}`);
    }

    return item;
  }

  /**
   * Check if artifact exists in memory
   *
   * @param queryId - Query identifier
   * @param artifactType - Type of artifact to check
   * @returns True if artifact exists
   */
  async exists(queryId: QueryId, artifactType: ArtifactType): Promise<boolean> {
    const key = this.getKey(queryId, artifactType);
    return this.store.has(key);
  }

  /**
   * List all artifacts for a query
   *
   * @param queryId - Query identifier
   * @returns Array of artifact metadata
   */
  async list(queryId: QueryId): Promise<ArtifactMetadata[]> {
    const prefix = `${queryId}/`;
    const artifacts: ArtifactMetadata[] = [];

    for (const [key, value] of this.store.entries()) {
      if (key.startsWith(prefix)) {
        artifacts.push(value.metadata);
      }
    }

    return artifacts;
  }

  /**
   * Delete artifact(s) from memory
   *
   * @param queryId - Query identifier
   * @param artifactType - Optional specific artifact to delete
   */
  async delete(queryId: QueryId, artifactType?: ArtifactType): Promise<void> {
    if (artifactType) {
      const key = this.getKey(queryId, artifactType);
      this.store.delete(key);
    } else {
      // Delete all artifacts for the query
      const prefix = `${queryId}/`;
      for (const key of this.store.keys()) {
        if (key.startsWith(prefix)) {
          this.store.delete(key);
        }
      }
    }
  }

  /**
   * Clear all stored artifacts (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
  }

  /**
   * Get the number of stored artifacts (useful for testing)
   *
   * @returns Number of stored artifacts
   */
  size(): number {
    return this.store.size;
  }

  /**
   * Get all stored keys (useful for debugging)
   *
   * @returns Array of storage keys
   */
  keys(): string[] {
    return Array.from(this.store.keys());
  }
}

/**
 * Factory function to create the storage adapter named by configuration
 */
export function createStorageAdapter(
  config: { type: 'memory' } | ({ type: 's3' } & S3Config)
): StorageAdapter {
  if (config.type === 'memory') {
    return new MemoryStorageAdapter();
  }
  return new S3StorageAdapter(config);
}
