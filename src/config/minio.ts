import { S3Client, CreateBucketCommand, HeadBucketCommand } from '@aws-sdk/client-s3';
import { logger } from './logger';

const MINIO_ENDPOINT = process.env.MINIO_ENDPOINT || 'http://localhost:9002';
const MINIO_ACCESS_KEY = process.env.MINIO_ACCESS_KEY || 'minioadmin';
const MINIO_SECRET_KEY = process.env.MINIO_SECRET_KEY || 'minioadmin';
const MINIO_BUCKET = process.env.MINIO_BUCKET || 'coldstore-billing-runs';

export const s3Client = new S3Client({
  endpoint: MINIO_ENDPOINT,
  region: 'us-east-1', // Required but ignored by MinIO
  credentials: {
    accessKeyId: MINIO_ACCESS_KEY,
    secretAccessKey: MINIO_SECRET_KEY,
  },
  forcePathStyle: true, // Required for MinIO
});

export const BUCKET_NAME = MINIO_BUCKET;

function isNotFound(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'NotFound') return true;
  const metadata: unknown = Reflect.get(error, '$metadata');
  return (
    typeof metadata === 'object' &&
    metadata !== null &&
    Reflect.get(metadata, 'httpStatusCode') === 404
  );
}

/**
 * Initialize MinIO: create bucket if it doesn't exist
 */
export async function initMinio(): Promise<void> {
  try {
    await s3Client.send(new HeadBucketCommand({ Bucket: BUCKET_NAME }));
    logger.info({ bucket: BUCKET_NAME }, 'MinIO bucket exists');
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
    await s3Client.send(new CreateBucketCommand({ Bucket: BUCKET_NAME }));
    logger.info({ bucket: BUCKET_NAME }, 'MinIO bucket created');
  }
}
