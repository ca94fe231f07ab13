import { registerAs } from '@nestjs/config';
import * as path from 'path';

export type StorageType = 's3' | 'r2' | 'local';

export interface StorageConfig {
  type: StorageType;
  bucketName: string;
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  endpoint?: string;
  publicBaseUrl?: string;
  uploadDir: string;
  fetchTimeoutMs: number;
}

function resolveStorageType(): StorageType {
  const requested = process.env.STORAGE_TYPE?.toLowerCase();
  if (requested === 's3' || requested === 'r2' || requested === 'local') {
    return requested;
  }
  // Default to r2 when its credentials are present, then s3, then disk.
  if (
    process.env.R2_ACCESS_KEY_ID &&
    process.env.R2_SECRET_ACCESS_KEY &&
    process.env.R2_ACCOUNT_ID
  ) {
    return 'r2';
  }
  if (process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY) {
    return 's3';
  }
  return 'local';
}

export default registerAs('storage', (): StorageConfig => {
  const type = resolveStorageType();
  const bucketName =
    process.env.AWS_S3_BUCKET || process.env.R2_BUCKET_NAME || 'order-ledger';
  const accountId = process.env.R2_ACCOUNT_ID;

  return {
    type,
    bucketName,
    region:
      type === 'r2' ? 'auto' : process.env.AWS_S3_REGION || 'ap-south-1',
    accessKeyId:
      process.env.AWS_ACCESS_KEY_ID || process.env.R2_ACCESS_KEY_ID,
    secretAccessKey:
      process.env.AWS_SECRET_ACCESS_KEY || process.env.R2_SECRET_ACCESS_KEY,
    endpoint:
      type === 'r2'
        ? process.env.R2_ENDPOINT ||
          `https://${accountId}.r2.cloudflarestorage.com`
        : undefined,
    publicBaseUrl: process.env.R2_PUBLIC_BASE_URL || undefined,
    uploadDir: process.env.UPLOAD_DIR || path.join(process.cwd(), 'uploads'),
    fetchTimeoutMs: parseInt(
      process.env.ATTACHMENT_FETCH_TIMEOUT_MS ?? '5000',
      10,
    ),
  };
});
