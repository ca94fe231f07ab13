import { Logger } from '@nestjs/common';
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { AttachmentKind } from '../../common/enums/attachment-kind.enum';
import { StorageConfig } from '../../config/storage.config';
import { describeError } from '../../utils/error.util';
import { BlobDeleteOutcome, BlobStore, UploadedBlob } from './blob-store.interface';

/**
 * AWS S3 or Cloudflare R2 (S3 compatible). Objects live under
 * `<kind>/<contentId>`.
 */
export class S3BlobStore implements BlobStore {
  private readonly logger = new Logger(S3BlobStore.name);
  private readonly s3Client: S3Client;
  private readonly baseUrl: string;
  private readonly storageName: string;

  constructor(private readonly config: StorageConfig) {
    const credentials =
      config.accessKeyId && config.secretAccessKey
        ? {
            accessKeyId: config.accessKeyId,
            secretAccessKey: config.secretAccessKey,
          }
        : undefined;

    if (config.type === 'r2') {
      this.storageName = 'R2';
      this.baseUrl =
        config.publicBaseUrl || `${config.endpoint}/${config.bucketName}`;
      // R2 requires path-style addressing (bucket/key format)
      this.s3Client = new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        credentials,
        forcePathStyle: true,
      });
    } else {
      this.storageName = 'S3';
      this.baseUrl = `https://${config.bucketName}.s3.${config.region}.amazonaws.com`;
      this.s3Client = new S3Client({ region: config.region, credentials });
    }

    this.logger.log(
      `${this.storageName} storage configured: bucket=${config.bucketName} region=${config.region}`,
    );
  }

  async upload(
    bytes: Buffer,
    kind: AttachmentKind,
    contentId: string,
    mimeType: string,
  ): Promise<UploadedBlob> {
    const key = this.objectKey(kind, contentId);
    this.logger.debug(
      `Uploading to ${this.storageName} bucket=${this.config.bucketName} key=${key} size=${bytes.length}`,
    );

    await this.s3Client.send(
      new PutObjectCommand({
        Bucket: this.config.bucketName,
        Key: key,
        Body: bytes,
        ContentType: mimeType,
      }),
    );

    return { locator: `${this.baseUrl}/${key}`, contentId };
  }

  async fetch(locator: string): Promise<Buffer> {
    const key = this.extractKey(locator);
    if (!key) {
      throw new Error(`Locator ${locator} does not belong to this bucket`);
    }

    const result = await this.s3Client.send(
      new GetObjectCommand({ Bucket: this.config.bucketName, Key: key }),
      { abortSignal: AbortSignal.timeout(this.config.fetchTimeoutMs) },
    );
    if (!result.Body) {
      throw new Error(`Object ${key} has no body`);
    }
    return Buffer.from(await result.Body.transformToByteArray());
  }

  async delete(contentId: string, kind: AttachmentKind): Promise<BlobDeleteOutcome> {
    const key = this.objectKey(kind, contentId);
    try {
      // DeleteObject succeeds for missing keys, so look first.
      await this.s3Client.send(
        new HeadObjectCommand({ Bucket: this.config.bucketName, Key: key }),
      );
      await this.s3Client.send(
        new DeleteObjectCommand({ Bucket: this.config.bucketName, Key: key }),
      );
      return 'ok';
    } catch (error) {
      if (
        error instanceof S3ServiceException &&
        error.$metadata.httpStatusCode === 404
      ) {
        return 'not_found';
      }
      this.logger.error(
        `Error deleting ${key} from ${this.storageName}: ${describeError(error)}`,
      );
      return 'error';
    }
  }

  private objectKey(kind: AttachmentKind, contentId: string): string {
    return `${kind}/${contentId}`;
  }

  private extractKey(locator: string): string | null {
    const prefix = `${this.baseUrl}/`;
    return locator.startsWith(prefix) ? locator.slice(prefix.length) : null;
  }
}
