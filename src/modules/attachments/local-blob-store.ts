import { Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { AttachmentKind } from '../../common/enums/attachment-kind.enum';
import { StorageConfig } from '../../config/storage.config';
import { describeError, errorCode } from '../../utils/error.util';
import { BlobDeleteOutcome, BlobStore, UploadedBlob } from './blob-store.interface';

const LOCATOR_PREFIX = '/uploads/';

/** Development store writing to `UPLOAD_DIR/<kind>/<contentId>`. */
export class LocalBlobStore implements BlobStore {
  private readonly logger = new Logger(LocalBlobStore.name);

  constructor(private readonly config: StorageConfig) {
    this.logger.warn(
      `Bucket storage not configured, keeping attachments on disk at ${config.uploadDir}`,
    );
  }

  async upload(
    bytes: Buffer,
    kind: AttachmentKind,
    contentId: string,
    _mimeType: string,
  ): Promise<UploadedBlob> {
    const filePath = this.filePath(`${kind}/${contentId}`);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, bytes);
    return { locator: `${LOCATOR_PREFIX}${kind}/${contentId}`, contentId };
  }

  async fetch(locator: string): Promise<Buffer> {
    if (!locator.startsWith(LOCATOR_PREFIX)) {
      throw new Error(`Locator ${locator} is not a local upload`);
    }
    return fs.readFile(this.filePath(locator.slice(LOCATOR_PREFIX.length)), {
      signal: AbortSignal.timeout(this.config.fetchTimeoutMs),
    });
  }

  async delete(contentId: string, kind: AttachmentKind): Promise<BlobDeleteOutcome> {
    try {
      await fs.unlink(this.filePath(`${kind}/${contentId}`));
      return 'ok';
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return 'not_found';
      }
      this.logger.error(
        `Error deleting local attachment ${kind}/${contentId}: ${describeError(error)}`,
      );
      return 'error';
    }
  }

  private filePath(key: string): string {
    const resolved = path.resolve(this.config.uploadDir, key);
    if (!resolved.startsWith(path.resolve(this.config.uploadDir) + path.sep)) {
      throw new Error(`Refusing to access ${key} outside the upload directory`);
    }
    return resolved;
  }
}
