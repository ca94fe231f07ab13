import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { AttachmentKind } from '../../common/enums/attachment-kind.enum';
import { OperationContext } from '../../common/operation-context';
import { Attachment } from '../../entities/attachment.entity';
import { describeError } from '../../utils/error.util';
import { LEDGER_STORE, LedgerStore } from '../ledger/ledger-store.interface';
import {
  AttachmentStorageException,
  LedgerValidationException,
} from '../ledger/ledger.errors';
import { BLOB_STORE, BlobDeleteOutcome, BlobStore } from './blob-store.interface';

export const MAX_ATTACHMENT_SIZE = 10 * 1024 * 1024;

const MIME_TYPES: Record<string, string> = {
  pdf: 'application/pdf',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
};

export type UploadedDocument = Pick<
  Express.Multer.File,
  'originalname' | 'buffer' | 'size' | 'mimetype'
>;

export interface AttachmentContent {
  bytes: Buffer;
  mimeType: string;
  extension: string;
}

export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? '' : fileName.slice(dot + 1).toLowerCase();
}

/** `pdf` is stored as a raw document, everything else as an image. */
export function classifyContentKind(fileName: string): AttachmentKind {
  return fileExtension(fileName) === 'pdf'
    ? AttachmentKind.RAW
    : AttachmentKind.IMAGE;
}

export function buildContentId(
  organizationId: string,
  orderId: number,
  fileName: string,
): string {
  return `ewaybill_${organizationId}_${orderId}_${uuidv4()}.${fileExtension(fileName)}`;
}

export function mimeTypeFor(extension: string): string {
  return MIME_TYPES[extension] ?? 'application/octet-stream';
}

@Injectable()
export class AttachmentsService {
  private readonly logger = new Logger(AttachmentsService.name);

  constructor(
    @Inject(BLOB_STORE) private readonly blobStore: BlobStore,
    @Inject(LEDGER_STORE) private readonly ledgerStore: LedgerStore,
  ) {}

  validateFile(file: UploadedDocument): void {
    const extension = fileExtension(file.originalname);
    if (!(extension in MIME_TYPES)) {
      throw new LedgerValidationException(
        `Unsupported attachment type "${extension || file.originalname}". Allowed: pdf, jpg, jpeg, png`,
      );
    }
    if (file.size > MAX_ATTACHMENT_SIZE) {
      throw new LedgerValidationException('Attachment exceeds the 10 MB limit');
    }
  }

  /**
   * Uploads the document, reads it back to confirm it is reachable and only
   * then records the reference. Any failure along the way removes the blob
   * again and raises {@link AttachmentStorageException}.
   */
  async store(
    ctx: OperationContext,
    orderId: number,
    file: UploadedDocument,
  ): Promise<Attachment> {
    this.validateFile(file);

    const extension = fileExtension(file.originalname);
    const kind = classifyContentKind(file.originalname);
    const contentId = buildContentId(ctx.organizationId, orderId, file.originalname);

    let locator: string;
    try {
      const uploaded = await this.blobStore.upload(
        file.buffer,
        kind,
        contentId,
        mimeTypeFor(extension),
      );
      locator = uploaded.locator;
    } catch (error) {
      this.logger.error(
        `Upload of ${kind}/${contentId} failed: ${describeError(error)}`,
      );
      throw new AttachmentStorageException('Failed to upload the e-way bill');
    }

    try {
      await this.blobStore.fetch(locator);
    } catch (error) {
      this.logger.error(
        `Uploaded e-way bill ${locator} is not accessible: ${describeError(error)}`,
      );
      await this.removeBlob(contentId, kind);
      throw new AttachmentStorageException(
        'The uploaded e-way bill could not be verified',
      );
    }

    try {
      return await this.ledgerStore.saveAttachment({
        organizationId: ctx.organizationId,
        contentId,
        contentKind: kind,
        locator,
        fileName: file.originalname,
        fileSize: file.size,
        uploadedBy: ctx.userId,
      });
    } catch (error) {
      await this.removeBlob(contentId, kind);
      throw error;
    }
  }

  async findById(
    organizationId: string,
    attachmentId: string,
  ): Promise<Attachment | null> {
    return this.ledgerStore.getAttachment(organizationId, attachmentId);
  }

  /**
   * Best-effort removal of the blob and its reference row. Must run after
   * nothing references the row any more. Never throws.
   */
  async discard(
    organizationId: string,
    attachmentId: string,
  ): Promise<BlobDeleteOutcome> {
    let outcome: BlobDeleteOutcome;
    try {
      const attachment = await this.ledgerStore.getAttachment(
        organizationId,
        attachmentId,
      );
      if (!attachment) {
        this.logger.warn(`Attachment reference ${attachmentId} already gone`);
        return 'not_found';
      }
      outcome = await this.removeBlob(attachment.contentId, attachment.contentKind);
      await this.ledgerStore.deleteAttachment(organizationId, attachmentId);
    } catch (error) {
      this.logger.error(
        `Failed to discard attachment ${attachmentId}: ${describeError(error)}`,
      );
      return 'error';
    }
    return outcome;
  }

  async removeBlob(
    contentId: string,
    kind: AttachmentKind,
  ): Promise<BlobDeleteOutcome> {
    let outcome: BlobDeleteOutcome;
    try {
      outcome = await this.blobStore.delete(contentId, kind);
    } catch (error) {
      this.logger.error(
        `Blob store rejected delete of ${kind}/${contentId}: ${describeError(error)}`,
      );
      return 'error';
    }

    if (outcome === 'ok') {
      this.logger.log(`Deleted e-way bill ${kind}/${contentId}`);
    } else if (outcome === 'not_found') {
      this.logger.warn(`E-way bill ${kind}/${contentId} was not found in storage`);
    } else {
      this.logger.error(`Could not delete e-way bill ${kind}/${contentId}`);
    }
    return outcome;
  }

  async fetchContent(attachment: Attachment): Promise<AttachmentContent> {
    const extension = fileExtension(attachment.contentId);
    try {
      const bytes = await this.blobStore.fetch(attachment.locator);
      return { bytes, mimeType: mimeTypeFor(extension), extension };
    } catch (error) {
      this.logger.error(
        `Failed to fetch e-way bill ${attachment.locator}: ${describeError(error)}`,
      );
      throw new AttachmentStorageException('Failed to fetch the e-way bill');
    }
  }
}
