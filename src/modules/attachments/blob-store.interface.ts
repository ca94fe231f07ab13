import { AttachmentKind } from '../../common/enums/attachment-kind.enum';

export const BLOB_STORE = Symbol('BLOB_STORE');

export interface UploadedBlob {
  locator: string;
  contentId: string;
}

export type BlobDeleteOutcome = 'ok' | 'not_found' | 'error';

/**
 * External document storage. Blobs are addressed by content id within a
 * kind; a delete or fetch issued with the wrong kind will not find the blob.
 */
export interface BlobStore {
  upload(
    bytes: Buffer,
    kind: AttachmentKind,
    contentId: string,
    mimeType: string,
  ): Promise<UploadedBlob>;

  /** Rejects when the blob cannot be read within the configured timeout. */
  fetch(locator: string): Promise<Buffer>;

  delete(contentId: string, kind: AttachmentKind): Promise<BlobDeleteOutcome>;
}
