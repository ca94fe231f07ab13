/**
 * Resource class an attachment is stored under. Uploads, fetches and deletes
 * must all use the kind that was chosen when the file was uploaded.
 */
export enum AttachmentKind {
  RAW = 'raw',
  IMAGE = 'image',
}
