import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { LocalBlobStore } from './local-blob-store';
import { AttachmentKind } from '../../common/enums/attachment-kind.enum';
import { StorageConfig } from '../../config/storage.config';

describe('LocalBlobStore', () => {
  let uploadDir: string;
  let store: LocalBlobStore;

  beforeEach(async () => {
    uploadDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-blobs-'));
    const config: StorageConfig = {
      type: 'local',
      bucketName: 'test-bucket',
      region: 'local',
      uploadDir,
      fetchTimeoutMs: 1000,
    };
    store = new LocalBlobStore(config);
  });

  afterEach(async () => {
    await fs.rm(uploadDir, { recursive: true, force: true });
  });

  it('stores bytes under the kind and reads them back by locator', async () => {
    const uploaded = await store.upload(
      Buffer.from('scan'),
      AttachmentKind.IMAGE,
      'bill.png',
      'image/png',
    );

    expect(uploaded).toEqual({
      locator: '/uploads/image/bill.png',
      contentId: 'bill.png',
    });
    await expect(store.fetch(uploaded.locator)).resolves.toEqual(
      Buffer.from('scan'),
    );
  });

  it('reports not_found when deleting with a different kind', async () => {
    await store.upload(Buffer.from('%PDF'), AttachmentKind.RAW, 'bill.pdf', 'application/pdf');

    await expect(store.delete('bill.pdf', AttachmentKind.IMAGE)).resolves.toBe(
      'not_found',
    );
    await expect(store.delete('bill.pdf', AttachmentKind.RAW)).resolves.toBe('ok');
    await expect(store.delete('bill.pdf', AttachmentKind.RAW)).resolves.toBe(
      'not_found',
    );
  });

  it('rejects locators it did not issue', async () => {
    await expect(store.fetch('https://example.com/bill.pdf')).rejects.toThrow(
      'is not a local upload',
    );
  });

  it('refuses keys that escape the upload directory', async () => {
    await expect(
      store.upload(Buffer.from('x'), AttachmentKind.RAW, '../../outside.pdf', 'application/pdf'),
    ).rejects.toThrow('outside the upload directory');
  });
});
