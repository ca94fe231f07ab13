import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LedgerModule } from '../ledger/ledger.module';
import { StorageConfig } from '../../config/storage.config';
import { AttachmentsService } from './attachments.service';
import { BLOB_STORE, BlobStore } from './blob-store.interface';
import { LocalBlobStore } from './local-blob-store';
import { S3BlobStore } from './s3-blob-store';

@Module({
  imports: [LedgerModule],
  providers: [
    {
      provide: BLOB_STORE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): BlobStore => {
        const config = configService.getOrThrow<StorageConfig>('storage');
        return config.type === 'local'
          ? new LocalBlobStore(config)
          : new S3BlobStore(config);
      },
    },
    AttachmentsService,
  ],
  exports: [AttachmentsService],
})
export class AttachmentsModule {}
