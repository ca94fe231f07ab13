import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { AbstractEntity } from './abstract.entity';
import { Organization } from './organization.entity';
import { AttachmentKind } from '../common/enums/attachment-kind.enum';

/**
 * Reference to an e-way bill or proof document held by the blob store.
 * Orders and deliveries point at these rows; the bytes never live here.
 */
@Entity({ name: 'attachments' })
@Index(['organizationId'])
export class Attachment extends AbstractEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'organization_id', type: 'uuid' })
  organizationId!: string;

  @ManyToOne(() => Organization, { nullable: false })
  @JoinColumn({ name: 'organization_id' })
  organization?: Organization;

  @Column({ name: 'content_id', length: 255 })
  contentId!: string;

  @Column({
    name: 'content_kind',
    type: 'enum',
    enum: AttachmentKind,
  })
  contentKind!: AttachmentKind;

  @Column({ type: 'text' })
  locator!: string;

  @Column({ name: 'file_name', length: 255 })
  fileName!: string;

  @Column({ name: 'file_size', type: 'int' })
  fileSize!: number;

  @Column({ name: 'uploaded_by', type: 'uuid', nullable: true })
  uploadedBy?: string | null;
}
