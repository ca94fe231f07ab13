import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryColumn,
} from 'typeorm';
import { AbstractEntity } from './abstract.entity';
import { Organization } from './organization.entity';
import { Attachment } from './attachment.entity';
import { OrderStatus } from '../common/enums/order-status.enum';

@Entity({ name: 'orders' })
@Index(['organizationId', 'orderDate'])
@Index(['organizationId', 'status'])
export class Order extends AbstractEntity {
  // Unique per organization only: max(order_id in org) + 1.
  @PrimaryColumn({ name: 'order_id', type: 'int' })
  orderId!: number;

  @PrimaryColumn({ name: 'organization_id', type: 'uuid' })
  organizationId!: string;

  @ManyToOne(() => Organization, { nullable: false })
  @JoinColumn({ name: 'organization_id' })
  organization?: Organization;

  @Column({ name: 'receiver_name', length: 200 })
  receiverName!: string;

  @Column({ length: 200 })
  product!: string;

  @Column({ type: 'text', default: '' })
  description!: string;

  @Column({ name: 'order_date', type: 'date' })
  orderDate!: string;

  @Column({ name: 'expected_delivery_date', type: 'date' })
  expectedDeliveryDate!: string;

  @Column({ type: 'int' })
  quantity!: number;

  @Column({ name: 'delivered_quantity', type: 'int', default: 0 })
  deliveredQuantity!: number;

  @Column({ name: 'unit_price', type: 'decimal', precision: 12, scale: 2 })
  unitPrice!: string;

  @Column({ name: 'basic_price', type: 'decimal', precision: 14, scale: 2 })
  basicPrice!: string;

  @Column({ name: 'gst_percent', type: 'decimal', precision: 6, scale: 2 })
  gstPercent!: string;

  @Column({
    name: 'total_amount_with_gst',
    type: 'decimal',
    precision: 14,
    scale: 2,
  })
  totalAmountWithGst!: string;

  @Column({
    name: 'advance_payment',
    type: 'decimal',
    precision: 14,
    scale: 2,
    default: 0,
  })
  advancePayment!: string;

  @Column({ name: 'pending_amount', type: 'decimal', precision: 14, scale: 2 })
  pendingAmount!: string;

  @Column({
    type: 'enum',
    enum: OrderStatus,
    default: OrderStatus.PENDING,
  })
  status!: OrderStatus;

  @Column({ name: 'created_by', type: 'uuid', nullable: true })
  createdBy!: string | null;

  // Order-level e-way bill
  @Column({ name: 'attachment_id', type: 'uuid', nullable: true })
  attachmentId!: string | null;

  @ManyToOne(() => Attachment, { nullable: true })
  @JoinColumn({ name: 'attachment_id' })
  attachment?: Attachment | null;
}
