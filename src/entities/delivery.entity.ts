import { Column, Entity, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { AbstractEntity } from './abstract.entity';
import { Order } from './order.entity';
import { Attachment } from './attachment.entity';

/**
 * One partial fulfillment of an order together with the payment taken at
 * that time. Never edited in place except for its attachment reference.
 */
@Entity({ name: 'deliveries' })
export class Delivery extends AbstractEntity {
  @PrimaryColumn({ name: 'order_id', type: 'int' })
  orderId!: number;

  // Per order, not global.
  @PrimaryColumn({ name: 'delivery_id', type: 'int' })
  deliveryId!: number;

  @PrimaryColumn({ name: 'organization_id', type: 'uuid' })
  organizationId!: string;

  // No cascade: the order row may only go once its deliveries are gone.
  @ManyToOne(() => Order, { nullable: false })
  @JoinColumn([
    { name: 'order_id', referencedColumnName: 'orderId' },
    { name: 'organization_id', referencedColumnName: 'organizationId' },
  ])
  order?: Order;

  @Column({ name: 'delivery_quantity', type: 'int' })
  deliveryQuantity!: number;

  @Column({ name: 'delivery_date', type: 'date' })
  deliveryDate!: string;

  @Column({
    name: 'amount_received',
    type: 'decimal',
    precision: 14,
    scale: 2,
    default: 0,
  })
  amountReceived!: string;

  @Column({ name: 'attachment_id', type: 'uuid', nullable: true })
  attachmentId!: string | null;

  @ManyToOne(() => Attachment, { nullable: true })
  @JoinColumn({ name: 'attachment_id' })
  attachment?: Attachment | null;

  @Column({ name: 'created_by', type: 'uuid', nullable: true })
  createdBy!: string | null;
}
