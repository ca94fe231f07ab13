import { Order } from '../../entities/order.entity';
import { Delivery } from '../../entities/delivery.entity';
import { Attachment } from '../../entities/attachment.entity';
import { OrderStatus } from '../../common/enums/order-status.enum';

export const LEDGER_STORE = Symbol('LEDGER_STORE');

export type OrderDraft = Omit<
  Order,
  'createdAt' | 'updatedAt' | 'organization' | 'attachment'
>;

export type DeliveryDraft = Omit<
  Delivery,
  'createdAt' | 'updatedAt' | 'order' | 'attachment'
>;

export type AttachmentDraft = Omit<
  Attachment,
  'id' | 'createdAt' | 'updatedAt' | 'organization'
>;

export interface OrderListFilter {
  status?: OrderStatus;
  startDate?: string;
  endDate?: string;
}

/**
 * Persistence boundary for orders, deliveries and attachment references.
 *
 * Every read is scoped to one organization. The store enforces keys and
 * foreign keys only; business rules are checked by the caller before any
 * write is issued. No operation spans tables atomically, so callers sequence
 * multi-row changes themselves. Failures surface as
 * {@link LedgerRecordNotFoundError} or {@link LedgerConstraintError} and are
 * never retried.
 */
export interface LedgerStore {
  getOrder(organizationId: string, orderId: number): Promise<Order | null>;

  listOrders(
    organizationId: string,
    filter?: OrderListFilter,
  ): Promise<Order[]>;

  listOrderIds(organizationId: string): Promise<number[]>;

  /** Insert, or replace every column of the row with the same key. */
  upsertOrder(order: OrderDraft): Promise<Order>;

  /** Fails while the order still has deliveries; nothing cascades. */
  deleteOrder(organizationId: string, orderId: number): Promise<void>;

  listDeliveries(organizationId: string, orderId: number): Promise<Delivery[]>;

  insertDelivery(delivery: DeliveryDraft): Promise<Delivery>;

  deleteDelivery(
    organizationId: string,
    orderId: number,
    deliveryId: number,
  ): Promise<void>;

  setDeliveryAttachment(
    organizationId: string,
    orderId: number,
    deliveryId: number,
    attachmentId: string | null,
  ): Promise<void>;

  saveAttachment(attachment: AttachmentDraft): Promise<Attachment>;

  getAttachment(
    organizationId: string,
    attachmentId: string,
  ): Promise<Attachment | null>;

  deleteAttachment(organizationId: string, attachmentId: string): Promise<void>;
}
