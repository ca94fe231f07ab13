import { v4 as uuidv4 } from 'uuid';
import { Order } from '../../../entities/order.entity';
import { Delivery } from '../../../entities/delivery.entity';
import { Attachment } from '../../../entities/attachment.entity';
import {
  AttachmentDraft,
  DeliveryDraft,
  LedgerStore,
  OrderDraft,
  OrderListFilter,
} from '../ledger-store.interface';
import { LedgerConstraintError, LedgerRecordNotFoundError } from '../ledger.errors';

type LedgerMethod = keyof LedgerStore;

/**
 * In-process stand-in for the relational store. Enforces the same key and
 * foreign-key rules as the postgres schema and records every mutating call.
 */
export class InMemoryLedgerStore implements LedgerStore {
  readonly writes: string[] = [];

  private readonly orders = new Map<string, Order>();
  private readonly deliveries = new Map<string, Delivery>();
  private readonly attachments = new Map<string, Attachment>();
  private readonly failures = new Map<LedgerMethod, Error>();

  /** Makes the next call of `method` reject with `error`. */
  failNext(method: LedgerMethod, error: Error = new Error(`${method} failed`)): void {
    this.failures.set(method, error);
  }

  async getOrder(organizationId: string, orderId: number): Promise<Order | null> {
    this.maybeFail('getOrder');
    const order = this.orders.get(orderKey(organizationId, orderId));
    return order ? copyOrder(order) : null;
  }

  async listOrders(
    organizationId: string,
    filter: OrderListFilter = {},
  ): Promise<Order[]> {
    this.maybeFail('listOrders');
    return [...this.orders.values()]
      .filter((order) => order.organizationId === organizationId)
      .filter((order) => !filter.status || order.status === filter.status)
      .filter((order) => !filter.startDate || order.orderDate >= filter.startDate)
      .filter((order) => !filter.endDate || order.orderDate <= filter.endDate)
      .sort((a, b) => a.orderId - b.orderId)
      .map(copyOrder);
  }

  async listOrderIds(organizationId: string): Promise<number[]> {
    const orders = await this.listOrders(organizationId);
    return orders.map((order) => order.orderId);
  }

  async upsertOrder(draft: OrderDraft): Promise<Order> {
    this.maybeFail('upsertOrder');
    const key = orderKey(draft.organizationId, draft.orderId);
    const existing = this.orders.get(key);
    const now = new Date();
    const order = Object.assign(new Order(), draft, {
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    });
    this.orders.set(key, order);
    this.writes.push(`upsertOrder:${draft.orderId}`);
    return copyOrder(order);
  }

  async deleteOrder(organizationId: string, orderId: number): Promise<void> {
    this.maybeFail('deleteOrder');
    const remaining = [...this.deliveries.values()].filter(
      (delivery) =>
        delivery.organizationId === organizationId && delivery.orderId === orderId,
    ).length;
    if (remaining > 0) {
      throw new LedgerConstraintError(
        `Order ${orderId} still has ${remaining} deliveries`,
      );
    }
    if (!this.orders.delete(orderKey(organizationId, orderId))) {
      throw new LedgerRecordNotFoundError(`Order ${orderId} not found`);
    }
    this.writes.push(`deleteOrder:${orderId}`);
  }

  async listDeliveries(
    organizationId: string,
    orderId: number,
  ): Promise<Delivery[]> {
    this.maybeFail('listDeliveries');
    return [...this.deliveries.values()]
      .filter(
        (delivery) =>
          delivery.organizationId === organizationId &&
          delivery.orderId === orderId,
      )
      .sort((a, b) => a.deliveryId - b.deliveryId)
      .map(copyDelivery);
  }

  async insertDelivery(draft: DeliveryDraft): Promise<Delivery> {
    this.maybeFail('insertDelivery');
    if (!this.orders.has(orderKey(draft.organizationId, draft.orderId))) {
      throw new LedgerConstraintError(
        `Delivery references missing order ${draft.orderId}`,
      );
    }
    const key = deliveryKey(draft.organizationId, draft.orderId, draft.deliveryId);
    if (this.deliveries.has(key)) {
      throw new LedgerConstraintError(
        `Duplicate key for delivery ${draft.deliveryId} of order ${draft.orderId}`,
      );
    }
    const now = new Date();
    const delivery = Object.assign(new Delivery(), draft, {
      createdAt: now,
      updatedAt: now,
    });
    this.deliveries.set(key, delivery);
    this.writes.push(`insertDelivery:${draft.orderId}/${draft.deliveryId}`);
    return copyDelivery(delivery);
  }

  async deleteDelivery(
    organizationId: string,
    orderId: number,
    deliveryId: number,
  ): Promise<void> {
    this.maybeFail('deleteDelivery');
    if (!this.deliveries.delete(deliveryKey(organizationId, orderId, deliveryId))) {
      throw new LedgerRecordNotFoundError(
        `Delivery ${deliveryId} of order ${orderId} not found`,
      );
    }
    this.writes.push(`deleteDelivery:${orderId}/${deliveryId}`);
  }

  async setDeliveryAttachment(
    organizationId: string,
    orderId: number,
    deliveryId: number,
    attachmentId: string | null,
  ): Promise<void> {
    this.maybeFail('setDeliveryAttachment');
    const delivery = this.deliveries.get(
      deliveryKey(organizationId, orderId, deliveryId),
    );
    if (!delivery) {
      throw new LedgerRecordNotFoundError(
        `Delivery ${deliveryId} of order ${orderId} not found`,
      );
    }
    delivery.attachmentId = attachmentId;
    this.writes.push(`setDeliveryAttachment:${orderId}/${deliveryId}`);
  }

  async saveAttachment(draft: AttachmentDraft): Promise<Attachment> {
    this.maybeFail('saveAttachment');
    const now = new Date();
    const attachment = Object.assign(new Attachment(), draft, {
      id: uuidv4(),
      createdAt: now,
      updatedAt: now,
    });
    this.attachments.set(attachment.id, attachment);
    this.writes.push(`saveAttachment:${attachment.contentId}`);
    return { ...attachment };
  }

  async getAttachment(
    organizationId: string,
    attachmentId: string,
  ): Promise<Attachment | null> {
    this.maybeFail('getAttachment');
    const attachment = this.attachments.get(attachmentId);
    return attachment && attachment.organizationId === organizationId
      ? { ...attachment }
      : null;
  }

  async deleteAttachment(
    organizationId: string,
    attachmentId: string,
  ): Promise<void> {
    this.maybeFail('deleteAttachment');
    const referenced =
      [...this.orders.values()].some((order) => order.attachmentId === attachmentId) ||
      [...this.deliveries.values()].some(
        (delivery) => delivery.attachmentId === attachmentId,
      );
    if (referenced) {
      throw new LedgerConstraintError(
        `Foreign key violation for attachment ${attachmentId}`,
      );
    }
    const attachment = this.attachments.get(attachmentId);
    if (attachment && attachment.organizationId === organizationId) {
      this.attachments.delete(attachmentId);
      this.writes.push(`deleteAttachment:${attachment.contentId}`);
    }
  }

  attachmentCount(): number {
    return this.attachments.size;
  }

  private maybeFail(method: LedgerMethod): void {
    const error = this.failures.get(method);
    if (error) {
      this.failures.delete(method);
      throw error;
    }
  }
}

function orderKey(organizationId: string, orderId: number): string {
  return `${organizationId}:${orderId}`;
}

function deliveryKey(
  organizationId: string,
  orderId: number,
  deliveryId: number,
): string {
  return `${organizationId}:${orderId}:${deliveryId}`;
}

function copyOrder(order: Order): Order {
  return Object.assign(new Order(), order);
}

function copyDelivery(delivery: Delivery): Delivery {
  return Object.assign(new Delivery(), delivery);
}
