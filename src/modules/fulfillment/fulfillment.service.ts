import { Inject, Injectable, Logger } from '@nestjs/common';
import { Order } from '../../entities/order.entity';
import { Delivery } from '../../entities/delivery.entity';
import { OrderStatus } from '../../common/enums/order-status.enum';
import { AuditAction } from '../../common/enums/audit-action.enum';
import { AuditEntityType } from '../../common/enums/audit-entity-type.enum';
import { OperationContext } from '../../common/operation-context';
import { describeError } from '../../utils/error.util';
import { AuditLogsService } from '../audit-logs/audit-logs.service';
import {
  AttachmentsService,
  UploadedDocument,
} from '../attachments/attachments.service';
import { BlobDeleteOutcome } from '../attachments/blob-store.interface';
import {
  LEDGER_STORE,
  LedgerStore,
  OrderDraft,
} from '../ledger/ledger-store.interface';
import {
  AttachmentNotFoundException,
  DeliveryNotFoundException,
  InsufficientDeliveredQuantityException,
  LedgerValidationException,
  NegativeAmountException,
  OrderNotFoundException,
  QuantityBelowDeliveredException,
  QuantityExceedsOrderException,
  StatusTransitionException,
} from '../ledger/ledger.errors';
import {
  computeOrderTotals,
  computePending,
  deriveStatus,
  findLedgerInconsistencies,
  nextDeliveryId,
  nextOrderId,
  parseMoney,
  roundMoney,
  sumAmountReceived,
  toMoneyString,
} from '../ledger/ledger.calculations';
import { OrderLockService } from './order-lock.service';
import { CreateOrderDto } from './dto/create-order.dto';
import { UpdateOrderDto } from './dto/update-order.dto';
import { CreateDeliveryDto } from './dto/create-delivery.dto';
import { OrderFilterDto } from './dto/order-filter.dto';

interface OrderFields {
  receiverName: string;
  product: string;
  description: string;
  orderDate: string;
  expectedDeliveryDate: string;
  quantity: number;
  unitPrice: number;
  gstPercent: number;
  advancePayment: number;
}

export interface AttachmentDownload {
  bytes: Buffer;
  mimeType: string;
  fileName: string;
}

export interface OrderDeletionSummary {
  deliveriesDeleted: number;
  blobsDeleted: number;
  blobFailures: number;
}

export interface OrganizationDeletionSummary {
  ordersDeleted: number;
  blobsDeleted: number;
  blobFailures: number;
}

export interface ConsistencyReport {
  orderId: number;
  consistent: boolean;
  problems: string[];
}

function toDraft(order: Order): OrderDraft {
  return {
    orderId: order.orderId,
    organizationId: order.organizationId,
    receiverName: order.receiverName,
    product: order.product,
    description: order.description,
    orderDate: order.orderDate,
    expectedDeliveryDate: order.expectedDeliveryDate,
    quantity: order.quantity,
    deliveredQuantity: order.deliveredQuantity,
    unitPrice: order.unitPrice,
    basicPrice: order.basicPrice,
    gstPercent: order.gstPercent,
    totalAmountWithGst: order.totalAmountWithGst,
    advancePayment: order.advancePayment,
    pendingAmount: order.pendingAmount,
    status: order.status,
    createdBy: order.createdBy,
    attachmentId: order.attachmentId,
  };
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Every order and delivery mutation goes through here. Each operation reads
 * the current ledger state, validates the transition and only then writes,
 * while holding the lock for the order it touches.
 */
@Injectable()
export class FulfillmentService {
  private readonly logger = new Logger(FulfillmentService.name);

  constructor(
    @Inject(LEDGER_STORE) private readonly ledgerStore: LedgerStore,
    private readonly attachmentsService: AttachmentsService,
    private readonly auditLogsService: AuditLogsService,
    private readonly orderLocks: OrderLockService,
  ) {}

  async createOrder(ctx: OperationContext, dto: CreateOrderDto): Promise<Order> {
    const fields = this.validateOrderFields({
      receiverName: dto.receiverName,
      product: dto.product,
      description: dto.description ?? '',
      orderDate: dto.orderDate,
      expectedDeliveryDate: dto.expectedDeliveryDate,
      quantity: dto.quantity,
      unitPrice: dto.unitPrice,
      gstPercent: dto.gstPercent,
      advancePayment: dto.advancePayment ?? 0,
    });

    return this.orderLocks.runExclusive(
      OrderLockService.organizationKey(ctx.organizationId),
      async () => {
        const orderId = nextOrderId(
          await this.ledgerStore.listOrderIds(ctx.organizationId),
        );
        const totals = computeOrderTotals(fields);

        const order = await this.ledgerStore.upsertOrder({
          orderId,
          organizationId: ctx.organizationId,
          receiverName: fields.receiverName,
          product: fields.product,
          description: fields.description,
          orderDate: fields.orderDate,
          expectedDeliveryDate: fields.expectedDeliveryDate,
          quantity: fields.quantity,
          deliveredQuantity: 0,
          unitPrice: toMoneyString(fields.unitPrice),
          basicPrice: toMoneyString(totals.basicPrice),
          gstPercent: toMoneyString(fields.gstPercent),
          totalAmountWithGst: toMoneyString(totals.totalAmountWithGst),
          advancePayment: toMoneyString(fields.advancePayment),
          pendingAmount: toMoneyString(totals.pendingAmount),
          status: OrderStatus.PENDING,
          createdBy: ctx.userId,
          attachmentId: null,
        });

        await this.audit(
          ctx,
          AuditEntityType.ORDER,
          `${orderId}`,
          AuditAction.CREATE,
          {
            receiverName: order.receiverName,
            product: order.product,
            quantity: order.quantity,
            totalAmountWithGst: order.totalAmountWithGst,
            advancePayment: order.advancePayment,
          },
        );
        this.logger.log(
          `Order #${orderId} created for organization ${ctx.organizationId}`,
        );
        return order;
      },
    );
  }

  /**
   * Replaces the editable fields and recomputes the money columns against
   * the receipts recorded so far. Delivered quantity and status are kept.
   */
  async editOrder(
    ctx: OperationContext,
    orderId: number,
    dto: UpdateOrderDto,
  ): Promise<Order> {
    return this.withOrderLock(ctx, orderId, async () => {
      const order = await this.requireOrder(ctx, orderId);
      const fields = this.validateOrderFields({
        receiverName: dto.receiverName ?? order.receiverName,
        product: dto.product ?? order.product,
        description: dto.description ?? order.description,
        orderDate: dto.orderDate ?? order.orderDate,
        expectedDeliveryDate:
          dto.expectedDeliveryDate ?? order.expectedDeliveryDate,
        quantity: dto.quantity ?? order.quantity,
        unitPrice: dto.unitPrice ?? parseMoney(order.unitPrice),
        gstPercent: dto.gstPercent ?? parseMoney(order.gstPercent),
        advancePayment: dto.advancePayment ?? parseMoney(order.advancePayment),
      });

      if (fields.quantity < order.deliveredQuantity) {
        throw new QuantityBelowDeliveredException(
          fields.quantity,
          order.deliveredQuantity,
        );
      }

      const deliveries = await this.ledgerStore.listDeliveries(
        ctx.organizationId,
        orderId,
      );
      const totals = computeOrderTotals(fields, sumAmountReceived(deliveries));

      const updated = await this.ledgerStore.upsertOrder({
        ...toDraft(order),
        receiverName: fields.receiverName,
        product: fields.product,
        description: fields.description,
        orderDate: fields.orderDate,
        expectedDeliveryDate: fields.expectedDeliveryDate,
        quantity: fields.quantity,
        unitPrice: toMoneyString(fields.unitPrice),
        basicPrice: toMoneyString(totals.basicPrice),
        gstPercent: toMoneyString(fields.gstPercent),
        totalAmountWithGst: toMoneyString(totals.totalAmountWithGst),
        advancePayment: toMoneyString(fields.advancePayment),
        pendingAmount: toMoneyString(totals.pendingAmount),
      });

      await this.audit(
        ctx,
        AuditEntityType.ORDER,
        `${orderId}`,
        AuditAction.UPDATE,
        {
          quantity: { from: order.quantity, to: updated.quantity },
          totalAmountWithGst: {
            from: order.totalAmountWithGst,
            to: updated.totalAmountWithGst,
          },
          pendingAmount: { from: order.pendingAmount, to: updated.pendingAmount },
        },
      );
      this.logger.log(`Order #${orderId} updated`);
      return updated;
    });
  }

  /**
   * Manual status change. Without deliveries an order can be marked
   * Completed (and reopened) freely; once deliveries exist the status must
   * match what the delivered quantity implies.
   */
  async updateStatus(
    ctx: OperationContext,
    orderId: number,
    status: OrderStatus,
  ): Promise<Order> {
    return this.withOrderLock(ctx, orderId, async () => {
      const order = await this.requireOrder(ctx, orderId);
      if (order.status === status) {
        return order;
      }

      const deliveries = await this.ledgerStore.listDeliveries(
        ctx.organizationId,
        orderId,
      );
      if (deliveries.length > 0) {
        const derived = deriveStatus(order.deliveredQuantity, order.quantity);
        if (status !== derived) {
          throw new StatusTransitionException(
            `Order #${orderId} has ${order.deliveredQuantity} of ${order.quantity} units delivered and must stay ${derived}`,
          );
        }
      }

      // Reopening drops any forced zero and owes what receipts leave open.
      const pendingAmount =
        status === OrderStatus.PENDING
          ? toMoneyString(
              computePending(
                parseMoney(order.totalAmountWithGst),
                parseMoney(order.advancePayment),
                sumAmountReceived(deliveries),
              ),
            )
          : order.pendingAmount;

      const updated = await this.ledgerStore.upsertOrder({
        ...toDraft(order),
        status,
        pendingAmount,
      });

      await this.audit(
        ctx,
        AuditEntityType.ORDER,
        `${orderId}`,
        AuditAction.UPDATE,
        {
          status: { from: order.status, to: status },
        },
      );
      this.logger.log(`Order #${orderId} marked ${status}`);
      return updated;
    });
  }

  async addDelivery(
    ctx: OperationContext,
    orderId: number,
    dto: CreateDeliveryDto,
    file?: UploadedDocument,
  ): Promise<Delivery> {
    const amountReceived = dto.amountReceived ?? 0;
    if (!Number.isInteger(dto.deliveryQuantity) || dto.deliveryQuantity < 1) {
      throw new LedgerValidationException(
        'Delivery quantity must be a whole number of at least 1',
      );
    }
    if (!isFiniteNumber(amountReceived)) {
      throw new LedgerValidationException('Amount received must be a number');
    }
    if (amountReceived < 0) {
      throw new NegativeAmountException(amountReceived);
    }
    if (!dto.deliveryDate) {
      throw new LedgerValidationException('Delivery date is required');
    }
    if (file) {
      this.attachmentsService.validateFile(file);
    }

    return this.withOrderLock(ctx, orderId, async () => {
      const order = await this.requireOrder(ctx, orderId);
      const remaining = order.quantity - order.deliveredQuantity;
      if (dto.deliveryQuantity > remaining) {
        throw new QuantityExceedsOrderException(dto.deliveryQuantity, remaining);
      }

      const deliveries = await this.ledgerStore.listDeliveries(
        ctx.organizationId,
        orderId,
      );

      // Upload first so the delivery only ever points at a stored document.
      const attachment = file
        ? await this.attachmentsService.store(ctx, orderId, file)
        : null;

      const pendingBefore = computePending(
        parseMoney(order.totalAmountWithGst),
        parseMoney(order.advancePayment),
        sumAmountReceived(deliveries),
      );
      const deliveredQuantity = order.deliveredQuantity + dto.deliveryQuantity;
      const fullyDelivered = deliveredQuantity >= order.quantity;
      const pendingAmount = fullyDelivered
        ? 0
        : Math.max(0, roundMoney(pendingBefore - amountReceived));

      const deliveryId = nextDeliveryId(deliveries);
      let delivery: Delivery;
      try {
        delivery = await this.ledgerStore.insertDelivery({
          orderId,
          deliveryId,
          organizationId: ctx.organizationId,
          deliveryQuantity: dto.deliveryQuantity,
          deliveryDate: dto.deliveryDate,
          amountReceived: toMoneyString(amountReceived),
          attachmentId: attachment?.id ?? null,
          createdBy: ctx.userId,
        });
      } catch (error) {
        if (attachment) {
          await this.attachmentsService.discard(ctx.organizationId, attachment.id);
        }
        throw error;
      }

      try {
        await this.ledgerStore.upsertOrder({
          ...toDraft(order),
          deliveredQuantity,
          pendingAmount: toMoneyString(pendingAmount),
          status: deriveStatus(deliveredQuantity, order.quantity),
        });
      } catch (error) {
        await this.rollbackDelivery(ctx, delivery);
        throw error;
      }

      await this.audit(
        ctx,
        AuditEntityType.DELIVERY,
        `${orderId}/${deliveryId}`,
        AuditAction.CREATE,
        {
          deliveryQuantity: delivery.deliveryQuantity,
          amountReceived: delivery.amountReceived,
          deliveredQuantity,
          pendingAmount: toMoneyString(pendingAmount),
          attachmentId: delivery.attachmentId,
        },
      );
      this.logger.log(
        `Delivery #${deliveryId} of ${dto.deliveryQuantity} units recorded on order #${orderId}`,
      );
      return delivery;
    });
  }

  /** Swaps the e-way bill of a delivery; nothing else about it changes. */
  async replaceDeliveryAttachment(
    ctx: OperationContext,
    orderId: number,
    deliveryId: number,
    file: UploadedDocument,
  ): Promise<Delivery> {
    this.attachmentsService.validateFile(file);

    return this.withOrderLock(ctx, orderId, async () => {
      await this.requireOrder(ctx, orderId);
      const delivery = await this.requireDelivery(ctx, orderId, deliveryId);

      const attachment = await this.attachmentsService.store(ctx, orderId, file);
      try {
        await this.ledgerStore.setDeliveryAttachment(
          ctx.organizationId,
          orderId,
          deliveryId,
          attachment.id,
        );
      } catch (error) {
        await this.attachmentsService.discard(ctx.organizationId, attachment.id);
        throw error;
      }

      if (delivery.attachmentId) {
        await this.attachmentsService.discard(
          ctx.organizationId,
          delivery.attachmentId,
        );
      }

      await this.audit(
        ctx,
        AuditEntityType.DELIVERY,
        `${orderId}/${deliveryId}`,
        AuditAction.UPDATE,
        { attachmentId: { from: delivery.attachmentId, to: attachment.id } },
      );
      return Object.assign(new Delivery(), delivery, {
        attachmentId: attachment.id,
      });
    });
  }

  /**
   * Reverses a delivery. Pending is recomputed from the receipts that remain
   * rather than adding the removed payment back, so an earlier clamp at zero
   * cannot leak into the result.
   */
  async deleteDelivery(
    ctx: OperationContext,
    orderId: number,
    deliveryId: number,
  ): Promise<Order> {
    return this.withOrderLock(ctx, orderId, async () => {
      const order = await this.requireOrder(ctx, orderId);
      const deliveries = await this.ledgerStore.listDeliveries(
        ctx.organizationId,
        orderId,
      );
      const delivery = deliveries.find((d) => d.deliveryId === deliveryId);
      if (!delivery) {
        throw new DeliveryNotFoundException(orderId, deliveryId);
      }
      if (order.deliveredQuantity < delivery.deliveryQuantity) {
        throw new InsufficientDeliveredQuantityException(
          order.deliveredQuantity,
          delivery.deliveryQuantity,
        );
      }

      const deliveredQuantity = order.deliveredQuantity - delivery.deliveryQuantity;
      const remaining = deliveries.filter((d) => d.deliveryId !== deliveryId);
      const pendingAmount = computePending(
        parseMoney(order.totalAmountWithGst),
        parseMoney(order.advancePayment),
        sumAmountReceived(remaining),
      );
      const status = deriveStatus(deliveredQuantity, order.quantity);

      await this.ledgerStore.deleteDelivery(ctx.organizationId, orderId, deliveryId);
      const updated = await this.ledgerStore.upsertOrder({
        ...toDraft(order),
        deliveredQuantity,
        pendingAmount: toMoneyString(pendingAmount),
        status,
      });

      if (delivery.attachmentId) {
        await this.attachmentsService.discard(
          ctx.organizationId,
          delivery.attachmentId,
        );
      }

      await this.audit(
        ctx,
        AuditEntityType.DELIVERY,
        `${orderId}/${deliveryId}`,
        AuditAction.DELETE,
        {
          deliveryQuantity: delivery.deliveryQuantity,
          amountReceived: delivery.amountReceived,
          deliveredQuantity,
          pendingAmount: updated.pendingAmount,
          status,
        },
      );
      this.logger.log(`Delivery #${deliveryId} of order #${orderId} deleted`);
      return updated;
    });
  }

  /** Attaches (or replaces) the e-way bill on the order itself. */
  async attachOrderDocument(
    ctx: OperationContext,
    orderId: number,
    file: UploadedDocument,
  ): Promise<Order> {
    this.attachmentsService.validateFile(file);

    return this.withOrderLock(ctx, orderId, async () => {
      const order = await this.requireOrder(ctx, orderId);
      const attachment = await this.attachmentsService.store(ctx, orderId, file);

      let updated: Order;
      try {
        updated = await this.ledgerStore.upsertOrder({
          ...toDraft(order),
          attachmentId: attachment.id,
        });
      } catch (error) {
        await this.attachmentsService.discard(ctx.organizationId, attachment.id);
        throw error;
      }

      if (order.attachmentId) {
        await this.attachmentsService.discard(ctx.organizationId, order.attachmentId);
      }

      await this.audit(
        ctx,
        AuditEntityType.ORDER,
        `${orderId}`,
        AuditAction.UPDATE,
        {
          attachmentId: { from: order.attachmentId, to: attachment.id },
        },
      );
      return updated;
    });
  }

  async downloadAttachment(
    ctx: OperationContext,
    orderId: number,
    deliveryId?: number,
  ): Promise<AttachmentDownload> {
    const order = await this.requireOrder(ctx, orderId);
    const attachmentId =
      deliveryId === undefined
        ? order.attachmentId
        : (await this.requireDelivery(ctx, orderId, deliveryId)).attachmentId;
    if (!attachmentId) {
      throw new AttachmentNotFoundException();
    }

    const attachment = await this.attachmentsService.findById(
      ctx.organizationId,
      attachmentId,
    );
    if (!attachment) {
      throw new AttachmentNotFoundException();
    }

    const content = await this.attachmentsService.fetchContent(attachment);
    const suffix = deliveryId === undefined ? '' : `_delivery_${deliveryId}`;
    return {
      bytes: content.bytes,
      mimeType: content.mimeType,
      fileName: `ewaybill_order_${orderId}${suffix}.${content.extension}`,
    };
  }

  async deleteOrder(
    ctx: OperationContext,
    orderId: number,
  ): Promise<OrderDeletionSummary> {
    return this.withOrderLock(ctx, orderId, async () => {
      const summary = await this.removeOrder(ctx.organizationId, orderId);
      await this.audit(
        ctx,
        AuditEntityType.ORDER,
        `${orderId}`,
        AuditAction.DELETE,
        {
          ...summary,
        },
      );
      this.logger.log(
        `Order #${orderId} deleted with ${summary.deliveriesDeleted} deliveries`,
      );
      return summary;
    });
  }

  /**
   * Removes every order of an organization. Blob failures are counted and
   * logged; ledger failures abort the run. Order creation for the
   * organization waits until the run has finished.
   */
  async deleteOrganizationOrders(
    organizationId: string,
  ): Promise<OrganizationDeletionSummary> {
    const totals = await this.orderLocks.runExclusive(
      OrderLockService.organizationKey(organizationId),
      async () => {
        const orderIds = await this.ledgerStore.listOrderIds(organizationId);
        const summary: OrganizationDeletionSummary = {
          ordersDeleted: 0,
          blobsDeleted: 0,
          blobFailures: 0,
        };

        for (const orderId of orderIds) {
          const removed = await this.orderLocks.runExclusive(
            OrderLockService.orderKey(organizationId, orderId),
            () => this.removeOrder(organizationId, orderId),
          );
          summary.ordersDeleted += 1;
          summary.blobsDeleted += removed.blobsDeleted;
          summary.blobFailures += removed.blobFailures;
        }
        return summary;
      },
    );

    if (totals.blobFailures > 0) {
      this.logger.warn(
        `${totals.blobFailures} e-way bills of organization ${organizationId} could not be deleted from storage`,
      );
    }
    this.logger.log(
      `Deleted ${totals.ordersDeleted} orders of organization ${organizationId}`,
    );
    return totals;
  }

  async getOrder(ctx: OperationContext, orderId: number): Promise<Order> {
    return this.requireOrder(ctx, orderId);
  }

  async listOrders(
    ctx: OperationContext,
    filter: OrderFilterDto = {},
  ): Promise<Order[]> {
    return this.ledgerStore.listOrders(ctx.organizationId, filter);
  }

  async listDeliveries(
    ctx: OperationContext,
    orderId: number,
  ): Promise<Delivery[]> {
    await this.requireOrder(ctx, orderId);
    return this.ledgerStore.listDeliveries(ctx.organizationId, orderId);
  }

  async checkConsistency(
    ctx: OperationContext,
    orderId: number,
  ): Promise<ConsistencyReport> {
    const order = await this.requireOrder(ctx, orderId);
    const deliveries = await this.ledgerStore.listDeliveries(
      ctx.organizationId,
      orderId,
    );
    const problems = findLedgerInconsistencies(order, deliveries);
    if (problems.length > 0) {
      this.logger.warn(
        `Order #${orderId} of organization ${ctx.organizationId} is inconsistent: ${problems.join('; ')}`,
      );
    }
    return { orderId, consistent: problems.length === 0, problems };
  }

  // Deliveries go first: the order row cannot be removed while they exist.
  private async removeOrder(
    organizationId: string,
    orderId: number,
  ): Promise<OrderDeletionSummary> {
    const order = await this.ledgerStore.getOrder(organizationId, orderId);
    if (!order) {
      throw new OrderNotFoundException(orderId);
    }
    const deliveries = await this.ledgerStore.listDeliveries(
      organizationId,
      orderId,
    );

    const outcomes: BlobDeleteOutcome[] = [];
    for (const delivery of deliveries) {
      await this.ledgerStore.deleteDelivery(
        organizationId,
        orderId,
        delivery.deliveryId,
      );
      if (delivery.attachmentId) {
        outcomes.push(
          await this.attachmentsService.discard(organizationId, delivery.attachmentId),
        );
      }
    }

    await this.ledgerStore.deleteOrder(organizationId, orderId);
    if (order.attachmentId) {
      outcomes.push(
        await this.attachmentsService.discard(organizationId, order.attachmentId),
      );
    }

    return {
      deliveriesDeleted: deliveries.length,
      blobsDeleted: outcomes.filter((outcome) => outcome === 'ok').length,
      blobFailures: outcomes.filter((outcome) => outcome === 'error').length,
    };
  }

  private async rollbackDelivery(
    ctx: OperationContext,
    delivery: Delivery,
  ): Promise<void> {
    try {
      await this.ledgerStore.deleteDelivery(
        ctx.organizationId,
        delivery.orderId,
        delivery.deliveryId,
      );
    } catch (error) {
      this.logger.error(
        `Delivery #${delivery.deliveryId} of order #${delivery.orderId} is left without its order update: ${describeError(error)}`,
      );
      return;
    }
    if (delivery.attachmentId) {
      await this.attachmentsService.discard(
        ctx.organizationId,
        delivery.attachmentId,
      );
    }
  }

  private validateOrderFields(fields: OrderFields): OrderFields {
    const receiverName = fields.receiverName?.trim() ?? '';
    const product = fields.product?.trim() ?? '';
    if (!receiverName) {
      throw new LedgerValidationException('Receiver name is required');
    }
    if (!product) {
      throw new LedgerValidationException('Product is required');
    }
    if (!fields.orderDate || !fields.expectedDeliveryDate) {
      throw new LedgerValidationException(
        'Order date and expected delivery date are required',
      );
    }
    if (!Number.isInteger(fields.quantity) || fields.quantity < 1) {
      throw new LedgerValidationException(
        'Quantity must be a whole number of at least 1',
      );
    }
    if (!isFiniteNumber(fields.unitPrice) || fields.unitPrice < 0.01) {
      throw new LedgerValidationException('Unit price must be at least 0.01');
    }
    if (!isFiniteNumber(fields.gstPercent) || fields.gstPercent < 0) {
      throw new LedgerValidationException('GST percent cannot be negative');
    }
    if (!isFiniteNumber(fields.advancePayment) || fields.advancePayment < 0) {
      throw new LedgerValidationException('Advance payment cannot be negative');
    }
    return {
      ...fields,
      receiverName,
      product,
      description: fields.description.trim(),
    };
  }

  private async requireOrder(
    ctx: OperationContext,
    orderId: number,
  ): Promise<Order> {
    const order = await this.ledgerStore.getOrder(ctx.organizationId, orderId);
    if (!order) {
      throw new OrderNotFoundException(orderId);
    }
    return order;
  }

  private async requireDelivery(
    ctx: OperationContext,
    orderId: number,
    deliveryId: number,
  ): Promise<Delivery> {
    const deliveries = await this.ledgerStore.listDeliveries(
      ctx.organizationId,
      orderId,
    );
    const delivery = deliveries.find((d) => d.deliveryId === deliveryId);
    if (!delivery) {
      throw new DeliveryNotFoundException(orderId, deliveryId);
    }
    return delivery;
  }

  private withOrderLock<T>(
    ctx: OperationContext,
    orderId: number,
    task: () => Promise<T>,
  ): Promise<T> {
    return this.orderLocks.runExclusive(
      OrderLockService.orderKey(ctx.organizationId, orderId),
      task,
    );
  }

  private async audit(
    ctx: OperationContext,
    entityType: AuditEntityType,
    entityId: string,
    action: AuditAction,
    changes: Record<string, unknown>,
  ): Promise<void> {
    await this.auditLogsService.record({
      organizationId: ctx.organizationId,
      userId: ctx.userId,
      entityType,
      entityId,
      action,
      changes,
    });
  }
}
