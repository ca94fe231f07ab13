import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { Order } from '../../entities/order.entity';
import { Delivery } from '../../entities/delivery.entity';
import { Attachment } from '../../entities/attachment.entity';
import {
  AttachmentDraft,
  DeliveryDraft,
  LedgerStore,
  OrderDraft,
  OrderListFilter,
} from './ledger-store.interface';
import { errorCode } from '../../utils/error.util';
import { LedgerConstraintError, LedgerRecordNotFoundError } from './ledger.errors';

@Injectable()
export class TypeOrmLedgerStore implements LedgerStore {
  constructor(
    @InjectRepository(Order)
    private readonly ordersRepository: Repository<Order>,
    @InjectRepository(Delivery)
    private readonly deliveriesRepository: Repository<Delivery>,
    @InjectRepository(Attachment)
    private readonly attachmentsRepository: Repository<Attachment>,
  ) {}

  async getOrder(organizationId: string, orderId: number): Promise<Order | null> {
    return this.ordersRepository.findOne({
      where: { organizationId, orderId },
    });
  }

  async listOrders(
    organizationId: string,
    filter: OrderListFilter = {},
  ): Promise<Order[]> {
    const query = this.ordersRepository
      .createQueryBuilder('o')
      .where('o.organization_id = :organizationId', { organizationId });

    if (filter.status) {
      query.andWhere('o.status = :status', { status: filter.status });
    }
    if (filter.startDate) {
      query.andWhere('o.order_date >= :startDate', {
        startDate: filter.startDate,
      });
    }
    if (filter.endDate) {
      query.andWhere('o.order_date <= :endDate', { endDate: filter.endDate });
    }

    return query.orderBy('o.order_id', 'ASC').getMany();
  }

  async listOrderIds(organizationId: string): Promise<number[]> {
    const rows = await this.ordersRepository.find({
      where: { organizationId },
      select: { orderId: true },
      order: { orderId: 'ASC' },
    });
    return rows.map((row) => row.orderId);
  }

  async upsertOrder(order: OrderDraft): Promise<Order> {
    try {
      return await this.ordersRepository.save(this.ordersRepository.create(order));
    } catch (error) {
      throw this.translate(error, `order ${order.orderId}`);
    }
  }

  async deleteOrder(organizationId: string, orderId: number): Promise<void> {
    const remaining = await this.deliveriesRepository.count({
      where: { organizationId, orderId },
    });
    if (remaining > 0) {
      throw new LedgerConstraintError(
        `Order ${orderId} still has ${remaining} deliveries`,
      );
    }

    const result = await this.ordersRepository.delete({ organizationId, orderId });
    if (!result.affected) {
      throw new LedgerRecordNotFoundError(`Order ${orderId} not found`);
    }
  }

  async listDeliveries(
    organizationId: string,
    orderId: number,
  ): Promise<Delivery[]> {
    return this.deliveriesRepository.find({
      where: { organizationId, orderId },
      order: { deliveryId: 'ASC' },
    });
  }

  async insertDelivery(delivery: DeliveryDraft): Promise<Delivery> {
    const parentExists = await this.ordersRepository.exists({
      where: {
        organizationId: delivery.organizationId,
        orderId: delivery.orderId,
      },
    });
    if (!parentExists) {
      throw new LedgerConstraintError(
        `Delivery references missing order ${delivery.orderId}`,
      );
    }

    const entity = this.deliveriesRepository.create(delivery);
    try {
      await this.deliveriesRepository.insert(entity);
    } catch (error) {
      throw this.translate(
        error,
        `delivery ${delivery.deliveryId} of order ${delivery.orderId}`,
      );
    }
    return entity;
  }

  async deleteDelivery(
    organizationId: string,
    orderId: number,
    deliveryId: number,
  ): Promise<void> {
    const result = await this.deliveriesRepository.delete({
      organizationId,
      orderId,
      deliveryId,
    });
    if (!result.affected) {
      throw new LedgerRecordNotFoundError(
        `Delivery ${deliveryId} of order ${orderId} not found`,
      );
    }
  }

  async setDeliveryAttachment(
    organizationId: string,
    orderId: number,
    deliveryId: number,
    attachmentId: string | null,
  ): Promise<void> {
    const result = await this.deliveriesRepository.update(
      { organizationId, orderId, deliveryId },
      { attachmentId },
    );
    if (!result.affected) {
      throw new LedgerRecordNotFoundError(
        `Delivery ${deliveryId} of order ${orderId} not found`,
      );
    }
  }

  async saveAttachment(attachment: AttachmentDraft): Promise<Attachment> {
    return this.attachmentsRepository.save(
      this.attachmentsRepository.create(attachment),
    );
  }

  async getAttachment(
    organizationId: string,
    attachmentId: string,
  ): Promise<Attachment | null> {
    return this.attachmentsRepository.findOne({
      where: { id: attachmentId, organizationId },
    });
  }

  async deleteAttachment(
    organizationId: string,
    attachmentId: string,
  ): Promise<void> {
    try {
      await this.attachmentsRepository.delete({ id: attachmentId, organizationId });
    } catch (error) {
      throw this.translate(error, `attachment ${attachmentId}`);
    }
  }

  // 23505 unique_violation, 23503 foreign_key_violation
  private translate(error: unknown, subject: string): unknown {
    if (error instanceof QueryFailedError) {
      const code = errorCode(error.driverError);
      if (code === '23505') {
        return new LedgerConstraintError(`Duplicate key for ${subject}`);
      }
      if (code === '23503') {
        return new LedgerConstraintError(`Foreign key violation for ${subject}`);
      }
    }
    return error;
  }
}
