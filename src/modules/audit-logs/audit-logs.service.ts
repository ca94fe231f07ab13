import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, Repository } from 'typeorm';
import { AuditLog } from '../../entities/audit-log.entity';
import { AuditAction } from '../../common/enums/audit-action.enum';
import { AuditEntityType } from '../../common/enums/audit-entity-type.enum';
import { AuditLogFilterDto } from './dto/audit-log-filter.dto';

export interface AuditLogInput {
  organizationId: string;
  userId?: string | null;
  entityType: AuditEntityType;
  entityId: string;
  action: AuditAction;
  changes?: Record<string, unknown>;
}

@Injectable()
export class AuditLogsService {
  constructor(
    @InjectRepository(AuditLog)
    private readonly auditLogsRepository: Repository<AuditLog>,
  ) {}

  async record(input: AuditLogInput): Promise<void> {
    const log = this.auditLogsRepository.create({
      organizationId: input.organizationId,
      userId: input.userId ?? null,
      entityType: input.entityType,
      entityId: input.entityId,
      action: input.action,
      changes: input.changes ?? {},
      timestamp: new Date(),
    });
    await this.auditLogsRepository.save(log);
  }

  async listForOrganization(
    organizationId: string,
    filters: AuditLogFilterDto,
  ): Promise<AuditLog[]> {
    const query = this.auditLogsRepository
      .createQueryBuilder('log')
      .where('log.organization_id = :organizationId', { organizationId });

    if (filters.entityType) {
      query.andWhere('log.entity_type = :entityType', {
        entityType: filters.entityType,
      });
    }
    if (filters.entityId) {
      query.andWhere('log.entity_id = :entityId', {
        entityId: filters.entityId,
      });
    }
    if (filters.userId) {
      query.andWhere('log.user_id = :userId', { userId: filters.userId });
    }
    if (filters.startDate) {
      query.andWhere('log.timestamp >= :startDate', {
        startDate: filters.startDate,
      });
    }
    if (filters.endDate) {
      query.andWhere('log.timestamp <= :endDate', {
        endDate: filters.endDate,
      });
    }
    query.orderBy('log.timestamp', 'DESC');
    return query.getMany();
  }

  /** Entries for one order and every delivery recorded against it. */
  async listForOrder(organizationId: string, orderId: number): Promise<AuditLog[]> {
    return this.auditLogsRepository
      .createQueryBuilder('log')
      .where('log.organization_id = :organizationId', { organizationId })
      .andWhere(
        new Brackets((scope) => {
          scope
            .where('log.entity_type = :order AND log.entity_id = :orderId', {
              order: AuditEntityType.ORDER,
              orderId: `${orderId}`,
            })
            .orWhere(
              'log.entity_type = :delivery AND log.entity_id LIKE :deliveryPrefix',
              {
                delivery: AuditEntityType.DELIVERY,
                deliveryPrefix: `${orderId}/%`,
              },
            );
        }),
      )
      .orderBy('log.timestamp', 'ASC')
      .getMany();
  }

  async deleteForOrganization(organizationId: string): Promise<void> {
    await this.auditLogsRepository.delete({ organizationId });
  }
}
