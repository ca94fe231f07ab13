import { IsDateString, IsEnum, IsOptional, IsUUID, Matches } from 'class-validator';
import { AuditEntityType } from '../../../common/enums/audit-entity-type.enum';

export class AuditLogFilterDto {
  @IsOptional()
  @IsEnum(AuditEntityType)
  entityType?: AuditEntityType;

  // "7" for an order, "7/2" for one of its deliveries
  @IsOptional()
  @Matches(/^\d+(\/\d+)?$|^[0-9a-f-]{36}$/i, {
    message: 'entityId must be an order id, order/delivery id or user id',
  })
  entityId?: string;

  @IsOptional()
  @IsUUID()
  userId?: string;

  @IsOptional()
  @IsDateString()
  startDate?: string;

  @IsOptional()
  @IsDateString()
  endDate?: string;
}
