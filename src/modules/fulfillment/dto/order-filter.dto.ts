import { IsDateString, IsEnum, IsOptional } from 'class-validator';
import { OrderStatus } from '../../../common/enums/order-status.enum';

export class OrderFilterDto {
  @IsOptional()
  @IsEnum(OrderStatus)
  status?: OrderStatus;

  @IsOptional()
  @IsDateString()
  startDate?: string;

  @IsOptional()
  @IsDateString()
  endDate?: string;
}
