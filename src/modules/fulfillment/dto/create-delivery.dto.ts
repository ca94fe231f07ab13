import { Type } from 'class-transformer';
import { IsDateString, IsInt, IsNumber, IsOptional, Min } from 'class-validator';

/**
 * Sent as multipart form fields alongside the optional e-way bill, hence the
 * numeric conversions. A negative amount is left to the service to reject.
 */
export class CreateDeliveryDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  deliveryQuantity!: number;

  @IsDateString()
  deliveryDate!: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber({ maxDecimalPlaces: 2 })
  amountReceived?: number;
}
