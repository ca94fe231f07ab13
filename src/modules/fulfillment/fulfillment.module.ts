import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { AttachmentsModule } from '../attachments/attachments.module';
import { AuditLogsModule } from '../audit-logs/audit-logs.module';
import { FulfillmentService } from './fulfillment.service';
import { OrderLockService } from './order-lock.service';
import { OrdersController } from './orders.controller';
import { DeliveriesController } from './deliveries.controller';

@Module({
  imports: [LedgerModule, AttachmentsModule, AuditLogsModule],
  providers: [FulfillmentService, OrderLockService],
  controllers: [OrdersController, DeliveriesController],
  exports: [FulfillmentService],
})
export class FulfillmentModule {}
