import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Order } from '../../entities/order.entity';
import { Delivery } from '../../entities/delivery.entity';
import { Attachment } from '../../entities/attachment.entity';
import { TypeOrmLedgerStore } from './typeorm-ledger-store';
import { LEDGER_STORE } from './ledger-store.interface';

@Module({
  imports: [TypeOrmModule.forFeature([Order, Delivery, Attachment])],
  providers: [
    TypeOrmLedgerStore,
    { provide: LEDGER_STORE, useExisting: TypeOrmLedgerStore },
  ],
  exports: [LEDGER_STORE],
})
export class LedgerModule {}
