import { Test, TestingModule } from '@nestjs/testing';
import { ReportsService } from './reports.service';
import { LEDGER_STORE, OrderDraft } from '../ledger/ledger-store.interface';
import { InMemoryLedgerStore } from '../ledger/testing/in-memory-ledger-store';
import { OrderStatus } from '../../common/enums/order-status.enum';

describe('ReportsService', () => {
  let service: ReportsService;
  let ledgerStore: InMemoryLedgerStore;

  const march = new Date(Date.UTC(2024, 2, 20));

  const order = (overrides: Partial<OrderDraft>): OrderDraft => ({
    orderId: 1,
    organizationId: 'org-1',
    receiverName: 'Acme Traders',
    product: 'Steel rods',
    description: '',
    orderDate: '2024-03-01',
    expectedDeliveryDate: '2024-03-15',
    quantity: 10,
    deliveredQuantity: 0,
    unitPrice: '100.00',
    basicPrice: '1000.00',
    gstPercent: '10.00',
    totalAmountWithGst: '1100.00',
    advancePayment: '0.00',
    pendingAmount: '1100.00',
    status: OrderStatus.PENDING,
    createdBy: null,
    attachmentId: null,
    ...overrides,
  });

  beforeEach(async () => {
    ledgerStore = new InMemoryLedgerStore();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReportsService,
        { provide: LEDGER_STORE, useValue: ledgerStore },
      ],
    }).compile();

    service = module.get<ReportsService>(ReportsService);
  });

  describe('getMonthlySummary', () => {
    it('returns zeros when the organization has no orders', async () => {
      await expect(service.getMonthlySummary('org-1', march)).resolves.toEqual({
        month: '2024-03',
        total: 0,
        completed: 0,
        pending: 0,
        revenue: 0,
        avgOrderValue: 0,
        momGrowth: 0,
      });
    });

    it('summarizes collected revenue and growth against last month', async () => {
      await ledgerStore.upsertOrder(
        order({
          orderId: 1,
          deliveredQuantity: 10,
          pendingAmount: '0.00',
          status: OrderStatus.COMPLETED,
        }),
      );
      await ledgerStore.upsertOrder(
        order({
          orderId: 2,
          orderDate: '2024-03-18',
          quantity: 5,
          basicPrice: '500.00',
          totalAmountWithGst: '550.00',
          advancePayment: '200.00',
          pendingAmount: '350.00',
        }),
      );
      await ledgerStore.upsertOrder(
        order({
          orderId: 3,
          orderDate: '2024-02-10',
          totalAmountWithGst: '1000.00',
          gstPercent: '0.00',
          pendingAmount: '0.00',
          status: OrderStatus.COMPLETED,
        }),
      );
      await ledgerStore.upsertOrder(
        order({ orderId: 1, organizationId: 'org-2', pendingAmount: '0.00' }),
      );

      await expect(service.getMonthlySummary('org-1', march)).resolves.toEqual({
        month: '2024-03',
        total: 2,
        completed: 1,
        pending: 1,
        revenue: 1300,
        avgOrderValue: 650,
        momGrowth: 30,
      });
    });

    it('reports 100% growth when last month collected nothing', async () => {
      await ledgerStore.upsertOrder(order({ orderId: 1, pendingAmount: '600.00' }));
      await ledgerStore.upsertOrder(
        order({ orderId: 2, orderDate: '2024-02-05' }),
      );

      const summary = await service.getMonthlySummary('org-1', march);

      expect(summary.revenue).toBe(500);
      expect(summary.momGrowth).toBe(100);
    });

    it('reports no growth when last month had no orders', async () => {
      await ledgerStore.upsertOrder(order({ orderId: 1, pendingAmount: '0.00' }));

      const summary = await service.getMonthlySummary('org-1', march);

      expect(summary.revenue).toBe(1100);
      expect(summary.momGrowth).toBe(0);
    });

    it('compares January against December of the previous year', async () => {
      await ledgerStore.upsertOrder(
        order({
          orderId: 1,
          orderDate: '2024-01-04',
          totalAmountWithGst: '150.00',
          pendingAmount: '0.00',
        }),
      );
      await ledgerStore.upsertOrder(
        order({
          orderId: 2,
          orderDate: '2023-12-28',
          totalAmountWithGst: '100.00',
          pendingAmount: '0.00',
        }),
      );

      const summary = await service.getMonthlySummary(
        'org-1',
        new Date(Date.UTC(2024, 0, 10)),
      );

      expect(summary.month).toBe('2024-01');
      expect(summary.momGrowth).toBe(50);
    });
  });

  describe('getRevenueSummary', () => {
    it('sums completed orders per month in calendar order', async () => {
      await ledgerStore.upsertOrder(
        order({ orderId: 1, pendingAmount: '0.00', status: OrderStatus.COMPLETED }),
      );
      await ledgerStore.upsertOrder(order({ orderId: 2, orderDate: '2024-03-09' }));
      await ledgerStore.upsertOrder(
        order({
          orderId: 3,
          orderDate: '2024-02-10',
          basicPrice: '250.50',
          totalAmountWithGst: '275.55',
          pendingAmount: '0.00',
          status: OrderStatus.COMPLETED,
        }),
      );
      await ledgerStore.upsertOrder(
        order({
          orderId: 4,
          orderDate: '2024-03-22',
          basicPrice: '99.99',
          totalAmountWithGst: '109.99',
          pendingAmount: '0.00',
          status: OrderStatus.COMPLETED,
        }),
      );

      await expect(service.getRevenueSummary('org-1')).resolves.toEqual([
        { month: '2024-02', basicPrice: 250.5, totalAmountWithGst: 275.55 },
        { month: '2024-03', basicPrice: 1099.99, totalAmountWithGst: 1209.99 },
      ]);
    });

    it('never writes to the ledger', async () => {
      await ledgerStore.upsertOrder(order({ orderId: 1 }));
      ledgerStore.writes.length = 0;

      await service.getRevenueSummary('org-1');
      await service.getMonthlySummary('org-1', march);

      expect(ledgerStore.writes).toEqual([]);
    });
  });
});
