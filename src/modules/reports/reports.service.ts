import { Inject, Injectable } from '@nestjs/common';
import { Order } from '../../entities/order.entity';
import { OrderStatus } from '../../common/enums/order-status.enum';
import {
  LEDGER_STORE,
  LedgerStore,
} from '../ledger/ledger-store.interface';
import { parseMoney, roundMoney } from '../ledger/ledger.calculations';

export interface MonthlySummary {
  month: string;
  total: number;
  completed: number;
  pending: number;
  revenue: number;
  avgOrderValue: number;
  momGrowth: number;
}

export interface MonthlyRevenue {
  month: string;
  basicPrice: number;
  totalAmountWithGst: number;
}

export function monthKey(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${date.getUTCFullYear()}-${month}`;
}

function previousMonthKey(date: Date): string {
  return monthKey(
    new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() - 1, 1)),
  );
}

/** Amount collected so far: the total less what is still pending. */
function collectedRevenue(order: Order): number {
  return parseMoney(order.totalAmountWithGst) - parseMoney(order.pendingAmount);
}

@Injectable()
export class ReportsService {
  constructor(
    @Inject(LEDGER_STORE)
    private readonly ledgerStore: LedgerStore,
  ) {}

  async getMonthlySummary(
    organizationId: string,
    now: Date = new Date(),
  ): Promise<MonthlySummary> {
    const orders = await this.ledgerStore.listOrders(organizationId);
    const month = monthKey(now);
    const current = orders.filter((order) => order.orderDate.startsWith(month));
    const previous = orders.filter((order) =>
      order.orderDate.startsWith(previousMonthKey(now)),
    );

    const revenue = current.reduce((sum, order) => sum + collectedRevenue(order), 0);
    const lastRevenue = previous.reduce(
      (sum, order) => sum + collectedRevenue(order),
      0,
    );

    let momGrowth = 0;
    if (current.length > 0 && previous.length > 0) {
      momGrowth =
        lastRevenue > 0 ? ((revenue - lastRevenue) / lastRevenue) * 100 : 100;
    }

    return {
      month,
      total: current.length,
      completed: current.filter((order) => order.status === OrderStatus.COMPLETED)
        .length,
      pending: current.filter((order) => order.status === OrderStatus.PENDING)
        .length,
      revenue: roundMoney(revenue),
      avgOrderValue: current.length ? roundMoney(revenue / current.length) : 0,
      momGrowth: roundMoney(momGrowth),
    };
  }

  async getRevenueSummary(organizationId: string): Promise<MonthlyRevenue[]> {
    const orders = await this.ledgerStore.listOrders(organizationId, {
      status: OrderStatus.COMPLETED,
    });

    const byMonth = new Map<string, MonthlyRevenue>();
    for (const order of orders) {
      const month = order.orderDate.slice(0, 7);
      const entry = byMonth.get(month) ?? {
        month,
        basicPrice: 0,
        totalAmountWithGst: 0,
      };
      entry.basicPrice = roundMoney(entry.basicPrice + parseMoney(order.basicPrice));
      entry.totalAmountWithGst = roundMoney(
        entry.totalAmountWithGst + parseMoney(order.totalAmountWithGst),
      );
      byMonth.set(month, entry);
    }

    return [...byMonth.values()].sort((a, b) => a.month.localeCompare(b.month));
  }
}
