import { OrderStatus } from '../../common/enums/order-status.enum';

export interface OrderPricing {
  quantity: number;
  unitPrice: number;
  gstPercent: number;
  advancePayment: number;
}

export interface OrderTotals {
  basicPrice: number;
  totalAmountWithGst: number;
  pendingAmount: number;
}

/** Rounds half-up to cents. */
export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function toMoneyString(value: number): string {
  return roundMoney(value).toFixed(2);
}

/** Decimal columns come back from postgres as strings. */
export function parseMoney(value: string | number | null | undefined): number {
  const parsed = parseFloat(String(value ?? 0));
  return Number.isFinite(parsed) ? parsed : 0;
}

export function computeBasicPrice(quantity: number, unitPrice: number): number {
  return roundMoney(quantity * unitPrice);
}

export function computeTotalWithGst(
  basicPrice: number,
  gstPercent: number,
): number {
  return roundMoney(basicPrice + (basicPrice * gstPercent) / 100);
}

/** Amount still owed, floored at zero: overpayment is absorbed. */
export function computePending(
  totalAmountWithGst: number,
  advancePayment: number,
  amountReceived: number,
): number {
  return Math.max(0, roundMoney(totalAmountWithGst - advancePayment - amountReceived));
}

export function computeOrderTotals(
  pricing: OrderPricing,
  amountReceived = 0,
): OrderTotals {
  const basicPrice = computeBasicPrice(pricing.quantity, pricing.unitPrice);
  const totalAmountWithGst = computeTotalWithGst(basicPrice, pricing.gstPercent);
  return {
    basicPrice,
    totalAmountWithGst,
    pendingAmount: computePending(
      totalAmountWithGst,
      pricing.advancePayment,
      amountReceived,
    ),
  };
}

export function deriveStatus(
  deliveredQuantity: number,
  quantity: number,
): OrderStatus {
  return deliveredQuantity >= quantity
    ? OrderStatus.COMPLETED
    : OrderStatus.PENDING;
}

export function nextOrderId(existingIds: number[]): number {
  return existingIds.reduce((max, id) => Math.max(max, id), 0) + 1;
}

export function nextDeliveryId(deliveries: { deliveryId: number }[]): number {
  return nextOrderId(deliveries.map((delivery) => delivery.deliveryId));
}

export function sumDeliveredQuantity(
  deliveries: { deliveryQuantity: number }[],
): number {
  return deliveries.reduce((sum, delivery) => sum + delivery.deliveryQuantity, 0);
}

export function sumAmountReceived(
  deliveries: { amountReceived: string | number }[],
): number {
  return roundMoney(
    deliveries.reduce(
      (sum, delivery) => sum + parseMoney(delivery.amountReceived),
      0,
    ),
  );
}

export interface LedgerSnapshot {
  quantity: number;
  deliveredQuantity: number;
  totalAmountWithGst: string;
  advancePayment: string;
  pendingAmount: string;
  status: OrderStatus;
}

/**
 * Lists the stored-state invariants an order and its deliveries violate.
 * Status is not checked: edits may legitimately move quantity relative to the
 * delivered amount without re-deriving it.
 */
export function findLedgerInconsistencies(
  order: LedgerSnapshot,
  deliveries: { deliveryQuantity: number; amountReceived: string | number }[],
): string[] {
  const problems: string[] = [];
  const delivered = sumDeliveredQuantity(deliveries);
  const pending = parseMoney(order.pendingAmount);

  if (order.deliveredQuantity < 0) {
    problems.push(`delivered quantity ${order.deliveredQuantity} is negative`);
  }
  if (order.deliveredQuantity > order.quantity) {
    problems.push(
      `delivered quantity ${order.deliveredQuantity} exceeds ordered quantity ${order.quantity}`,
    );
  }
  if (delivered !== order.deliveredQuantity) {
    problems.push(
      `deliveries sum to ${delivered} but order records ${order.deliveredQuantity} delivered`,
    );
  }
  if (pending < 0) {
    problems.push(`pending amount ${order.pendingAmount} is negative`);
  }
  if (order.status === OrderStatus.PENDING) {
    const expected = computePending(
      parseMoney(order.totalAmountWithGst),
      parseMoney(order.advancePayment),
      sumAmountReceived(deliveries),
    );
    if (roundMoney(pending) !== expected) {
      problems.push(
        `pending amount ${order.pendingAmount} does not match ${toMoneyString(expected)} owed after receipts`,
      );
    }
  }

  return problems;
}
