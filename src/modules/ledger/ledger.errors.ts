import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

/**
 * Ledger failures as HTTP exceptions. Each carries a stable `code` both on
 * the instance and in the response body.
 */
export interface LedgerErrorBody {
  statusCode: number;
  code: string;
  message: string;
}

function body(statusCode: number, code: string, message: string): LedgerErrorBody {
  return { statusCode, code, message };
}

// NotFound

export class OrderNotFoundException extends NotFoundException {
  readonly code = 'ORDER_NOT_FOUND';

  constructor(orderId: number) {
    super(body(404, 'ORDER_NOT_FOUND', `Order #${orderId} not found`));
  }
}

export class DeliveryNotFoundException extends NotFoundException {
  readonly code = 'DELIVERY_NOT_FOUND';

  constructor(orderId: number, deliveryId: number) {
    super(
      body(
        404,
        'DELIVERY_NOT_FOUND',
        `Delivery #${deliveryId} of order #${orderId} not found`,
      ),
    );
  }
}

export class AttachmentNotFoundException extends NotFoundException {
  readonly code = 'ATTACHMENT_NOT_FOUND';

  constructor(message = 'No e-way bill is attached') {
    super(body(404, 'ATTACHMENT_NOT_FOUND', message));
  }
}

export class LedgerRecordNotFoundError extends NotFoundException {
  readonly code = 'NOT_FOUND';

  constructor(message: string) {
    super(body(404, 'NOT_FOUND', message));
  }
}

// ValidationFailed

export class LedgerValidationException extends BadRequestException {
  readonly code = 'VALIDATION_FAILED';

  constructor(message: string) {
    super(body(400, 'VALIDATION_FAILED', message));
  }
}

export class NegativeAmountException extends UnprocessableEntityException {
  readonly code = 'NEGATIVE_AMOUNT';

  constructor(amount: number) {
    super(
      body(422, 'NEGATIVE_AMOUNT', `Amount received cannot be negative (${amount})`),
    );
  }
}

// InvariantViolation

export class QuantityBelowDeliveredException extends ConflictException {
  readonly code = 'QUANTITY_BELOW_DELIVERED';

  constructor(requested: number, delivered: number) {
    super(
      body(
        409,
        'QUANTITY_BELOW_DELIVERED',
        `Quantity ${requested} is below the ${delivered} units already delivered`,
      ),
    );
  }
}

export class QuantityExceedsOrderException extends ConflictException {
  readonly code = 'QUANTITY_EXCEEDS_ORDER';

  constructor(requested: number, remaining: number) {
    super(
      body(
        409,
        'QUANTITY_EXCEEDS_ORDER',
        `Delivery of ${requested} units exceeds the ${remaining} units remaining on the order`,
      ),
    );
  }
}

export class InsufficientDeliveredQuantityException extends ConflictException {
  readonly code = 'INSUFFICIENT_DELIVERED_QUANTITY';

  constructor(delivered: number, reversal: number) {
    super(
      body(
        409,
        'INSUFFICIENT_DELIVERED_QUANTITY',
        `Cannot reverse ${reversal} units when only ${delivered} are recorded as delivered`,
      ),
    );
  }
}

export class StatusTransitionException extends ConflictException {
  readonly code = 'INVALID_STATUS_TRANSITION';

  constructor(message: string) {
    super(body(409, 'INVALID_STATUS_TRANSITION', message));
  }
}

export class LedgerConstraintError extends ConflictException {
  readonly code = 'CONSTRAINT_VIOLATION';

  constructor(message: string) {
    super(body(409, 'CONSTRAINT_VIOLATION', message));
  }
}

// ExternalStoreError

export class AttachmentStorageException extends BadGatewayException {
  readonly code = 'EXTERNAL_STORE_ERROR';

  constructor(message: string) {
    super(body(502, 'EXTERNAL_STORE_ERROR', message));
  }
}
