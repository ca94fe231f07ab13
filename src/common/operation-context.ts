import { ForbiddenException } from '@nestjs/common';
import { AuthenticatedUser } from './decorators/current-user.decorator';

/**
 * Who is acting and on behalf of which organization. Passed explicitly into
 * every fulfillment operation; the service trusts it without re-checking.
 */
export interface OperationContext {
  organizationId: string;
  userId: string;
}

export function toOperationContext(
  user: AuthenticatedUser | undefined,
): OperationContext {
  if (!user?.organizationId) {
    throw new ForbiddenException('Organization context is required');
  }
  return { organizationId: user.organizationId, userId: user.userId };
}
