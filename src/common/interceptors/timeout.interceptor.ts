import {
  Injectable,
  Logger,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  RequestTimeoutException,
} from '@nestjs/common';
import { Observable, throwError, TimeoutError } from 'rxjs';
import { catchError, timeout } from 'rxjs/operators';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';

const ATTACHMENT_ROUTE_TIMEOUT_MS = 120000;

/**
 * Bounds every request. Attachment routes get a longer budget because they
 * upload to and read back from the blob store within the same request.
 */
@Injectable()
export class TimeoutInterceptor implements NestInterceptor {
  private readonly logger = new Logger(TimeoutInterceptor.name);
  private readonly defaultTimeout: number;

  constructor(private readonly configService: ConfigService) {
    this.defaultTimeout = parseInt(
      this.configService.get<string>('REQUEST_TIMEOUT', '30000'),
      10,
    );
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const isAttachmentRoute =
      request.url?.includes('/attachment') ||
      request.url?.includes('/deliveries');
    const timeoutMs = isAttachmentRoute
      ? ATTACHMENT_ROUTE_TIMEOUT_MS
      : this.defaultTimeout;

    return next.handle().pipe(
      timeout(timeoutMs),
      catchError((err: unknown) => {
        if (err instanceof TimeoutError) {
          this.logger.warn(
            `Request timeout after ${timeoutMs}ms: ${request.method} ${request.url}`,
          );
          return throwError(
            () => new RequestTimeoutException('Request timeout exceeded'),
          );
        }
        return throwError(() => err);
      }),
    );
  }
}
