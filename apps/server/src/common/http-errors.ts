import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import { CannotRemoveCurrentKeyError, isWebPushError, KeyNotFoundError, NoPreviousKeysError } from '@relaypush/web-push';

import { SubscriptionConflictError, SubscriptionNotFoundError } from '../modules/subscriptions/subscription.record';

/**
 * Map storage and push errors to HTTP exceptions. Anything unrecognised is returned unchanged.
 */
export function toHttpException(error: unknown): unknown {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof SubscriptionNotFoundError || error instanceof KeyNotFoundError) {
    return new NotFoundException(error.message, { cause: error });
  }
  if (
    error instanceof SubscriptionConflictError ||
    error instanceof CannotRemoveCurrentKeyError ||
    error instanceof NoPreviousKeysError
  ) {
    return new ConflictException(error.message, { cause: error });
  }
  if (isWebPushError(error)) {
    switch (error.kind) {
      case 'validation':
        return new BadRequestException(error.message, { cause: error });
      case 'delivery':
        return new BadGatewayException(error.message, { cause: error });
      default:
        return new InternalServerErrorException(error.message, { cause: error });
    }
  }
  return error;
}
