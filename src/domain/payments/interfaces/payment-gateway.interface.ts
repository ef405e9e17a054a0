/**
 * Contract of a payment gateway integration
 *
 * Two entry points over the same pipeline: `processPayment` reports failures
 * in its result, `processPaymentOrThrow` raises them as PaymentProcessingError.
 */

import {
  PaymentRequest,
  PaymentResult,
  ProcessedPayment,
  ProcessPaymentOptions,
} from '../models';

export interface PaymentGateway {
  /**
   * Authorize a payment
   * @returns ok with payment and metadata, or error with the transport code
   */
  processPayment(
    request: PaymentRequest,
    options?: ProcessPaymentOptions,
  ): Promise<PaymentResult>;

  /**
   * Authorize a payment, throwing PaymentProcessingError on failure
   */
  processPaymentOrThrow(
    request: PaymentRequest,
    options?: ProcessPaymentOptions,
  ): Promise<ProcessedPayment>;
}
