import { ErrorCode, PaymentResult, ProcessedPayment } from '../models';

/**
 * Raised by the throwing payment entry point
 */
export class PaymentProcessingError extends Error {
  constructor(readonly code: ErrorCode) {
    super(`Payment processing failed: ${code}`);
    this.name = 'PaymentProcessingError';
  }
}

/**
 * Unwrap a payment result, throwing PaymentProcessingError on the error variant
 */
export const unwrapPaymentResult = (result: PaymentResult): ProcessedPayment => {
  if (result.status === 'error') {
    throw new PaymentProcessingError(result.code);
  }

  return { payment: result.payment, metadata: result.metadata };
};
