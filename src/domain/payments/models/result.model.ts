import { PaymentMetadata } from './metadata.model';
import { Payment } from './payment.model';

/**
 * Opaque failure code, surfaced unchanged from the transport
 * (e.g. "invalid_card", "timeout")
 */
export type ErrorCode = string;

/**
 * Outcome of a gateway call, before mapping
 */
export type ApiResult<T> =
  | { status: 'ok'; data: T }
  | { status: 'error'; code: ErrorCode };

/**
 * Outcome of the payment flow
 */
export type PaymentResult =
  | { status: 'ok'; payment: Payment; metadata: PaymentMetadata }
  | { status: 'error'; code: ErrorCode };

export interface ProcessedPayment {
  payment: Payment;
  metadata: PaymentMetadata;
}
