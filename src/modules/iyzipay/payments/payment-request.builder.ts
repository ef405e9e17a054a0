import {
  PaymentRequest,
  ProcessPaymentOptions,
} from '../../../domain/payments';

export const IYZIPAY_PAYMENT_PATHS = {
  AUTH: '/payment/auth',
  SECURE_AUTH: '/payment/3dsecure/auth',
} as const;

export type IyzipayPaymentPath =
  (typeof IYZIPAY_PAYMENT_PATHS)[keyof typeof IYZIPAY_PAYMENT_PATHS];

export interface BuiltPaymentRequest {
  path: IyzipayPaymentPath;
  body: PaymentRequest;
}

/**
 * Select the endpoint and final body of a payment request
 *
 * Without a callback URL the request goes to the direct authorization
 * endpoint as is; with one it goes to the 3D-Secure endpoint carrying
 * `callbackUrl`. No I/O.
 */
export const buildPaymentRequest = (
  request: PaymentRequest,
  options: ProcessPaymentOptions = {},
): BuiltPaymentRequest => {
  const callbackUrl = options.secureCallbackUrl;

  if (!callbackUrl) {
    return { path: IYZIPAY_PAYMENT_PATHS.AUTH, body: request };
  }

  return {
    path: IYZIPAY_PAYMENT_PATHS.SECURE_AUTH,
    body: { ...request, callbackUrl },
  };
};
