/**
 * Transport and audit data returned with every gateway response.
 * Not part of the financial record.
 */
export interface PaymentMetadata {
  systemTime?: number;
  succeeded: boolean;
  phase?: string;
  locale?: string;
  authCode?: string;
}
