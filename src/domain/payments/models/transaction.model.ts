import { Amount } from './payment-request.model';

/**
 * Status of a single basket item transaction
 */
export enum TransactionStatus {
  SUCCESS = 'success',
  PENDING_APPROVAL = 'pending_approval',
  FAILURE = 'failure',
  REJECTED = 'rejected',
  UNKNOWN = 'unknown',
}

/**
 * Payout amounts expressed in the currency the gateway settled in
 */
export interface ConvertedPayout {
  merchantBlockageAmount?: Amount;
  submerchantBlockageAmount?: Amount;
  currency?: string;
  commissionFee?: Amount;
  commissionAmount?: Amount;
  conversionRate?: Amount;
  conversionCost?: Amount;
  merchantPayoutAmount?: Amount;
  paidPrice?: Amount;
  submerchantPayoutAmount?: Amount;
}

/**
 * Per basket item breakdown of a payment
 */
export interface Transaction {
  /**
   * Gateway payment transaction id
   */
  id?: string;

  /**
   * Basket item the transaction pays for
   */
  itemId?: string;

  blockageRate?: Amount;
  merchantBlockageAmount?: Amount;
  submerchantBlockageAmount?: Amount;

  /**
   * Date the blockage is released
   */
  resolutionDate?: string;

  convertedPayout: ConvertedPayout;
  commissionFee?: Amount;
  commissionAmount?: Amount;
  merchantCommissionRate?: Amount;
  merchantCommissionAmount?: Amount;
  merchantPayoutAmount?: Amount;
  paidPrice?: Amount;
  price?: Amount;
  submerchantPayoutAmount?: Amount;
  submerchantPayoutRate?: Amount;
  submerchantPrice?: Amount;
  transactionStatus: TransactionStatus;
}
