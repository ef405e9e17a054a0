/**
 * Payment model
 *
 * Result of an authorized payment. Only built from a successful gateway
 * response, always together with its Metadata.
 */

import { CardReference } from './card.model';
import { Amount, Currency } from './payment-request.model';
import { Transaction } from './transaction.model';

/**
 * Fraud check outcome
 */
export enum FraudStatus {
  OK = 'ok',
  REVIEW = 'review',
  REJECTED = 'rejected',
  UNKNOWN = 'unknown',
}

export interface Payment {
  /**
   * Gateway payment id
   */
  id?: string;

  basketId?: string;

  /**
   * First six digits of the card
   */
  binId?: string;

  cardRef: CardReference;
  conversationId?: string;

  /**
   * Lowercased gateway currency, e.g. "TRY" -> try
   */
  currency?: Currency | string;

  fraudStatus: FraudStatus;
  installment?: number;

  /**
   * One entry per basket item, in the gateway's order
   */
  transactions: Transaction[];

  commissionFee?: Amount;
  commissionAmount?: Amount;
  lastFourDigits?: string;
  merchantCommissionRate?: Amount;
  merchantCommissionAmount?: Amount;
  paidPrice?: Amount;
  price?: Amount;
}
