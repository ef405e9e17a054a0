/**
 * Wire shapes of the iyzipay payment API
 *
 * Every response field is optional: the gateway omits fields depending on
 * the payment phase, and the mapper passes absent values through.
 */

/**
 * Amounts arrive as JSON numbers; older endpoints send strings
 */
export type IyzipayAmount = number | string;

export interface IyzipayConvertedPayout {
  blockageRateAmountMerchant?: IyzipayAmount;
  blockageRateAmountSubMerchant?: IyzipayAmount;
  currency?: string;
  iyziCommissionFee?: IyzipayAmount;
  iyziCommissionRateAmount?: IyzipayAmount;
  iyziConversionRate?: IyzipayAmount;
  iyziConversionRateAmount?: IyzipayAmount;
  merchantPayoutAmount?: IyzipayAmount;
  paidPrice?: IyzipayAmount;
  subMerchantPayoutAmount?: IyzipayAmount;
}

export interface IyzipayItemTransaction {
  blockageRate?: IyzipayAmount;
  blockageRateAmountMerchant?: IyzipayAmount;
  blockageRateAmountSubMerchant?: IyzipayAmount;
  blockageResolvedDate?: string;
  convertedPayout?: IyzipayConvertedPayout;
  itemId?: string;
  iyziCommissionFee?: IyzipayAmount;
  iyziCommissionRateAmount?: IyzipayAmount;
  merchantCommissionRate?: IyzipayAmount;
  merchantCommissionRateAmount?: IyzipayAmount;
  merchantPayoutAmount?: IyzipayAmount;
  paidPrice?: IyzipayAmount;
  paymentTransactionId?: string;
  price?: IyzipayAmount;
  subMerchantPayoutAmount?: IyzipayAmount;
  subMerchantPayoutRate?: IyzipayAmount;
  subMerchantPrice?: IyzipayAmount;
  transactionStatus?: number;
}

/**
 * Common envelope of every iyzipay response
 */
export interface IyzipayEnvelope {
  status: string;
  errorCode?: string;
  errorMessage?: string;
  errorGroup?: string;
  locale?: string;
  systemTime?: number;
  conversationId?: string;
}

export interface IyzipayPaymentResponse extends IyzipayEnvelope {
  price?: IyzipayAmount;
  paidPrice?: IyzipayAmount;
  installment?: number;
  paymentId?: string;
  fraudStatus?: number;
  merchantCommissionRate?: IyzipayAmount;
  merchantCommissionRateAmount?: IyzipayAmount;
  iyziCommissionRateAmount?: IyzipayAmount;
  iyziCommissionFee?: IyzipayAmount;
  cardType?: string;
  cardAssociation?: string;
  cardFamily?: string;
  cardUserKey?: string;
  cardToken?: string;
  binNumber?: string;
  lastFourDigits?: string;
  basketId?: string;
  currency?: string | number;
  itemTransactions?: IyzipayItemTransaction[];
  authCode?: string;
  phase?: string;
}

/**
 * Request body in the gateway's wire format
 */
export interface IyzipayPaymentRequestPayload {
  locale: string;
  conversationId: string;
  price: string;
  paidPrice: string;
  currency: string;
  basketId: string;
  paymentChannel: string;
  paymentGroup: string;
  installment: number;
  paymentCard: {
    cardHolderName?: string;
    cardNumber?: string;
    expireMonth?: string;
    expireYear?: string;
    cvc?: string;
    registerCard?: number;
    cardAlias?: string;
    cardUserKey?: string;
    cardToken?: string;
  };
  buyer: {
    id: string;
    name: string;
    surname: string;
    identityNumber: string;
    email: string;
    gsmNumber?: string;
    registrationDate?: string;
    lastLoginDate?: string;
    registrationAddress: string;
    ip: string;
    city: string;
    country: string;
    zipCode?: string;
  };
  shippingAddress: IyzipayAddressPayload;
  billingAddress: IyzipayAddressPayload;
  basketItems: Array<{
    id: string;
    name: string;
    category1: string;
    category2?: string;
    itemType: string;
    price: string;
  }>;
  callbackUrl?: string;
}

export interface IyzipayAddressPayload {
  contactName: string;
  city: string;
  country: string;
  address: string;
  zipCode?: string;
}
