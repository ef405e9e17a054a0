/**
 * Payment request model
 *
 * Input of the "authorize payment" flow. Built by the caller and never
 * mutated by this service; the 3D-Secure callback is added on a copy.
 */

export enum Locale {
  TR = 'tr',
  EN = 'en',
}

export enum Currency {
  TRY = 'try',
  USD = 'usd',
  EUR = 'eur',
  GBP = 'gbp',
  IRR = 'irr',
  NOK = 'nok',
  RUB = 'rub',
  CHF = 'chf',
}

export enum PaymentChannel {
  WEB = 'web',
  MOBILE = 'mobile',
  MOBILE_WEB = 'mobile_web',
  MOBILE_IOS = 'mobile_ios',
  MOBILE_ANDROID = 'mobile_android',
  MOBILE_WINDOWS = 'mobile_windows',
  MOBILE_TABLET = 'mobile_tablet',
  MOBILE_PHONE = 'mobile_phone',
}

export enum PaymentGroup {
  PRODUCT = 'product',
  LISTING = 'listing',
  SUBSCRIPTION = 'subscription',
}

export enum BasketItemType {
  PHYSICAL = 'physical',
  VIRTUAL = 'virtual',
}

/**
 * Decimal amount as sent to and received from the gateway (e.g. "0.5")
 */
export type Amount = string;

/**
 * Card used for the payment
 *
 * Either raw card data, or a previously registered card referenced by
 * `cardUserKey` + `cardToken`.
 */
export interface PaymentCard {
  cardHolderName?: string;
  cardNumber?: string;
  expireMonth?: string;
  expireYear?: string;
  cvc?: string;

  /**
   * Ask the gateway to store the card for later use
   */
  registerCard?: boolean;

  /**
   * Alias the stored card is saved under
   */
  registrationAlias?: string;

  cardUserKey?: string;
  cardToken?: string;
}

export interface Buyer {
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
}

export interface Address {
  contactName: string;
  city: string;
  country: string;
  address: string;
  zipCode?: string;
}

export interface BasketItem {
  id: string;
  name: string;
  category1: string;
  category2?: string;
  itemType: BasketItemType;
  price: Amount;
}

export interface PaymentRequest {
  readonly locale: Locale;
  readonly conversationId: string;
  readonly price: Amount;
  readonly paidPrice: Amount;
  readonly currency: Currency;
  readonly basketId: string;
  readonly paymentChannel: PaymentChannel;
  readonly paymentGroup: PaymentGroup;
  readonly paymentCard: PaymentCard;
  readonly installment: number;
  readonly buyer: Buyer;
  readonly shippingAddress: Address;
  readonly billingAddress: Address;
  readonly basketItems: readonly BasketItem[];

  /**
   * 3D-Secure callback; only present on requests sent to the 3D-Secure endpoint
   */
  readonly callbackUrl?: string;
}

/**
 * Per-call options of the payment flow
 */
export interface ProcessPaymentOptions {
  /**
   * Overrides IYZIPAY_API_KEY for this call
   */
  apiKey?: string;

  /**
   * Overrides IYZIPAY_API_SECRET for this call
   */
  apiSecret?: string;

  /**
   * Switches the flow to 3D-Secure when set
   */
  secureCallbackUrl?: string;
}
