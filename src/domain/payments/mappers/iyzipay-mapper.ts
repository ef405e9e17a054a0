/**
 * iyzipay Mapper
 *
 * Converts iyzipay wire structures to domain models and back.
 * The response side is a field-for-field reshape: absent vendor fields stay
 * absent, only enumeration codes and currency are normalized.
 */

import {
  IyzipayAddressPayload,
  IyzipayAmount,
  IyzipayConvertedPayout,
  IyzipayItemTransaction,
  IyzipayPaymentRequestPayload,
  IyzipayPaymentResponse,
} from '../interfaces/iyzipay-payload.interface';
import {
  Address,
  Amount,
  ApiResult,
  CardAssociation,
  CardFamily,
  CardReference,
  CardType,
  ConvertedPayout,
  Currency,
  FraudStatus,
  Payment,
  PaymentMetadata,
  PaymentRequest,
  PaymentResult,
  Transaction,
  TransactionStatus,
} from '../models';

/**
 * Status literal of a successful gateway response
 */
export const IYZIPAY_SUCCESS_STATUS = 'success';

export class IyzipayMapper {
  private static readonly CARD_ASSOCIATIONS: Record<string, CardAssociation> = {
    VISA: CardAssociation.VISA,
    MASTER_CARD: CardAssociation.MASTER_CARD,
    AMERICAN_EXPRESS: CardAssociation.AMERICAN_EXPRESS,
    TROY: CardAssociation.TROY,
  };

  private static readonly CARD_FAMILIES: Record<string, CardFamily> = {
    Bonus: CardFamily.BONUS,
    Axess: CardFamily.AXESS,
    World: CardFamily.WORLD,
    Maximum: CardFamily.MAXIMUM,
    Paraf: CardFamily.PARAF,
    CardFinans: CardFamily.CARD_FINANS,
    Advantage: CardFamily.ADVANTAGE,
    Neo: CardFamily.NEO,
  };

  private static readonly CARD_TYPES: Record<string, CardType> = {
    CREDIT_CARD: CardType.CREDIT_CARD,
    DEBIT_CARD: CardType.DEBIT_CARD,
    PREPAID_CARD: CardType.PREPAID_CARD,
  };

  private static readonly FRAUD_STATUSES: Record<number, FraudStatus> = {
    1: FraudStatus.OK,
    0: FraudStatus.REVIEW,
    [-1]: FraudStatus.REJECTED,
  };

  private static readonly TRANSACTION_STATUSES: Record<
    number,
    TransactionStatus
  > = {
    2: TransactionStatus.SUCCESS,
    1: TransactionStatus.PENDING_APPROVAL,
    0: TransactionStatus.FAILURE,
    [-1]: TransactionStatus.REJECTED,
  };

  /**
   * Map a gateway call outcome to a payment result
   *
   * Errors pass through untouched; a successful body is mapped to a Payment
   * and its Metadata.
   *
   * @param result - Transport outcome carrying the raw response body
   * @param request - Request the response answers; source of card and buyer back-references
   */
  static toPaymentResult(
    result: ApiResult<IyzipayPaymentResponse>,
    request: PaymentRequest,
  ): PaymentResult {
    if (result.status === 'error') {
      return result;
    }

    return {
      status: 'ok',
      payment: this.toPayment(result.data, request),
      metadata: this.toMetadata(result.data),
    };
  }

  /**
   * Map a successful payment response to the domain Payment
   */
  static toPayment(
    response: IyzipayPaymentResponse,
    request: PaymentRequest,
  ): Payment {
    return {
      id: response.paymentId,
      basketId: response.basketId,
      binId: response.binNumber,
      cardRef: this.toCardReference(response, request),
      conversationId: response.conversationId,
      currency: this.toCurrency(response.currency),
      fraudStatus: this.toFraudStatus(response.fraudStatus),
      installment: response.installment,
      transactions: this.toTransactions(response.itemTransactions ?? []),
      commissionFee: this.toAmount(response.iyziCommissionFee),
      commissionAmount: this.toAmount(response.iyziCommissionRateAmount),
      lastFourDigits: response.lastFourDigits,
      merchantCommissionRate: this.toAmount(response.merchantCommissionRate),
      merchantCommissionAmount: this.toAmount(
        response.merchantCommissionRateAmount,
      ),
      paidPrice: this.toAmount(response.paidPrice),
      price: this.toAmount(response.price),
    };
  }

  static toTransactions(items: IyzipayItemTransaction[]): Transaction[] {
    return items.map((item) => this.toTransaction(item));
  }

  static toTransaction(item: IyzipayItemTransaction): Transaction {
    return {
      id: item.paymentTransactionId,
      itemId: item.itemId,
      blockageRate: this.toAmount(item.blockageRate),
      merchantBlockageAmount: this.toAmount(item.blockageRateAmountMerchant),
      submerchantBlockageAmount: this.toAmount(
        item.blockageRateAmountSubMerchant,
      ),
      resolutionDate: item.blockageResolvedDate,
      convertedPayout: this.toConvertedPayout(item.convertedPayout ?? {}),
      commissionFee: this.toAmount(item.iyziCommissionFee),
      commissionAmount: this.toAmount(item.iyziCommissionRateAmount),
      merchantCommissionRate: this.toAmount(item.merchantCommissionRate),
      merchantCommissionAmount: this.toAmount(
        item.merchantCommissionRateAmount,
      ),
      merchantPayoutAmount: this.toAmount(item.merchantPayoutAmount),
      paidPrice: this.toAmount(item.paidPrice),
      price: this.toAmount(item.price),
      submerchantPayoutAmount: this.toAmount(item.subMerchantPayoutAmount),
      submerchantPayoutRate: this.toAmount(item.subMerchantPayoutRate),
      submerchantPrice: this.toAmount(item.subMerchantPrice),
      transactionStatus: this.toTransactionStatus(item.transactionStatus),
    };
  }

  static toConvertedPayout(payout: IyzipayConvertedPayout): ConvertedPayout {
    return {
      merchantBlockageAmount: this.toAmount(payout.blockageRateAmountMerchant),
      submerchantBlockageAmount: this.toAmount(
        payout.blockageRateAmountSubMerchant,
      ),
      currency: payout.currency,
      commissionFee: this.toAmount(payout.iyziCommissionFee),
      commissionAmount: this.toAmount(payout.iyziCommissionRateAmount),
      conversionRate: this.toAmount(payout.iyziConversionRate),
      conversionCost: this.toAmount(payout.iyziConversionRateAmount),
      merchantPayoutAmount: this.toAmount(payout.merchantPayoutAmount),
      paidPrice: this.toAmount(payout.paidPrice),
      submerchantPayoutAmount: this.toAmount(payout.subMerchantPayoutAmount),
    };
  }

  /**
   * Build the saved-card handle of a payment
   *
   * Alias, card and email come from the request since the gateway does not
   * echo them back.
   */
  static toCardReference(
    response: IyzipayPaymentResponse,
    request: PaymentRequest,
  ): CardReference {
    return {
      assoc: this.toCardAssociation(response.cardAssociation),
      family: this.toCardFamily(response.cardFamily),
      type: this.toCardType(response.cardType),
      alias: request.paymentCard.registrationAlias,
      userKey: response.cardUserKey,
      token: response.cardToken,
      card: request.paymentCard,
      email: request.buyer.email,
    };
  }

  static toMetadata(response: IyzipayPaymentResponse): PaymentMetadata {
    return {
      systemTime: response.systemTime,
      succeeded: response.status === IYZIPAY_SUCCESS_STATUS,
      phase: response.phase,
      locale: response.locale,
      authCode: response.authCode,
    };
  }

  /**
   * Render a payment request in the gateway's wire format
   */
  static toRequestPayload(
    request: PaymentRequest,
  ): IyzipayPaymentRequestPayload {
    const card = request.paymentCard;
    const buyer = request.buyer;

    return {
      locale: request.locale,
      conversationId: request.conversationId,
      price: request.price,
      paidPrice: request.paidPrice,
      currency: request.currency.toUpperCase(),
      basketId: request.basketId,
      paymentChannel: request.paymentChannel.toUpperCase(),
      paymentGroup: request.paymentGroup.toUpperCase(),
      installment: request.installment,
      paymentCard: {
        cardHolderName: card.cardHolderName,
        cardNumber: card.cardNumber,
        expireMonth: card.expireMonth,
        expireYear: card.expireYear,
        cvc: card.cvc,
        registerCard:
          card.registerCard === undefined ? undefined : Number(card.registerCard),
        cardAlias: card.registrationAlias,
        cardUserKey: card.cardUserKey,
        cardToken: card.cardToken,
      },
      buyer: {
        id: buyer.id,
        name: buyer.name,
        surname: buyer.surname,
        identityNumber: buyer.identityNumber,
        email: buyer.email,
        gsmNumber: buyer.gsmNumber,
        registrationDate: buyer.registrationDate,
        lastLoginDate: buyer.lastLoginDate,
        registrationAddress: buyer.registrationAddress,
        ip: buyer.ip,
        city: buyer.city,
        country: buyer.country,
        zipCode: buyer.zipCode,
      },
      shippingAddress: this.toAddressPayload(request.shippingAddress),
      billingAddress: this.toAddressPayload(request.billingAddress),
      basketItems: request.basketItems.map((item) => ({
        id: item.id,
        name: item.name,
        category1: item.category1,
        category2: item.category2,
        itemType: item.itemType.toUpperCase(),
        price: item.price,
      })),
      ...(request.callbackUrl ? { callbackUrl: request.callbackUrl } : {}),
    };
  }

  private static toAddressPayload(address: Address): IyzipayAddressPayload {
    return {
      contactName: address.contactName,
      city: address.city,
      country: address.country,
      address: address.address,
      zipCode: address.zipCode,
    };
  }

  /**
   * "TRY" -> try; a numeric ISO code is kept as its string form
   */
  static toCurrency(
    currency?: string | number | null,
  ): Currency | string | undefined {
    if (currency === undefined || currency === null) {
      return undefined;
    }
    return typeof currency === 'string'
      ? currency.toLowerCase()
      : String(currency);
  }

  private static toAmount(value?: IyzipayAmount | null): Amount | undefined {
    return value === undefined || value === null ? undefined : String(value);
  }

  static toCardAssociation(code?: string): CardAssociation {
    return (code && this.CARD_ASSOCIATIONS[code]) || CardAssociation.UNKNOWN;
  }

  static toCardFamily(code?: string): CardFamily {
    return (code && this.CARD_FAMILIES[code]) || CardFamily.UNKNOWN;
  }

  static toCardType(code?: string): CardType {
    return (code && this.CARD_TYPES[code]) || CardType.UNKNOWN;
  }

  static toFraudStatus(code?: number): FraudStatus {
    return (
      (code !== undefined && this.FRAUD_STATUSES[code]) || FraudStatus.UNKNOWN
    );
  }

  static toTransactionStatus(code?: number): TransactionStatus {
    return (
      (code !== undefined && this.TRANSACTION_STATUSES[code]) ||
      TransactionStatus.UNKNOWN
    );
  }
}
