import {
  CardReference,
  Payment,
  PaymentMetadata,
  ProcessedPayment,
} from '../../../domain/payments';

/**
 * Card reference as exposed over HTTP: no raw card data
 */
export type CardReferenceDto = Omit<CardReference, 'card'>;

export interface PaymentDto extends Omit<Payment, 'cardRef'> {
  cardRef: CardReferenceDto;
}

export interface PaymentResponseDto {
  payment: PaymentDto;
  metadata: PaymentMetadata;
}

export interface PaymentErrorResponseDto {
  statusCode: number;
  message: string;
  code: string;
}

export const toPaymentResponse = ({
  payment,
  metadata,
}: ProcessedPayment): PaymentResponseDto => {
  const { card: _card, ...cardRef } = payment.cardRef;

  return {
    payment: { ...payment, cardRef },
    metadata,
  };
};
