import { PaymentCard } from './payment-request.model';

export enum CardAssociation {
  VISA = 'visa',
  MASTER_CARD = 'master_card',
  AMERICAN_EXPRESS = 'american_express',
  TROY = 'troy',
  UNKNOWN = 'unknown',
}

export enum CardFamily {
  BONUS = 'bonus',
  AXESS = 'axess',
  WORLD = 'world',
  MAXIMUM = 'maximum',
  PARAF = 'paraf',
  CARD_FINANS = 'card_finans',
  ADVANTAGE = 'advantage',
  NEO = 'neo',
  UNKNOWN = 'unknown',
}

export enum CardType {
  CREDIT_CARD = 'credit_card',
  DEBIT_CARD = 'debit_card',
  PREPAID_CARD = 'prepaid_card',
  UNKNOWN = 'unknown',
}

/**
 * Reusable handle of a card the gateway has seen
 *
 * `card` and `email` are copied from the request: the gateway does not echo
 * them, and they are needed to pay again with the same saved card.
 */
export interface CardReference {
  assoc: CardAssociation;
  family: CardFamily;
  type: CardType;
  alias?: string;
  userKey?: string;
  token?: string;
  card: PaymentCard;
  email: string;
}
