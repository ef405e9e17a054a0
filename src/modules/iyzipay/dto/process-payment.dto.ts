/**
 * Body of POST /payments
 */

import { Transform, TransformFnParams, Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsBoolean,
  IsDefined,
  IsEmail,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumberString,
  IsOptional,
  IsString,
  IsUrl,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  Address,
  BasketItem,
  BasketItemType,
  Buyer,
  Currency,
  Locale,
  PaymentCard,
  PaymentChannel,
  PaymentGroup,
  PaymentRequest,
} from '../../../domain/payments';

const toBooleanFlag = ({ value }: TransformFnParams): unknown => {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
};

export class PaymentCardDto implements PaymentCard {
  @IsOptional()
  @IsString()
  cardHolderName?: string;

  @IsOptional()
  @IsNumberString()
  cardNumber?: string;

  @IsOptional()
  @IsNumberString()
  expireMonth?: string;

  @IsOptional()
  @IsNumberString()
  expireYear?: string;

  @IsOptional()
  @IsNumberString()
  cvc?: string;

  /**
   * Form style "true" / "false" strings are read literally
   */
  @IsOptional()
  @IsBoolean()
  @Transform(toBooleanFlag)
  registerCard?: boolean;

  @IsOptional()
  @IsString()
  registrationAlias?: string;

  /**
   * Saved card owner, used with `cardToken` instead of raw card data
   */
  @IsOptional()
  @IsString()
  cardUserKey?: string;

  @IsOptional()
  @IsString()
  cardToken?: string;
}

export class BuyerDto implements Buyer {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  surname!: string;

  @IsString()
  @IsNotEmpty()
  identityNumber!: string;

  @IsEmail()
  email!: string;

  @IsOptional()
  @IsString()
  gsmNumber?: string;

  /**
   * @example "2013-04-21 15:12:09"
   */
  @IsOptional()
  @IsString()
  registrationDate?: string;

  @IsOptional()
  @IsString()
  lastLoginDate?: string;

  @IsString()
  @IsNotEmpty()
  registrationAddress!: string;

  @IsString()
  @IsNotEmpty()
  ip!: string;

  @IsString()
  @IsNotEmpty()
  city!: string;

  @IsString()
  @IsNotEmpty()
  country!: string;

  @IsOptional()
  @IsString()
  zipCode?: string;
}

export class AddressDto implements Address {
  @IsString()
  @IsNotEmpty()
  contactName!: string;

  @IsString()
  @IsNotEmpty()
  city!: string;

  @IsString()
  @IsNotEmpty()
  country!: string;

  @IsString()
  @IsNotEmpty()
  address!: string;

  @IsOptional()
  @IsString()
  zipCode?: string;
}

export class BasketItemDto implements BasketItem {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  category1!: string;

  @IsOptional()
  @IsString()
  category2?: string;

  @IsEnum(BasketItemType)
  itemType!: BasketItemType;

  @IsNumberString()
  price!: string;
}

export class ProcessPaymentDto implements PaymentRequest {
  @IsEnum(Locale)
  locale!: Locale;

  @IsString()
  @IsNotEmpty()
  conversationId!: string;

  /**
   * @example "0.5"
   */
  @IsNumberString()
  price!: string;

  @IsNumberString()
  paidPrice!: string;

  @IsEnum(Currency)
  currency!: Currency;

  @IsString()
  @IsNotEmpty()
  basketId!: string;

  @IsEnum(PaymentChannel)
  paymentChannel!: PaymentChannel;

  @IsEnum(PaymentGroup)
  paymentGroup!: PaymentGroup;

  @IsDefined()
  @ValidateNested()
  @Type(() => PaymentCardDto)
  paymentCard!: PaymentCardDto;

  @IsInt()
  @Min(1)
  installment!: number;

  @IsDefined()
  @ValidateNested()
  @Type(() => BuyerDto)
  buyer!: BuyerDto;

  @IsDefined()
  @ValidateNested()
  @Type(() => AddressDto)
  shippingAddress!: AddressDto;

  @IsDefined()
  @ValidateNested()
  @Type(() => AddressDto)
  billingAddress!: AddressDto;

  @ValidateNested({ each: true })
  @ArrayMinSize(1)
  @Type(() => BasketItemDto)
  basketItems!: BasketItemDto[];

  /**
   * Switches the payment to 3D-Secure
   */
  @IsOptional()
  @IsUrl({ require_tld: false })
  secureCallbackUrl?: string;
}
