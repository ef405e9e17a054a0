import {
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpException,
  HttpStatus,
  Post,
  UnauthorizedException,
  UseInterceptors,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { logger } from '../../../core/logger/logger.config';
import { Timeout } from '../../../core/timeout/timeout.decorator';
import { TimeoutInterceptor } from '../../../core/timeout/timeout.interceptor';
import { PaymentProcessingError } from '../../../domain/payments';
import {
  PaymentErrorResponseDto,
  PaymentResponseDto,
  toPaymentResponse,
} from '../dto/payment-response.dto';
import { ProcessPaymentDto } from '../dto/process-payment.dto';
import { IyzipayPaymentService } from '../payments/iyzipay-payment.service';

@Controller('payments')
@UseInterceptors(TimeoutInterceptor)
export class PaymentsController {
  private readonly logger = logger();

  constructor(
    private readonly paymentService: IyzipayPaymentService,
    private readonly configService: ConfigService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @Timeout(60000)
  async processPayment(
    @Body() dto: ProcessPaymentDto,
    @Headers('authorization') auth?: string,
  ): Promise<PaymentResponseDto> {
    this.authorize(auth);

    const { secureCallbackUrl, ...request } = dto;

    try {
      const processed = await this.paymentService.processPaymentOrThrow(
        request,
        { secureCallbackUrl },
      );
      return toPaymentResponse(processed);
    } catch (error: unknown) {
      if (error instanceof PaymentProcessingError) {
        const body: PaymentErrorResponseDto = {
          statusCode: HttpStatus.PAYMENT_REQUIRED,
          message: error.message,
          code: error.code,
        };
        throw new HttpException(body, HttpStatus.PAYMENT_REQUIRED);
      }
      throw error;
    }
  }

  private authorize(auth?: string): void {
    const token = this.configService.get<string>('API_AUTH_TOKEN');

    if (!auth) {
      throw new UnauthorizedException('Authorization header required');
    }
    if (!token || auth !== `Bearer ${token}`) {
      this.logger.warn('Rejected payment request with invalid credentials');
      throw new UnauthorizedException('Invalid authorization');
    }
  }
}
