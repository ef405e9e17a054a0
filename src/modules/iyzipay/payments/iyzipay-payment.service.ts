import { Injectable } from '@nestjs/common';
import { logger } from '../../../core/logger/logger.config';
import {
  IyzipayMapper,
  IyzipayPaymentResponse,
  PaymentGateway,
  PaymentRequest,
  PaymentResult,
  ProcessedPayment,
  ProcessPaymentOptions,
  unwrapPaymentResult,
} from '../../../domain/payments';
import { IyzipayApiClientService } from '../adapters/iyzipay-api-client.service';
import {
  buildPaymentRequest,
  IYZIPAY_PAYMENT_PATHS,
} from './payment-request.builder';

@Injectable()
export class IyzipayPaymentService implements PaymentGateway {
  private readonly logger = logger();

  constructor(private readonly apiClient: IyzipayApiClientService) {}

  async processPayment(
    request: PaymentRequest,
    options: ProcessPaymentOptions = {},
  ): Promise<PaymentResult> {
    const { path, body } = buildPaymentRequest(request, options);
    const context = {
      conversationId: request.conversationId,
      basketId: request.basketId,
      secure: path === IYZIPAY_PAYMENT_PATHS.SECURE_AUTH,
    };

    this.logger.info(context, 'Processing payment');

    const response = await this.apiClient.post<IyzipayPaymentResponse>(
      path,
      IyzipayMapper.toRequestPayload(body),
      { apiKey: options.apiKey, apiSecret: options.apiSecret },
    );
    const result = IyzipayMapper.toPaymentResult(response, request);

    if (result.status === 'ok') {
      this.logger.info(
        {
          ...context,
          paymentId: result.payment.id,
          transactions: result.payment.transactions.length,
          phase: result.metadata.phase,
        },
        'Payment processed',
      );
    } else {
      this.logger.warn({ ...context, code: result.code }, 'Payment failed');
    }

    return result;
  }

  async processPaymentOrThrow(
    request: PaymentRequest,
    options: ProcessPaymentOptions = {},
  ): Promise<ProcessedPayment> {
    return unwrapPaymentResult(await this.processPayment(request, options));
  }
}
