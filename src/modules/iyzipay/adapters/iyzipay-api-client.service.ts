import { HttpService } from '@nestjs/axios';
import { HttpStatus, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosResponse, isAxiosError } from 'axios';
import CircuitBreaker from 'opossum';
import { firstValueFrom } from 'rxjs';
import { CircuitBreakerService } from '../../../core/circuit-breaker/circuit-breaker.service';
import { ProcessingLimitsService } from '../../../core/limits/processing-limits.service';
import { logger } from '../../../core/logger/logger.config';
import { PayloadValidatorService } from '../../../core/validation/payload-validator.service';
import {
  ApiResult,
  ErrorCode,
  IyzipayEnvelope,
} from '../../../domain/payments';
import vendorErrorCodes from './error-codes.json';
import { IyzipayCredentials, signRequest } from './request-signer';

export const IYZIPAY_CIRCUIT_BREAKER = 'iyzipay-api';

const IYZIPAY_FAILURE_STATUS = 'failure';
const VENDOR_ERROR_CODES = new Map<string, ErrorCode>(
  Object.entries(vendorErrorCodes),
);

type RequestArgs = [path: string, body: string, headers: Record<string, string>];

@Injectable()
export class IyzipayApiClientService {
  private readonly logger = logger();
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private circuitBreaker?: CircuitBreaker<RequestArgs, AxiosResponse<unknown>>;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
    private readonly circuitBreakerService: CircuitBreakerService,
    private readonly limitsService: ProcessingLimitsService,
    private readonly payloadValidator: PayloadValidatorService,
  ) {
    this.baseUrl =
      this.configService.get<string>('IYZIPAY_BASE_URL') ||
      'https://sandbox-api.iyzipay.com';
    this.apiKey = this.configService.get<string>('IYZIPAY_API_KEY') || '';
    this.apiSecret = this.configService.get<string>('IYZIPAY_API_SECRET') || '';
  }

  private getCircuitBreaker(): CircuitBreaker<
    RequestArgs,
    AxiosResponse<unknown>
  > {
    if (!this.circuitBreaker) {
      this.circuitBreaker = this.circuitBreakerService.createCircuitBreaker(
        (path: string, body: string, headers: Record<string, string>) =>
          this.makeRequest(path, body, headers),
        {
          name: IYZIPAY_CIRCUIT_BREAKER,
          timeout: this.limitsService.getCircuitBreakerTimeout(),
        },
      );
    }
    return this.circuitBreaker;
  }

  /**
   * Sign and POST a JSON body to the gateway
   *
   * Never throws: transport failures and gateway `failure` responses are
   * both reported as an error code.
   *
   * @param path - Endpoint path, e.g. "/payment/auth"
   * @param payload - Body in the gateway's wire format
   * @param overrides - Per-call credentials, replacing the configured ones
   */
  async post<T extends IyzipayEnvelope>(
    path: string,
    payload: object,
    overrides: Partial<IyzipayCredentials> = {},
  ): Promise<ApiResult<T>> {
    const credentials: IyzipayCredentials = {
      apiKey: overrides.apiKey || this.apiKey,
      apiSecret: overrides.apiSecret || this.apiSecret,
    };

    if (!credentials.apiKey || !credentials.apiSecret) {
      this.logger.error({ path }, 'iyzipay credentials are not configured');
      return { status: 'error', code: 'missing_credentials' };
    }

    const body = JSON.stringify(payload);
    const headers = signRequest(credentials, path, body);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.getCircuitBreaker().fire(path, body, headers);
    } catch (error: unknown) {
      const code = this.toTransportErrorCode(error);
      this.logger.error(
        {
          path,
          code,
          error: error instanceof Error ? error.message : String(error),
        },
        'iyzipay request failed',
      );
      return { status: 'error', code };
    }

    return this.toApiResult<T>(path, response);
  }

  private async makeRequest(
    path: string,
    body: string,
    headers: Record<string, string>,
  ): Promise<AxiosResponse<unknown>> {
    const url = `${this.baseUrl}${path}`;

    this.logger.debug({ method: 'POST', url }, 'Making HTTP request');

    return firstValueFrom(
      this.httpService.request<unknown>({
        method: 'POST',
        url,
        data: body,
        headers: {
          ...headers,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        timeout: this.limitsService.getApiCallTimeout(),
        // 4xx bodies carry gateway errors; only 5xx and network errors reject
        validateStatus: (status) => status < HttpStatus.INTERNAL_SERVER_ERROR,
      }),
    );
  }

  private toApiResult<T extends IyzipayEnvelope>(
    path: string,
    response: AxiosResponse<unknown>,
  ): ApiResult<T> {
    const { status: httpStatus, data } = response;

    if (!this.isEnvelope<T>(data)) {
      const code = this.toHttpErrorCode(httpStatus);
      this.logger.error({ path, httpStatus, code }, 'Unexpected iyzipay response');
      return { status: 'error', code };
    }

    if (data.status === IYZIPAY_FAILURE_STATUS) {
      const code = this.toVendorErrorCode(data);
      this.logger.warn(
        {
          path,
          httpStatus,
          code,
          errorCode: data.errorCode,
          errorGroup: data.errorGroup,
          errorMessage: data.errorMessage,
          conversationId: data.conversationId,
        },
        'iyzipay rejected request',
      );
      return { status: 'error', code };
    }

    return { status: 'ok', data };
  }

  private isEnvelope<T extends IyzipayEnvelope>(data: unknown): data is T {
    return this.payloadValidator.isValidEnvelope(data);
  }

  private toVendorErrorCode(envelope: IyzipayEnvelope): ErrorCode {
    const mapped = envelope.errorCode
      ? VENDOR_ERROR_CODES.get(envelope.errorCode)
      : undefined;
    if (mapped) {
      return mapped;
    }
    if (envelope.errorGroup) {
      return envelope.errorGroup.toLowerCase();
    }
    return 'payment_failed';
  }

  private toHttpErrorCode(httpStatus: number): ErrorCode {
    if (
      httpStatus === HttpStatus.UNAUTHORIZED ||
      httpStatus === HttpStatus.FORBIDDEN
    ) {
      return 'unauthorized';
    }
    if (httpStatus >= HttpStatus.BAD_REQUEST) {
      return 'bad_request';
    }
    return 'invalid_response';
  }

  private toTransportErrorCode(error: unknown): ErrorCode {
    if (isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return 'timeout';
      }
      return error.response ? 'server_error' : 'network_error';
    }

    const code =
      error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'EOPENBREAKER') {
      return 'service_unavailable';
    }
    if (code === 'ETIMEDOUT') {
      return 'timeout';
    }
    return 'internal_error';
  }
}
