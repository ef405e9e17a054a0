import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { of, throwError } from 'rxjs';
import { CircuitBreakerService } from '../../../core/circuit-breaker/circuit-breaker.service';
import { ProcessingLimitsService } from '../../../core/limits/processing-limits.service';
import { PayloadValidatorService } from '../../../core/validation/payload-validator.service';
import { IyzipayPaymentResponse } from '../../../domain/payments';
import { createPaymentResponse } from '../../../test/fixtures/payment.fixtures';
import {
  IYZIPAY_CIRCUIT_BREAKER,
  IyzipayApiClientService,
} from './iyzipay-api-client.service';

const toResponse = (status: number, data: unknown): AxiosResponse<unknown> => ({
  status,
  statusText: String(status),
  headers: {},
  config: { headers: new AxiosHeaders() },
  data,
});

const defaultConfig = {
  IYZIPAY_BASE_URL: 'https://gateway.test',
  IYZIPAY_API_KEY: 'test-key',
  IYZIPAY_API_SECRET: 'test-secret',
};

const createClient = (config: Record<string, string> = defaultConfig) => {
  const request = jest.fn();
  const httpService = { request } as unknown as HttpService;
  const configService = new ConfigService(config);
  const circuitBreakerService = new CircuitBreakerService(configService);
  const client = new IyzipayApiClientService(
    httpService,
    configService,
    circuitBreakerService,
    new ProcessingLimitsService(configService),
    new PayloadValidatorService(),
  );

  return { client, request, circuitBreakerService };
};

const decodeAuthorization = (header: string): string =>
  Buffer.from(header.replace('IYZWSv2 ', ''), 'base64').toString('utf8');

describe('IyzipayApiClientService', () => {
  let breakers: CircuitBreakerService | undefined;

  afterEach(() => {
    breakers?.shutdown();
    breakers = undefined;
  });

  const setup = (config?: Record<string, string>) => {
    const created = createClient(config);
    breakers = created.circuitBreakerService;
    return created;
  };

  it('posts the signed JSON body to the gateway', async () => {
    const { client, request } = setup();
    request.mockReturnValue(of(toResponse(200, createPaymentResponse())));

    const payload = { locale: 'tr', conversationId: '123456789' };
    await client.post<IyzipayPaymentResponse>('/payment/auth', payload);

    expect(request).toHaveBeenCalledTimes(1);
    const [config] = request.mock.calls[0];
    expect(config).toMatchObject({
      method: 'POST',
      url: 'https://gateway.test/payment/auth',
      data: JSON.stringify(payload),
      timeout: 10000,
    });
    expect(config.headers['Content-Type']).toBe('application/json');
    expect(config.headers['x-iyzi-rnd']).toEqual(expect.any(String));
    expect(decodeAuthorization(config.headers.Authorization)).toMatch(
      /^apiKey:test-key&randomKey:\w+&signature:[0-9a-f]{64}$/,
    );
  });

  it('returns the response body on success', async () => {
    const { client, request } = setup();
    const body = createPaymentResponse();
    request.mockReturnValue(of(toResponse(200, body)));

    const result = await client.post<IyzipayPaymentResponse>(
      '/payment/auth',
      {},
    );

    expect(result).toEqual({ status: 'ok', data: body });
  });

  it('prefers per-call credentials over configuration', async () => {
    const { client, request } = setup();
    request.mockReturnValue(of(toResponse(200, createPaymentResponse())));

    await client.post('/payment/auth', {}, {
      apiKey: 'override-key',
      apiSecret: 'override-secret',
    });

    const [config] = request.mock.calls[0];
    expect(decodeAuthorization(config.headers.Authorization)).toMatch(
      /^apiKey:override-key&/,
    );
  });

  it('refuses to call the gateway without credentials', async () => {
    const { client, request } = setup({
      IYZIPAY_BASE_URL: 'https://gateway.test',
    });

    const result = await client.post('/payment/auth', {});

    expect(result).toEqual({ status: 'error', code: 'missing_credentials' });
    expect(request).not.toHaveBeenCalled();
  });

  describe('gateway failures', () => {
    it('maps known vendor error codes', async () => {
      const { client, request } = setup();
      request.mockReturnValue(
        of(
          toResponse(200, {
            status: 'failure',
            errorCode: '12',
            errorMessage: 'Invalid card number',
          }),
        ),
      );

      expect(await client.post('/payment/auth', {})).toEqual({
        status: 'error',
        code: 'invalid_card',
      });
    });

    it('falls back to the lowercased error group', async () => {
      const { client, request } = setup();
      request.mockReturnValue(
        of(
          toResponse(200, {
            status: 'failure',
            errorCode: '99999',
            errorGroup: 'NOT_SUFFICIENT_FUNDS',
          }),
        ),
      );

      expect(await client.post('/payment/auth', {})).toEqual({
        status: 'error',
        code: 'not_sufficient_funds',
      });
    });

    it('reports payment_failed when the failure has no code', async () => {
      const { client, request } = setup();
      request.mockReturnValue(of(toResponse(200, { status: 'failure' })));

      expect(await client.post('/payment/auth', {})).toEqual({
        status: 'error',
        code: 'payment_failed',
      });
    });

    it('ignores error codes that are not in the table', async () => {
      const { client, request } = setup();
      request.mockReturnValue(
        of(toResponse(200, { status: 'failure', errorCode: 'constructor' })),
      );

      expect(await client.post('/payment/auth', {})).toEqual({
        status: 'error',
        code: 'payment_failed',
      });
    });

    it('reports unauthorized for a 401 without an envelope', async () => {
      const { client, request } = setup();
      request.mockReturnValue(of(toResponse(401, '')));

      expect(await client.post('/payment/auth', {})).toEqual({
        status: 'error',
        code: 'unauthorized',
      });
    });

    it('reports bad_request for other 4xx without an envelope', async () => {
      const { client, request } = setup();
      request.mockReturnValue(of(toResponse(404, { message: 'not found' })));

      expect(await client.post('/payment/auth', {})).toEqual({
        status: 'error',
        code: 'bad_request',
      });
    });

    it('reports invalid_response for a malformed 200 body', async () => {
      const { client, request } = setup();
      request.mockReturnValue(of(toResponse(200, ['unexpected'])));

      expect(await client.post('/payment/auth', {})).toEqual({
        status: 'error',
        code: 'invalid_response',
      });
    });
  });

  describe('transport failures', () => {
    it('reports timeout', async () => {
      const { client, request } = setup();
      request.mockReturnValue(
        throwError(() => new AxiosError('timeout exceeded', 'ECONNABORTED')),
      );

      expect(await client.post('/payment/auth', {})).toEqual({
        status: 'error',
        code: 'timeout',
      });
    });

    it('reports server_error for 5xx responses', async () => {
      const { client, request } = setup();
      const response = toResponse(503, 'unavailable');
      request.mockReturnValue(
        throwError(
          () =>
            new AxiosError(
              'Request failed with status code 503',
              'ERR_BAD_RESPONSE',
              undefined,
              undefined,
              response,
            ),
        ),
      );

      expect(await client.post('/payment/auth', {})).toEqual({
        status: 'error',
        code: 'server_error',
      });
    });

    it('reports network_error when no response arrives', async () => {
      const { client, request } = setup();
      request.mockReturnValue(
        throwError(() => new AxiosError('connect refused', 'ECONNREFUSED')),
      );

      expect(await client.post('/payment/auth', {})).toEqual({
        status: 'error',
        code: 'network_error',
      });
    });

    it('stops calling the gateway once the breaker opens', async () => {
      const { client, request, circuitBreakerService } = setup();
      request.mockReturnValue(
        throwError(() => new AxiosError('connect refused', 'ECONNREFUSED')),
      );

      await client.post('/payment/auth', {});
      const second = await client.post('/payment/auth', {});

      expect(second).toEqual({ status: 'error', code: 'service_unavailable' });
      expect(request).toHaveBeenCalledTimes(1);
      expect(
        circuitBreakerService.getCircuitBreakerState(IYZIPAY_CIRCUIT_BREAKER)
          ?.state,
      ).toBe('open');
    });
  });
});
