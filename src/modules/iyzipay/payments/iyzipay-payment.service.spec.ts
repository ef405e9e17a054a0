import {
  ApiResult,
  IyzipayPaymentResponse,
  PaymentProcessingError,
} from '../../../domain/payments';
import {
  createItemTransaction,
  createPaymentRequest,
  createPaymentResponse,
} from '../../../test/fixtures/payment.fixtures';
import { IyzipayApiClientService } from '../adapters/iyzipay-api-client.service';
import { IyzipayPaymentService } from './iyzipay-payment.service';

const createService = (result: ApiResult<IyzipayPaymentResponse>) => {
  const post = jest.fn().mockResolvedValue(result);
  const apiClient = { post } as unknown as IyzipayApiClientService;

  return { service: new IyzipayPaymentService(apiClient), post };
};

describe('IyzipayPaymentService', () => {
  const request = createPaymentRequest();

  describe('processPayment', () => {
    it('returns payment and metadata for a successful response', async () => {
      const { service } = createService({
        status: 'ok',
        data: createPaymentResponse(),
      });

      const result = await service.processPayment(request);

      expect(result.status).toBe('ok');
      if (result.status !== 'ok') return;
      expect(result.payment.price).toBe('0.5');
      expect(result.payment.paidPrice).toBe('0.7');
      expect(result.payment.currency).toBe('try');
      expect(result.payment.transactions).toHaveLength(1);
      expect(result.metadata.succeeded).toBe(true);
    });

    it('posts to the direct authorization endpoint without a callback', async () => {
      const { service, post } = createService({
        status: 'ok',
        data: createPaymentResponse(),
      });

      await service.processPayment(request);

      const [path, payload, credentials] = post.mock.calls[0];
      expect(path).toBe('/payment/auth');
      expect(payload).not.toHaveProperty('callbackUrl');
      expect(payload.currency).toBe('TRY');
      expect(credentials).toEqual({ apiKey: undefined, apiSecret: undefined });
    });

    it('posts to the 3D-Secure endpoint with the callback url', async () => {
      const { service, post } = createService({
        status: 'ok',
        data: createPaymentResponse(),
      });

      await service.processPayment(request, {
        secureCallbackUrl: 'https://shop.example.com/3ds/callback',
      });

      const [path, payload] = post.mock.calls[0];
      expect(path).toBe('/payment/3dsecure/auth');
      expect(payload.callbackUrl).toBe('https://shop.example.com/3ds/callback');
    });

    it('forwards per-call credentials', async () => {
      const { service, post } = createService({
        status: 'ok',
        data: createPaymentResponse(),
      });

      await service.processPayment(request, {
        apiKey: 'test-key',
        apiSecret: 'test-secret',
      });

      expect(post.mock.calls[0][2]).toEqual({
        apiKey: 'test-key',
        apiSecret: 'test-secret',
      });
    });

    it('keeps the order of item transactions', async () => {
      const { service } = createService({
        status: 'ok',
        data: createPaymentResponse({
          itemTransactions: [
            createItemTransaction({ itemId: 'BI2', price: 0.3 }),
            createItemTransaction({ itemId: 'BI1', price: 0.2 }),
          ],
        }),
      });

      const result = await service.processPayment(request);

      if (result.status !== 'ok') {
        throw new Error(`unexpected error ${result.code}`);
      }
      expect(
        result.payment.transactions.map((t) => [t.itemId, t.price]),
      ).toEqual([
        ['BI2', '0.3'],
        ['BI1', '0.2'],
      ]);
    });

    it('returns transport errors without throwing', async () => {
      const { service } = createService({
        status: 'error',
        code: 'invalid_card',
      });

      await expect(service.processPayment(request)).resolves.toEqual({
        status: 'error',
        code: 'invalid_card',
      });
    });
  });

  describe('processPaymentOrThrow', () => {
    it('unwraps a successful result', async () => {
      const { service } = createService({
        status: 'ok',
        data: createPaymentResponse(),
      });

      const { payment, metadata } = await service.processPaymentOrThrow(request);

      expect(payment.id).toBe('11111111');
      expect(payment.cardRef.email).toBe('buyer@example.com');
      expect(metadata.authCode).toBe('auth-1');
    });

    it('throws PaymentProcessingError with the transport code', async () => {
      const { service } = createService({
        status: 'error',
        code: 'invalid_card',
      });

      const promise = service.processPaymentOrThrow(request);

      await expect(promise).rejects.toBeInstanceOf(PaymentProcessingError);
      await expect(promise).rejects.toMatchObject({ code: 'invalid_card' });
    });
  });
});
