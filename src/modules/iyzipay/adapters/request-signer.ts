import { createHmac, randomBytes } from 'node:crypto';

export interface IyzipayCredentials {
  apiKey: string;
  apiSecret: string;
}

export const IYZIPAY_RANDOM_HEADER = 'x-iyzi-rnd';

/**
 * Random key sent with every request and mixed into its signature
 */
export const generateRandomKey = (): string =>
  `${Date.now()}${randomBytes(4).toString('hex')}`;

/**
 * Build the IYZWSv2 authentication headers of a request
 *
 * signature = hex(HMAC-SHA256(secret, randomKey + path + body))
 *
 * @param path - URI path without host or query, e.g. "/payment/auth"
 * @param body - Exact JSON string sent as the request body
 */
export const signRequest = (
  credentials: IyzipayCredentials,
  path: string,
  body: string,
  randomKey: string = generateRandomKey(),
): Record<string, string> => {
  const signature = createHmac('sha256', credentials.apiSecret)
    .update(randomKey + path + body)
    .digest('hex');

  const authorization = [
    `apiKey:${credentials.apiKey}`,
    `randomKey:${randomKey}`,
    `signature:${signature}`,
  ].join('&');

  return {
    Authorization: `IYZWSv2 ${Buffer.from(authorization).toString('base64')}`,
    [IYZIPAY_RANDOM_HEADER]: randomKey,
  };
};
