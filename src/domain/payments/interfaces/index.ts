/**
 * Barrel export for payment domain interfaces
 */

export * from './iyzipay-payload.interface';
export * from './payment-gateway.interface';
