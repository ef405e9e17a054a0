/**
 * Barrel export for payment domain models
 */

export * from './card.model';
export * from './metadata.model';
export * from './payment-request.model';
export * from './payment.model';
export * from './result.model';
export * from './transaction.model';
