export * from './payment-processing.error';
