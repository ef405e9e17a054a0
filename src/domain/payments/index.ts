/**
 * Payment domain: models, gateway contract, errors and the iyzipay mapper
 */

export * from './errors';
export * from './interfaces';
export * from './mappers/iyzipay-mapper';
export * from './models';
