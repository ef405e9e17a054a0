import pino from 'pino';

/**
 * Card data that must never reach the logs
 */
const REDACTED_PATHS = [
  'paymentCard.cardNumber',
  'paymentCard.cvc',
  '*.paymentCard.cardNumber',
  '*.paymentCard.cvc',
];

export const logger = () => {
  const logLevel = process.env.LOG_LEVEL || 'info';

  return pino({
    level: logLevel,
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  });
};
