import { Injectable } from '@nestjs/common';
import { logger } from '../logger/logger.config';

/**
 * Shape checks on payloads received from third parties
 */
@Injectable()
export class PayloadValidatorService {
  private readonly logger = logger();

  isObject(payload: unknown): payload is Record<string, unknown> {
    return (
      payload !== null && typeof payload === 'object' && !Array.isArray(payload)
    );
  }

  /**
   * An envelope is an object carrying a string `status`
   */
  isValidEnvelope(
    payload: unknown,
  ): payload is Record<string, unknown> & { status: string } {
    if (!this.isObject(payload) || typeof payload.status !== 'string') {
      this.logger.warn(
        { payloadType: Array.isArray(payload) ? 'array' : typeof payload },
        'Invalid payload structure',
      );
      return false;
    }

    return true;
  }
}
