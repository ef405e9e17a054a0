import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Injectable()
export class ProcessingLimitsService {
  constructor(private readonly configService: ConfigService) {}

  /**
   * Timeout of a single HTTP call to the gateway
   */
  getApiCallTimeout(): number {
    return Number(this.configService.get<number>('API_CALL_TIMEOUT', 10000));
  }

  /**
   * Breaker timeout; must exceed the HTTP timeout so the HTTP error wins
   */
  getCircuitBreakerTimeout(): number {
    return Number(
      this.configService.get<number>('CIRCUIT_BREAKER_TIMEOUT', 15000),
    );
  }
}
