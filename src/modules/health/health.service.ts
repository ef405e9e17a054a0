import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { CircuitBreakerService } from '../../core/circuit-breaker/circuit-breaker.service';
import { IYZIPAY_CIRCUIT_BREAKER } from '../iyzipay/adapters/iyzipay-api-client.service';

@Injectable()
export class HealthService extends HealthIndicator {
  constructor(private readonly circuitBreakerService: CircuitBreakerService) {
    super();
  }

  /**
   * The gateway is considered healthy unless its breaker is open.
   * A breaker that has not been created yet means no call was made.
   */
  async checkIyzipayApi(): Promise<HealthIndicatorResult> {
    const state = this.circuitBreakerService.getCircuitBreakerState(
      IYZIPAY_CIRCUIT_BREAKER,
    );
    if (!state) {
      return this.getStatus(IYZIPAY_CIRCUIT_BREAKER, true, {
        message: 'Circuit breaker not initialized',
      });
    }

    const isHealthy = state.state !== 'open';

    return this.getStatus(IYZIPAY_CIRCUIT_BREAKER, isHealthy, {
      state: state.state,
      enabled: state.enabled,
      failures: state.stats.failures,
      fires: state.stats.fires,
    });
  }

  async checkCircuitBreakers(): Promise<HealthIndicatorResult> {
    const allBreakers = this.circuitBreakerService.getAllCircuitBreakersState();
    const openBreakers = Object.entries(allBreakers).filter(
      ([, state]) => state.state === 'open',
    );

    const isHealthy = openBreakers.length === 0;

    return this.getStatus('circuit-breakers', isHealthy, {
      total: Object.keys(allBreakers).length,
      open: openBreakers.map(([name]) => name),
      message: isHealthy
        ? 'All circuit breakers closed'
        : `${openBreakers.length} circuit breaker(s) open`,
    });
  }
}
