import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { logger } from '../logger/logger.config';

export interface CircuitBreakerOptions {
  timeout?: number;
  errorThresholdPercentage?: number;
  resetTimeout?: number;
  name?: string;
}

/**
 * Members of a breaker that do not depend on its argument and result types
 */
type BreakerHandle = Pick<
  CircuitBreaker,
  'opened' | 'halfOpen' | 'enabled' | 'stats' | 'shutdown'
>;

export interface CircuitBreakerState {
  state: 'open' | 'halfOpen' | 'closed';
  enabled: boolean;
  stats: CircuitBreaker.Stats;
}

@Injectable()
export class CircuitBreakerService {
  private readonly logger = logger();
  private readonly breakers = new Map<string, BreakerHandle>();

  constructor(private readonly configService: ConfigService) {}

  createCircuitBreaker<TI extends unknown[], TR>(
    fn: (...args: TI) => Promise<TR>,
    options?: CircuitBreakerOptions,
  ): CircuitBreaker<TI, TR> {
    const name = options?.name || 'default';
    const timeout =
      options?.timeout ||
      this.configService.get<number>('CIRCUIT_BREAKER_TIMEOUT', 15000);
    const errorThresholdPercentage =
      options?.errorThresholdPercentage ||
      this.configService.get<number>('CIRCUIT_BREAKER_ERROR_THRESHOLD', 50);
    const resetTimeout =
      options?.resetTimeout ||
      this.configService.get<number>('CIRCUIT_BREAKER_RESET_TIMEOUT', 30000);

    const breaker = new CircuitBreaker<TI, TR>(fn, {
      timeout: Number(timeout),
      errorThresholdPercentage: Number(errorThresholdPercentage),
      resetTimeout: Number(resetTimeout),
      name,
    });

    breaker.on('open', () => {
      this.logger.warn(
        { circuitBreaker: name, state: 'open' },
        'Circuit breaker opened',
      );
    });

    breaker.on('halfOpen', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'halfOpen' },
        'Circuit breaker half-open',
      );
    });

    breaker.on('close', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'close' },
        'Circuit breaker closed',
      );
    });

    breaker.on('failure', (error: Error) => {
      this.logger.error(
        { circuitBreaker: name, error: error.message },
        'Circuit breaker failure',
      );
    });

    this.breakers.set(name, breaker);
    return breaker;
  }

  getCircuitBreakerState(name: string): CircuitBreakerState | null {
    const breaker = this.breakers.get(name);
    if (!breaker) return null;

    return this.describe(breaker);
  }

  getAllCircuitBreakersState(): Record<string, CircuitBreakerState> {
    const states: Record<string, CircuitBreakerState> = {};
    this.breakers.forEach((breaker, name) => {
      states[name] = this.describe(breaker);
    });
    return states;
  }

  /**
   * Stop every breaker's stats timers; used on application shutdown
   */
  shutdown(): void {
    this.breakers.forEach((breaker) => breaker.shutdown());
    this.breakers.clear();
  }

  private describe(breaker: BreakerHandle): CircuitBreakerState {
    let state: CircuitBreakerState['state'] = 'closed';
    if (breaker.opened) {
      state = 'open';
    } else if (breaker.halfOpen) {
      state = 'halfOpen';
    }

    return {
      state,
      enabled: breaker.enabled,
      stats: breaker.stats,
    };
  }
}
