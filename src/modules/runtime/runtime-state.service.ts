import { Inject, Injectable, Logger } from '@nestjs/common';
import { MOCK_SETTINGS, MockSettings } from '../../config/mock-settings';
import { FakeContentProducer } from '../content/fake-content.producer';
import { SeededRandom } from '../content/seeded-random';
import { FaultKind, RANDOM_FAULTS } from './interfaces/runtime.interfaces';

/**
 * Process-wide mock state: the request counter, the shared generator and
 * the fault decision. Each method touching shared state runs to completion
 * without awaiting, so concurrent requests cannot interleave inside it.
 */
@Injectable()
export class RuntimeStateService {
  private readonly logger = new Logger(RuntimeStateService.name);
  private readonly random: SeededRandom;
  private requestCount = 0;

  constructor(@Inject(MOCK_SETTINGS) readonly settings: MockSettings) {
    const seed = settings.content.deterministic
      ? settings.content.seed
      : SeededRandom.entropySeed();
    this.random = new SeededRandom(seed);

    if (settings.content.deterministic) {
      this.logger.log(`Deterministic content enabled (seed ${seed})`);
    }
  }

  /**
   * Count a request and return the new total
   */
  incrementRequests(): number {
    this.requestCount += 1;
    return this.requestCount;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  /**
   * Decide whether the request with the given count gets a fault.
   * Forced fault, then the request threshold, then the random rate.
   */
  decideFault(requestCount: number): FaultKind | null {
    const { errors, rateLimit } = this.settings;

    if (errors.forceError !== 'none') {
      return errors.forceError;
    }

    if (
      rateLimit.failAfterRequests > 0 &&
      requestCount >= rateLimit.failAfterRequests
    ) {
      return 'rate_limit';
    }

    if (errors.errorRate > 0 && this.random.next() < errors.errorRate) {
      return this.random.pick(RANDOM_FAULTS);
    }

    return null;
  }

  /**
   * Always true when auth is not required
   */
  isValidKey(key: string | undefined): boolean {
    if (!this.settings.auth.requireAuth) {
      return true;
    }
    return key !== undefined && this.settings.auth.validKeys.includes(key);
  }

  latencyMs(): number {
    return this.settings.server.latencyMs;
  }

  /**
   * Producer for one request, seeded from the shared generator
   */
  createProducer(): FakeContentProducer {
    return new FakeContentProducer(this.random.nextUint32());
  }
}
