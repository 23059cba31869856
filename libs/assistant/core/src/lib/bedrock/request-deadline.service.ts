import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { assistantConfig, AssistantConfig } from '@kb-chat/assistant/config';
import { ExternalServiceError } from '../errors';

export enum AbortReason {
  TIMEOUT = 'timeout',
  SHUTDOWN = 'shutdown',
}

/**
 * Runs Bedrock calls under a deadline and cancels whatever is still in flight
 * when the application shuts down.
 */
@Injectable()
export class RequestDeadlineService implements OnApplicationShutdown {
  private readonly logger = new Logger(RequestDeadlineService.name);
  private readonly inFlight = new Set<AbortController>();

  constructor(
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig
  ) {}

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Every failure, including the deadline, surfaces as ExternalServiceError.
   */
  async run<T>(
    operation: string,
    task: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutMs = this.config.requestTimeoutMs;
    const timer = setTimeout(
      () => controller.abort(AbortReason.TIMEOUT),
      timeoutMs
    );
    this.inFlight.add(controller);

    // The SDK honours the signal, but the deadline must hold even if it does not
    const aborted = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(new Error(`${operation} aborted`)),
        { once: true }
      );
    });

    try {
      return await Promise.race([task(controller.signal), aborted]);
    } catch (error) {
      if (controller.signal.aborted) {
        if (controller.signal.reason === AbortReason.SHUTDOWN) {
          throw new ExternalServiceError(
            'cancelled',
            operation,
            'cancelled by application shutdown',
            { cause: error }
          );
        }
        throw new ExternalServiceError(
          'timeout',
          operation,
          `no response within ${timeoutMs} ms`,
          { cause: error }
        );
      }
      throw ExternalServiceError.fromUnknown(operation, error);
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }

  onApplicationShutdown(signal?: string): void {
    if (this.inFlight.size === 0) {
      return;
    }

    this.logger.warn(
      `Cancelling ${this.inFlight.size} in-flight Bedrock request(s)` +
        (signal ? ` on ${signal}` : '')
    );
    for (const controller of this.inFlight) {
      controller.abort(AbortReason.SHUTDOWN);
    }
    this.inFlight.clear();
  }
}
