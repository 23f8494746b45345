import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger';
import type { TransitionEvent, TransitionKind, TransitionListener } from './types';

export const TRANSITION_KINDS: readonly TransitionKind[] = [
  'submitted',
  'dispatched',
  'succeeded',
  'retrying',
  'failed',
  'cancelled',
  'recovered',
];

type BusEvents = { [K in TransitionKind]: [event: TransitionEvent] };

export type Unsubscribe = () => void;

/**
 * Fan-out of item transitions.
 *
 * publish() returns before any listener runs. Each listener is invoked on its
 * own microtask; a throw or rejection is logged and goes no further.
 */
export class EventBus {
  private readonly emitter = new EventEmitter<BusEvents>();
  private readonly logger: Logger;
  private readonly inFlight = new Set<Promise<void>>();
  private failures = 0;

  constructor() {
    this.logger = createLogger('event-bus');
  }

  subscribe(kinds: TransitionKind | readonly TransitionKind[] | '*', listener: TransitionListener): Unsubscribe {
    const selected = kinds === '*' ? TRANSITION_KINDS : typeof kinds === 'string' ? [kinds] : kinds;
    const handler = (event: TransitionEvent): void => this.deliver(listener, event);

    for (const kind of selected) {
      this.emitter.on(kind, handler);
    }

    return () => {
      for (const kind of selected) {
        this.emitter.off(kind, handler);
      }
    };
  }

  publish(event: TransitionEvent): void {
    this.emitter.emit(event.kind, event);
  }

  /** Listener invocations that threw or rejected since construction. */
  get deliveryFailures(): number {
    return this.failures;
  }

  /**
   * Resolves once every delivery started so far has settled.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private deliver(listener: TransitionListener, event: TransitionEvent): void {
    const delivery = Promise.resolve()
      .then(() => listener(event))
      .then(
        () => undefined,
        (err: unknown) => {
          this.failures++;
          this.logger.error({ err, itemId: event.itemId, kind: event.kind }, 'Transition listener failed');
        }
      )
      .finally(() => {
        this.inFlight.delete(delivery);
      });

    this.inFlight.add(delivery);
  }
}
