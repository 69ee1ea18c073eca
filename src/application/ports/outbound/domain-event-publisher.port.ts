import { DomainEvent } from '@domain/events';

export interface IDomainEventPublisherPort {
  /**
   * Hands recorded events to whatever delivers them, in the order given.
   * Called after the entity that recorded them has been saved.
   */
  publish(events: readonly DomainEvent[]): Promise<void>;
}
