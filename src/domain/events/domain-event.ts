/**
 * A fact recorded by an entity. Events are produced, not delivered:
 * dispatch belongs to whoever pulls them from the entity.
 */
export interface DomainEvent {
  readonly eventName: string;
  readonly occurredAt: Date;
}
