/**
 * Ticket Entity - Domain Model
 *
 * A ticket has no record of its own outside the chat platform: every field
 * below is read back from the backing channel (topic, parent area,
 * permission overwrites and the ticket message).
 */
export interface Ticket {
  /** Backing channel id */
  readonly id: string;
  readonly category: string;
  readonly sequenceNumber: number;
  readonly ownerId: string;
  readonly assigneeId?: string;
  readonly state: TicketState;
  readonly participants: readonly Participant[];
  /** Whether the claim control on the ticket message is still active */
  readonly claimEnabled: boolean;
}

/**
 * Ticket before its channel exists (no id yet)
 */
export type TicketDraft = Omit<Ticket, 'id'>;

export enum TicketState {
  OPEN = 'open',
  PENDING_CLOSE = 'pending_close',
  CLOSED = 'closed',
  DELETED = 'deleted'
}

export enum SubjectKind {
  MEMBER = 'member',
  ROLE = 'role'
}

/**
 * A user or role with explicit visibility on the ticket channel
 */
export interface Participant {
  readonly id: string;
  readonly kind: SubjectKind;
}

/**
 * Visibility grant for one subject on the ticket channel
 */
export interface PermissionGrant {
  readonly subjectId: string;
  readonly kind: SubjectKind;
  readonly visible: boolean;
  readonly canSend: boolean;
}

/**
 * Acting user with the role ids they hold
 */
export interface Actor {
  readonly id: string;
  readonly roleIds: readonly string[];
}

/**
 * Parent area a ticket channel lives in
 */
export type ChannelArea = 'open' | 'closed';
