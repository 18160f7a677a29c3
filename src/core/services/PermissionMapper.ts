import { Participant, PermissionGrant, SubjectKind, Ticket, TicketState } from '../entities/Ticket.js';
import { Result, ok, err } from '../entities/Result.js';
import { TicketError } from '../errors/TicketError.js';

export interface PermissionContext {
  readonly state: TicketState;
  readonly ownerId: string;
  readonly supportRoleId: string;
  readonly participants: readonly Participant[];
  /** The guild-wide "everyone" role */
  readonly everyoneId: string;
}

export type ParticipantAddition =
  | { readonly kind: 'grant'; readonly grant: PermissionGrant }
  | { readonly kind: 'already_added' };

export type ParticipantRemoval =
  | { readonly kind: 'revoke'; readonly subject: Participant }
  | { readonly kind: 'not_found' };

/**
 * Permission Mapper
 * Derives channel visibility grants from ticket state and participants.
 */
export class PermissionMapper {
  /**
   * Full grant set for a ticket channel.
   * Everyone is always denied, even when listed as a participant; the owner
   * loses visibility while the ticket is closed.
   */
  derive(context: PermissionContext): PermissionGrant[] {
    return [
      { subjectId: context.everyoneId, kind: SubjectKind.ROLE, visible: false, canSend: false },
      this.ownerGrant(context.ownerId, context.state),
      this.allow({ id: context.supportRoleId, kind: SubjectKind.ROLE }),
      ...context.participants
        .filter(participant => participant.id !== context.everyoneId)
        .map(participant => this.allow(participant))
    ];
  }

  ownerGrant(ownerId: string, state: TicketState): PermissionGrant {
    if (this.ownerVisible(state)) {
      return this.allow({ id: ownerId, kind: SubjectKind.MEMBER });
    }
    return { subjectId: ownerId, kind: SubjectKind.MEMBER, visible: false, canSend: false };
  }

  allow(subject: Participant): PermissionGrant {
    return { subjectId: subject.id, kind: subject.kind, visible: true, canSend: true };
  }

  /**
   * Decide how adding a subject changes the grants.
   * Subjects that can already see the channel are reported, not re-granted.
   */
  planAddition(
    ticket: Ticket,
    subject: Participant,
    supportRoleId: string,
    everyoneId: string
  ): Result<ParticipantAddition, TicketError> {
    if (subject.id === everyoneId) {
      return err(TicketError.precondition(
        'The everyone role cannot be added to a ticket.',
        { ticketId: ticket.id, subjectId: subject.id }
      ));
    }

    if (subject.kind === SubjectKind.MEMBER && subject.id === ticket.ownerId) {
      if (this.ownerVisible(ticket.state)) {
        return ok({ kind: 'already_added' });
      }
      return err(TicketError.precondition(
        'The ticket owner regains access when the ticket is reopened.',
        { ticketId: ticket.id, subjectId: subject.id }
      ));
    }

    if (subject.kind === SubjectKind.ROLE && subject.id === supportRoleId) {
      return ok({ kind: 'already_added' });
    }

    if (this.isParticipant(ticket, subject)) {
      return ok({ kind: 'already_added' });
    }

    return ok({ kind: 'grant', grant: this.allow(subject) });
  }

  /**
   * Decide how removing a subject changes the grants.
   * Protected support roles and the owner cannot be removed this way.
   */
  planRemoval(
    ticket: Ticket,
    subject: Participant,
    protectedRoleIds: ReadonlySet<string>
  ): Result<ParticipantRemoval, TicketError> {
    if (subject.kind === SubjectKind.ROLE && protectedRoleIds.has(subject.id)) {
      return err(TicketError.precondition(
        'Support roles cannot be removed from a ticket.',
        { ticketId: ticket.id, subjectId: subject.id }
      ));
    }

    if (subject.kind === SubjectKind.MEMBER && subject.id === ticket.ownerId) {
      return err(TicketError.precondition(
        'The ticket owner cannot be removed. Close the ticket instead.',
        { ticketId: ticket.id, subjectId: subject.id }
      ));
    }

    if (!this.isParticipant(ticket, subject)) {
      return ok({ kind: 'not_found' });
    }

    return ok({ kind: 'revoke', subject });
  }

  private isParticipant(ticket: Ticket, subject: Participant): boolean {
    return ticket.participants.some(p => p.id === subject.id && p.kind === subject.kind);
  }

  private ownerVisible(state: TicketState): boolean {
    return state === TicketState.OPEN || state === TicketState.PENDING_CLOSE;
  }
}
