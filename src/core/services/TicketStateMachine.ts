import { Actor, Ticket, TicketDraft, TicketState } from '../entities/Ticket.js';
import { TicketCommand } from '../entities/TicketCommand.js';
import { TicketEffect } from '../entities/TicketEffect.js';
import { Result, ok, err } from '../entities/Result.js';
import { TicketError } from '../errors/TicketError.js';
import { CategoryCatalog } from './CategoryCatalog.js';
import { PermissionMapper } from './PermissionMapper.js';
import { TicketStateCodec } from './TicketStateCodec.js';

/**
 * Accepted command: the resulting ticket and the effects that realise it
 */
export interface Transition {
  readonly ticket: Ticket;
  readonly effects: readonly TicketEffect[];
  /** Set when the command was accepted but nothing had to change */
  readonly noop?: 'already_added' | 'not_found' | 'deletion_cancelled';
}

export interface OpenRequest {
  readonly category: string;
  readonly sequenceNumber: number;
  readonly requesterId: string;
}

export interface Opening {
  readonly draft: TicketDraft;
  readonly effects: readonly TicketEffect[];
}

/**
 * Ticket State Machine
 *
 *   Open --confirm-close--> Closed --reopen--> Open
 *                           Closed --delete--> Deleted (terminal)
 *
 * PendingClose is accepted wherever Open is for the close flow, so a
 * transport that persists the confirmation step can represent it.
 * Pure: validates a command against a ticket snapshot and describes effects,
 * never performs them.
 */
export class TicketStateMachine {
  constructor(
    private readonly catalog: CategoryCatalog,
    private readonly permissions: PermissionMapper,
    private readonly everyoneId: string
  ) {}

  /**
   * Build a new ticket for an already allocated sequence number
   */
  open(request: OpenRequest): Result<Opening, TicketError> {
    if (!this.catalog.isValid(request.category)) {
      return err(TicketError.precondition(
        `Unknown ticket category: ${request.category}`,
        { category: request.category, actorId: request.requesterId }
      ));
    }

    const supportRoleId = this.catalog.resolveSupportRole(request.category);
    const draft: TicketDraft = {
      category: request.category,
      sequenceNumber: request.sequenceNumber,
      ownerId: request.requesterId,
      state: TicketState.OPEN,
      participants: [],
      claimEnabled: true
    };

    const grants = this.permissions.derive({
      state: draft.state,
      ownerId: draft.ownerId,
      supportRoleId,
      participants: draft.participants,
      everyoneId: this.everyoneId
    });

    return ok({
      draft,
      effects: [
        {
          type: 'create_channel',
          name: TicketStateCodec.encodeTicketName(draft),
          topic: TicketStateCodec.encodeTopic(draft),
          area: 'open',
          grants
        },
        { type: 'post_ticket_message', supportRoleId }
      ]
    });
  }

  /**
   * Validate a command against the current ticket and compute the transition
   */
  apply(ticket: Ticket, command: TicketCommand): Result<Transition, TicketError> {
    if (ticket.state === TicketState.DELETED) {
      return err(this.precondition(ticket, command.actor, 'This ticket has been deleted.'));
    }

    switch (command.type) {
      case 'request_close':
        return this.requestClose(ticket, command.actor);
      case 'confirm_close':
        return this.confirmClose(ticket, command.actor);
      case 'cancel_close':
        return this.cancelClose(ticket, command.actor);
      case 'claim':
        return this.claim(ticket, command.actor);
      case 'transfer':
        return this.transfer(ticket, command.actor, command.targetId, command.targetCanView);
      case 'reopen':
        return this.reopen(ticket, command.actor);
      case 'delete':
        return this.delete(ticket, command.actor);
      case 'add_participant':
        return this.addParticipant(ticket, command);
      case 'remove_participant':
        return this.removeParticipant(ticket, command);
    }
  }

  private requestClose(ticket: Ticket, actor: Actor): Result<Transition, TicketError> {
    if (ticket.state === TicketState.CLOSED) {
      return err(this.precondition(ticket, actor, 'This ticket is already closed.'));
    }
    // The confirmation prompt is a reply to the actor, not a ticket change
    return ok({ ticket, effects: [] });
  }

  private confirmClose(ticket: Ticket, actor: Actor): Result<Transition, TicketError> {
    if (!this.isOpenLike(ticket.state)) {
      return err(this.precondition(ticket, actor, 'This ticket is already closed.'));
    }

    const closed: Ticket = { ...ticket, state: TicketState.CLOSED };
    return ok({
      ticket: closed,
      effects: [
        { type: 'set_permission', grant: this.permissions.ownerGrant(ticket.ownerId, closed.state) },
        { type: 'relocate', area: 'closed' },
        { type: 'post_admin_panel', closedBy: actor.id }
      ]
    });
  }

  private cancelClose(ticket: Ticket, actor: Actor): Result<Transition, TicketError> {
    if (!this.isOpenLike(ticket.state)) {
      return err(this.precondition(ticket, actor, 'The ticket has already been closed; it can only be reopened by staff.'));
    }
    return ok({ ticket: { ...ticket, state: TicketState.OPEN }, effects: [] });
  }

  private claim(ticket: Ticket, actor: Actor): Result<Transition, TicketError> {
    if (!this.catalog.isSupport(actor)) {
      return err(this.denied(ticket, actor, 'You do not have a support role.'));
    }
    if (ticket.assigneeId) {
      return err(this.precondition(ticket, actor, 'This ticket already has an assignee.'));
    }
    if (ticket.state !== TicketState.OPEN) {
      return err(this.precondition(ticket, actor, 'Only open tickets can be claimed.'));
    }

    return ok({
      ticket: { ...ticket, assigneeId: actor.id, claimEnabled: false },
      effects: [
        { type: 'update_ticket_message', assigneeId: actor.id, claimEnabled: false },
        { type: 'announce', notice: { type: 'claimed', assigneeId: actor.id } }
      ]
    });
  }

  private transfer(ticket: Ticket, actor: Actor, targetId: string, targetCanView: boolean): Result<Transition, TicketError> {
    const isAssignee = ticket.assigneeId !== undefined && ticket.assigneeId === actor.id;
    if (!this.catalog.isSupport(actor) && !isAssignee) {
      return err(this.denied(ticket, actor, 'Only support staff or the current assignee can change the assignee.'));
    }
    if (!targetCanView) {
      return err(this.precondition(
        ticket,
        actor,
        `${TicketStateCodec.encodeAssignee(targetId)} cannot see this channel and cannot be made the assignee. Add them to the ticket first.`
      ));
    }

    return ok({
      ticket: { ...ticket, assigneeId: targetId, claimEnabled: false },
      effects: [
        { type: 'update_ticket_message', assigneeId: targetId, claimEnabled: false },
        {
          type: 'announce',
          notice: { type: 'assignee_changed', actorId: actor.id, previousAssigneeId: ticket.assigneeId, assigneeId: targetId }
        }
      ]
    });
  }

  private reopen(ticket: Ticket, actor: Actor): Result<Transition, TicketError> {
    if (!this.catalog.isSupport(actor)) {
      return err(this.denied(ticket, actor, 'Only support staff can reopen a ticket.'));
    }
    if (ticket.state !== TicketState.CLOSED) {
      return err(this.precondition(ticket, actor, 'This ticket is not closed.'));
    }

    const reopened: Ticket = { ...ticket, state: TicketState.OPEN };
    return ok({
      ticket: reopened,
      effects: [
        { type: 'relocate', area: 'open' },
        { type: 'set_permission', grant: this.permissions.ownerGrant(ticket.ownerId, reopened.state) },
        { type: 'remove_admin_panel' },
        { type: 'announce', notice: { type: 'reopened', actorId: actor.id, ownerId: ticket.ownerId } }
      ]
    });
  }

  private delete(ticket: Ticket, actor: Actor): Result<Transition, TicketError> {
    if (!this.catalog.isSupport(actor)) {
      return err(this.denied(ticket, actor, 'Only support staff can delete a ticket.'));
    }
    if (ticket.state !== TicketState.CLOSED) {
      return err(this.precondition(ticket, actor, 'Close the ticket before deleting it.'));
    }

    return ok({
      ticket: { ...ticket, state: TicketState.DELETED },
      effects: [{ type: 'archive_transcript' }, { type: 'delete_channel' }]
    });
  }

  private addParticipant(
    ticket: Ticket,
    command: Extract<TicketCommand, { type: 'add_participant' }>
  ): Result<Transition, TicketError> {
    const supportRoleId = this.catalog.resolveSupportRole(ticket.category);
    const plan = this.permissions.planAddition(ticket, command.subject, supportRoleId, this.everyoneId);
    if (!plan.ok) return plan;

    if (plan.value.kind === 'already_added') {
      return ok({ ticket, effects: [], noop: 'already_added' });
    }

    return ok({
      ticket: { ...ticket, participants: [...ticket.participants, command.subject] },
      effects: [
        { type: 'set_permission', grant: plan.value.grant },
        { type: 'announce', notice: { type: 'participant_added', subject: command.subject } }
      ]
    });
  }

  private removeParticipant(
    ticket: Ticket,
    command: Extract<TicketCommand, { type: 'remove_participant' }>
  ): Result<Transition, TicketError> {
    const plan = this.permissions.planRemoval(ticket, command.subject, this.catalog.supportRoleIds());
    if (!plan.ok) return plan;

    if (plan.value.kind === 'not_found') {
      return ok({ ticket, effects: [], noop: 'not_found' });
    }

    const { subject } = plan.value;
    return ok({
      ticket: {
        ...ticket,
        participants: ticket.participants.filter(p => !(p.id === subject.id && p.kind === subject.kind))
      },
      effects: [
        { type: 'remove_permission', subject },
        { type: 'announce', notice: { type: 'participant_removed', subject } }
      ]
    });
  }

  private isOpenLike(state: TicketState): boolean {
    return state === TicketState.OPEN || state === TicketState.PENDING_CLOSE;
  }

  private precondition(ticket: Ticket, actor: Actor, message: string): TicketError {
    return TicketError.precondition(message, { ticketId: ticket.id, category: ticket.category, actorId: actor.id });
  }

  private denied(ticket: Ticket, actor: Actor, message: string): TicketError {
    return TicketError.denied(message, { ticketId: ticket.id, category: ticket.category, actorId: actor.id });
  }
}
