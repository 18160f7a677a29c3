import { TicketService } from '../../core/services/TicketService.js';
import { CategoryCatalog } from '../../core/services/CategoryCatalog.js';
import { TicketStateCodec } from '../../core/services/TicketStateCodec.js';
import { TicketError, TicketErrorKind } from '../../core/errors/TicketError.js';
import { Actor, Participant, SubjectKind } from '../../core/entities/Ticket.js';
import { TicketCommand } from '../../core/entities/TicketCommand.js';
import { ILogger } from '../../core/repositories/ILogger.js';
import { InboundEvent, InboundEventSchema, formatIssues } from '../../schemas/index.js';
import { TICKET_PANEL_TITLE } from '../../constants.js';

export type ReplyTone = 'success' | 'info' | 'warning' | 'error';

/**
 * Interactive controls attached to a reply
 */
export type ReplyControls = 'ticket_panel' | 'close_confirmation' | 'deletion_countdown';

export interface Reply {
  readonly tone: ReplyTone;
  readonly title: string;
  readonly description: string;
  readonly controls?: ReplyControls;
}

/**
 * Receives interim replies while a long command is still running
 */
export type ProgressReporter = (reply: Reply) => Promise<void>;

/**
 * Ticket Handlers
 * Turns inbound events into replies for the acting user.
 *
 * This is the failure boundary: every outcome, including unexpected
 * exceptions, ends in a reply and nothing is thrown to the transport.
 * A null reply means there is nowhere left to answer (the channel is gone).
 */
export class TicketHandlers {
  constructor(
    private readonly tickets: TicketService,
    private readonly catalog: CategoryCatalog,
    private readonly logger: ILogger
  ) {}

  async dispatch(raw: unknown, progress?: ProgressReporter): Promise<Reply | null> {
    const parsed = InboundEventSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Rejected malformed event', { issues: formatIssues(parsed.error) });
      return this.failure('Invalid Request', 'This request could not be understood.');
    }

    const event = parsed.data;
    try {
      return await this.route(event, progress);
    } catch (error) {
      this.logger.error(`Unhandled error while handling ${event.type}`, { event: this.describeEvent(event), error });
      return this.failure('Something Went Wrong', 'An unexpected error occurred. Please try again later.');
    }
  }

  private async route(event: InboundEvent, progress?: ProgressReporter): Promise<Reply | null> {
    switch (event.type) {
      case 'send_panel':
        return this.handleSendPanel(event.actor);
      case 'create_ticket':
        return this.handleCreateTicket(event.category, event.requesterId);
      case 'request_close':
        return this.handleRequestClose(event.ticketId, event.actor);
      case 'confirm_close':
        return this.handleConfirmClose(event.ticketId, event.actor);
      case 'cancel_close':
        return this.handleCancelClose(event.ticketId, event.actor);
      case 'claim_ticket':
        return this.handleClaim(event.ticketId, event.actor);
      case 'transfer_assignee':
        return this.handleTransfer(event.ticketId, event.actor, event.targetId);
      case 'reopen_ticket':
        return this.handleReopen(event.ticketId, event.actor);
      case 'delete_ticket':
        return this.handleDelete(event.ticketId, event.actor, progress);
      case 'cancel_deletion':
        return this.handleCancelDeletion(event.ticketId, event.actor);
      case 'add_participant':
        return this.handleAddParticipant(event.ticketId, event.actor, { id: event.subjectId, kind: event.subjectKind });
      case 'remove_participant':
        return this.handleRemoveParticipant(event.ticketId, event.actor, { id: event.subjectId, kind: event.subjectKind });
    }
  }

  /**
   * Post the category selection panel
   */
  private handleSendPanel(actor: Actor): Reply {
    if (!this.catalog.isSupport(actor)) {
      return this.fromError(TicketError.denied('Only support staff can post the ticket panel.', { actorId: actor.id }));
    }

    return {
      tone: 'info',
      title: TICKET_PANEL_TITLE,
      description: 'Need help? Select the category that fits your request below and a private ticket channel will be opened for you.',
      controls: 'ticket_panel'
    };
  }

  private async handleCreateTicket(category: string, requesterId: string): Promise<Reply> {
    const result = await this.tickets.createTicket(category, requesterId);
    if (!result.ok) return this.fromError(result.error);

    return this.success('Ticket Created', `Your ticket has been created: <#${result.value.id}>`);
  }

  /**
   * Ask for confirmation; the ticket is not changed yet
   */
  private async handleRequestClose(ticketId: string, actor: Actor): Promise<Reply> {
    const result = await this.tickets.handle(ticketId, { type: 'request_close', actor });
    if (!result.ok) return this.fromError(result.error);

    return {
      tone: 'warning',
      title: 'Close Ticket',
      description: 'Are you sure you want to close this ticket?',
      controls: 'close_confirmation'
    };
  }

  private async handleConfirmClose(ticketId: string, actor: Actor): Promise<Reply> {
    const result = await this.tickets.handle(ticketId, { type: 'confirm_close', actor });
    if (!result.ok) return this.fromError(result.error);

    return this.success('Ticket Closed', `This ticket has been closed by <@${actor.id}>.`);
  }

  private async handleCancelClose(ticketId: string, actor: Actor): Promise<Reply> {
    const result = await this.tickets.handle(ticketId, { type: 'cancel_close', actor });
    if (!result.ok) return this.fromError(result.error);

    return { tone: 'info', title: 'Close Cancelled', description: 'The ticket stays open.' };
  }

  private async handleClaim(ticketId: string, actor: Actor): Promise<Reply> {
    const result = await this.tickets.handle(ticketId, { type: 'claim', actor });
    if (!result.ok) return this.fromError(result.error);

    return this.success('Ticket Claimed', 'You are now the assignee of this ticket.');
  }

  private async handleTransfer(ticketId: string, actor: Actor, targetId: string): Promise<Reply> {
    const visibility = await this.tickets.canView(ticketId, targetId);
    if (!visibility.ok) return this.fromError(visibility.error);

    const result = await this.tickets.handle(ticketId, {
      type: 'transfer',
      actor,
      targetId,
      targetCanView: visibility.value
    });
    if (!result.ok) return this.fromError(result.error);

    return this.success('Assignee Changed', `${TicketStateCodec.encodeAssignee(targetId)} is now the assignee of this ticket.`);
  }

  private async handleReopen(ticketId: string, actor: Actor): Promise<Reply> {
    const result = await this.tickets.handle(ticketId, { type: 'reopen', actor });
    if (!result.ok) return this.fromError(result.error);

    return this.success('Ticket Reopened', 'The ticket has been reopened and moved back to the open area.');
  }

  /**
   * Count down, archive, delete. The countdown is reported through the
   * progress reporter so the actor can still cancel it.
   */
  private async handleDelete(ticketId: string, actor: Actor, progress?: ProgressReporter): Promise<Reply | null> {
    const result = await this.tickets.handle(ticketId, { type: 'delete', actor }, {
      onDeletionScheduled: async delayMs => {
        if (!progress) return;
        await progress({
          tone: 'error',
          title: 'Deleting Ticket',
          description: `This channel will be deleted in ${Math.ceil(delayMs / 1000)} seconds, once the transcript is saved.`,
          controls: 'deletion_countdown'
        });
      }
    });
    if (!result.ok) return this.fromError(result.error);

    if (result.value.noop === 'deletion_cancelled') {
      return { tone: 'info', title: 'Deletion Cancelled', description: 'The ticket was kept and stays closed.' };
    }
    return null;
  }

  private handleCancelDeletion(ticketId: string, actor: Actor): Reply {
    if (!this.catalog.isSupport(actor)) {
      return this.fromError(TicketError.denied('Only support staff can cancel a deletion.', { ticketId, actorId: actor.id }));
    }

    if (!this.tickets.cancelDeletion(ticketId)) {
      return this.fromError(TicketError.precondition('No deletion is pending for this ticket.', { ticketId, actorId: actor.id }));
    }

    this.logger.info('Deletion cancelled by staff', { ticketId, actorId: actor.id });
    return { tone: 'info', title: 'Deletion Cancelled', description: 'You cancelled the deletion of this ticket.' };
  }

  private async handleAddParticipant(ticketId: string, actor: Actor, subject: Participant): Promise<Reply> {
    const command: TicketCommand = { type: 'add_participant', actor, subject };
    const result = await this.tickets.handle(ticketId, command);
    if (!result.ok) return this.fromError(result.error);

    if (result.value.noop === 'already_added') {
      return { tone: 'info', title: 'Already Added', description: `${mention(subject)} already has access to this ticket.` };
    }
    return this.success('Access Granted', `${mention(subject)} has been added to this ticket.`);
  }

  private async handleRemoveParticipant(ticketId: string, actor: Actor, subject: Participant): Promise<Reply> {
    const command: TicketCommand = { type: 'remove_participant', actor, subject };
    const result = await this.tickets.handle(ticketId, command);
    if (!result.ok) return this.fromError(result.error);

    if (result.value.noop === 'not_found') {
      return { tone: 'info', title: 'Not Found', description: `${mention(subject)} is not part of this ticket.` };
    }
    return this.success('Access Removed', `${mention(subject)} has been removed from this ticket.`);
  }

  /**
   * Map a workflow error to a reply and log it with its context
   */
  private fromError(error: TicketError): Reply {
    const meta = { kind: error.kind, ...error.context };

    switch (error.kind) {
      case TicketErrorKind.ALLOCATION_FAILURE:
        this.logger.error(error.message, { ...meta, cause: error.cause });
        return this.failure('Ticket Not Created', 'Your ticket could not be created right now. Please try again later.');
      case TicketErrorKind.AUTHORIZATION_DENIED:
        this.logger.info(`Denied: ${error.message}`, meta);
        return this.failure('Permission Denied', error.message);
      case TicketErrorKind.PRECONDITION_FAILED:
        this.logger.info(`Rejected: ${error.message}`, meta);
        return { tone: 'warning', title: 'Not Possible', description: error.message };
      case TicketErrorKind.STATE_NOT_FOUND:
        this.logger.info(`Rejected: ${error.message}`, meta);
        return this.failure('Not a Ticket', error.message);
      case TicketErrorKind.TRANSPORT_FAILURE:
        this.logger.error(error.message, { ...meta, cause: error.cause });
        return this.failure('Something Went Wrong', error.message);
    }
  }

  private success(title: string, description: string): Reply {
    return { tone: 'success', title, description };
  }

  private failure(title: string, description: string): Reply {
    return { tone: 'error', title, description };
  }

  private describeEvent(event: InboundEvent): Record<string, string> {
    return 'ticketId' in event
      ? { type: event.type, ticketId: event.ticketId, actorId: event.actor.id }
      : { type: event.type };
  }
}

/**
 * Chat mention for a member or role
 */
export function mention(subject: Participant): string {
  return subject.kind === SubjectKind.ROLE ? `<@&${subject.id}>` : `<@${subject.id}>`;
}
