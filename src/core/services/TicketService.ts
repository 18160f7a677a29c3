import { ITicketGateway } from '../repositories/ITicketGateway.js';
import { ILogger } from '../repositories/ILogger.js';
import { Ticket } from '../entities/Ticket.js';
import { TicketCommand } from '../entities/TicketCommand.js';
import { TicketEffect, TicketEffectType } from '../entities/TicketEffect.js';
import { Result, ok, err } from '../entities/Result.js';
import { TicketError } from '../errors/TicketError.js';
import { SequenceAllocator } from './SequenceAllocator.js';
import { TicketStateMachine, Transition } from './TicketStateMachine.js';
import { TranscriptComposer } from './TranscriptComposer.js';
import { TicketLock } from './TicketLock.js';
import { DeletionCountdown } from './DeletionCountdown.js';
import { CategoryCatalog } from './CategoryCatalog.js';

/**
 * Effects whose failure is logged and otherwise ignored.
 * Everything else aborts the workflow and is reported to the actor.
 */
const NON_CRITICAL_EFFECTS: ReadonlySet<TicketEffectType> = new Set<TicketEffectType>([
  'announce',
  'remove_admin_panel'
]);

export interface CommandHooks {
  /** Called when the deletion window opens, before the transcript is archived */
  onDeletionScheduled?(delayMs: number): Promise<void>;
}

/**
 * Ticket Service - Workflow Layer
 * Runs commands through the state machine under a per-ticket lock and
 * executes the resulting effects through the gateway.
 */
export class TicketService {
  constructor(
    private readonly gateway: ITicketGateway,
    private readonly allocator: SequenceAllocator,
    private readonly machine: TicketStateMachine,
    private readonly catalog: CategoryCatalog,
    private readonly composer: TranscriptComposer,
    private readonly lock: TicketLock,
    private readonly countdown: DeletionCountdown,
    private readonly logger: ILogger
  ) {}

  /**
   * Allocate a number, create the channel and post the ticket message.
   * No channel is created when allocation fails, and a channel whose setup
   * fails is deleted again. The sequence number stays used.
   */
  async createTicket(category: string, requesterId: string): Promise<Result<Ticket, TicketError>> {
    if (!this.catalog.isValid(category)) {
      return err(TicketError.precondition(`Unknown ticket category: ${category}`, { category, actorId: requesterId }));
    }

    const allocation = await this.allocator.allocate(category);
    if (!allocation.ok) return allocation;

    const opening = this.machine.open({ category, sequenceNumber: allocation.value, requesterId });
    if (!opening.ok) return opening;

    const [create, ...rest] = opening.value.effects;
    if (create.type !== 'create_channel') {
      return err(TicketError.transport('Ticket opening did not start with channel creation', { category }));
    }

    let channelId: string;
    try {
      channelId = await this.gateway.createChannel(create);
    } catch (error) {
      return err(TicketError.transport(
        'Failed to create the ticket channel.',
        { category, actorId: requesterId, sequenceNumber: allocation.value },
        error
      ));
    }

    const ticket: Ticket = { ...opening.value.draft, id: channelId };
    this.logger.info('Ticket channel created', { ticketId: channelId, category, sequenceNumber: ticket.sequenceNumber, ownerId: requesterId });

    const setup = await this.runEffects(ticket, rest, {});
    if (!setup.ok) {
      await this.rollBackChannel(ticket);
      return setup;
    }

    return ok(ticket);
  }

  /**
   * Apply a command to the ticket backed by the given channel
   */
  async handle(channelId: string, command: TicketCommand, hooks: CommandHooks = {}): Promise<Result<Transition, TicketError>> {
    return this.lock.runExclusive(channelId, async () => {
      const loaded = await this.loadTicket(channelId, command.actor.id);
      if (!loaded.ok) return loaded;

      const transition = this.machine.apply(loaded.value, command);
      if (!transition.ok) return transition;

      const applied = await this.runEffects(transition.value.ticket, transition.value.effects, hooks);
      if (!applied.ok) return applied;

      if (applied.value === 'deletion_cancelled') {
        return ok({ ticket: loaded.value, effects: transition.value.effects, noop: 'deletion_cancelled' as const });
      }

      this.logger.info(`Ticket command applied: ${command.type}`, {
        ticketId: channelId,
        actorId: command.actor.id,
        state: transition.value.ticket.state
      });
      return ok(transition.value);
    });
  }

  /**
   * Whether the member can see the ticket channel (transfer guard input)
   */
  async canView(channelId: string, memberId: string): Promise<Result<boolean, TicketError>> {
    try {
      return ok(await this.gateway.canView(channelId, memberId));
    } catch (error) {
      return err(TicketError.transport('Failed to check the target member\'s channel permissions.', { ticketId: channelId, targetId: memberId }, error));
    }
  }

  /**
   * Stop a pending deletion. Not serialized with the ticket lock, since the
   * deleting command holds it for the whole window.
   */
  cancelDeletion(channelId: string): boolean {
    return this.countdown.cancel(channelId);
  }

  private async loadTicket(channelId: string, actorId: string): Promise<Result<Ticket, TicketError>> {
    let ticket: Ticket | null;
    try {
      ticket = await this.gateway.loadTicket(channelId);
    } catch (error) {
      return err(TicketError.transport('Failed to read ticket information.', { ticketId: channelId, actorId }, error));
    }

    if (!ticket) {
      return err(TicketError.notFound('This command can only be used inside a ticket channel.', { ticketId: channelId, actorId }));
    }
    return ok(ticket);
  }

  private async runEffects(
    ticket: Ticket,
    effects: readonly TicketEffect[],
    hooks: CommandHooks
  ): Promise<Result<'done' | 'deletion_cancelled', TicketError>> {
    for (const effect of effects) {
      switch (effect.type) {
        case 'archive_transcript': {
          // A cancelled deletion leaves no transcript in the log channel
          if (!(await this.awaitGrace(ticket, hooks))) return ok('deletion_cancelled');
          const archived = await this.archiveTranscript(ticket);
          if (!archived.ok) return archived;
          break;
        }
        default: {
          const executed = await this.execute(ticket, effect);
          if (!executed.ok) return executed;
        }
      }
    }
    return ok('done');
  }

  private async execute(ticket: Ticket, effect: TicketEffect): Promise<Result<void, TicketError>> {
    try {
      await this.gateway.execute(ticket, effect);
      return ok(undefined);
    } catch (error) {
      const context = { ticketId: ticket.id, category: ticket.category, effect: effect.type };
      if (NON_CRITICAL_EFFECTS.has(effect.type)) {
        this.logger.warn('Non-critical ticket effect failed', { ...context, error: this.describe(error) });
        return ok(undefined);
      }
      return err(TicketError.transport(`Failed to update the ticket channel (${effect.type}).`, context, error));
    }
  }

  /**
   * Deletion is gated on this: a transcript that cannot be composed or
   * delivered keeps the channel.
   */
  private async archiveTranscript(ticket: Ticket): Promise<Result<void, TicketError>> {
    try {
      const history = await this.gateway.fetchHistory(ticket.id);
      const transcript = await this.composer.compose(history.channel, history.messages);
      await this.gateway.deliverTranscript(ticket, transcript);
      this.logger.info('Transcript archived', { ticketId: ticket.id, fileName: transcript.fileName, messages: transcript.messageCount });
      return ok(undefined);
    } catch (error) {
      return err(TicketError.transport(
        'The transcript could not be archived, so the channel was kept.',
        { ticketId: ticket.id, category: ticket.category },
        error
      ));
    }
  }

  /**
   * Open the cancellable deletion window.
   * Resolves false when the deletion was cancelled.
   */
  private async awaitGrace(ticket: Ticket, hooks: CommandHooks): Promise<boolean> {
    const elapsed = this.countdown.wait(ticket.id);
    if (hooks.onDeletionScheduled) {
      try {
        await hooks.onDeletionScheduled(this.countdown.delayMs);
      } catch (error) {
        this.logger.warn('Could not announce deletion countdown', { ticketId: ticket.id, error: this.describe(error) });
      }
    }

    if (!(await elapsed)) {
      this.logger.info('Ticket deletion cancelled', { ticketId: ticket.id });
      return false;
    }
    return true;
  }

  private async rollBackChannel(ticket: Ticket): Promise<void> {
    try {
      await this.gateway.execute(ticket, { type: 'delete_channel' });
      this.logger.info('Incomplete ticket channel removed', { ticketId: ticket.id, category: ticket.category });
    } catch (error) {
      this.logger.error('Could not remove incomplete ticket channel', { ticketId: ticket.id, error: this.describe(error) });
    }
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
