import {
  BaseMessageOptions,
  ButtonInteraction,
  ChatInputCommandInteraction,
  Interaction,
  StringSelectMenuInteraction
} from 'discord.js';

import { TicketHandlers, Reply } from '../../application/handlers/TicketHandlers.js';
import { ILogger } from '../../core/repositories/ILogger.js';
import { SubjectKind } from '../../core/entities/Ticket.js';
import { InboundEventType } from '../../schemas/index.js';
import { CommandName, ControlId } from '../../constants.js';
import { MessageFactory } from './MessageFactory.js';

/**
 * How the interaction is acknowledged before the handler runs:
 * a private reply, a reply everyone in the channel sees, or an edit of
 * the message that carries the control.
 */
export type AckMode = 'ephemeral' | 'public' | 'update';

/**
 * Interaction data every route may draw on
 */
export interface RouteContext {
  readonly actor: { readonly id: string; readonly roleIds: readonly string[] };
  readonly channelId: string;
  /** Selected values of a select menu */
  readonly values: readonly string[];
  /** Id held by a user or role option */
  option(name: string): string | undefined;
}

export type RawEvent = { readonly type: InboundEventType } & Readonly<Record<string, unknown>>;

export interface Route {
  readonly ack: AckMode;
  build(context: RouteContext): RawEvent;
}

type RoutedInteraction = ChatInputCommandInteraction | ButtonInteraction | StringSelectMenuInteraction;

/**
 * The response calls shared by commands and components
 */
interface Respondable {
  reply(options: { content: string; ephemeral: boolean }): Promise<unknown>;
  deferReply(options: { ephemeral: boolean }): Promise<unknown>;
  editReply(options: BaseMessageOptions): Promise<unknown>;
}

const ticketEvent = (type: InboundEventType) => (context: RouteContext): RawEvent => ({
  type,
  ticketId: context.channelId,
  actor: context.actor
});

const participantEvent = (type: 'add_participant' | 'remove_participant', optionName: string, subjectKind: SubjectKind) =>
  (context: RouteContext): RawEvent => ({
    type,
    ticketId: context.channelId,
    actor: context.actor,
    subjectId: context.option(optionName),
    subjectKind
  });

/**
 * The routing table: control ids and command names to inbound events
 */
export const ROUTES: ReadonlyMap<string, Route> = new Map<string, Route>([
  // Components
  [ControlId.TOPIC_SELECT, {
    ack: 'ephemeral',
    build: context => ({ type: 'create_ticket', category: context.values[0], requesterId: context.actor.id })
  }],
  [ControlId.CLOSE_REQUEST, { ack: 'ephemeral', build: ticketEvent('request_close') }],
  [ControlId.CONFIRM_CLOSE, { ack: 'update', build: ticketEvent('confirm_close') }],
  [ControlId.CANCEL_CLOSE, { ack: 'update', build: ticketEvent('cancel_close') }],
  [ControlId.CLAIM, { ack: 'ephemeral', build: ticketEvent('claim_ticket') }],
  [ControlId.REOPEN, { ack: 'ephemeral', build: ticketEvent('reopen_ticket') }],
  [ControlId.DELETE, { ack: 'public', build: ticketEvent('delete_ticket') }],
  [ControlId.CANCEL_DELETION, { ack: 'ephemeral', build: ticketEvent('cancel_deletion') }],

  // Slash commands
  [CommandName.PANEL, {
    ack: 'public',
    build: context => ({ type: 'send_panel', channelId: context.channelId, actor: context.actor })
  }],
  [CommandName.CLOSE, { ack: 'ephemeral', build: ticketEvent('request_close') }],
  [CommandName.ADD, { ack: 'ephemeral', build: participantEvent('add_participant', 'user', SubjectKind.MEMBER) }],
  [CommandName.REMOVE, { ack: 'ephemeral', build: participantEvent('remove_participant', 'user', SubjectKind.MEMBER) }],
  [CommandName.ADD_ROLE, { ack: 'ephemeral', build: participantEvent('add_participant', 'role', SubjectKind.ROLE) }],
  [CommandName.REMOVE_ROLE, { ack: 'ephemeral', build: participantEvent('remove_participant', 'role', SubjectKind.ROLE) }],
  [CommandName.ASSIGN, {
    ack: 'ephemeral',
    build: context => ({
      type: 'transfer_assignee',
      ticketId: context.channelId,
      actor: context.actor,
      targetId: context.option('user')
    })
  }]
]);

/**
 * Interaction Router
 * Acknowledges interactions, hands the built event to the handlers and
 * renders their replies. Unknown ids are ignored.
 */
export class InteractionRouter {
  constructor(
    private readonly handlers: TicketHandlers,
    private readonly messages: MessageFactory,
    private readonly logger: ILogger,
    private readonly routes: ReadonlyMap<string, Route> = ROUTES
  ) {}

  async handle(interaction: Interaction): Promise<void> {
    let routed: RoutedInteraction;
    let key: string;

    if (interaction.isChatInputCommand()) {
      routed = interaction;
      key = interaction.commandName;
    } else if (interaction.isButton() || interaction.isStringSelectMenu()) {
      routed = interaction;
      key = interaction.customId;
    } else {
      return;
    }

    const route = this.routes.get(key);
    if (!route) {
      this.logger.debug(`No route for interaction ${key}`);
      return;
    }

    const responder: Respondable = routed;
    try {
      if (!routed.guildId) {
        await responder.reply({ content: 'Tickets can only be used inside the server.', ephemeral: true });
        return;
      }

      await this.acknowledge(routed, responder, route.ack);
      const event = route.build(this.contextOf(routed));
      const reply = await this.handlers.dispatch(event, progress => this.render(responder, progress));
      if (reply) {
        await this.render(responder, reply);
      }
    } catch (error) {
      this.logger.error(`Failed to answer interaction ${key}`, { channelId: routed.channelId, userId: routed.user.id, error });
    }
  }

  private async acknowledge(interaction: RoutedInteraction, responder: Respondable, ack: AckMode): Promise<void> {
    if (ack === 'update' && (interaction.isButton() || interaction.isStringSelectMenu())) {
      await interaction.deferUpdate();
      return;
    }
    await responder.deferReply({ ephemeral: ack !== 'public' });
  }

  private async render(responder: Respondable, reply: Reply): Promise<void> {
    await responder.editReply(this.messages.reply(reply));
  }

  private contextOf(interaction: RoutedInteraction): RouteContext {
    const member = interaction.member;
    const roleIds = !member ? [] : Array.isArray(member.roles) ? member.roles : [...member.roles.cache.keys()];

    return {
      actor: { id: interaction.user.id, roleIds },
      channelId: interaction.channelId ?? '',
      values: interaction.isStringSelectMenu() ? interaction.values : [],
      option: name => {
        if (!interaction.isChatInputCommand()) return undefined;
        const value = interaction.options.get(name)?.value;
        return typeof value === 'string' ? value : undefined;
      }
    };
  }
}
