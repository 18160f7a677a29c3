import {
  ChannelType,
  Client,
  Collection,
  ComponentType,
  DiscordAPIError,
  Guild,
  GuildMember,
  Message,
  OverwriteType,
  PermissionFlagsBits,
  PermissionOverwriteOptions,
  RESTJSONErrorCodes,
  TextChannel
} from 'discord.js';

import { ITicketGateway } from '../../core/repositories/ITicketGateway.js';
import { ILogger } from '../../core/repositories/ILogger.js';
import {
  ChannelArea,
  Participant,
  PermissionGrant,
  SubjectKind,
  Ticket,
  TicketState
} from '../../core/entities/Ticket.js';
import { TicketEffect } from '../../core/entities/TicketEffect.js';
import { TranscriptChannel, TranscriptDocument, TranscriptMessage } from '../../core/entities/Transcript.js';
import { CategoryCatalog } from '../../core/services/CategoryCatalog.js';
import { TicketStateCodec, ASSIGNEE_FIELD_NAME } from '../../core/services/TicketStateCodec.js';
import { MessageFactory } from './MessageFactory.js';
import { ADMIN_PANEL_TITLE, ControlId, HISTORY_PAGE_SIZE } from '../../constants.js';

export interface DiscordGatewayOptions {
  readonly guildId: string;
  readonly openParentId: string;
  readonly closedParentId: string;
  readonly logChannelId: string;
}

interface TicketMessageState {
  readonly message: Message;
  readonly assigneeId?: string;
  readonly claimEnabled: boolean;
}

/**
 * Discord Ticket Gateway
 * Reads ticket state back from channels and performs effects with discord.js.
 * Holds no ticket state of its own.
 */
export class DiscordTicketGateway implements ITicketGateway {
  constructor(
    private readonly client: Client,
    private readonly catalog: CategoryCatalog,
    private readonly messages: MessageFactory,
    private readonly options: DiscordGatewayOptions,
    private readonly logger: ILogger
  ) {}

  async loadTicket(channelId: string): Promise<Ticket | null> {
    const channel = await this.findTextChannel(channelId);
    if (!channel) return null;

    const topic = TicketStateCodec.decodeTopic(channel.topic);
    if (!topic) return null;

    const supportRoleId = this.catalog.resolveSupportRole(topic.category);
    const ticketMessage = await this.findTicketMessage(channel);

    return {
      id: channel.id,
      category: topic.category,
      sequenceNumber: topic.sequenceNumber,
      ownerId: topic.ownerId,
      assigneeId: ticketMessage?.assigneeId,
      state: channel.parentId === this.options.closedParentId ? TicketState.CLOSED : TicketState.OPEN,
      participants: this.readParticipants(channel, [channel.guild.id, topic.ownerId, supportRoleId]),
      claimEnabled: ticketMessage?.claimEnabled ?? false
    };
  }

  async canView(channelId: string, memberId: string): Promise<boolean> {
    const channel = await this.requireTextChannel(channelId);

    let member: GuildMember;
    try {
      member = await channel.guild.members.fetch(memberId);
    } catch (error) {
      if (isApiError(error, RESTJSONErrorCodes.UnknownMember) || isApiError(error, RESTJSONErrorCodes.UnknownUser)) {
        return false;
      }
      throw error;
    }

    return channel.permissionsFor(member).has(PermissionFlagsBits.ViewChannel);
  }

  async createChannel(request: {
    readonly name: string;
    readonly topic: string;
    readonly area: ChannelArea;
    readonly grants: readonly PermissionGrant[];
  }): Promise<string> {
    const guild = await this.guild();
    const botId = this.client.user?.id;

    const permissionOverwrites = request.grants.map(grant => ({
      id: grant.subjectId,
      type: grant.kind === SubjectKind.ROLE ? OverwriteType.Role : OverwriteType.Member,
      ...this.toAllowDeny(grant)
    }));

    if (botId) {
      permissionOverwrites.push({
        id: botId,
        type: OverwriteType.Member,
        allow: [PermissionFlagsBits.ViewChannel, PermissionFlagsBits.SendMessages, PermissionFlagsBits.ManageChannels],
        deny: []
      });
    }

    const channel = await guild.channels.create({
      name: request.name,
      type: ChannelType.GuildText,
      topic: request.topic,
      parent: this.parentFor(request.area),
      permissionOverwrites
    });

    return channel.id;
  }

  async execute(ticket: Ticket, effect: TicketEffect): Promise<void> {
    const channel = await this.requireTextChannel(ticket.id);

    switch (effect.type) {
      case 'post_ticket_message':
        await channel.send({
          ...this.messages.ticketGreeting(ticket.ownerId, effect.supportRoleId),
          ...this.messages.ticketMessage(ticket)
        });
        return;

      case 'set_permission':
        await channel.permissionOverwrites.edit(effect.grant.subjectId, this.toOverwriteOptions(effect.grant), {
          type: effect.grant.kind === SubjectKind.ROLE ? OverwriteType.Role : OverwriteType.Member
        });
        return;

      case 'remove_permission':
        await channel.permissionOverwrites.delete(effect.subject.id);
        return;

      case 'relocate':
        await channel.setParent(this.parentFor(effect.area), { lockPermissions: false });
        return;

      case 'update_ticket_message': {
        const state = await this.findTicketMessage(channel);
        if (!state) {
          throw new Error(`Ticket message not found in channel ${channel.id}`);
        }
        await state.message.edit(this.messages.ticketMessage({ ...ticket, assigneeId: effect.assigneeId, claimEnabled: effect.claimEnabled }));
        return;
      }

      case 'post_admin_panel':
        await channel.send(this.messages.adminPanel(effect.closedBy));
        return;

      case 'remove_admin_panel': {
        const recent = await channel.messages.fetch({ limit: 50 });
        const panels = recent.filter(message => this.isAdminPanel(message));
        for (const panel of panels.values()) {
          await panel.delete();
        }
        return;
      }

      case 'announce':
        await channel.send(this.messages.notice(effect.notice));
        return;

      case 'delete_channel':
        await channel.delete(`Ticket ${TicketStateCodec.encodeTicketName(ticket)} deleted`);
        this.logger.info('Ticket channel deleted', { ticketId: ticket.id });
        return;

      case 'create_channel':
      case 'archive_transcript':
        throw new Error(`Effect ${effect.type} is not executed per channel`);
    }
  }

  /**
   * Page backwards through the whole history, then order oldest first
   */
  async fetchHistory(channelId: string): Promise<{ channel: TranscriptChannel; messages: TranscriptMessage[] }> {
    const channel = await this.requireTextChannel(channelId);
    const byId = new Map<string, Message>();
    let before: string | undefined;

    for (;;) {
      const page: Collection<string, Message> = await channel.messages.fetch({ limit: HISTORY_PAGE_SIZE, before });
      for (const message of page.values()) {
        byId.set(message.id, message);
      }
      if (page.size < HISTORY_PAGE_SIZE) break;

      const oldest = page.last();
      if (!oldest || oldest.id === before) break;
      before = oldest.id;
    }

    const messages = [...byId.values()]
      .sort((a, b) => a.createdTimestamp - b.createdTimestamp)
      .map(message => this.toTranscriptMessage(message));

    this.logger.debug('Fetched channel history', { channelId, messages: messages.length });
    return { channel: { id: channel.id, name: channel.name }, messages };
  }

  async deliverTranscript(ticket: Ticket, transcript: TranscriptDocument): Promise<void> {
    const logChannel = await this.findTextChannel(this.options.logChannelId);
    if (!logChannel) {
      throw new Error(`Log channel ${this.options.logChannelId} is not a text channel`);
    }
    await logChannel.send(this.messages.transcriptLog(ticket, transcript));
  }

  private async guild(): Promise<Guild> {
    return this.client.guilds.cache.get(this.options.guildId) ?? this.client.guilds.fetch(this.options.guildId);
  }

  /**
   * Text channel by id, or null when it is missing or of another type
   */
  private async findTextChannel(channelId: string): Promise<TextChannel | null> {
    const guild = await this.guild();
    try {
      const channel = await guild.channels.fetch(channelId);
      return channel?.type === ChannelType.GuildText ? channel : null;
    } catch (error) {
      if (isApiError(error, RESTJSONErrorCodes.UnknownChannel)) return null;
      throw error;
    }
  }

  private async requireTextChannel(channelId: string): Promise<TextChannel> {
    const channel = await this.findTextChannel(channelId);
    if (!channel) {
      throw new Error(`Channel ${channelId} not found`);
    }
    return channel;
  }

  /**
   * The ticket message is the bot's first message carrying the claim control
   */
  private async findTicketMessage(channel: TextChannel): Promise<TicketMessageState | null> {
    const earliest = await channel.messages.fetch({ after: '0', limit: 10 });
    const candidates = [...earliest.values()].sort((a, b) => a.createdTimestamp - b.createdTimestamp);

    for (const message of candidates) {
      if (message.author.id !== this.client.user?.id) continue;

      const claimEnabled = this.claimControlState(message);
      if (claimEnabled === null) continue;

      const assigneeField = message.embeds[0]?.fields.find(field => field.name === ASSIGNEE_FIELD_NAME);
      return {
        message,
        assigneeId: TicketStateCodec.decodeAssignee(assigneeField?.value),
        claimEnabled
      };
    }
    return null;
  }

  /**
   * Whether the claim button is enabled; null when the message has none
   */
  private claimControlState(message: Message): boolean | null {
    for (const row of message.components) {
      if (row.type !== ComponentType.ActionRow) continue;
      for (const component of row.components) {
        if (component.type === ComponentType.Button && component.customId === ControlId.CLAIM) {
          return !component.disabled;
        }
      }
    }
    return null;
  }

  private isAdminPanel(message: Message): boolean {
    return message.author.id === this.client.user?.id && message.embeds[0]?.title === ADMIN_PANEL_TITLE;
  }

  private readParticipants(channel: TextChannel, excluded: readonly string[]): Participant[] {
    const botId = this.client.user?.id;
    return [...channel.permissionOverwrites.cache.values()]
      .filter(overwrite => !excluded.includes(overwrite.id) && overwrite.id !== botId)
      .filter(overwrite => overwrite.allow.has(PermissionFlagsBits.ViewChannel))
      .map(overwrite => ({
        id: overwrite.id,
        kind: overwrite.type === OverwriteType.Member ? SubjectKind.MEMBER : SubjectKind.ROLE
      }));
  }

  private parentFor(area: ChannelArea): string {
    return area === 'closed' ? this.options.closedParentId : this.options.openParentId;
  }

  private toAllowDeny(grant: PermissionGrant): { allow: bigint[]; deny: bigint[] } {
    if (!grant.visible) {
      return { allow: [], deny: [PermissionFlagsBits.ViewChannel, PermissionFlagsBits.SendMessages] };
    }

    const allow = [PermissionFlagsBits.ViewChannel, PermissionFlagsBits.ReadMessageHistory, PermissionFlagsBits.AttachFiles];
    if (grant.canSend) {
      return { allow: [...allow, PermissionFlagsBits.SendMessages], deny: [] };
    }
    return { allow, deny: [PermissionFlagsBits.SendMessages] };
  }

  private toOverwriteOptions(grant: PermissionGrant): PermissionOverwriteOptions {
    if (!grant.visible) {
      return { ViewChannel: false, SendMessages: false };
    }
    return { ViewChannel: true, ReadMessageHistory: true, AttachFiles: true, SendMessages: grant.canSend };
  }

  private toTranscriptMessage(message: Message): TranscriptMessage {
    return {
      id: message.id,
      author: {
        id: message.author.id,
        username: message.author.username,
        avatarUrl: message.author.displayAvatarURL({ extension: 'png', size: 64 }),
        bot: message.author.bot
      },
      createdAt: message.createdAt,
      content: message.content,
      attachments: [...message.attachments.values()].map(attachment => ({
        url: attachment.url,
        name: attachment.name,
        contentType: attachment.contentType ?? undefined
      })),
      embeds: message.embeds.map(embed => ({
        title: embed.title ?? undefined,
        url: embed.url ?? undefined,
        description: embed.description ?? undefined,
        color: embed.color ?? undefined,
        author: embed.author
          ? { name: embed.author.name, url: embed.author.url, iconUrl: embed.author.iconURL }
          : undefined,
        fields: embed.fields.map(field => ({ name: field.name, value: field.value, inline: field.inline ?? false })),
        imageUrl: embed.image?.url,
        thumbnailUrl: embed.thumbnail?.url,
        footer: embed.footer ? { text: embed.footer.text, iconUrl: embed.footer.iconURL } : undefined
      }))
    };
  }
}

function isApiError(error: unknown, code: RESTJSONErrorCodes): boolean {
  return error instanceof DiscordAPIError && error.code === code;
}
