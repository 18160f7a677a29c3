import {
  ActionRowBuilder,
  AttachmentBuilder,
  BaseMessageOptions,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
  StringSelectMenuBuilder,
  StringSelectMenuOptionBuilder
} from 'discord.js';

import { CategoryCatalog } from '../../core/services/CategoryCatalog.js';
import { TicketStateCodec, ASSIGNEE_FIELD_NAME } from '../../core/services/TicketStateCodec.js';
import { TicketDraft } from '../../core/entities/Ticket.js';
import { TicketNotice } from '../../core/entities/TicketEffect.js';
import { TranscriptDocument } from '../../core/entities/Transcript.js';
import { Reply, ReplyTone, mention } from '../../application/handlers/TicketHandlers.js';
import { ADMIN_PANEL_TITLE, Colors, ControlId } from '../../constants.js';

const TONE_COLORS: Record<ReplyTone, number> = {
  success: Colors.GREEN,
  info: Colors.BLUE,
  warning: Colors.YELLOW,
  error: Colors.RED
};

const UNASSIGNED = 'Unassigned';

/**
 * Message Factory
 * Builds every embed and control row the bot posts. Control ids come from
 * ControlId so the router and the gateway agree on them.
 */
export class MessageFactory {
  constructor(
    private readonly catalog: CategoryCatalog,
    private readonly organizationName: string
  ) {}

  /**
   * Handler reply, with the controls it asks for
   */
  reply(reply: Reply): BaseMessageOptions {
    const embed = new EmbedBuilder()
      .setColor(TONE_COLORS[reply.tone])
      .setTitle(reply.title)
      .setDescription(reply.description);

    switch (reply.controls) {
      case 'ticket_panel':
        return { embeds: [embed.setFooter({ text: this.organizationName })], components: [this.categoryMenu()] };
      case 'close_confirmation':
        return { embeds: [embed], components: [this.closeConfirmationRow()] };
      case 'deletion_countdown':
        return { embeds: [embed], components: [this.deletionCountdownRow()] };
      case undefined:
        return { embeds: [embed], components: [] };
    }
  }

  categoryMenu(): ActionRowBuilder<StringSelectMenuBuilder> {
    const menu = new StringSelectMenuBuilder()
      .setCustomId(ControlId.TOPIC_SELECT)
      .setPlaceholder('Select a category')
      .addOptions(this.catalog.list().map(category => {
        const option = new StringSelectMenuOptionBuilder()
          .setLabel(category.label)
          .setValue(category.name);
        if (category.description) option.setDescription(category.description);
        if (category.emoji) option.setEmoji(category.emoji);
        return option;
      }));

    return new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(menu);
  }

  /**
   * First message of a ticket channel; its Assignee field and claim button
   * carry part of the ticket state.
   */
  ticketMessage(ticket: Pick<TicketDraft, 'ownerId' | 'category' | 'sequenceNumber' | 'assigneeId' | 'claimEnabled'>): BaseMessageOptions {
    const category = this.catalog.find(ticket.category);
    const embed = new EmbedBuilder()
      .setColor(Colors.BLUE)
      .setTitle(`${category?.emoji ? `${category.emoji} ` : ''}${category?.label ?? ticket.category} Ticket`)
      .setDescription(
        `Welcome <@${ticket.ownerId}>!\n` +
        'Please describe your request in as much detail as possible. A staff member will be with you shortly.'
      )
      .addFields(
        { name: 'Ticket', value: TicketStateCodec.encodeTicketName(ticket), inline: true },
        {
          name: ASSIGNEE_FIELD_NAME,
          value: ticket.assigneeId ? TicketStateCodec.encodeAssignee(ticket.assigneeId) : UNASSIGNED,
          inline: true
        }
      )
      .setFooter({ text: this.organizationName });

    return { embeds: [embed], components: [this.ticketControlRow(ticket.claimEnabled)] };
  }

  ticketControlRow(claimEnabled: boolean): ActionRowBuilder<ButtonBuilder> {
    return new ActionRowBuilder<ButtonBuilder>().addComponents(
      new ButtonBuilder()
        .setCustomId(ControlId.CLOSE_REQUEST)
        .setLabel('Close')
        .setEmoji('🔒')
        .setStyle(ButtonStyle.Danger),
      new ButtonBuilder()
        .setCustomId(ControlId.CLAIM)
        .setLabel('Claim')
        .setEmoji('🙋')
        .setStyle(ButtonStyle.Success)
        .setDisabled(!claimEnabled)
    );
  }

  closeConfirmationRow(): ActionRowBuilder<ButtonBuilder> {
    return new ActionRowBuilder<ButtonBuilder>().addComponents(
      new ButtonBuilder().setCustomId(ControlId.CONFIRM_CLOSE).setLabel('Close Ticket').setStyle(ButtonStyle.Danger),
      new ButtonBuilder().setCustomId(ControlId.CANCEL_CLOSE).setLabel('Cancel').setStyle(ButtonStyle.Secondary)
    );
  }

  deletionCountdownRow(): ActionRowBuilder<ButtonBuilder> {
    return new ActionRowBuilder<ButtonBuilder>().addComponents(
      new ButtonBuilder().setCustomId(ControlId.CANCEL_DELETION).setLabel('Cancel Deletion').setStyle(ButtonStyle.Secondary)
    );
  }

  /**
   * Staff controls posted when a ticket is closed
   */
  adminPanel(closedBy: string): BaseMessageOptions {
    const embed = new EmbedBuilder()
      .setColor(Colors.YELLOW)
      .setTitle(ADMIN_PANEL_TITLE)
      .setDescription(`Ticket closed by <@${closedBy}>. Support staff can reopen or permanently delete it.`);

    const row = new ActionRowBuilder<ButtonBuilder>().addComponents(
      new ButtonBuilder().setCustomId(ControlId.REOPEN).setLabel('Reopen').setEmoji('🔓').setStyle(ButtonStyle.Success),
      new ButtonBuilder().setCustomId(ControlId.DELETE).setLabel('Delete').setEmoji('⛔').setStyle(ButtonStyle.Danger)
    );

    return { embeds: [embed], components: [row] };
  }

  notice(notice: TicketNotice): BaseMessageOptions {
    const embed = new EmbedBuilder();

    switch (notice.type) {
      case 'claimed':
        embed.setColor(Colors.GREEN).setTitle('Ticket Claimed')
          .setDescription(`${TicketStateCodec.encodeAssignee(notice.assigneeId)} will handle this ticket.`);
        break;
      case 'assignee_changed':
        embed.setColor(Colors.BLUE).setTitle('Assignee Changed')
          .setDescription(
            notice.previousAssigneeId
              ? `<@${notice.actorId}> handed this ticket from ${TicketStateCodec.encodeAssignee(notice.previousAssigneeId)} to ${TicketStateCodec.encodeAssignee(notice.assigneeId)}.`
              : `<@${notice.actorId}> assigned this ticket to ${TicketStateCodec.encodeAssignee(notice.assigneeId)}.`
          );
        break;
      case 'reopened':
        embed.setColor(Colors.GREEN).setTitle('Ticket Reopened')
          .setDescription(`<@${notice.actorId}> reopened this ticket. Welcome back <@${notice.ownerId}>.`);
        break;
      case 'participant_added':
        embed.setColor(Colors.GREEN).setDescription(`${mention(notice.subject)} has been added to the ticket.`);
        break;
      case 'participant_removed':
        embed.setColor(Colors.GRAY).setDescription(`${mention(notice.subject)} has been removed from the ticket.`);
        break;
    }

    return { embeds: [embed] };
  }

  /**
   * Log channel entry: summary embed plus the transcript file
   */
  transcriptLog(ticket: Pick<TicketDraft, 'ownerId' | 'category' | 'sequenceNumber'>, transcript: TranscriptDocument): BaseMessageOptions {
    const activity = transcript.activity.length > 0
      ? transcript.activity.map(entry => `${entry.messageCount} - <@${entry.authorId}>`).join('\n')
      : 'No messages';

    const embed = new EmbedBuilder()
      .setColor(Colors.GRAY)
      .setTitle('Ticket Transcript')
      .addFields(
        { name: 'Ticket Owner', value: `<@${ticket.ownerId}>`, inline: true },
        { name: 'Ticket Name', value: TicketStateCodec.encodeTicketName(ticket), inline: true },
        { name: 'Category', value: ticket.category, inline: true },
        { name: 'Users in Transcript', value: activity.slice(0, 1024) }
      )
      .setFooter({ text: this.organizationName })
      .setTimestamp();

    const file = new AttachmentBuilder(Buffer.from(transcript.html, 'utf-8'), { name: transcript.fileName });
    return { embeds: [embed], files: [file] };
  }

  /**
   * Mentions that open a ticket: the support role and the requester
   */
  ticketGreeting(ownerId: string, supportRoleId: string): Pick<BaseMessageOptions, 'content' | 'allowedMentions'> {
    return {
      content: `<@&${supportRoleId}> <@${ownerId}>`,
      allowedMentions: { roles: [supportRoleId], users: [ownerId] }
    };
  }
}
