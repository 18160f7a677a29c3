import { APIEmbed, AttachmentBuilder, BaseMessageOptions } from 'discord.js';

import { MessageFactory } from '../../../src/infrastructure/discord/MessageFactory.js';
import { SubjectKind } from '../../../src/core/entities/Ticket.js';
import { Colors, ControlId } from '../../../src/constants.js';
import { OWNER_ID, STAFF_ID, SUPPORT_ROLE_ID, createCatalog } from '../../helpers/fakes.js';

function firstEmbed(options: BaseMessageOptions): APIEmbed {
  const embed = options.embeds?.[0];
  if (!embed) throw new Error('Message has no embed');
  return 'toJSON' in embed ? embed.toJSON() : embed;
}

function customIds(row: { toJSON(): { components: ReadonlyArray<object> } }): string[] {
  return row.toJSON().components.map(component => ('custom_id' in component ? String(component.custom_id) : ''));
}

describe('MessageFactory', () => {
  const factory = new MessageFactory(createCatalog(), 'Test Support');

  describe('reply', () => {
    it('should colour replies by tone', () => {
      expect(firstEmbed(factory.reply({ tone: 'success', title: 'Done', description: 'ok' })).color).toBe(Colors.GREEN);
      expect(firstEmbed(factory.reply({ tone: 'info', title: 'Note', description: 'ok' })).color).toBe(Colors.BLUE);
      expect(firstEmbed(factory.reply({ tone: 'warning', title: 'Careful', description: 'ok' })).color).toBe(Colors.YELLOW);
      expect(firstEmbed(factory.reply({ tone: 'error', title: 'Failed', description: 'ok' })).color).toBe(Colors.RED);
    });

    it('should carry title and description and clear old controls', () => {
      const options = factory.reply({ tone: 'info', title: 'Close Cancelled', description: 'The ticket stays open.' });

      expect(firstEmbed(options).title).toBe('Close Cancelled');
      expect(firstEmbed(options).description).toBe('The ticket stays open.');
      expect(options.components).toEqual([]);
    });

    it('should attach the requested controls', () => {
      expect(factory.reply({ tone: 'warning', title: 'Close Ticket', description: '?', controls: 'close_confirmation' }).components).toHaveLength(1);
      expect(factory.reply({ tone: 'error', title: 'Deleting', description: '…', controls: 'deletion_countdown' }).components).toHaveLength(1);
    });

    it('should sign the ticket panel with the organisation name', () => {
      const options = factory.reply({ tone: 'info', title: 'Support Tickets', description: 'Pick one', controls: 'ticket_panel' });
      expect(firstEmbed(options).footer?.text).toBe('Test Support');
    });
  });

  it('should offer every category in the menu', () => {
    const menu = factory.categoryMenu().toJSON().components[0];

    expect(menu.custom_id).toBe(ControlId.TOPIC_SELECT);
    expect(menu.options.map(option => [option.label, option.value, option.description])).toEqual([
      ['General', 'General', 'General questions'],
      ['Report', 'Report', 'Report abuse']
    ]);
  });

  describe('ticketMessage', () => {
    it('should show the encoded name and an unassigned placeholder', () => {
      const options = factory.ticketMessage({ ownerId: OWNER_ID, category: 'General', sequenceNumber: 3, claimEnabled: true });
      const embed = firstEmbed(options);

      expect(embed.title).toBe('📄 General Ticket');
      expect(embed.fields).toEqual([
        { name: 'Ticket', value: 'General-0003', inline: true },
        { name: 'Assignee', value: 'Unassigned', inline: true }
      ]);
    });

    it('should show the assignee as a mention', () => {
      const options = factory.ticketMessage({
        ownerId: OWNER_ID,
        category: 'Report',
        sequenceNumber: 12,
        assigneeId: STAFF_ID,
        claimEnabled: false
      });
      const embed = firstEmbed(options);

      expect(embed.title).toBe('Report Ticket');
      expect(embed.fields?.[1]).toEqual({ name: 'Assignee', value: `<@${STAFF_ID}>`, inline: true });
    });
  });

  it('should disable the claim button once claimed', () => {
    const buttons = factory.ticketControlRow(false).toJSON().components;

    expect(customIds(factory.ticketControlRow(false))).toEqual([ControlId.CLOSE_REQUEST, ControlId.CLAIM]);
    expect(buttons.map(button => button.disabled ?? false)).toEqual([false, true]);
  });

  it('should wire the confirmation and countdown controls', () => {
    expect(customIds(factory.closeConfirmationRow())).toEqual([ControlId.CONFIRM_CLOSE, ControlId.CANCEL_CLOSE]);
    expect(customIds(factory.deletionCountdownRow())).toEqual([ControlId.CANCEL_DELETION]);
  });

  it('should title the admin panel so transcripts can skip it', () => {
    const options = factory.adminPanel(STAFF_ID);

    expect(firstEmbed(options).title).toBe('Ticket Controls');
    expect(firstEmbed(options).description).toBe(`Ticket closed by <@${STAFF_ID}>. Support staff can reopen or permanently delete it.`);
  });

  describe('notice', () => {
    it('should describe a transfer from a previous assignee', () => {
      const options = factory.notice({
        type: 'assignee_changed',
        actorId: STAFF_ID,
        previousAssigneeId: STAFF_ID,
        assigneeId: '100000000000000003'
      });
      expect(firstEmbed(options).description).toBe(`<@${STAFF_ID}> handed this ticket from <@${STAFF_ID}> to <@100000000000000003>.`);
    });

    it('should describe a first assignment', () => {
      const options = factory.notice({ type: 'assignee_changed', actorId: STAFF_ID, assigneeId: '100000000000000003' });
      expect(firstEmbed(options).description).toBe(`<@${STAFF_ID}> assigned this ticket to <@100000000000000003>.`);
    });

    it('should mention roles as roles', () => {
      const options = factory.notice({ type: 'participant_added', subject: { id: '200000000000000005', kind: SubjectKind.ROLE } });
      expect(firstEmbed(options).description).toBe('<@&200000000000000005> has been added to the ticket.');
    });
  });

  it('should summarise the transcript and attach the file', () => {
    const options = factory.transcriptLog(
      { ownerId: OWNER_ID, category: 'General', sequenceNumber: 1 },
      {
        fileName: 'transcript-General-0001.html',
        html: '<html></html>',
        messageCount: 3,
        activity: [
          { authorId: STAFF_ID, username: 'helper', messageCount: 2 },
          { authorId: OWNER_ID, username: 'owner', messageCount: 1 }
        ]
      }
    );

    expect(firstEmbed(options).fields).toEqual([
      { name: 'Ticket Owner', value: `<@${OWNER_ID}>`, inline: true },
      { name: 'Ticket Name', value: 'General-0001', inline: true },
      { name: 'Category', value: 'General', inline: true },
      { name: 'Users in Transcript', value: `2 - <@${STAFF_ID}>\n1 - <@${OWNER_ID}>` }
    ]);

    const file = options.files?.[0];
    expect(file).toBeInstanceOf(AttachmentBuilder);
    if (file instanceof AttachmentBuilder) {
      expect(file.name).toBe('transcript-General-0001.html');
    }
  });

  it('should ping the support role and the owner only', () => {
    expect(factory.ticketGreeting(OWNER_ID, SUPPORT_ROLE_ID)).toEqual({
      content: `<@&${SUPPORT_ROLE_ID}> <@${OWNER_ID}>`,
      allowedMentions: { roles: [SUPPORT_ROLE_ID], users: [OWNER_ID] }
    });
  });
});
