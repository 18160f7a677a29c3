import {
  PermissionFlagsBits,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
  SlashCommandBuilder
} from 'discord.js';

import { CommandName } from '../../constants.js';

/**
 * Guild slash commands, registered on ready
 */
export function buildCommandDefinitions(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return [
    new SlashCommandBuilder()
      .setName(CommandName.PANEL)
      .setDescription('Post the ticket category panel in this channel')
      .setDefaultMemberPermissions(PermissionFlagsBits.ManageChannels),

    new SlashCommandBuilder()
      .setName(CommandName.CLOSE)
      .setDescription('Close this ticket'),

    new SlashCommandBuilder()
      .setName(CommandName.ADD)
      .setDescription('Give a member access to this ticket')
      .addUserOption(option => option.setName('user').setDescription('Member to add').setRequired(true)),

    new SlashCommandBuilder()
      .setName(CommandName.REMOVE)
      .setDescription('Remove a member from this ticket')
      .addUserOption(option => option.setName('user').setDescription('Member to remove').setRequired(true)),

    new SlashCommandBuilder()
      .setName(CommandName.ADD_ROLE)
      .setDescription('Give a role access to this ticket')
      .addRoleOption(option => option.setName('role').setDescription('Role to add').setRequired(true)),

    new SlashCommandBuilder()
      .setName(CommandName.REMOVE_ROLE)
      .setDescription('Remove a role from this ticket')
      .addRoleOption(option => option.setName('role').setDescription('Role to remove').setRequired(true)),

    new SlashCommandBuilder()
      .setName(CommandName.ASSIGN)
      .setDescription('Make a member the assignee of this ticket')
      .addUserOption(option => option.setName('user').setDescription('New assignee').setRequired(true))
  ].map(command => command.toJSON());
}
