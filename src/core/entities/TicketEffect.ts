import { ChannelArea, Participant, PermissionGrant } from './Ticket.js';

/**
 * Side effects requested of the chat transport.
 * The state machine only describes them; the ticket service executes them.
 */
export type TicketEffect =
  | { readonly type: 'create_channel'; readonly name: string; readonly topic: string; readonly area: ChannelArea; readonly grants: readonly PermissionGrant[] }
  | { readonly type: 'post_ticket_message'; readonly supportRoleId: string }
  | { readonly type: 'set_permission'; readonly grant: PermissionGrant }
  | { readonly type: 'remove_permission'; readonly subject: Participant }
  | { readonly type: 'relocate'; readonly area: ChannelArea }
  | { readonly type: 'update_ticket_message'; readonly assigneeId: string; readonly claimEnabled: boolean }
  | { readonly type: 'post_admin_panel'; readonly closedBy: string }
  | { readonly type: 'remove_admin_panel' }
  | { readonly type: 'announce'; readonly notice: TicketNotice }
  | { readonly type: 'archive_transcript' }
  | { readonly type: 'delete_channel' };

export type TicketEffectType = TicketEffect['type'];

/**
 * Public announcements posted into the ticket channel
 */
export type TicketNotice =
  | { readonly type: 'claimed'; readonly assigneeId: string }
  | { readonly type: 'assignee_changed'; readonly actorId: string; readonly previousAssigneeId?: string; readonly assigneeId: string }
  | { readonly type: 'reopened'; readonly actorId: string; readonly ownerId: string }
  | { readonly type: 'participant_added'; readonly subject: Participant }
  | { readonly type: 'participant_removed'; readonly subject: Participant };
