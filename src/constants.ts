/**
 * Shared constants for the ticket desk bot
 */

// Control identifiers (buttons and select menus); the router dispatches on these
export const ControlId = {
  TOPIC_SELECT: 'ticket_topic_select',
  CLOSE_REQUEST: 'close_ticket_request',
  CONFIRM_CLOSE: 'confirm_close_ticket',
  CANCEL_CLOSE: 'cancel_close_ticket',
  CLAIM: 'claim_ticket',
  REOPEN: 'reopen_ticket',
  DELETE: 'delete_ticket_permanent',
  CANCEL_DELETION: 'cancel_ticket_deletion'
} as const;

export type ControlId = (typeof ControlId)[keyof typeof ControlId];

// Slash command names
export const CommandName = {
  PANEL: 'panel',
  CLOSE: 'close',
  ADD: 'add',
  REMOVE: 'remove',
  ADD_ROLE: 'addrole',
  REMOVE_ROLE: 'removerole',
  ASSIGN: 'assign'
} as const;

export type CommandName = (typeof CommandName)[keyof typeof CommandName];

// Embed colours
export const Colors = {
  BLUE: 0x0099ff,
  GREEN: 0x28a745,
  RED: 0xdc3545,
  YELLOW: 0xffc107,
  GRAY: 0x95a5a6
} as const;

// Title of the staff controls posted on close; transcripts leave this message out
export const ADMIN_PANEL_TITLE = 'Ticket Controls';

export const TICKET_PANEL_TITLE = 'Support Tickets';

// Select menus take at most this many options
export const MAX_CATEGORIES = 25;

// History paging
export const HISTORY_PAGE_SIZE = 100;

// Media fetch for transcripts
export const MEDIA_TIMEOUT_MS = 10000; // 10 seconds
export const MAX_INLINE_MEDIA_BYTES = 8 * 1024 * 1024;

// Health check
export const HEALTH_CHECK_RESPONSE = 'Bot is running!';

// Bot info
export const BOT_NAME = 'ticket-desk-bot';
export const BOT_VERSION = '1.0.0';
