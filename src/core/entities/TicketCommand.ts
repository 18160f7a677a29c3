import { Actor, Participant } from './Ticket.js';

/**
 * Triggers accepted by the state machine for an existing ticket
 */
export type TicketCommand =
  | { readonly type: 'request_close'; readonly actor: Actor }
  | { readonly type: 'confirm_close'; readonly actor: Actor }
  | { readonly type: 'cancel_close'; readonly actor: Actor }
  | { readonly type: 'claim'; readonly actor: Actor }
  | { readonly type: 'transfer'; readonly actor: Actor; readonly targetId: string; readonly targetCanView: boolean }
  | { readonly type: 'reopen'; readonly actor: Actor }
  | { readonly type: 'delete'; readonly actor: Actor }
  | { readonly type: 'add_participant'; readonly actor: Actor; readonly subject: Participant }
  | { readonly type: 'remove_participant'; readonly actor: Actor; readonly subject: Participant };

export type TicketCommandType = TicketCommand['type'];
