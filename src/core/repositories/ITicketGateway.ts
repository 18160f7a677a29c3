import { Ticket, PermissionGrant, ChannelArea } from '../entities/Ticket.js';
import { TicketEffect } from '../entities/TicketEffect.js';
import { TranscriptChannel, TranscriptDocument, TranscriptMessage } from '../entities/Transcript.js';

/**
 * Chat transport seen from the ticket workflow.
 * The Discord implementation lives in infrastructure/discord.
 */
export interface ITicketGateway {
  /**
   * Read ticket state back from the channel. Null when the channel
   * carries no ticket encoding (or does not exist).
   */
  loadTicket(channelId: string): Promise<Ticket | null>;

  /**
   * Whether the member can currently view the channel (all sources of access)
   */
  canView(channelId: string, memberId: string): Promise<boolean>;

  /**
   * Create the backing channel and return its id
   */
  createChannel(request: {
    readonly name: string;
    readonly topic: string;
    readonly area: ChannelArea;
    readonly grants: readonly PermissionGrant[];
  }): Promise<string>;

  /**
   * Execute one effect against an existing ticket channel
   */
  execute(ticket: Ticket, effect: TicketEffect): Promise<void>;

  /**
   * Full message history, oldest first, without duplicates
   */
  fetchHistory(channelId: string): Promise<{ channel: TranscriptChannel; messages: TranscriptMessage[] }>;

  /**
   * Send the transcript to the archival channel
   */
  deliverTranscript(ticket: Ticket, transcript: TranscriptDocument): Promise<void>;
}
