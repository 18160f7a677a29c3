/**
 * Ticket State Codec
 *
 * The only place that knows how ticket state is written into chat metadata:
 *   - channel name:  `<category>-<NNNN>`
 *   - channel topic: `User ID: <owner> | Ticket ID: <category>-<NNNN>`
 *   - ticket message: an `Assignee` embed field holding a user mention
 *
 * Other modules (reopen, close, transcript log lookup) parse through here, so
 * the encoding can change without touching the state machine.
 */

export const OWNER_TOPIC_LABEL = 'User ID:';
export const TICKET_TOPIC_LABEL = 'Ticket ID:';
export const TOPIC_SEPARATOR = ' | ';
export const ASSIGNEE_FIELD_NAME = 'Assignee';
export const SEQUENCE_WIDTH = 4;

export interface TicketName {
  readonly category: string;
  readonly sequenceNumber: number;
}

export interface TopicState extends TicketName {
  readonly ownerId: string;
}

export class TicketStateCodec {
  /**
   * Zero-pad the sequence number for display (1 -> "0001")
   */
  static formatSequenceNumber(sequenceNumber: number): string {
    return String(sequenceNumber).padStart(SEQUENCE_WIDTH, '0');
  }

  static encodeTicketName(name: TicketName): string {
    return `${name.category}-${TicketStateCodec.formatSequenceNumber(name.sequenceNumber)}`;
  }

  /**
   * Split on the last dash, so category names may contain dashes themselves
   */
  static decodeTicketName(value: string): TicketName | null {
    const match = /^(.+)-(\d+)$/.exec(value.trim());
    if (!match) return null;

    const sequenceNumber = Number(match[2]);
    if (!Number.isSafeInteger(sequenceNumber) || sequenceNumber <= 0) return null;

    return { category: match[1], sequenceNumber };
  }

  static encodeTopic(state: TopicState): string {
    return [
      `${OWNER_TOPIC_LABEL} ${state.ownerId}`,
      `${TICKET_TOPIC_LABEL} ${TicketStateCodec.encodeTicketName(state)}`
    ].join(TOPIC_SEPARATOR);
  }

  /**
   * Parse a channel topic. Returns null when the topic carries no owner
   * or no ticket id, i.e. the channel is not a ticket channel.
   */
  static decodeTopic(topic: string | null | undefined): TopicState | null {
    if (!topic) return null;

    let ownerId = '';
    let name: TicketName | null = null;

    for (const rawPart of topic.split('|')) {
      const part = rawPart.trim();
      if (part.startsWith(OWNER_TOPIC_LABEL)) {
        ownerId = part.slice(OWNER_TOPIC_LABEL.length).trim();
      } else if (part.startsWith(TICKET_TOPIC_LABEL)) {
        name = TicketStateCodec.decodeTicketName(part.slice(TICKET_TOPIC_LABEL.length));
      }
    }

    if (!ownerId || !name) return null;
    return { ownerId, ...name };
  }

  static encodeAssignee(userId: string): string {
    return `<@${userId}>`;
  }

  /**
   * Accepts `<@id>`, `<@!id>` or a bare id
   */
  static decodeAssignee(value: string | null | undefined): string | undefined {
    if (!value) return undefined;
    const match = /^<@!?(\d+)>$/.exec(value.trim()) ?? /^(\d+)$/.exec(value.trim());
    return match ? match[1] : undefined;
  }
}
