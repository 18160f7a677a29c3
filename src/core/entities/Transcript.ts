/**
 * Platform-neutral view of a channel message, as needed for transcripts
 */
export interface TranscriptMessage {
  readonly id: string;
  readonly author: TranscriptAuthor;
  readonly createdAt: Date;
  readonly content: string;
  readonly attachments: readonly TranscriptAttachment[];
  readonly embeds: readonly TranscriptEmbed[];
}

export interface TranscriptAuthor {
  readonly id: string;
  readonly username: string;
  readonly avatarUrl?: string;
  readonly bot: boolean;
}

export interface TranscriptAttachment {
  readonly url: string;
  readonly name: string;
  readonly contentType?: string;
}

export interface TranscriptEmbed {
  readonly title?: string;
  readonly url?: string;
  readonly description?: string;
  readonly color?: number;
  readonly author?: { readonly name: string; readonly url?: string; readonly iconUrl?: string };
  readonly fields: readonly { readonly name: string; readonly value: string; readonly inline: boolean }[];
  readonly imageUrl?: string;
  readonly thumbnailUrl?: string;
  readonly footer?: { readonly text: string; readonly iconUrl?: string };
}

/**
 * Channel metadata the transcript header needs
 */
export interface TranscriptChannel {
  readonly id: string;
  readonly name: string;
}

export interface AuthorActivity {
  readonly authorId: string;
  readonly username: string;
  readonly messageCount: number;
}

/**
 * Rendered archival artifact
 */
export interface TranscriptDocument {
  readonly fileName: string;
  readonly html: string;
  readonly messageCount: number;
  /** Sorted by message count, most active first */
  readonly activity: readonly AuthorActivity[];
}
