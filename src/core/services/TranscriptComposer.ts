import {
  AuthorActivity,
  TranscriptChannel,
  TranscriptDocument,
  TranscriptEmbed,
  TranscriptMessage
} from '../entities/Transcript.js';
import { IMediaResolver } from '../repositories/IMediaResolver.js';
import { escapeHtml } from '../../utils/html.js';
import { formatTimestamp } from '../../utils/time.js';

export interface TranscriptComposerOptions {
  /** IANA zone used for message timestamps */
  readonly timeZone: string;
  /** Title of the closing workflow's control message, which is left out */
  readonly adminPanelTitle: string;
  /** CSS inlined into the document head */
  readonly stylesheet: string;
  /** Total data URI characters one document may inline; media past it stays a link */
  readonly inlineBudget?: number;
}

const DEFAULT_EMBED_COLOR = '#4f545c';

// Keeps the file under the chat platform's default upload limit
export const DEFAULT_INLINE_BUDGET = 6 * 1024 * 1024;

interface InlineBudget {
  remaining: number;
}

/**
 * Transcript Composer
 * Renders a channel's ordered history into one self-contained HTML file.
 * Images are inlined as data URIs; media that cannot be fetched, or that
 * would exceed the document's inline budget, stays a link.
 */
export class TranscriptComposer {
  constructor(
    private readonly media: IMediaResolver,
    private readonly options: TranscriptComposerOptions
  ) {}

  /**
   * @param messages - full history, oldest first
   */
  async compose(channel: TranscriptChannel, messages: readonly TranscriptMessage[]): Promise<TranscriptDocument> {
    const title = `Transcript for #${escapeHtml(channel.name)}`;
    const kept = messages.filter(message => !this.isAdminPanel(message));
    const budget: InlineBudget = { remaining: this.options.inlineBudget ?? DEFAULT_INLINE_BUDGET };
    const body: string[] = [];

    for (const message of kept) {
      const rendered = await this.renderMessage(message, budget);
      if (rendered) body.push(rendered);
    }

    const html =
      `<!DOCTYPE html><html><head><meta charset="UTF-8"><title>${title}</title>` +
      `<style>${this.options.stylesheet}</style></head>` +
      `<body><div class="container"><h1>${title}</h1>${body.join('')}</div></body></html>`;

    return {
      fileName: `transcript-${channel.name}.html`,
      html,
      messageCount: kept.length,
      activity: this.summarizeActivity(kept)
    };
  }

  private isAdminPanel(message: TranscriptMessage): boolean {
    return message.author.bot && message.embeds.length > 0 && message.embeds[0].title === this.options.adminPanelTitle;
  }

  /**
   * Inline media while the budget lasts, otherwise keep the URL
   */
  private async inline(url: string, budget: InlineBudget): Promise<string> {
    const resolved = await this.media.inline(url);
    if (resolved === url) return url;
    if (resolved.length > budget.remaining) return url;
    budget.remaining -= resolved.length;
    return resolved;
  }

  private async renderMessage(message: TranscriptMessage, budget: InlineBudget): Promise<string | null> {
    let content = '';

    if (message.content) {
      content += `<div>${escapeHtml(message.content)}</div>`;
    }

    for (const attachment of message.attachments) {
      const href = escapeHtml(attachment.url);
      if (attachment.contentType?.startsWith('image/')) {
        const src = escapeHtml(await this.inline(attachment.url, budget));
        content += `<a href="${href}" target="_blank"><img class="attachment-image" src="${src}" alt="Attachment"></a>`;
      } else {
        content += `<div class="attachment"><a href="${href}" target="_blank">${escapeHtml(attachment.name)}</a></div>`;
      }
    }

    for (const embed of message.embeds) {
      content += await this.renderEmbed(embed, budget);
    }

    if (!content) return null;

    const avatar = message.author.avatarUrl ? escapeHtml(await this.inline(message.author.avatarUrl, budget)) : '';
    const botTag = message.author.bot ? '<span class="bot-tag">BOT</span>' : '';
    const timestamp = formatTimestamp(message.createdAt, this.options.timeZone);

    return (
      `<div class="message"><img class="avatar" src="${avatar}"><div class="message-content">` +
      `<div class="header"><span class="username">${escapeHtml(message.author.username)}</span>${botTag}` +
      `<span class="timestamp">${timestamp}</span></div>` +
      `<div class="content">${content}</div></div></div>`
    );
  }

  private async renderEmbed(embed: TranscriptEmbed, budget: InlineBudget): Promise<string> {
    const borderColor = embed.color !== undefined ? `#${embed.color.toString(16).padStart(6, '0')}` : DEFAULT_EMBED_COLOR;
    let html = `<div class="embed" style="border-left-color: ${borderColor};">`;

    let thumbnail = '';
    if (embed.thumbnailUrl) {
      const src = escapeHtml(await this.inline(embed.thumbnailUrl, budget));
      thumbnail = `<div class="embed-thumbnail"><img src="${src}" alt="Thumbnail"></div>`;
    }

    html += '<div class="embed-content">';

    if (embed.author) {
      const icon = embed.author.iconUrl ? escapeHtml(await this.inline(embed.author.iconUrl, budget)) : '';
      html +=
        `<div class="embed-author"><img class="embed-author-icon" src="${icon}">` +
        `<span class="embed-author-name"><a href="${escapeHtml(embed.author.url ?? '')}" target="_blank">` +
        `${escapeHtml(embed.author.name)}</a></span></div>`;
    }

    if (embed.title) {
      html += embed.url
        ? `<div class="embed-title"><a href="${escapeHtml(embed.url)}" target="_blank">${escapeHtml(embed.title)}</a></div>`
        : `<div class="embed-title">${escapeHtml(embed.title)}</div>`;
    }

    if (embed.description) {
      html += `<div class="embed-description">${escapeHtml(embed.description)}</div>`;
    }

    if (embed.fields.length > 0) {
      html += '<div class="embed-fields">';
      for (const field of embed.fields) {
        const fieldClass = field.inline ? 'embed-field embed-field-inline' : 'embed-field';
        html +=
          `<div class="${fieldClass}"><div class="embed-field-name">${escapeHtml(field.name)}</div>` +
          `<div class="embed-field-value">${escapeHtml(field.value)}</div></div>`;
      }
      html += '</div>';
    }

    if (embed.imageUrl) {
      const src = escapeHtml(await this.inline(embed.imageUrl, budget));
      html += `<div class="embed-image"><a href="${escapeHtml(embed.imageUrl)}" target="_blank"><img src="${src}" alt="Embed Image"></a></div>`;
    }

    html += '</div>';
    html += thumbnail;

    if (embed.footer) {
      html += '<div class="embed-footer">';
      if (embed.footer.iconUrl) {
        const icon = escapeHtml(await this.inline(embed.footer.iconUrl, budget));
        html += `<img class="embed-footer-icon" src="${icon}">`;
      }
      html += `<span class="embed-footer-text">${escapeHtml(embed.footer.text)}</span></div>`;
    }

    return html + '</div>';
  }

  /**
   * Message counts per author, most active first (ties by username)
   */
  private summarizeActivity(messages: readonly TranscriptMessage[]): AuthorActivity[] {
    const byAuthor = new Map<string, { username: string; count: number }>();
    for (const message of messages) {
      const entry = byAuthor.get(message.author.id);
      if (entry) {
        entry.count++;
      } else {
        byAuthor.set(message.author.id, { username: message.author.username, count: 1 });
      }
    }

    return [...byAuthor.entries()]
      .map(([authorId, { username, count }]) => ({ authorId, username, messageCount: count }))
      .sort((a, b) => b.messageCount - a.messageCount || a.username.localeCompare(b.username));
  }
}
