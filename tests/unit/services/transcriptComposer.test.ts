import { TranscriptComposer } from '../../../src/core/services/TranscriptComposer.js';
import { OWNER_ID, STAFF_ID, StubMediaResolver, message } from '../../helpers/fakes.js';

const channel = { id: '300000000000000010', name: 'general-0001' };
const staffAuthor = { id: STAFF_ID, username: 'helper', bot: false };
const botAuthor = { id: '100000000000000099', username: 'Ticket Desk', bot: true };

describe('TranscriptComposer', () => {
  let media: StubMediaResolver;
  let composer: TranscriptComposer;

  beforeEach(() => {
    media = new StubMediaResolver();
    composer = new TranscriptComposer(media, {
      timeZone: 'UTC',
      adminPanelTitle: 'Ticket Controls',
      stylesheet: 'body { color: #dcddde; }'
    });
  });

  it('should name the file after the channel and inline the stylesheet', async () => {
    const transcript = await composer.compose(channel, []);

    expect(transcript.fileName).toBe('transcript-general-0001.html');
    expect(transcript.html).toBe(
      '<!DOCTYPE html><html><head><meta charset="UTF-8"><title>Transcript for #general-0001</title>' +
      '<style>body { color: #dcddde; }</style></head>' +
      '<body><div class="container"><h1>Transcript for #general-0001</h1></div></body></html>'
    );
    expect(transcript.messageCount).toBe(0);
    expect(transcript.activity).toEqual([]);
  });

  it('should render escaped message text with author and timestamp', async () => {
    const transcript = await composer.compose(channel, [message({ id: '1', content: 'Hello <b>"world"</b>' })]);

    expect(transcript.html).toContain(
      '<div class="message"><img class="avatar" src=""><div class="message-content">' +
      '<div class="header"><span class="username">owner</span><span class="timestamp">2024-03-01 12:00:00</span></div>' +
      '<div class="content"><div>Hello &lt;b&gt;&#34;world&#34;&lt;/b&gt;</div></div></div></div>'
    );
  });

  it('should format timestamps in the configured zone', async () => {
    const berlin = new TranscriptComposer(media, { timeZone: 'Europe/Berlin', adminPanelTitle: 'Ticket Controls', stylesheet: '' });
    const transcript = await berlin.compose(channel, [message({ id: '1', content: 'hi' })]);

    expect(transcript.html).toContain('<span class="timestamp">2024-03-01 13:00:00</span>');
  });

  it('should inline images and avatars and link other attachments', async () => {
    const transcript = await composer.compose(channel, [
      message({
        id: '1',
        author: { ...staffAuthor, avatarUrl: 'https://cdn.example.com/avatar.png' },
        attachments: [
          { url: 'https://cdn.example.com/shot.png', name: 'shot.png', contentType: 'image/png' },
          { url: 'https://cdn.example.com/log.txt', name: 'log.txt', contentType: 'text/plain' }
        ]
      })
    ]);

    expect(transcript.html).toContain(
      '<a href="https://cdn.example.com/shot.png" target="_blank">' +
      '<img class="attachment-image" src="data:inline;https://cdn.example.com/shot.png" alt="Attachment"></a>'
    );
    expect(transcript.html).toContain(
      '<div class="attachment"><a href="https://cdn.example.com/log.txt" target="_blank">log.txt</a></div>'
    );
    expect(transcript.html).toContain('<img class="avatar" src="data:inline;https://cdn.example.com/avatar.png">');
    expect(media.requested).toEqual(['https://cdn.example.com/shot.png', 'https://cdn.example.com/avatar.png']);
  });

  it('should keep the link when media cannot be inlined', async () => {
    media.unreachable.add('https://cdn.example.com/gone.png');
    const transcript = await composer.compose(channel, [
      message({ id: '1', attachments: [{ url: 'https://cdn.example.com/gone.png', name: 'gone.png', contentType: 'image/png' }] })
    ]);

    expect(transcript.html).toContain('src="https://cdn.example.com/gone.png"');
  });

  it('should render embeds with their colour, title and fields', async () => {
    const transcript = await composer.compose(channel, [
      message({
        id: '1',
        author: botAuthor,
        embeds: [{
          title: 'Ticket Claimed',
          description: 'You are now the assignee',
          color: 0x28a745,
          fields: [{ name: 'Assignee', value: `<@${STAFF_ID}>`, inline: true }]
        }]
      })
    ]);

    expect(transcript.html).toContain(
      '<div class="embed" style="border-left-color: #28a745;"><div class="embed-content">' +
      '<div class="embed-title">Ticket Claimed</div>' +
      '<div class="embed-description">You are now the assignee</div>' +
      '<div class="embed-fields"><div class="embed-field embed-field-inline"><div class="embed-field-name">Assignee</div>' +
      `<div class="embed-field-value">&lt;@${STAFF_ID}&gt;</div></div></div>` +
      '</div></div>'
    );
    expect(transcript.html).toContain('<span class="bot-tag">BOT</span>');
  });

  it('should use the default border colour for embeds without one', async () => {
    const transcript = await composer.compose(channel, [
      message({ id: '1', embeds: [{ description: 'plain', fields: [] }] })
    ]);

    expect(transcript.html).toContain('<div class="embed" style="border-left-color: #4f545c;">');
  });

  it('should leave out the admin panel and empty messages', async () => {
    const transcript = await composer.compose(channel, [
      message({ id: '1', author: botAuthor, embeds: [{ title: 'Ticket Controls', fields: [] }] }),
      message({ id: '2', content: '' }),
      message({ id: '3', content: 'visible' })
    ]);

    expect(transcript.html).not.toContain('Ticket Controls');
    expect(transcript.html.match(/class="message"/g)).toHaveLength(1);
    expect(transcript.messageCount).toBe(2);
    expect(transcript.activity).toEqual([{ authorId: OWNER_ID, username: 'owner', messageCount: 2 }]);
  });

  it('should keep a black embed border', async () => {
    const transcript = await composer.compose(channel, [
      message({ id: '1', embeds: [{ description: 'dark', color: 0, fields: [] }] })
    ]);

    expect(transcript.html).toContain('<div class="embed" style="border-left-color: #000000;">');
  });

  it('should link media once the inline budget is spent', async () => {
    // Each stubbed data URI is 41 characters long
    const limited = new TranscriptComposer(media, {
      timeZone: 'UTC',
      adminPanelTitle: 'Ticket Controls',
      stylesheet: '',
      inlineBudget: 100
    });
    const image = (name: string) => ({ url: `https://cdn.example.com/${name}`, name, contentType: 'image/png' });

    const transcript = await limited.compose(channel, [
      message({ id: '1', attachments: [image('a.png'), image('b.png'), image('c.png')] })
    ]);

    expect(transcript.html).toContain('src="data:inline;https://cdn.example.com/a.png"');
    expect(transcript.html).toContain('src="data:inline;https://cdn.example.com/b.png"');
    expect(transcript.html).toContain(
      '<a href="https://cdn.example.com/c.png" target="_blank">' +
      '<img class="attachment-image" src="https://cdn.example.com/c.png" alt="Attachment"></a>'
    );
  });

  it('should summarise activity per author, most active first', async () => {
    const transcript = await composer.compose(channel, [
      message({ id: '1', content: 'a' }),
      message({ id: '2', author: staffAuthor, content: 'b' }),
      message({ id: '3', author: staffAuthor, content: 'c' }),
      message({ id: '4', author: botAuthor, content: 'd' })
    ]);

    expect(transcript.activity).toEqual([
      { authorId: STAFF_ID, username: 'helper', messageCount: 2 },
      { authorId: OWNER_ID, username: 'owner', messageCount: 1 },
      { authorId: '100000000000000099', username: 'Ticket Desk', messageCount: 1 }
    ]);
  });
});
