import * as http from 'http';

import { HttpMediaResolver } from '../../../src/infrastructure/http/HttpMediaResolver.js';
import { RecordingLogger } from '../../helpers/fakes.js';

describe('HttpMediaResolver', () => {
  let server: http.Server;
  let baseUrl: string;
  let requests: string[];
  let logger: RecordingLogger;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      requests.push(req.url ?? '');
      switch (req.url) {
        case '/avatar.png':
          res.writeHead(200, { 'Content-Type': 'image/png' });
          res.end('PNG');
          return;
        case '/photo.jpg?size=64':
          res.writeHead(200);
          res.end('hello');
          return;
        case '/large.gif':
          res.writeHead(200, { 'Content-Type': 'image/gif; charset=binary' });
          res.end('0123456789');
          return;
        default:
          res.writeHead(404);
          res.end();
      }
    });

    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    baseUrl = `http://127.0.0.1:${typeof address === 'object' && address ? address.port : 0}`;
  });

  afterAll(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  beforeEach(() => {
    requests = [];
    logger = new RecordingLogger();
  });

  it('should inline media as a data URI using the response type', async () => {
    const resolver = new HttpMediaResolver(logger);
    expect(await resolver.inline(`${baseUrl}/avatar.png`)).toBe('data:image/png;base64,UE5H');
  });

  it('should guess the type from the URL when the response has none', async () => {
    const resolver = new HttpMediaResolver(logger);
    expect(await resolver.inline(`${baseUrl}/photo.jpg?size=64`)).toBe('data:image/jpeg;base64,aGVsbG8=');
  });

  it('should download repeated URLs once', async () => {
    const resolver = new HttpMediaResolver(logger);

    await resolver.inline(`${baseUrl}/avatar.png`);
    await resolver.inline(`${baseUrl}/avatar.png`);

    expect(requests).toEqual(['/avatar.png']);
  });

  it('should keep the link for failed downloads', async () => {
    const resolver = new HttpMediaResolver(logger);
    const url = `${baseUrl}/missing.png`;

    expect(await resolver.inline(url)).toBe(url);
    expect(logger.entries).toEqual([{ level: 'warn', message: 'Could not inline media, keeping link', meta: { url, error: 'HTTP 404' } }]);
  });

  it('should keep the link for media over the size limit', async () => {
    const resolver = new HttpMediaResolver(logger, { maxBytes: 4 });
    const url = `${baseUrl}/large.gif`;

    expect(await resolver.inline(url)).toBe(url);
    expect(logger.messages('warn')).toEqual(['Could not inline media, keeping link']);
  });

  it('should keep links that are not http URLs', async () => {
    const resolver = new HttpMediaResolver(logger);

    expect(await resolver.inline('attachment://shot.png')).toBe('attachment://shot.png');
    expect(await resolver.inline('not a url')).toBe('not a url');
    expect(requests).toEqual([]);
  });
});
