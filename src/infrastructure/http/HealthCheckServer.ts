import * as http from 'http';

import { ILogger } from '../../core/repositories/ILogger.js';
import { HEALTH_CHECK_RESPONSE } from '../../constants.js';

/**
 * Plain-text liveness endpoint for the hosting platform
 */
export class HealthCheckServer {
  private server: http.Server | null = null;

  constructor(
    private readonly port: number,
    private readonly logger: ILogger
  ) {}

  /**
   * Start listening; resolves with the bound port (useful with port 0)
   */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = http.createServer((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'text/plain' });
        res.end(HEALTH_CHECK_RESPONSE);
      });

      server.once('error', reject);
      server.listen(this.port, () => {
        server.off('error', reject);
        server.on('error', error => this.logger.error('Health check server error', error));
        this.server = server;
        const address = server.address();
        const port = typeof address === 'object' && address ? address.port : this.port;
        this.logger.info(`Health check listening on port ${port}`);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        this.server = null;
        resolve();
      });
    });
  }
}
