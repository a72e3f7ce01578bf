/**
 * Loopback redirect listener for the OAuth installed-app consent flow
 */

import express, { type Request, type Response } from 'express';
import { createServer } from 'http';
import type { AddressInfo } from 'net';
import { NetworkError } from '@coffee-chat/core';
import type { ConsentResult } from './types.js';

export const CALLBACK_PATH = '/oauth/callback';

export interface ConsentFlowOptions {
  /** Port to listen on; 0 picks a free one */
  port: number;
  timeoutMs: number;
  /** Builds the provider's consent URL for the given redirect URI */
  buildAuthUrl: (redirectUri: string) => string;
  /** Sends the user to the consent URL */
  openUrl: (url: string) => void;
}

function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value ? value : undefined;
}

/**
 * Listen on 127.0.0.1, send the user to the consent page and resolve with the
 * authorization code delivered to the redirect.
 */
export function runConsentFlow(options: ConsentFlowOptions): Promise<ConsentResult> {
  return new Promise<ConsentResult>((resolve, reject) => {
    const app = express();
    const server = createServer(app);
    let redirectUri = '';
    let timer: NodeJS.Timeout | undefined;

    const finish = (outcome: () => void) => {
      if (timer) clearTimeout(timer);
      server.close();
      outcome();
    };

    app.get(CALLBACK_PATH, (req: Request, res: Response) => {
      const error = queryParam(req, 'error');
      const code = queryParam(req, 'code');

      // Let the listener close without waiting on a kept-alive socket
      res.set('Connection', 'close');
      if (error || !code) {
        res.type('text/plain').send('Authorization failed. You can close this window.');
        finish(() => reject(new NetworkError(`Authorization was not granted (${error ?? 'no code returned'})`)));
        return;
      }

      res.type('text/plain').send('Calendar connected. You can close this window and return to Coffee Chat.');
      finish(() => resolve({ code, redirectUri }));
    });

    server.on('error', (error) => {
      finish(() => reject(new NetworkError('Could not start the OAuth redirect listener', error)));
    });

    server.listen(options.port, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      const port = address && typeof address === 'object' ? address.port : options.port;
      redirectUri = `http://127.0.0.1:${port}${CALLBACK_PATH}`;
      console.log(`[Calendar] Waiting for OAuth redirect on ${redirectUri}`);

      timer = setTimeout(() => {
        finish(() =>
          reject(new NetworkError(`Timed out after ${Math.round(options.timeoutMs / 1000)}s waiting for consent`))
        );
      }, options.timeoutMs);

      options.openUrl(options.buildAuthUrl(redirectUri));
    });
  });
}
