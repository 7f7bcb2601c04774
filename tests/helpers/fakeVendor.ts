import express from 'express';
import type { Server } from 'http';

export type FakeReply = {
  status: number;
  body?: unknown;
  delayMs?: number;
};

export type TokenHandler = (params: URLSearchParams) => FakeReply;

export type ContainerHandler = (request: {
  vin: string;
  container: string;
  authorization: string | undefined;
}) => FakeReply;

export type FakeVendor = {
  baseUrl: string;
  tokenUrl: string;
  authorizationUrl: string;
  apiBaseUrl: string;
  tokenRequests: URLSearchParams[];
  containerRequests: Array<{ container: string; authorization: string | undefined }>;
  onToken(handler: TokenHandler): void;
  onContainer(handler: ContainerHandler): void;
  close(): Promise<void>;
};

const pendingReplies = new Set<NodeJS.Timeout>();

const reply = (res: express.Response, { status, body, delayMs }: FakeReply): void => {
  const send = () => {
    if (body === undefined) {
      res.status(status).end();
      return;
    }

    if (typeof body === 'string') {
      res.status(status).type('text/plain').send(body);
      return;
    }

    res.status(status).json(body);
  };

  if (delayMs) {
    const timer = setTimeout(() => {
      pendingReplies.delete(timer);
      send();
    }, delayMs);
    pendingReplies.add(timer);
    return;
  }

  send();
};

/** In-process stand-in for the vendor's OAuth server and vehicle data API. */
export const startFakeVendor = async (): Promise<FakeVendor> => {
  const app = express();
  const tokenRequests: URLSearchParams[] = [];
  const containerRequests: FakeVendor['containerRequests'] = [];

  let tokenHandler: TokenHandler = () => ({
    status: 400,
    body: { error: 'invalid_request', error_description: 'no handler configured' },
  });
  let containerHandler: ContainerHandler = () => ({ status: 204 });

  app.post(
    '/as/token.oauth2',
    express.text({ type: 'application/x-www-form-urlencoded' }),
    (req, res) => {
      const params = new URLSearchParams(typeof req.body === 'string' ? req.body : '');
      tokenRequests.push(params);
      reply(res, tokenHandler(params));
    },
  );

  app.get('/vehicledata/v2/vehicles/:vin/containers/:container', (req, res) => {
    const authorization = req.header('authorization');
    containerRequests.push({ container: req.params.container, authorization });
    reply(
      res,
      containerHandler({ vin: req.params.vin, container: req.params.container, authorization }),
    );
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('fake vendor did not bind a TCP port');
  }

  const baseUrl = `http://127.0.0.1:${address.port}`;

  return {
    baseUrl,
    tokenUrl: `${baseUrl}/as/token.oauth2`,
    authorizationUrl: `${baseUrl}/as/authorization.oauth2`,
    apiBaseUrl: `${baseUrl}/vehicledata/v2`,
    tokenRequests,
    containerRequests,
    onToken(handler) {
      tokenHandler = handler;
    },
    onContainer(handler) {
      containerHandler = handler;
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        pendingReplies.forEach((timer) => clearTimeout(timer));
        pendingReplies.clear();
        server.closeAllConnections();
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }

          resolve();
        });
      }),
  };
};
