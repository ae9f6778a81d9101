import type { FastifyInstance } from 'fastify';
import { v4 as uuidv4 } from 'uuid';

declare module 'fastify' {
  interface FastifyRequest {
    sessionId: string;
  }
}

export interface SessionOptions {
  cookieName: string;
  secure: boolean;
  /** Only routes under this path get a session */
  routePrefix: string;
}

// browser-session cookie holding a signed uuid; needs @fastify/cookie registered with a secret
export function registerSession(app: FastifyInstance, options: SessionOptions): void {
  app.decorateRequest('sessionId', '');

  app.addHook('onRequest', async (request, reply) => {
    const route = request.routeOptions.url;
    if (!route || !route.startsWith(options.routePrefix)) return;

    const raw = request.cookies[options.cookieName];

    if (raw) {
      const unsigned = request.unsignCookie(raw);
      if (unsigned.valid && unsigned.value) {
        request.sessionId = unsigned.value;
        return;
      }
      request.log.warn('Rejected session cookie with an invalid signature');
    }

    request.sessionId = uuidv4();
    reply.setCookie(options.cookieName, request.sessionId, {
      path: '/',
      httpOnly: true,
      sameSite: 'lax',
      secure: options.secure,
      signed: true,
    });
  });
}
