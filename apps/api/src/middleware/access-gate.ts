import type { IncomingHttpHeaders } from 'http';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { AccessGatePort } from '@sensorgrid/domain';

export const AUTH_CHALLENGE = 'Basic realm="sensorgrid", charset="UTF-8"';

export interface BasicCredentials {
  username: string;
  password: string;
}

export function parseBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header) return null;
  const match = /^Basic\s+([A-Za-z0-9+/=]+)\s*$/i.exec(header);
  if (!match?.[1]) return null;
  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator < 0) return null;
  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

/**
 * Checks the request's Basic credentials. Requests without usable
 * credentials still go through the gate so every rejection costs the same.
 */
export async function isAuthorized(gate: AccessGatePort, headers: IncomingHttpHeaders): Promise<boolean> {
  const credentials = parseBasicAuth(headers.authorization);
  const ok = await gate.authenticate(credentials?.username ?? '', credentials?.password ?? '');
  return ok && credentials !== null;
}

export function requireAccess(gate: AccessGatePort): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    isAuthorized(gate, req.headers)
      .then((ok) => {
        if (ok) {
          next();
          return;
        }
        res.set('WWW-Authenticate', AUTH_CHALLENGE).status(401).json({ error: 'unauthorized' });
      })
      .catch(next);
  };
}
