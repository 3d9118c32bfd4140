import { randomUUID } from 'node:crypto';
import type { Session } from '../../src/domain/types.js';

/** Login tokens for the HTTP API. In memory: a restart logs everyone out. */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();

  open(session: Session): string {
    const token = randomUUID();
    this.sessions.set(token, session);
    return token;
  }

  get(token: string): Session | undefined {
    return this.sessions.get(token);
  }

  close(token: string): boolean {
    return this.sessions.delete(token);
  }

  /** Token from an `Authorization: Bearer <token>` header */
  static tokenFrom(header: string | undefined): string | undefined {
    if (!header) return undefined;
    const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
    return match ? match[1] : undefined;
  }
}
