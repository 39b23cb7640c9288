import type { LinkStats } from '../types.js';
import type { LinkSession } from './linkSession.js';

/** Sessions of the links currently connected to this process. */
export class LinkRegistry {
  private sessions = new Map<string, LinkSession>();

  register(session: LinkSession): void {
    if (this.sessions.has(session.linkId)) {
      throw new Error(`link already registered: ${session.linkId}`);
    }
    this.sessions.set(session.linkId, session);
  }

  has(linkId: string): boolean {
    return this.sessions.has(linkId);
  }

  get(linkId: string): LinkSession | null {
    return this.sessions.get(linkId) ?? null;
  }

  remove(linkId: string): boolean {
    return this.sessions.delete(linkId);
  }

  list(): LinkStats[] {
    return [...this.sessions.values()].map((session) => session.stats());
  }

  get size(): number {
    return this.sessions.size;
  }
}
