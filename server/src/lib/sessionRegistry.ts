import type { SessionState } from '../types.js';
import type { ClientSession } from './clientSession.js';

export type StateCounts = Record<SessionState, number>;

/**
 * Sessions whose transport is open or being established. Membership changes
 * come only from the signaling side; broadcast iterates a copied snapshot so a
 * removal mid-broadcast never disturbs it.
 */
export class SessionRegistry {
  private sessions = new Map<string, ClientSession>();

  add(session: ClientSession): void {
    if (this.sessions.has(session.id)) {
      throw new Error('SESSION_EXISTS');
    }
    this.sessions.set(session.id, session);
  }

  remove(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get(sessionId: string): ClientSession | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  snapshot(): ClientSession[] {
    return Array.from(this.sessions.values());
  }

  get size(): number {
    return this.sessions.size;
  }

  countByState(): StateCounts {
    const counts: StateCounts = {
      new: 0,
      'offer-sent': 0,
      'answer-received': 0,
      negotiating: 0,
      connected: 0,
      closed: 0,
      failed: 0,
    };
    for (const session of this.sessions.values()) {
      counts[session.state] += 1;
    }
    return counts;
  }

  async closeAll(reason: string): Promise<void> {
    const sessions = this.snapshot();
    sessions.forEach((session) => session.close(reason));
    await Promise.all(sessions.map((session) => session.whenReleased()));
  }
}
