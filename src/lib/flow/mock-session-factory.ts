import { MockSession } from './mock-session';
import type { SessionOwner } from './mock-session';
import type { SharedSessionState } from './shared-session-state';

export class MockSessionFactory {
  private readonly state: SharedSessionState;
  private readonly owner: SessionOwner;
  private sessions: MockSession[] = [];

  constructor(options: { state: SharedSessionState; owner: SessionOwner }) {
    this.state = options.state;
    this.owner = options.owner;
  }

  public createSession(): MockSession {
    const session = new MockSession({ state: this.state, owner: this.owner });
    this.sessions.push(session);
    return session;
  }

  public getCreatedSessions(): readonly MockSession[] {
    return [...this.sessions];
  }
}
