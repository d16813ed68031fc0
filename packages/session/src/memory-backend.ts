import type { SessionBackend, SessionStore } from './types.js';

/** Process-local sessions for tests and single-instance development. */
export class InMemorySessionBackend implements SessionBackend {
  private readonly sessions = new Map<string, Map<string, string>>();

  async open(sessionId: string): Promise<SessionStore> {
    let fields = this.sessions.get(sessionId);
    if (!fields) {
      fields = new Map();
      this.sessions.set(sessionId, fields);
    }
    const data = fields;

    return {
      sessionId,
      get: async (field) => data.get(field),
      set: async (field, value) => {
        data.set(field, value);
      },
      delete: async (field) => {
        data.delete(field);
      }
    };
  }

  async destroy(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  /** Raw field snapshot, for test assertions. */
  snapshot(sessionId: string): Record<string, string> {
    return Object.fromEntries(this.sessions.get(sessionId) ?? []);
  }
}
