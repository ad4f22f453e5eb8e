// api/_lib/services/sessionStore.ts
// In-process registry of conversation sessions; nothing survives a restart.
import { withModule } from '../logger';
import { AppError } from '../errors';
import { ConversationSession, type ConversationSessionOptions } from './conversationSession';

const log = withModule('sessionStore');

export class SessionStore {
  private readonly sessions = new Map<string, ConversationSession>();

  /**
   * @param defaults merged under the options of every session this store creates
   */
  constructor(private readonly defaults: Omit<ConversationSessionOptions, 'id'> = {}) {}

  get size(): number {
    return this.sessions.size;
  }

  /** Throws when the id is already taken. */
  create(options: ConversationSessionOptions = {}): ConversationSession {
    if (options.id !== undefined && this.sessions.has(options.id)) {
      throw new AppError(`Session already exists: ${options.id}`, 'ERR_SESSION_EXISTS');
    }
    const session = new ConversationSession({ ...this.defaults, ...options });
    this.sessions.set(session.id, session);
    log.debug('Session created', { sessionId: session.id, culturalContext: session.culturalContext });
    return session;
  }

  get(id: string): ConversationSession | undefined {
    return this.sessions.get(id);
  }

  getOrCreate(id: string, options: Omit<ConversationSessionOptions, 'id'> = {}): ConversationSession {
    return this.sessions.get(id) ?? this.create({ ...options, id });
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  delete(id: string): boolean {
    const removed = this.sessions.delete(id);
    if (removed) log.debug('Session deleted', { sessionId: id });
    return removed;
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  clear(): void {
    this.sessions.clear();
  }
}
