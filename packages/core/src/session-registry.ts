// SessionRegistry: ordered, name-unique set of capability sessions

import type { CapabilitySession, Logger } from "./types";
import { RegistrationError, describeError } from "./types";

/**
 * In-memory registry backed by a Map. Insertion order is registration
 * order, which the catalog and dispatcher use as precedence.
 * Mutated only by explicit administrative calls, never during a dispatch.
 */
export class SessionRegistry {
  private sessions = new Map<string, CapabilitySession>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "SessionRegistry" });
  }

  add(session: CapabilitySession): void {
    if (this.sessions.has(session.name)) {
      throw new RegistrationError(`Session "${session.name}" is already registered`);
    }
    this.sessions.set(session.name, session);
    this.logger.info("Session registered", { session: session.name, total: this.sessions.size });
  }

  get(name: string): CapabilitySession | undefined {
    return this.sessions.get(name);
  }

  list(): CapabilitySession[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Close every session. A failing close is logged and does not stop the
   * others; the registry is empty afterwards.
   */
  async closeAll(): Promise<void> {
    for (const session of this.sessions.values()) {
      if (!session.close) continue;
      try {
        await session.close();
      } catch (error) {
        this.logger.warn("Failed to close session", {
          session: session.name,
          error: describeError(error),
        });
      }
    }
    this.sessions.clear();
  }
}
