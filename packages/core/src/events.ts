// EventBus: typed pub/sub for cross-cutting concerns (audit, metrics, UI mirrors)

import type { AssistantMessage, CapabilityCallRequest, Logger, ToolrelayError } from "./types";

export interface ToolrelayEvents {
  "turn:started": { conversationId: string; turnId: string; utterance: string };
  "turn:completed": {
    conversationId: string;
    turnId: string;
    message: AssistantMessage;
    rounds: number;
    durationMs: number;
  };
  "turn:failed": { conversationId: string; turnId: string; error: ToolrelayError; durationMs: number };
  "capability:calling": { conversationId: string; call: CapabilityCallRequest };
  "capability:result": {
    conversationId: string;
    call: CapabilityCallRequest;
    content: string;
    isError: boolean;
    durationMs: number;
  };
  "catalog:refreshed": { capabilities: number; failedSessions: string[] };
}

export type ToolrelayEventName = keyof ToolrelayEvents;

export type EventListener<K extends ToolrelayEventName> = (data: ToolrelayEvents[K]) => void | Promise<void>;

export interface EventBus {
  /** Fire-and-forget emit. Listener errors are caught and logged, never block the caller. */
  emit<K extends ToolrelayEventName>(event: K, data: ToolrelayEvents[K]): void;
  /** Async emit. Awaits all listeners and collects errors. */
  emitAsync<K extends ToolrelayEventName>(event: K, data: ToolrelayEvents[K]): Promise<void>;
  on<K extends ToolrelayEventName>(event: K, handler: EventListener<K>): void;
  off<K extends ToolrelayEventName>(event: K, handler: EventListener<K>): void;
}

type Handler = (data: unknown) => void | Promise<void>;

export class SimpleEventBus implements EventBus {
  private handlers = new Map<ToolrelayEventName, Set<Handler>>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "EventBus" });
  }

  emit<K extends ToolrelayEventName>(event: K, data: ToolrelayEvents[K]): void {
    const handlers = this.handlers.get(event);
    if (!handlers) return;

    for (const handler of handlers) {
      try {
        const result = handler(data);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            this.logger.error("Async listener error (fire-and-forget)", { event, error: String(error) });
          });
        }
      } catch (error) {
        this.logger.error("Sync listener error", { event, error: String(error) });
      }
    }
  }

  async emitAsync<K extends ToolrelayEventName>(event: K, data: ToolrelayEvents[K]): Promise<void> {
    const handlers = this.handlers.get(event);
    if (!handlers) return;

    const errors: unknown[] = [];
    await Promise.all(
      [...handlers].map(async (handler) => {
        try {
          await handler(data);
        } catch (error) {
          errors.push(error);
        }
      }),
    );

    if (errors.length > 0) {
      this.logger.error("emitAsync listener errors", {
        event,
        errorCount: errors.length,
        errors: errors.map(String),
      });
    }
  }

  on<K extends ToolrelayEventName>(event: K, handler: EventListener<K>): void {
    let handlers = this.handlers.get(event);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(event, handlers);
    }
    handlers.add(handler as Handler);
  }

  off<K extends ToolrelayEventName>(event: K, handler: EventListener<K>): void {
    this.handlers.get(event)?.delete(handler as Handler);
  }
}
