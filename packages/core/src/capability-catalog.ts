// CapabilityCatalog: aggregates and normalizes capabilities from every session
//
// Rebuilt wholesale on each refresh, never patched in place. Order is
// provider order, then the order each provider listed its capabilities in;
// that order is also dispatch precedence.

import type {
  CapabilityDescriptor,
  CapabilitySession,
  JsonObject,
  Logger,
  ObjectSchema,
  RawCapabilityDescriptor,
  SessionFailure,
} from "./types";
import {
  CatalogRefreshPartialFailure,
  DuplicateCapabilityError,
  TurnCancelledError,
  describeError,
  isJsonObject,
  toJsonValue,
} from "./types";

export type DuplicateNamePolicy = "shadow" | "reject";

export interface CatalogOptions {
  /** Parameter injected at dispatch time; never advertised to the model. */
  readonly reservedParam: string;
  readonly duplicateNames?: DuplicateNamePolicy;
  readonly logger: Logger;
}

export interface CatalogEntry {
  readonly descriptor: CapabilityDescriptor;
  readonly session: string;
}

export interface CatalogRefreshOutcome {
  readonly descriptors: readonly CapabilityDescriptor[];
  /** Present when at least one session failed to list. */
  readonly failure?: CatalogRefreshPartialFailure;
}

function normalizeRequired(value: unknown, reservedParam: string): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((entry): entry is string => typeof entry === "string" && entry !== reservedParam);
}

/**
 * Coerce any schema document into a well-formed object schema.
 * Returns a fresh copy; idempotent.
 */
export function normalizeParameterSchema(raw: unknown, reservedParam: string): ObjectSchema {
  const copy = toJsonValue(raw);
  const source: JsonObject = isJsonObject(copy) ? copy : {};

  const properties: JsonObject = isJsonObject(source.properties) ? { ...source.properties } : {};
  delete properties[reservedParam];

  const schema: ObjectSchema = { type: "object", properties };
  for (const [keyword, value] of Object.entries(source)) {
    if (keyword === "type" || keyword === "properties" || keyword === "required") continue;
    schema[keyword] = value;
  }

  const required = normalizeRequired(source.required, reservedParam);
  if (required) schema.required = required;

  return schema;
}

export function normalizeDescriptor(raw: RawCapabilityDescriptor, reservedParam: string): CapabilityDescriptor {
  return {
    name: raw.name,
    description: typeof raw.description === "string" ? raw.description : "",
    parameters: normalizeParameterSchema(raw.inputSchema, reservedParam),
  };
}

export class CapabilityCatalog {
  private entries: CatalogEntry[] = [];
  private index = new Map<string, string[]>();
  private readonly logger: Logger;
  private readonly reservedParam: string;
  private readonly duplicateNames: DuplicateNamePolicy;

  constructor(options: CatalogOptions) {
    this.logger = options.logger.child({ component: "CapabilityCatalog" });
    this.reservedParam = options.reservedParam;
    this.duplicateNames = options.duplicateNames ?? "shadow";
  }

  get descriptors(): CapabilityDescriptor[] {
    return this.entries.map((e) => e.descriptor);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Session names advertising `name`, in registration order. */
  sessionsFor(name: string): readonly string[] {
    return this.index.get(name) ?? [];
  }

  /**
   * The descriptor that wins dispatch precedence for `name`, or the one a
   * specific session advertised when `session` is given.
   */
  find(name: string, session?: string): CapabilityDescriptor | undefined {
    return this.entries.find((e) => e.descriptor.name === name && (session === undefined || e.session === session))
      ?.descriptor;
  }

  /**
   * Query every session and rebuild the catalog. A session that fails to
   * list is logged and skipped. Under the "reject" policy a duplicate name
   * throws DuplicateCapabilityError and the previous catalog stays in place.
   */
  async refresh(
    sessions: readonly CapabilitySession[],
    options?: { signal?: AbortSignal },
  ): Promise<CatalogRefreshOutcome> {
    const entries: CatalogEntry[] = [];
    const failures: SessionFailure[] = [];

    for (const session of sessions) {
      if (options?.signal?.aborted) {
        throw new TurnCancelledError("Catalog refresh cancelled", options.signal.reason);
      }

      let listed: RawCapabilityDescriptor[];
      try {
        listed = await session.listCapabilities({ signal: options?.signal });
      } catch (error) {
        if (options?.signal?.aborted) {
          throw new TurnCancelledError("Catalog refresh cancelled", error);
        }
        this.logger.warn("Failed to list capabilities, skipping session", {
          session: session.name,
          error: describeError(error),
        });
        failures.push({ session: session.name, error });
        continue;
      }

      for (const raw of listed) {
        if (typeof raw.name !== "string" || raw.name.length === 0) {
          this.logger.warn("Skipping capability without a name", { session: session.name });
          continue;
        }
        entries.push({ descriptor: normalizeDescriptor(raw, this.reservedParam), session: session.name });
      }
    }

    const index = this.buildIndex(entries);

    this.entries = entries;
    this.index = index;

    const failure = failures.length > 0 ? new CatalogRefreshPartialFailure(failures) : undefined;
    this.logger.info("Catalog refreshed", {
      sessions: sessions.length,
      capabilities: entries.length,
      failedSessions: failures.length,
    });

    return { descriptors: this.descriptors, failure };
  }

  private buildIndex(entries: readonly CatalogEntry[]): Map<string, string[]> {
    const index = new Map<string, string[]>();
    const shadowed = new Set<string>();

    for (const { descriptor, session } of entries) {
      const owners = index.get(descriptor.name);
      if (!owners) {
        index.set(descriptor.name, [session]);
        continue;
      }
      if (!owners.includes(session)) owners.push(session);
      shadowed.add(descriptor.name);
    }

    for (const name of shadowed) {
      const owners = index.get(name) ?? [];
      if (this.duplicateNames === "reject") {
        throw new DuplicateCapabilityError(name, owners);
      }
      this.logger.warn("Capability advertised more than once; first provider wins", {
        capability: name,
        sessions: owners,
      });
    }

    return index;
  }
}
