// LocalCapabilitySession: an in-process capability provider backed by handlers

import type {
  CapabilityResult,
  CapabilitySession,
  JsonObject,
  RawCapabilityDescriptor,
  SessionCallOptions,
} from "./types";
import { RegistrationError, ToolrelayError, describeError } from "./types";

export type CapabilityHandler = (
  args: JsonObject,
  options: SessionCallOptions,
) => Promise<string | CapabilityResult>;

/**
 * Serves registered handlers through the CapabilitySession contract.
 * Invoking an unknown name rejects, which the dispatcher treats as the
 * session declining the call.
 */
export class LocalCapabilitySession implements CapabilitySession {
  private capabilities = new Map<string, { descriptor: RawCapabilityDescriptor; handler: CapabilityHandler }>();

  constructor(readonly name: string) {}

  register(descriptor: RawCapabilityDescriptor, handler: CapabilityHandler): this {
    if (this.capabilities.has(descriptor.name)) {
      throw new RegistrationError(`Capability "${descriptor.name}" is already registered on session "${this.name}"`);
    }
    this.capabilities.set(descriptor.name, { descriptor, handler });
    return this;
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  get size(): number {
    return this.capabilities.size;
  }

  async listCapabilities(): Promise<RawCapabilityDescriptor[]> {
    return Array.from(this.capabilities.values(), (c) => c.descriptor);
  }

  /**
   * Handler exceptions come back as an error result: the session accepted
   * the call, so the dispatcher must not fall through to another provider.
   */
  async invoke(name: string, args: JsonObject, options: SessionCallOptions = {}): Promise<CapabilityResult> {
    const entry = this.capabilities.get(name);
    if (!entry) {
      throw new ToolrelayError(`Unknown capability "${name}" on session "${this.name}"`, "CAPABILITY_NOT_FOUND");
    }

    try {
      const output = await entry.handler(args, options);
      return typeof output === "string" ? { content: [{ type: "text", text: output }] } : output;
    } catch (error) {
      return {
        content: [{ type: "text", text: `Error executing "${name}": ${describeError(error)}` }],
        isError: true,
      };
    }
  }
}
