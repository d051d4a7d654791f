// Test fixture: capability session with scripted listing and invoke behaviour

import type {
  CapabilityResult,
  CapabilitySession,
  JsonObject,
  RawCapabilityDescriptor,
  SessionCallOptions,
} from "../types";

export type InvokeBehaviour =
  | { readonly text: string }
  | { readonly result: CapabilityResult }
  | { readonly reject: Error }
  | { readonly hang: true };

export interface InvocationRecord {
  readonly name: string;
  readonly args: JsonObject;
}

export class MockCapabilitySession implements CapabilitySession {
  public invocations: InvocationRecord[] = [];
  public closed = false;
  private behaviours = new Map<string, InvokeBehaviour>();

  constructor(
    readonly name: string,
    private capabilities: RawCapabilityDescriptor[] | Error = [],
  ) {}

  /** Set how invoke(name) behaves. Unscripted names reject as "not found". */
  on(capability: string, behaviour: InvokeBehaviour): this {
    this.behaviours.set(capability, behaviour);
    return this;
  }

  async listCapabilities(): Promise<RawCapabilityDescriptor[]> {
    if (this.capabilities instanceof Error) throw this.capabilities;
    return this.capabilities;
  }

  async invoke(name: string, args: JsonObject, options?: SessionCallOptions): Promise<CapabilityResult> {
    this.invocations.push({ name, args });
    const behaviour = this.behaviours.get(name);

    if (!behaviour) throw new Error(`tool ${name} not found`);
    if ("reject" in behaviour) throw behaviour.reject;
    if ("result" in behaviour) return behaviour.result;
    if ("text" in behaviour) return { content: [{ type: "text", text: behaviour.text }] };

    // Never settles on its own; only an abort ends it.
    return new Promise<CapabilityResult>((_, reject) => {
      options?.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
