import type { FrameIdentity } from "@faultline/core";
import { FrameConfigurationError } from "@faultline/errors";

/**
 * Maps procedure names to stable numeric ids within a process.
 *
 * The id is what a `PROCID` token carries; lookup resolves it back to the
 * name for the error node's source procedure.
 */
export class ProcedureRegistry {
  private readonly byName = new Map<string, FrameIdentity>();
  private readonly byId = new Map<number, FrameIdentity>();
  private nextId: number;

  constructor(firstId = 1) {
    this.nextId = firstId;
  }

  /**
   * Return the identity for a name, registering it on first use.
   *
   * @throws FrameConfigurationError for a blank name
   */
  register(name: string): FrameIdentity {
    if (name.trim().length === 0) {
      throw new FrameConfigurationError("frame name must not be blank");
    }
    const existing = this.byName.get(name);
    if (existing !== undefined) {
      return existing;
    }
    const identity: FrameIdentity = Object.freeze({ id: this.nextId++, name });
    this.byName.set(name, identity);
    this.byId.set(identity.id, identity);
    return identity;
  }

  resolve(id: number): string | undefined {
    return this.byId.get(id)?.name;
  }

  identityOf(name: string): FrameIdentity | undefined {
    return this.byName.get(name);
  }
}
