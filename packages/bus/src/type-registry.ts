/**
 * Message type registry for the bus.
 *
 * Maps a stable numeric type code to a unique name. Registration normally
 * happens at startup; afterwards the registry is read-mostly. Each bus owns
 * its own registry instance, so tests and embedded buses never share
 * routing tables.
 *
 * @module bus/type-registry
 */
import { BusConfigError, DuplicateTypeError, NotRegisteredError } from './errors.js';
import type { MessageTypeInfo } from './types.js';

export class TypeRegistry {
  private readonly byCode = new Map<number, MessageTypeInfo>();
  private readonly byName = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Register a message type.
   *
   * Registering the same code under the same name again is a no-op.
   *
   * @throws {DuplicateTypeError} If the code or the name is already mapped to a different entry.
   * @throws {BusConfigError} If the code is not a non-negative integer or the name is blank.
   */
  register(typeCode: number, name: string): MessageTypeInfo {
    if (!Number.isInteger(typeCode) || typeCode < 0) {
      throw new BusConfigError(`type code must be a non-negative integer, got ${typeCode}`);
    }
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new BusConfigError(`type ${typeCode} needs a non-empty name`);
    }

    const existing = this.byCode.get(typeCode);
    if (existing) {
      if (existing.name === trimmed) return existing;
      throw new DuplicateTypeError(typeCode, trimmed, `existing name "${existing.name}"`);
    }

    const codeForName = this.byName.get(trimmed);
    if (codeForName !== undefined) {
      throw new DuplicateTypeError(typeCode, trimmed, `type code ${codeForName}`);
    }

    const info: MessageTypeInfo = Object.freeze({
      typeCode,
      name: trimmed,
      registeredAt: new Date(this.now()).toISOString(),
    });
    this.byCode.set(typeCode, info);
    this.byName.set(trimmed, typeCode);
    return info;
  }

  /**
   * Return the registered name for a type code.
   *
   * @throws {NotRegisteredError} If nothing is registered under the code.
   */
  lookup(typeCode: number): string {
    const info = this.byCode.get(typeCode);
    if (!info) throw new NotRegisteredError(typeCode);
    return info.name;
  }

  /** Registration details for a type code, if registered. */
  get(typeCode: number): MessageTypeInfo | undefined {
    return this.byCode.get(typeCode);
  }

  /** Reverse lookup from name to type code. */
  resolve(name: string): number | undefined {
    return this.byName.get(name.trim());
  }

  has(typeCode: number): boolean {
    return this.byCode.has(typeCode);
  }

  /** All registered types, ordered by type code. */
  list(): MessageTypeInfo[] {
    return [...this.byCode.values()].sort((a, b) => a.typeCode - b.typeCode);
  }

  get size(): number {
    return this.byCode.size;
  }
}
