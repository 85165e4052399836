/**
 * Contract bytecode with unlinked library placeholders
 *
 * Compilers leave a 20-byte slot for every library address, written as a
 * 40-character placeholder: `__Name_____...` (legacy) or `__$hash$__`.
 */

import type { Address, Hex } from '../core/types.js';
import { assertAddress } from '../core/address.js';
import { LinkerError } from '../core/errors.js';

const SLOT_LENGTH = 40;

function placeholderName(slot: string): string {
  const inner = slot.slice(2);
  if (inner.startsWith('$')) {
    return inner.replace(/\$__$/, '').slice(1);
  }
  return inner.replace(/_+$/, '');
}

/**
 * Immutable bytecode; `link` returns a new instance
 */
export class Bytecode {
  private readonly text: string;
  private readonly slots: ReadonlyArray<{ readonly offset: number; readonly name: string }>;

  private constructor(text: string) {
    const slots: Array<{ offset: number; name: string }> = [];
    let i = 0;
    while (i < text.length) {
      if (text.startsWith('__', i)) {
        const slot = text.slice(i, i + SLOT_LENGTH);
        const name = placeholderName(slot);
        if (slot.length !== SLOT_LENGTH || name === '') {
          throw new LinkerError('invalid-bytecode', `malformed library placeholder at offset ${i / 2}`);
        }
        slots.push({ offset: i, name });
        i += SLOT_LENGTH;
      } else {
        const pair = text.slice(i, i + 2);
        if (!/^[0-9a-fA-F]{2}$/.test(pair)) {
          throw new LinkerError('invalid-bytecode', `invalid bytecode character at offset ${i / 2}`);
        }
        i += 2;
      }
    }
    this.text = text;
    this.slots = slots;
  }

  /**
   * Parse compiler output. `0x` and the empty string give empty bytecode.
   */
  static fromHex(hex: string): Bytecode {
    const text = hex.trim().replace(/^0x/, '');
    if (text.length % 2 !== 0) {
      throw new LinkerError('invalid-bytecode', 'bytecode has an odd number of characters');
    }
    return new Bytecode(text);
  }

  isEmpty(): boolean {
    return this.text.length === 0;
  }

  /**
   * Libraries still to be linked, in order of first appearance
   */
  undefinedLibraries(): string[] {
    return [...new Set(this.slots.map((s) => s.name))];
  }

  isLinked(): boolean {
    return this.slots.length === 0;
  }

  /**
   * Replace every placeholder of `name` with `address`
   */
  link(name: string, address: Address): Bytecode {
    assertAddress(address);
    if (!this.slots.some((s) => s.name === name)) {
      throw new LinkerError('unused-dependency', `bytecode does not reference library ${name}`, name);
    }
    const replacement = address.slice(2).toLowerCase();
    let text = this.text;
    for (const slot of this.slots) {
      if (slot.name === name) {
        text = text.slice(0, slot.offset) + replacement + text.slice(slot.offset + SLOT_LENGTH);
      }
    }
    return new Bytecode(text);
  }

  /**
   * Deployable hex. Throws while any library is unlinked.
   */
  toHex(): Hex {
    const [first] = this.undefinedLibraries();
    if (first !== undefined) {
      throw new LinkerError('missing-dependency', `library ${first} is not linked`, first);
    }
    return `0x${this.text.toLowerCase()}`;
  }

  toString(): string {
    return `0x${this.text}`;
  }
}

type Library = { readonly kind: 'resolved'; readonly address: Address } | { readonly kind: 'pending'; readonly bytecode: Bytecode };

export interface PendingLibrary {
  readonly name: string;
  readonly bytecode: Hex;
}

/**
 * Result of linking: libraries to deploy first, then the contract once their
 * addresses are linked in
 */
export interface LinkedDeployment {
  readonly libraries: ReadonlyArray<PendingLibrary>;
  readonly contract: Bytecode;
}

/**
 * Collects library addresses and bytecodes; every problem is reported by `link()`
 */
export class Linker {
  private readonly bytecode: Bytecode;
  private readonly libraries: Array<{ name: string; library: Library }> = [];

  constructor(bytecode: Bytecode | string) {
    const parsed = typeof bytecode === 'string' ? Bytecode.fromHex(bytecode) : bytecode;
    if (parsed.isEmpty()) {
      throw new LinkerError('empty-bytecode', 'contract has no bytecode to deploy');
    }
    this.bytecode = parsed;
  }

  /** Link an already deployed library */
  libraryAt(name: string, address: Address): this {
    this.libraries.push({ name, library: { kind: 'resolved', address } });
    return this;
  }

  /** Deploy a library before the contract */
  deployLibrary(name: string, bytecode: Bytecode | string): this {
    const parsed = typeof bytecode === 'string' ? Bytecode.fromHex(bytecode) : bytecode;
    this.libraries.push({ name, library: { kind: 'pending', bytecode: parsed } });
    return this;
  }

  link(): LinkedDeployment {
    let contract = this.bytecode;
    const pending = new Map<string, Bytecode>();

    for (const { name, library } of this.libraries) {
      if (library.kind === 'resolved') {
        contract = contract.link(name, library.address);
      } else {
        if (pending.has(name)) {
          throw new LinkerError('unused-dependency', `library ${name} added more than once`, name);
        }
        pending.set(name, library.bytecode);
      }
    }

    const libraries: PendingLibrary[] = [];
    for (const name of contract.undefinedLibraries()) {
      const bytecode = pending.get(name);
      if (bytecode === undefined) {
        throw new LinkerError('missing-dependency', `no address or bytecode for library ${name}`, name);
      }
      pending.delete(name);
      if (!bytecode.isLinked()) {
        throw new LinkerError('nested-dependencies', `library ${name} has unlinked dependencies of its own`, name);
      }
      libraries.push({ name, bytecode: bytecode.toHex() });
    }

    const [unused] = pending.keys();
    if (unused !== undefined) {
      throw new LinkerError('unused-dependency', `library ${unused} is not referenced by the contract`, unused);
    }

    return { libraries, contract };
  }
}
