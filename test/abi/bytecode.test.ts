import { describe, it, expect } from 'vitest';
import { Bytecode, Linker } from '../../src/abi/bytecode.js';
import { LinkerError } from '../../src/core/errors.js';
import type { Address } from '../../src/core/types.js';

const MATH = '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed' as Address;
const LEGACY_SLOT = '__Math__________________________________';
const HASHED_SLOT = '__$0123456789abcdef0123456789abcdef01$__';

describe('Bytecode', () => {
  it('finds legacy and hashed placeholders', () => {
    const code = Bytecode.fromHex(`0x6080${LEGACY_SLOT}00${HASHED_SLOT}`);
    expect(code.undefinedLibraries()).toEqual(['Math', '0123456789abcdef0123456789abcdef01']);
    expect(code.isLinked()).toBe(false);
  });

  it('replaces every occurrence of a library', () => {
    const code = Bytecode.fromHex(`0x60${LEGACY_SLOT}61${LEGACY_SLOT}`).link('Math', MATH);
    const address = MATH.slice(2).toLowerCase();
    expect(code.isLinked()).toBe(true);
    expect(code.toHex()).toBe(`0x60${address}61${address}`);
  });

  it('refuses to emit unlinked bytecode', () => {
    expect(() => Bytecode.fromHex(`0x60${LEGACY_SLOT}`).toHex()).toThrow('library Math is not linked');
  });

  it('rejects malformed input', () => {
    expect(() => Bytecode.fromHex('0x608')).toThrow(LinkerError);
    expect(() => Bytecode.fromHex('0x60zz')).toThrow('invalid bytecode character at offset 1');
    expect(() => Bytecode.fromHex('0x60__Math')).toThrow(LinkerError);
  });

  it('rejects links to libraries it does not reference', () => {
    expect(() => Bytecode.fromHex('0x6080').link('Math', MATH)).toThrow('bytecode does not reference library Math');
  });
});

describe('Linker', () => {
  it('links known addresses and queues libraries to deploy', () => {
    const linked = new Linker(`0x60${LEGACY_SLOT}61__Strings_______________________________`)
      .libraryAt('Math', MATH)
      .deployLibrary('Strings', '0x6001')
      .link();
    expect(linked.libraries).toEqual([{ name: 'Strings', bytecode: '0x6001' }]);
    expect(linked.contract.undefinedLibraries()).toEqual(['Strings']);
  });

  it('reports each linking problem by kind', () => {
    const kind = (fn: () => unknown): string | undefined => {
      try {
        fn();
      } catch (error) {
        if (error instanceof LinkerError) return error.kind;
        throw error;
      }
      return undefined;
    };
    expect(kind(() => new Linker('0x'))).toBe('empty-bytecode');
    expect(kind(() => new Linker(`0x60${LEGACY_SLOT}`).link())).toBe('missing-dependency');
    expect(kind(() => new Linker('0x6080').deployLibrary('Math', '0x00').link())).toBe('unused-dependency');
    expect(kind(() => new Linker(`0x60${LEGACY_SLOT}`).deployLibrary('Math', `0x${LEGACY_SLOT}`).link())).toBe(
      'nested-dependencies'
    );
    expect(
      kind(() => new Linker(`0x60${LEGACY_SLOT}`).deployLibrary('Math', '0x00').deployLibrary('Math', '0x01').link())
    ).toBe('unused-dependency');
  });
});
