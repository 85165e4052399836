/**
 * Offline emission of binding declarations
 */

import { IDENTIFIER } from './signature.js';
import type { ContractBindings, FunctionBinding, NativeParam } from './binding.js';

export interface RenderOptions {
  /** Contract name used as the prefix of emitted interfaces */
  name: string;
  /** Module the emitted code imports its support types from */
  importFrom?: string;
}

function parameterNames(params: ReadonlyArray<NativeParam>): string[] {
  const used = new Set<string>();
  return params.map((p, i) => {
    const name = p.name && IDENTIFIER.test(p.name) && !used.has(p.name) ? p.name : `arg${i}`;
    used.add(name);
    return name;
  });
}

function propertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

function outputType(outputs: ReadonlyArray<NativeParam>): string {
  const [only] = outputs;
  if (only === undefined) return 'undefined';
  if (outputs.length === 1) return only.tsType;
  const names = outputs.map((o) => o.name);
  if (names.every((n) => n !== '' && IDENTIFIER.test(n)) && new Set(names).size === names.length) {
    return `{ ${outputs.map((o) => `${o.name}: ${o.tsType}`).join('; ')} }`;
  }
  return `readonly [${outputs.map((o) => o.tsType).join(', ')}]`;
}

function renderMethod(binding: FunctionBinding, returns: string, extra?: string): string[] {
  const names = parameterNames(binding.inputs);
  const params = binding.inputs.map((p, i) => `${names[i] ?? `arg${i}`}: ${p.tsType}`);
  if (extra) params.push(extra);
  return [
    `  /** ${binding.descriptor.signature} ${binding.descriptor.selector} */`,
    `  ${propertyKey(binding.callableName)}(${params.join(', ')}): ${returns};`,
  ];
}

/**
 * TypeScript declaration source for a contract's typed surface
 */
export function renderBindings(bindings: ContractBindings, options: RenderOptions): string {
  if (!IDENTIFIER.test(options.name)) {
    throw new TypeError(`"${options.name}" is not a valid interface prefix`);
  }
  const name = options.name;
  const importFrom = options.importFrom ?? 'ethbind';
  const reads = bindings.functions.filter((f) => f.kind === 'read');
  const writes = bindings.functions.filter((f) => f.kind === 'write');

  const lines: string[] = [
    `export interface ${name}Read {`,
    ...reads.flatMap((f) => renderMethod(f, `Promise<${outputType(f.outputs)}>`, 'options?: CallOptions')),
    '}',
    '',
    `export interface ${name}Write {`,
    ...writes.flatMap((f) => renderMethod(f, 'Promise<PendingTransaction>', 'options?: SendOptions')),
    '}',
    '',
    `export interface ${name}Events {`,
  ];

  for (const event of bindings.events) {
    const fields = event.descriptor.inputs.map((p, i) => {
      const field = event.fields[i];
      const tsType = p.indexed && field && isHashed(field.abiType) ? 'Hash' : (field?.tsType ?? 'unknown');
      return `${propertyKey(p.name || String(i))}: ${tsType}`;
    });
    lines.push(`  /** ${event.descriptor.signature} */`);
    lines.push(`  ${propertyKey(event.callableName)}: { ${fields.join('; ')} };`);
  }
  lines.push('}', '');

  const body = lines.join('\n');
  const used = SUPPORT_TYPES.filter((t) => new RegExp(`\\b${t}\\b`).test(body));
  const header = used.length > 0 ? `import type { ${used.join(', ')} } from '${importFrom}';\n\n` : '';
  return header + body;
}

const SUPPORT_TYPES = ['Address', 'CallOptions', 'Hash', 'Hex', 'PendingTransaction', 'SendOptions'];

function isHashed(abiType: string): boolean {
  return abiType === 'string' || abiType === 'bytes' || abiType.endsWith(']') || abiType.startsWith('(');
}
