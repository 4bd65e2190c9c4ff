// Turns a DecisionTable into something that dispatches: an in-process
// function, or TypeScript source with one specialised call site per entry.

import { DecisionTable, DispatchEntry, OpcodeWidth, Scalar } from "./types";
import { fullMask } from "./parse";
import { UnknownHandlerError, UnmatchedOpcodeError } from "./errors";

export type Opcode = number | bigint;

// Method syntax keeps handler parameters bivariant, so a handler may declare
// narrower value types (an enum, a boolean) than Scalar.
export type Handler<C, O extends Opcode = number> = {
  bivarianceHack(ctx: C, opcode: O, ...values: Scalar[]): void;
}["bivarianceHack"];

export type HandlerMap<C, O extends Opcode = number> = Record<
  string,
  Handler<C, O>
>;

export type Dispatcher<C, O extends Opcode = number> = (
  ctx: C,
  opcode: O,
) => void;

export type DispatchStrategy = "chain" | "lookup";

export interface DispatcherOptions<C, O extends Opcode = number> {
  strategy?: DispatchStrategy;
  // Called instead of throwing UnmatchedOpcodeError
  fallback?: Dispatcher<C, O>;
}

function toBigInt(opcode: Opcode): bigint {
  return typeof opcode === "bigint" ? opcode : BigInt(opcode);
}

function bindEntries<C, O extends Opcode>(
  entries: readonly DispatchEntry[],
  handlers: HandlerMap<C, O>,
): Dispatcher<C, O>[] {
  return entries.map((entry) => {
    if (!Object.hasOwn(handlers, entry.handler))
      throw new UnknownHandlerError(entry.handler);
    const handler = handlers[entry.handler];
    const values = [...entry.values];
    return (ctx: C, opcode: O) => handler(ctx, opcode, ...values);
  });
}

/**
 * Build a dispatch function over a compiled table. Entries are tried in table
 * order and the first `(opcode & mask) === expected` wins.
 */
export function createDispatcher<C, O extends Opcode = number>(
  table: DecisionTable,
  handlers: HandlerMap<C, O>,
  options: DispatcherOptions<C, O> = {},
): Dispatcher<C, O> {
  const calls = bindEntries(table.entries, handlers);
  const strategy = options.strategy ?? (table.width === 8 ? "lookup" : "chain");
  const unmatched: Dispatcher<C, O> =
    options.fallback ??
    ((_ctx, opcode) => {
      throw new UnmatchedOpcodeError(opcode);
    });

  if (table.width === 64) {
    if (strategy === "lookup")
      throw new RangeError("lookup dispatch needs an 8- or 16-bit table");
    const masks = table.entries.map((entry) => entry.mask);
    const expected = table.entries.map((entry) => entry.expected);
    return (ctx, opcode) => {
      const op = toBigInt(opcode);
      for (let i = 0; i < calls.length; i++) {
        if ((op & masks[i]) === expected[i]) return calls[i](ctx, opcode);
      }
      unmatched(ctx, opcode);
    };
  }

  const widthMask = Number(fullMask(table.width));
  const masks = table.entries.map((entry) => Number(entry.mask));
  const expected = table.entries.map((entry) => Number(entry.expected));
  const toNumber = (opcode: Opcode): number =>
    typeof opcode === "bigint"
      ? Number(BigInt.asUintN(table.width, opcode))
      : opcode;

  if (strategy === "lookup") {
    if (table.width > 16)
      throw new RangeError("lookup dispatch needs an 8- or 16-bit table");
    const slots = new Int32Array(widthMask + 1).fill(-1);
    for (let op = 0; op <= widthMask; op++) {
      for (let i = 0; i < masks.length; i++) {
        if ((op & masks[i]) === expected[i]) {
          slots[op] = i;
          break;
        }
      }
    }
    return (ctx, opcode) => {
      const slot = slots[toNumber(opcode) & widthMask];
      if (slot < 0) return unmatched(ctx, opcode);
      calls[slot](ctx, opcode);
    };
  }

  return (ctx, opcode) => {
    const op = toNumber(opcode);
    for (let i = 0; i < calls.length; i++) {
      if ((op & masks[i]) >>> 0 === expected[i]) return calls[i](ctx, opcode);
    }
    unmatched(ctx, opcode);
  };
}

export interface EmitOptions {
  dispatcherName?: string;
  contextType?: string;
  // Module the handlers and context type are imported from
  handlerImport?: string;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function renderScalar(value: Scalar): string {
  switch (typeof value) {
    case "bigint":
      return `${value}n`;
    case "string":
      return JSON.stringify(value);
    default:
      return String(value);
  }
}

function hex(value: bigint, width: number, big: boolean): string {
  return `0x${value.toString(16).padStart(width / 4, "0")}${big ? "n" : ""}`;
}

function condition(entry: DispatchEntry, width: OpcodeWidth): string | null {
  const big = width === 64;
  if (entry.mask === 0n) return null;
  if (entry.mask === fullMask(width))
    return `opcode === ${hex(entry.expected, width, big)}`;
  const masked = `opcode & ${hex(entry.mask, width, big)}`;
  if (width === 32)
    return `(${masked}) >>> 0 === ${hex(entry.expected, width, big)}`;
  return `(${masked}) === ${hex(entry.expected, width, big)}`;
}

/**
 * Emit a TypeScript module exporting one dispatcher function. Every entry
 * becomes its own guarded call with its bound values written out as literals.
 */
export function emitSource(
  table: DecisionTable,
  options: EmitOptions = {},
): string {
  const name = options.dispatcherName ?? "dispatch";
  const contextType = options.contextType ?? "unknown";
  const opcodeType = table.width === 64 ? "bigint" : "number";

  const handlerNames = [...new Set(table.entries.map((e) => e.handler))];
  for (const id of [name, ...handlerNames]) {
    if (!IDENTIFIER.test(id))
      throw new Error(`Cannot emit '${id}': not a valid identifier`);
  }

  const lines: string[] = ["// Generated by opdispatch. Do not edit by hand.", ""];

  if (options.handlerImport) {
    const imports = [...handlerNames].sort();
    const typeImport =
      IDENTIFIER.test(contextType) && contextType !== "unknown"
        ? [`type ${contextType}`]
        : [];
    lines.push(
      `import { ${[...typeImport, ...imports].join(", ")} } from ${JSON.stringify(options.handlerImport)};`,
      "",
    );
  }

  lines.push(
    `export function ${name}(ctx: ${contextType}, opcode: ${opcodeType}): void {`,
  );

  let total = false; // an unconditional entry ends the chain
  for (const entry of table.entries) {
    const args = ["ctx", "opcode", ...entry.values.map(renderScalar)].join(", ");
    const call = `return ${entry.handler}(${args});`;
    const rawNames = Object.keys(entry.raw);
    const note = rawNames.length
      ? ` // ${rawNames.map((v) => `${v}=${entry.raw[v]}`).join(" ")}`
      : "";
    const test = condition(entry, table.width);
    if (test === null) {
      lines.push(`  ${call}${note}`);
      total = true;
      break;
    }
    lines.push(`  if (${test}) ${call}${note}`);
  }

  if (!total) {
    lines.push(
      `  throw new Error("Unhandled opcode: 0x" + opcode.toString(16).toUpperCase());`,
    );
  }
  lines.push("}", "");
  return lines.join("\n");
}
