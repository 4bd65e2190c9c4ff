// Strongly-typed model for bit-pattern rules and the decision tables built from them

export type OpcodeWidth = 8 | 16 | 32 | 64;

export type BitSpec =
  | { kind: "fixed"; bit: 0 | 1 }
  | { kind: "wildcard" }
  | { kind: "variable"; name: string };

export interface Pattern {
  source: string; // as written, separators included
  width: OpcodeWidth;
  bits: BitSpec[]; // index 0 is the most significant bit
}

// Typed constants a handler can be bound to
export type Scalar = number | bigint | boolean | string;

export type MapperFn = (raw: number) => Scalar;

export type LiteralTable = ReadonlyMap<number, Scalar>;

export interface VariableDecl {
  type: string; // declared type name, e.g. "Register" or "u8"
  mapping?: LiteralTable | Record<number, Scalar> | MapperFn;
}

export type Binding =
  | { kind: "raw" }
  | { kind: "literal"; table: LiteralTable }
  | { kind: "function"; fn: MapperFn; name?: string };

export type BindingKind = Binding["kind"];

export interface VariableGroup {
  name: string;
  type: string;
  positions: number[]; // MSB first
  binding: Binding;
}

export type GenericArg =
  | { kind: "var"; name: string }
  | { kind: "literal"; value: Scalar };

// What a caller (or the table language) declares for one rule
export interface RuleDecl {
  pattern: string;
  handler: string;
  args?: GenericArg[];
  where?: Record<string, VariableDecl>;
  line?: number; // source line, when the rule came from a table file
}

export interface Rule {
  index: number; // declaration order
  pattern: Pattern;
  handler: string;
  args: GenericArg[];
  variables: VariableGroup[];
  line?: number;
}

export interface DispatchEntry {
  rule: number; // index of the originating rule
  mask: bigint;
  expected: bigint;
  handler: string;
  values: Scalar[]; // one per generic argument
  raw: Record<string, number>; // raw bits per variable for this combination
}

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  code: "AmbiguousPattern" | "UnreachablePattern";
  severity: DiagnosticSeverity;
  message: string;
  rules: number[]; // rule indices involved
}

export interface DecisionTable {
  readonly width: OpcodeWidth;
  readonly rules: readonly Rule[];
  readonly entries: readonly DispatchEntry[];
  readonly warnings: readonly Diagnostic[];
}

export const RAW_INTEGER_TYPES: readonly string[] = [
  "u8",
  "u16",
  "u32",
  "u64",
  "uint",
  "number",
];

export function isRawIntegerType(type: string): boolean {
  return RAW_INTEGER_TYPES.includes(type);
}

// Tiny helpers to build declarations inline
export function raw(type = "uint"): VariableDecl {
  if (!isRawIntegerType(type))
    throw new Error(`Not a raw integer type: ${type}`);
  return { type };
}

export function literal(
  type: string,
  entries: Record<number, Scalar> | LiteralTable,
): VariableDecl {
  return { type, mapping: entries };
}

export function mapped(type: string, fn: MapperFn): VariableDecl {
  return { type, mapping: fn };
}

export function argVar(name: string): GenericArg {
  return { kind: "var", name };
}

export function argLit(value: Scalar): GenericArg {
  return { kind: "literal", value };
}
