// Works out, per variable letter, where its bits live and how raw bits become a value.

import {
  Binding,
  LiteralTable,
  Pattern,
  Scalar,
  VariableDecl,
  VariableGroup,
  isRawIntegerType,
} from "./types";
import { variableNames } from "./parse";
import {
  MissingMappingError,
  UnknownVariableError,
  UnmappedCombinationError,
  VariableWidthOverflowError,
} from "./errors";

// Widest variable the expansion enumerates with plain numbers
export const MAX_VARIABLE_BITS = 31;

function isLiteralTable(
  mapping: LiteralTable | Record<number, Scalar>,
): mapping is LiteralTable {
  return mapping instanceof Map;
}

function toLiteralTable(
  mapping: LiteralTable | Record<number, Scalar>,
): Map<number, Scalar> {
  if (isLiteralTable(mapping)) return new Map(mapping);
  const table = new Map<number, Scalar>();
  for (const [key, value] of Object.entries(mapping)) {
    table.set(Number(key), value);
  }
  return table;
}

function resolveBinding(
  rule: number,
  name: string,
  bitCount: number,
  decl: VariableDecl,
): Binding {
  const { mapping } = decl;

  if (mapping === undefined) {
    if (isRawIntegerType(decl.type)) return { kind: "raw" };
    throw new MissingMappingError(rule, name, decl.type);
  }

  if (typeof mapping === "function") {
    // Totality is the caller's contract; nothing to check here
    return { kind: "function", fn: mapping, name: mapping.name || undefined };
  }

  const table = toLiteralTable(mapping);
  const size = 2 ** bitCount;

  for (const key of table.keys()) {
    if (!Number.isInteger(key) || key < 0 || key >= size) {
      throw new VariableWidthOverflowError(
        rule,
        name,
        `maps raw value ${key}, which does not fit in ${bitCount} bit(s)`,
      );
    }
  }
  // Keys are distinct and in range, so only a short table has a gap
  if (table.size < size) {
    let rawValue = 0;
    while (table.has(rawValue)) rawValue++;
    throw new UnmappedCombinationError(rule, name, rawValue, bitCount);
  }

  return { kind: "literal", table };
}

/**
 * Build one VariableGroup per letter in the pattern, in order of first
 * appearance. Letters without a declaration bind as raw unsigned integers.
 */
export function resolveBindings(
  pattern: Pattern,
  where: Record<string, VariableDecl> | undefined,
  rule: number,
): VariableGroup[] {
  const names = variableNames(pattern);
  const decls = where ?? {};

  for (const declared of Object.keys(decls)) {
    if (!names.includes(declared))
      throw new UnknownVariableError(rule, declared, "where clause");
  }

  return names.map((name) => {
    const positions: number[] = [];
    pattern.bits.forEach((spec, i) => {
      if (spec.kind === "variable" && spec.name === name) positions.push(i);
    });

    const decl = decls[name] ?? { type: "uint" };
    return {
      name,
      type: decl.type,
      positions,
      binding: resolveBinding(rule, name, positions.length, decl),
    };
  });
}

// How many raw values bindingDomain would list
export function domainSize(group: VariableGroup): number {
  if (group.binding.kind === "literal") return group.binding.table.size;
  return 2 ** group.positions.length;
}

// Raw values the expansion enumerates for a group
export function bindingDomain(group: VariableGroup): number[] {
  const size = 2 ** group.positions.length;
  if (group.binding.kind === "literal") {
    return [...group.binding.table.keys()]
      .filter((key) => key < size)
      .sort((a, b) => a - b);
  }
  const domain: number[] = [];
  for (let rawValue = 0; rawValue < size; rawValue++) domain.push(rawValue);
  return domain;
}

export function applyBinding(
  group: VariableGroup,
  rawValue: number,
  rule: number,
): Scalar {
  const { binding } = group;
  switch (binding.kind) {
    case "raw":
      return rawValue;
    case "function":
      return binding.fn(rawValue);
    case "literal": {
      const value = binding.table.get(rawValue);
      if (value === undefined)
        throw new UnmappedCombinationError(
          rule,
          group.name,
          rawValue,
          group.positions.length,
        );
      return value;
    }
  }
}
