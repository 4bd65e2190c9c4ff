import { BitSpec, OpcodeWidth, Pattern } from "./types";
import { MalformedPatternError } from "./errors";

export const SEPARATOR = "'";

export function isOpcodeWidth(n: number): n is OpcodeWidth {
  return n === 8 || n === 16 || n === 32 || n === 64;
}

/**
 * Parse a pattern such as "0001'rr__" into one BitSpec per opcode bit.
 * Separators are dropped before the length check.
 */
export function parsePattern(source: string, width: OpcodeWidth): Pattern {
  const bits: BitSpec[] = [];

  for (let col = 0; col < source.length; col++) {
    const ch = source[col];
    if (ch === SEPARATOR) continue;

    if (ch === "0" || ch === "1") {
      bits.push({ kind: "fixed", bit: ch === "1" ? 1 : 0 });
    } else if (ch === "_") {
      bits.push({ kind: "wildcard" });
    } else if (ch >= "a" && ch <= "z") {
      bits.push({ kind: "variable", name: ch });
    } else {
      throw new MalformedPatternError(
        source,
        `invalid character '${ch}' at column ${col + 1} (use 0/1, a-z, _ or ${SEPARATOR})`,
      );
    }
  }

  if (bits.length !== width) {
    throw new MalformedPatternError(
      source,
      `expected ${width} bits, got ${bits.length}`,
    );
  }

  return { source, width, bits };
}

// Bit value of a pattern position (position 0 = MSB)
export function positionBit(width: OpcodeWidth, position: number): bigint {
  return 1n << BigInt(width - 1 - position);
}

export function fullMask(width: OpcodeWidth): bigint {
  return (1n << BigInt(width)) - 1n;
}

export function fixedMask(pattern: Pattern): bigint {
  let mask = 0n;
  pattern.bits.forEach((spec, i) => {
    if (spec.kind === "fixed") mask |= positionBit(pattern.width, i);
  });
  return mask;
}

export function fixedValue(pattern: Pattern): bigint {
  let value = 0n;
  pattern.bits.forEach((spec, i) => {
    if (spec.kind === "fixed" && spec.bit === 1)
      value |= positionBit(pattern.width, i);
  });
  return value;
}

export function wildcardMask(pattern: Pattern): bigint {
  let mask = 0n;
  pattern.bits.forEach((spec, i) => {
    if (spec.kind === "wildcard") mask |= positionBit(pattern.width, i);
  });
  return mask;
}

// Variable letters in order of first appearance
export function variableNames(pattern: Pattern): string[] {
  const names: string[] = [];
  for (const spec of pattern.bits) {
    if (spec.kind === "variable" && !names.includes(spec.name))
      names.push(spec.name);
  }
  return names;
}
