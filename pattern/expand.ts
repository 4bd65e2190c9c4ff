import { DispatchEntry, Pattern, Rule, Scalar } from "./types";
import { fixedMask, fixedValue, positionBit } from "./parse";
import {
  applyBinding,
  bindingDomain,
  domainSize,
  MAX_VARIABLE_BITS,
} from "./bindings";
import {
  ExpansionLimitError,
  UnknownVariableError,
  VariableWidthOverflowError,
} from "./errors";

export const DEFAULT_MAX_ENTRIES_PER_RULE = 65536;

export interface ExpandOptions {
  maxEntriesPerRule?: number;
}

export interface MaskValue {
  mask: bigint;
  expected: bigint;
}

/**
 * Turn a pattern plus raw values for (some of) its variables into the test
 * `(opcode & mask) === expected`. Unassigned variables and wildcards stay out
 * of the mask.
 */
export function deriveMaskValue(
  pattern: Pattern,
  assignment: Record<string, number>,
  rule = 0,
): MaskValue {
  let mask = fixedMask(pattern);
  let expected = fixedValue(pattern);

  const positions = new Map<string, number[]>();
  pattern.bits.forEach((spec, i) => {
    if (spec.kind !== "variable") return;
    const list = positions.get(spec.name) ?? [];
    list.push(i);
    positions.set(spec.name, list);
  });

  for (const [name, rawValue] of Object.entries(assignment)) {
    const at = positions.get(name);
    if (!at) throw new UnknownVariableError(rule, name, "assignment");

    const bitCount = at.length;
    if (!Number.isInteger(rawValue) || rawValue < 0 || rawValue >= 2 ** bitCount) {
      throw new VariableWidthOverflowError(
        rule,
        name,
        `raw value ${rawValue} does not fit in ${bitCount} bit(s)`,
      );
    }

    at.forEach((position, j) => {
      const bit = Math.floor(rawValue / 2 ** (bitCount - 1 - j)) % 2;
      const place = positionBit(pattern.width, position);
      mask |= place;
      if (bit === 1) expected |= place;
    });
  }

  if ((expected & ~mask) !== 0n) {
    throw new VariableWidthOverflowError(
      rule,
      Object.keys(assignment).join(","),
      "set bits outside the mask",
    );
  }

  return { mask, expected };
}

/**
 * Expand a rule over the cross-product of its variables' domains.
 * The first variable varies slowest.
 */
export function expandRule(
  rule: Rule,
  options: ExpandOptions = {},
): DispatchEntry[] {
  const limit = options.maxEntriesPerRule ?? DEFAULT_MAX_ENTRIES_PER_RULE;
  const names = rule.variables.map((group) => group.name);

  for (const arg of rule.args) {
    if (arg.kind === "var" && !names.includes(arg.name))
      throw new UnknownVariableError(
        rule.index,
        arg.name,
        `generic argument of ${rule.handler}`,
      );
  }

  // Sized before anything is enumerated
  const total = rule.variables.reduce((n, group) => n * domainSize(group), 1);
  const tooWide = rule.variables.some(
    (group) => group.positions.length > MAX_VARIABLE_BITS,
  );
  if (total > limit || tooWide)
    throw new ExpansionLimitError(rule.index, total, limit);

  const domains = rule.variables.map(bindingDomain);

  // Each mapping runs once per raw value
  const bound = rule.variables.map((group, i) => {
    const values = new Map<number, Scalar>();
    for (const rawValue of domains[i])
      values.set(rawValue, applyBinding(group, rawValue, rule.index));
    return values;
  });

  const entries: DispatchEntry[] = [];
  const tuple: number[] = [];

  const emit = () => {
    const assignment: Record<string, number> = {};
    names.forEach((name, i) => (assignment[name] = tuple[i]));

    const { mask, expected } = deriveMaskValue(
      rule.pattern,
      assignment,
      rule.index,
    );
    const values = rule.args.map((arg): Scalar => {
      if (arg.kind === "literal") return arg.value;
      const i = names.indexOf(arg.name);
      const value = bound[i].get(tuple[i]);
      if (value === undefined)
        throw new UnknownVariableError(rule.index, arg.name, "expansion");
      return value;
    });

    entries.push({
      rule: rule.index,
      mask,
      expected,
      handler: rule.handler,
      values,
      raw: assignment,
    });
  };

  const walk = (depth: number) => {
    if (depth === domains.length) {
      emit();
      return;
    }
    for (const rawValue of domains[depth]) {
      tuple[depth] = rawValue;
      walk(depth + 1);
    }
  };
  walk(0);

  return entries;
}
