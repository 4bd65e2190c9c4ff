// Orders dispatch entries (first match wins) and checks rules against each other.

import {
  DecisionTable,
  Diagnostic,
  DispatchEntry,
  OpcodeWidth,
  Rule,
} from "./types";
import { MaskValue } from "./expand";
import { UnreachablePatternError } from "./errors";

export const DEFAULT_COVERAGE_BUDGET = 4096;

export interface PriorityOptions {
  allowUnreachable?: boolean;
  coverageBudget?: number;
  trace?: boolean;
}

export type Coverage = "covered" | "uncovered" | "unknown";

// Some opcode matches both tests
export function intersects(a: MaskValue, b: MaskValue): boolean {
  return ((a.expected ^ b.expected) & a.mask & b.mask) === 0n;
}

// Every opcode matching `inner` also matches `outer`
export function subsumes(outer: MaskValue, inner: MaskValue): boolean {
  return (
    (outer.mask & ~inner.mask) === 0n &&
    (inner.expected & outer.mask) === outer.expected
  );
}

/**
 * Decide whether the opcodes matching `candidate` are all matched by at least
 * one of `earlier`. The candidate is split on bits an overlapping test fixes
 * until each piece is subsumed or provably missed. Gives up with "unknown"
 * once the budget of splits is spent.
 */
export function coverage(
  candidate: MaskValue,
  earlier: readonly MaskValue[],
  budget: { remaining: number },
): Coverage {
  const hits = earlier.filter((test) => intersects(test, candidate));
  if (hits.length === 0) return "uncovered";
  if (hits.some((test) => subsumes(test, candidate))) return "covered";
  if (budget.remaining <= 0) return "unknown";
  budget.remaining--;

  // hits[0] overlaps without subsuming, so it fixes a bit the candidate leaves open
  const free = hits[0].mask & ~candidate.mask;
  const bit = free & -free;
  const mask = candidate.mask | bit;

  const low = coverage({ mask, expected: candidate.expected }, hits, budget);
  if (low === "uncovered") return "uncovered";
  const high = coverage(
    { mask, expected: candidate.expected | bit },
    hits,
    budget,
  );
  if (high === "uncovered") return "uncovered";
  return low === "covered" && high === "covered" ? "covered" : "unknown";
}

function findShadowing(
  rule: Rule,
  entries: readonly DispatchEntry[],
  earlier: readonly DispatchEntry[],
  budgetSize: number,
): number[] | null {
  if (entries.length === 0 || earlier.length === 0) return null;

  const budget = { remaining: budgetSize };
  for (const entry of entries) {
    if (coverage(entry, earlier, budget) !== "covered") return null;
  }

  const by = new Set<number>();
  for (const test of earlier) {
    if (entries.some((entry) => intersects(test, entry))) by.add(test.rule);
  }
  return [...by].filter((index) => index !== rule.index).sort((a, b) => a - b);
}

function handlerLabel(rules: readonly Rule[], index: number): string {
  const rule = rules.find((r) => r.index === index);
  return rule ? `${rule.handler} (rule ${index})` : `rule ${index}`;
}

/**
 * Lay entries out in rule declaration order and report unreachable and
 * ambiguous rules. Throws on the first unreachable rule unless
 * `allowUnreachable` is set.
 */
export function resolvePriority(
  width: OpcodeWidth,
  rules: readonly Rule[],
  entriesPerRule: readonly (readonly DispatchEntry[])[],
  options: PriorityOptions = {},
): DecisionTable {
  const budgetSize = options.coverageBudget ?? DEFAULT_COVERAGE_BUDGET;
  const order = rules
    .map((rule, i) => ({ rule, entries: entriesPerRule[i] ?? [] }))
    .sort((a, b) => a.rule.index - b.rule.index);

  const warnings: Diagnostic[] = [];
  const entries: DispatchEntry[] = [];
  const seen = new Map<string, DispatchEntry>();
  const reported = new Set<string>();

  for (const { rule, entries: own } of order) {
    const shadowedBy = findShadowing(rule, own, entries, budgetSize);
    if (shadowedBy) {
      const error = new UnreachablePatternError(
        rule.index,
        shadowedBy,
        rule.pattern.source,
      );
      if (!options.allowUnreachable) throw error;
      warnings.push({
        code: "UnreachablePattern",
        severity: "warning",
        message: error.message,
        rules: [...shadowedBy, rule.index],
      });
    }

    for (const entry of own) {
      const key = `${entry.mask.toString(16)}:${entry.expected.toString(16)}`;
      const first = seen.get(key);
      if (!first) {
        seen.set(key, entry);
      } else if (first.rule !== entry.rule && first.handler !== entry.handler) {
        const pair = `${first.rule}:${entry.rule}`;
        if (!reported.has(pair)) {
          reported.add(pair);
          warnings.push({
            code: "AmbiguousPattern",
            severity: "warning",
            message: `${handlerLabel(rules, entry.rule)} duplicates mask 0x${entry.mask.toString(16)} / value 0x${entry.expected.toString(16)} of ${handlerLabel(rules, first.rule)}`,
            rules: [first.rule, entry.rule],
          });
        }
      }
    }

    entries.push(...own.map((entry) => Object.freeze(entry)));
    if (options.trace) {
      console.log(
        `rule ${rule.index} "${rule.pattern.source}" => ${rule.handler}: ${own.length} entr${own.length === 1 ? "y" : "ies"}`,
      );
    }
  }

  for (const warning of warnings) console.warn(`warning: ${warning.message}`);

  return Object.freeze({
    width,
    rules: Object.freeze(order.map(({ rule }) => rule)),
    entries: Object.freeze(entries),
    warnings: Object.freeze(warnings),
  });
}
