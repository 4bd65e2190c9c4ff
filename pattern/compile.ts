import { DecisionTable, OpcodeWidth, Rule, RuleDecl } from "./types";
import { parsePattern } from "./parse";
import { resolveBindings } from "./bindings";
import { DEFAULT_MAX_ENTRIES_PER_RULE, expandRule } from "./expand";
import { DEFAULT_COVERAGE_BUDGET, resolvePriority } from "./priority";

export interface CompileOptions {
  trace?: boolean; // log each stage to the console
  allowUnreachable?: boolean; // report shadowed rules as warnings instead of failing
  maxEntriesPerRule?: number;
  coverageBudget?: number;
}

export const DEFAULT_COMPILE_OPTIONS: Required<CompileOptions> = {
  trace: false,
  allowUnreachable: false,
  maxEntriesPerRule: DEFAULT_MAX_ENTRIES_PER_RULE,
  coverageBudget: DEFAULT_COVERAGE_BUDGET,
};

export function buildRule(
  width: OpcodeWidth,
  decl: RuleDecl,
  index: number,
): Rule {
  const pattern = parsePattern(decl.pattern, width);
  const rule: Rule = {
    index,
    pattern,
    handler: decl.handler,
    args: decl.args ?? [],
    variables: resolveBindings(pattern, decl.where, index),
  };
  if (decl.line !== undefined) rule.line = decl.line;
  return rule;
}

/**
 * Compile rule declarations, in priority order, into a decision table.
 * Any fatal problem throws a PatternError and no table is produced.
 */
export function compileRules(
  width: OpcodeWidth,
  decls: readonly RuleDecl[],
  options: CompileOptions = {},
): DecisionTable {
  const opts = { ...DEFAULT_COMPILE_OPTIONS, ...options };

  const rules = decls.map((decl, index) => buildRule(width, decl, index));
  if (opts.trace) {
    for (const rule of rules) {
      const vars = rule.variables
        .map((v) => `${v.name}:${v.type}/${v.binding.kind}@${v.positions.join(",")}`)
        .join(" ");
      console.log(`parsed rule ${rule.index} "${rule.pattern.source}"${vars ? ` ${vars}` : ""}`);
    }
  }

  const expanded = rules.map((rule) =>
    expandRule(rule, { maxEntriesPerRule: opts.maxEntriesPerRule }),
  );

  const table = resolvePriority(width, rules, expanded, {
    allowUnreachable: opts.allowUnreachable,
    coverageBudget: opts.coverageBudget,
    trace: opts.trace,
  });

  if (opts.trace) {
    console.log(
      `decision table: ${table.entries.length} entries from ${rules.length} rules, ${table.warnings.length} warning(s)`,
    );
  }
  return table;
}
