import {
  ConstantAst,
  GenericArgAst,
  MappingAst,
  RuleAst,
  TableAst,
  TableHeader,
  VariableAst,
} from "./parse";
import { GenericArg, RuleDecl, Scalar, VariableDecl } from "../pattern/types";
import { TableSyntaxError, UnknownMapperError, UnknownVariableError } from "../pattern/errors";
import { DecoderEnvironment } from "../DecoderEnvironment";

export interface TableDecl {
  header: TableHeader;
  rules: RuleDecl[];
}

function patternLetters(pattern: string): Set<string> {
  return new Set(pattern.split("").filter((ch) => ch >= "a" && ch <= "z"));
}

/**
 * Resolve a constant to a typed value. `Type::Variant` (or a bare variant
 * where the type is known from context) goes through the environment's enums;
 * without an enum for the type it binds as the variant name.
 */
export function resolveConstant(
  constant: ConstantAst,
  env: DecoderEnvironment,
  contextType: string | undefined,
  line: number,
  col: number,
): Scalar {
  switch (constant.kind) {
    case "number":
    case "bool":
    case "string":
      return constant.value;
    case "ident":
    case "path": {
      const type = constant.kind === "path" ? constant.type : contextType;
      const enumObject = type !== undefined ? env.enums?.[type] : undefined;
      if (!enumObject) return constant.name;
      if (!Object.hasOwn(enumObject, constant.name))
        throw new TableSyntaxError(line, col, `${type} has no member ${constant.name}`);
      return enumObject[constant.name];
    }
  }
}

function resolveMapping(
  variable: VariableAst,
  mapping: MappingAst,
  env: DecoderEnvironment,
): VariableDecl["mapping"] {
  if (mapping.kind === "call") {
    if (mapping.arg !== variable.name)
      throw new TableSyntaxError(
        mapping.line,
        mapping.col,
        `${mapping.fn}(${mapping.arg}) must be applied to its own variable '${variable.name}'`,
      );
    const fn = env.mappers?.[mapping.fn];
    if (!fn) throw new UnknownMapperError(mapping.fn, mapping.line);
    return fn;
  }

  const table = new Map<number, Scalar>();
  for (const entry of mapping.entries) {
    if (table.has(entry.raw))
      throw new TableSyntaxError(entry.line, entry.col, `Duplicate mapping for raw value ${entry.raw}`);
    table.set(entry.raw, resolveConstant(entry.value, env, variable.type, entry.line, entry.col));
  }
  return table;
}

function resolveArg(
  arg: GenericArgAst,
  rule: RuleAst,
  index: number,
  letters: Set<string>,
  where: Record<string, VariableDecl>,
  env: DecoderEnvironment,
): GenericArg {
  switch (arg.kind) {
    case "var": {
      const declared = where[arg.name]?.type;
      if (arg.type !== undefined && declared !== undefined && declared !== arg.type)
        throw new TableSyntaxError(
          arg.line,
          arg.col,
          `'${arg.name}' is declared as ${declared} but used as ${arg.type}`,
        );
      return { kind: "var", name: arg.name };
    }
    case "braced":
      // {m} names a pattern variable; anything else in braces is a constant
      if (arg.value.kind === "ident" && /^[a-z]$/.test(arg.value.name)) {
        if (!letters.has(arg.value.name))
          throw new UnknownVariableError(index, arg.value.name, `generic argument of ${rule.handler}`);
        return { kind: "var", name: arg.value.name };
      }
      return { kind: "literal", value: resolveConstant(arg.value, env, undefined, arg.line, arg.col) };
    case "const":
      return { kind: "literal", value: resolveConstant(arg.value, env, undefined, arg.line, arg.col) };
  }
}

export function resolveRule(
  rule: RuleAst,
  env: DecoderEnvironment,
  index = 0,
): RuleDecl {
  const where: Record<string, VariableDecl> = {};
  for (const variable of rule.where) {
    if (Object.hasOwn(where, variable.name))
      throw new TableSyntaxError(variable.line, variable.col, `Variable '${variable.name}' declared twice`);
    const decl: VariableDecl = { type: variable.type ?? "" };
    if (variable.mapping) decl.mapping = resolveMapping(variable, variable.mapping, env);
    else if (variable.type === undefined)
      throw new TableSyntaxError(variable.line, variable.col, `Variable '${variable.name}' needs a type or a mapping`);
    where[variable.name] = decl;
  }

  const letters = patternLetters(rule.pattern);
  const decl: RuleDecl = {
    pattern: rule.pattern,
    handler: rule.handler,
    args: rule.args.map((arg) => resolveArg(arg, rule, index, letters, where, env)),
    line: rule.line,
  };
  if (rule.where.length > 0) decl.where = where;
  return decl;
}

export function resolveTable(
  ast: TableAst,
  env: DecoderEnvironment = {},
): TableDecl {
  return {
    header: ast.header,
    rules: ast.rules.map((rule, index) => resolveRule(rule, env, index)),
  };
}
