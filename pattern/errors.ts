export type PatternErrorCode =
  | "MalformedPattern"
  | "MissingMapping"
  | "UnmappedCombination"
  | "VariableWidthOverflow"
  | "UnreachablePattern"
  | "UnknownVariable"
  | "ExpansionLimit"
  | "UnknownHandler"
  | "UnknownMapper"
  | "TableSyntax";

/**
 * A rule table could not be compiled. Raised before any dispatcher exists.
 */
export class PatternError extends Error {
  readonly code: PatternErrorCode;

  constructor(code: PatternErrorCode, message: string) {
    super(message);
    this.name = "PatternError";
    this.code = code;
  }
}

export class MalformedPatternError extends PatternError {
  constructor(
    readonly pattern: string,
    message: string,
  ) {
    super("MalformedPattern", `Malformed pattern "${pattern}": ${message}`);
    this.name = "MalformedPatternError";
  }
}

export class MissingMappingError extends PatternError {
  constructor(
    readonly rule: number,
    readonly variable: string,
    readonly type: string,
  ) {
    super(
      "MissingMapping",
      `Rule ${rule}: variable '${variable}' of type ${type} needs a mapping`,
    );
    this.name = "MissingMappingError";
  }
}

export class UnmappedCombinationError extends PatternError {
  constructor(
    readonly rule: number,
    readonly variable: string,
    readonly raw: number,
    readonly bits: number,
  ) {
    super(
      "UnmappedCombination",
      `Rule ${rule}: variable '${variable}' has no mapping for raw value 0b${raw
        .toString(2)
        .padStart(bits, "0")}`,
    );
    this.name = "UnmappedCombinationError";
  }
}

export class VariableWidthOverflowError extends PatternError {
  constructor(
    readonly rule: number,
    readonly variable: string,
    message: string,
  ) {
    super("VariableWidthOverflow", `Rule ${rule}: variable '${variable}' ${message}`);
    this.name = "VariableWidthOverflowError";
  }
}

export class UnreachablePatternError extends PatternError {
  constructor(
    readonly rule: number,
    readonly shadowedBy: number[],
    pattern: string,
  ) {
    super(
      "UnreachablePattern",
      `Rule ${rule} ("${pattern}") is unreachable: shadowed by rule(s) ${shadowedBy.join(", ")}`,
    );
    this.name = "UnreachablePatternError";
  }
}

export class UnknownVariableError extends PatternError {
  constructor(
    readonly rule: number,
    readonly variable: string,
    where: string,
  ) {
    super(
      "UnknownVariable",
      `Rule ${rule}: ${where} names variable '${variable}' which is not in the pattern`,
    );
    this.name = "UnknownVariableError";
  }
}

export class ExpansionLimitError extends PatternError {
  constructor(
    readonly rule: number,
    readonly entries: number,
    readonly limit: number,
  ) {
    super(
      "ExpansionLimit",
      `Rule ${rule} expands to ${entries} entries, more than the limit of ${limit}`,
    );
    this.name = "ExpansionLimitError";
  }
}

export class UnknownHandlerError extends PatternError {
  constructor(readonly handler: string) {
    super("UnknownHandler", `No implementation supplied for handler '${handler}'`);
    this.name = "UnknownHandlerError";
  }
}

export class UnknownMapperError extends PatternError {
  constructor(
    readonly mapper: string,
    readonly line?: number,
  ) {
    super(
      "UnknownMapper",
      `${line !== undefined ? `Line ${line}: ` : ""}mapping function '${mapper}' is not defined`,
    );
    this.name = "UnknownMapperError";
  }
}

export class TableSyntaxError extends PatternError {
  constructor(
    readonly line: number,
    readonly col: number,
    message: string,
  ) {
    super("TableSyntax", `${line}:${col}: ${message}`);
    this.name = "TableSyntaxError";
  }
}

/**
 * Raised by a dispatcher when no entry matches and no fallback was configured.
 */
export class UnmatchedOpcodeError extends Error {
  constructor(readonly opcode: number | bigint) {
    super(`Unhandled opcode: 0x${opcode.toString(16).toUpperCase().padStart(2, "0")}`);
    this.name = "UnmatchedOpcodeError";
  }
}
