import { readFile } from "fs/promises";
import { DecoderEnvironment } from "./DecoderEnvironment";
import { parseTable, TableHeader } from "./dsl/parse";
import { resolveTable } from "./dsl/resolve";
import { compileRules, CompileOptions } from "./pattern/compile";
import {
  createDispatcher,
  Dispatcher,
  DispatcherOptions,
  emitSource,
  EmitOptions,
  HandlerMap,
  Opcode,
} from "./pattern/emit";
import { DecisionTable } from "./pattern/types";

/**
 * A rule table read from a file (or given as text), compiled once.
 */
class DecoderTable {
  private header: TableHeader | null = null;
  private table: DecisionTable | null = null;
  private trace: boolean = false; // log each compile stage
  private allowUnreachable: boolean = false;

  constructor(
    private filePath: string,
    private env: DecoderEnvironment = {},
    private options: Omit<CompileOptions, "trace" | "allowUnreachable"> = {},
  ) {}

  static fromSource(
    source: string,
    env: DecoderEnvironment = {},
    options: CompileOptions = {},
  ): DecoderTable {
    const { trace, allowUnreachable, ...rest } = options;
    const dt = new DecoderTable("<inline>", env, rest);
    dt.setTrace(trace ?? false);
    dt.setAllowUnreachable(allowUnreachable ?? false);
    dt.compile(source);
    return dt;
  }

  setTrace(trace: boolean) {
    this.trace = trace;
  }

  setAllowUnreachable(allow: boolean) {
    this.allowUnreachable = allow;
  }

  async load(): Promise<DecisionTable> {
    const source = await readFile(this.filePath, "utf8");
    if (this.trace) console.log(`Loaded ${this.filePath} (${source.length} bytes)`);
    return this.compile(source);
  }

  compile(source: string): DecisionTable {
    const decl = resolveTable(parseTable(source), this.env);
    if (this.trace) {
      console.log(
        `Header: ${decl.header.opcodeType} dispatcher=${decl.header.dispatcher} context=${decl.header.context}, ${decl.rules.length} rule(s)`,
      );
    }

    const table = compileRules(decl.header.width, decl.rules, {
      ...this.options,
      trace: this.trace,
      allowUnreachable: this.allowUnreachable,
    });
    this.header = decl.header;
    this.table = table;
    return table;
  }

  getHeader(): TableHeader {
    if (!this.header) throw new Error("Table not loaded");
    return this.header;
  }

  getTable(): DecisionTable {
    if (!this.table) throw new Error("Table not loaded");
    return this.table;
  }

  createDispatcher<C, O extends Opcode = number>(
    handlers: HandlerMap<C, O>,
    options: DispatcherOptions<C, O> = {},
  ): Dispatcher<C, O> {
    return createDispatcher(this.getTable(), handlers, options);
  }

  emitSource(options: EmitOptions = {}): string {
    const header = this.getHeader();
    return emitSource(this.getTable(), {
      dispatcherName: header.dispatcher,
      contextType: header.context,
      ...options,
    });
  }
}

export { DecoderTable };
