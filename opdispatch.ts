#!/usr/bin/env node
import { writeFile } from "fs/promises";
import * as path from "path";
import { DecoderTable } from "./DecoderTable";
import { DecoderEnvironment } from "./DecoderEnvironment";
import { MapperFn } from "./pattern/types";

const USAGE =
  "Usage: opdispatch <table-file> [--out <file>] [--env <module>] [--handlers <module>] [--allow-unreachable] [--trace]";

export interface CliArgs {
  tablePath: string;
  out?: string;
  envModule?: string;
  handlerImport?: string;
  allowUnreachable: boolean;
  trace: boolean;
}

const VALUE_FLAGS = ["--out", "--env", "--handlers"];

export function parseArgs(args: string[]): CliArgs | null {
  const values: Record<string, string> = {};
  let tablePath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.includes(arg)) {
      if (i + 1 < args.length) values[arg] = args[i + 1];
      i++;
    } else if (!arg.startsWith("--") && tablePath === undefined) {
      tablePath = arg;
    }
  }
  if (!tablePath) return null;

  return {
    tablePath,
    out: values["--out"],
    envModule: values["--env"],
    handlerImport: values["--handlers"],
    allowUnreachable: args.includes("--allow-unreachable"),
    trace: args.includes("--trace"),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

// Accepts a CommonJS module exporting `mappers` and/or `enums`
export function toEnvironment(loaded: unknown): DecoderEnvironment {
  const env: DecoderEnvironment = {};
  if (!isRecord(loaded)) return env;

  const { mappers, enums } = loaded;
  if (isRecord(mappers)) {
    env.mappers = {};
    for (const [name, fn] of Object.entries(mappers)) {
      if (typeof fn === "function") {
        const mapper: MapperFn = (raw) => {
          const value: unknown = fn(raw);
          if (
            typeof value === "number" ||
            typeof value === "bigint" ||
            typeof value === "boolean" ||
            typeof value === "string"
          )
            return value;
          throw new Error(`Mapper ${name}(${raw}) returned ${String(value)}`);
        };
        env.mappers[name] = mapper;
      }
    }
  }
  if (isRecord(enums)) {
    env.enums = {};
    for (const [name, members] of Object.entries(enums)) {
      if (!isRecord(members)) continue;
      const out: Record<string, string | number> = {};
      for (const [member, value] of Object.entries(members)) {
        if (typeof value === "string" || typeof value === "number") out[member] = value;
      }
      env.enums[name] = out;
    }
  }
  return env;
}

export async function run(args: string[]): Promise<number> {
  const cli = parseArgs(args);
  if (!cli) {
    console.error("Error: table file path is required");
    console.error(USAGE);
    return 1;
  }

  try {
    const env = cli.envModule
      ? toEnvironment(require(path.resolve(cli.envModule)))
      : {};
    const dt = new DecoderTable(cli.tablePath, env);
    dt.setTrace(cli.trace);
    dt.setAllowUnreachable(cli.allowUnreachable);
    await dt.load();

    const source = dt.emitSource(
      cli.handlerImport ? { handlerImport: cli.handlerImport } : {},
    );
    if (cli.out) {
      await writeFile(cli.out, source, "utf8");
      if (cli.trace) console.log(`Wrote ${cli.out}`);
    } else {
      process.stdout.write(source);
    }
    return 0;
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    if (cli.trace && err instanceof Error) console.error("Stack trace:", err.stack);
    return 1;
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}
