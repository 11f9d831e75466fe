import type { Readable } from "node:stream";
import { extractText, formatText, mergeText, type TextResult } from "./api";
import { resolveConfig, type CliConfig } from "./config";
import { formatError } from "./errors";
import { readDocumentText, writeDocumentText, STDIN_PATH, type ReadResult } from "./files";
import { generateJsonSchema } from "./json-schema";
import { validateSettingsText } from "./validate";

// =============================================================================
// ANSI Helpers
// =============================================================================

type Ansi = Record<"bold" | "green" | "red" | "yellow" | "dim", (s: string) => string>;

function createAnsi(enabled: boolean): Ansi {
  const wrap = (code: string) => (s: string) => (enabled ? `\x1b[${code}m${s}\x1b[0m` : s);
  return {
    bold: wrap("1"),
    green: wrap("32"),
    red: wrap("31"),
    yellow: wrap("33"),
    dim: wrap("2"),
  };
}

// =============================================================================
// Argument Parsing
// =============================================================================

export type ParsedArgs = {
  positionals: string[];
  output?: string;
  fallback?: string;
  pretty?: boolean;
};

export type ParseArgsResult =
  | { ok: true; args: ParsedArgs }
  | { ok: false; error: string };

/**
 * Split command arguments into positionals and flags.
 * "-" is a positional (standard input), never a flag.
 */
export function parseArgs(args: string[]): ParseArgsResult {
  const parsed: ParsedArgs = { positionals: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "-o":
      case "--output":
      case "--fallback": {
        const value = args[i + 1];
        if (value === undefined) {
          return { ok: false, error: `Missing value for ${arg}` };
        }
        if (arg === "--fallback") parsed.fallback = value;
        else parsed.output = value;
        i++;
        break;
      }
      case "--minify":
        parsed.pretty = false;
        break;
      case "--pretty":
        parsed.pretty = true;
        break;
      default:
        if (arg.startsWith("-") && arg !== "-") {
          return { ok: false, error: `Unknown option: ${arg}` };
        }
        parsed.positionals.push(arg);
    }
  }

  return { ok: true, args: parsed };
}

// =============================================================================
// Context
// =============================================================================

type CliContext = {
  config: CliConfig;
  ansi: Ansi;
  stdin: Readable;
};

export type MainOptions = {
  env?: Record<string, string | undefined>;
  isTTY?: boolean;
  stdin?: Readable;
};

function fail(ctx: CliContext, message: string): number {
  console.error(ctx.ansi.red(`Error: ${message}`));
  return 1;
}

function usage(ctx: CliContext, line: string): number {
  console.error(ctx.ansi.red(`Usage: keybind-merger ${line}`));
  return 1;
}

async function read(ctx: CliContext, input: string): Promise<ReadResult> {
  return readDocumentText(input, ctx.stdin);
}

/**
 * Print a result to stdout, or save it when -o was given.
 */
async function emit(
  ctx: CliContext,
  result: TextResult,
  output: string | undefined,
  status: string,
): Promise<number> {
  if (!result.ok) return fail(ctx, formatError(result.error));

  if (output === undefined) {
    console.log(result.text);
    console.error(ctx.ansi.dim(status));
    return 0;
  }

  const written = await writeDocumentText(output, result.text);
  if (!written.ok) return fail(ctx, written.error.message);

  console.error(ctx.ansi.dim(status));
  console.error(ctx.ansi.green(`Saved to ${written.path}`));
  return 0;
}

function isPretty(ctx: CliContext, args: ParsedArgs): boolean {
  return args.pretty ?? !ctx.config.minify;
}

// =============================================================================
// Command Handlers
// =============================================================================

async function cmdExtract(ctx: CliContext, args: ParsedArgs): Promise<number> {
  if (args.positionals.length !== 1) {
    return usage(ctx, "extract <source> [-o file] [--minify|--pretty]");
  }

  const source = await read(ctx, args.positionals[0]);
  if (!source.ok) return fail(ctx, source.error.message);

  const result = extractText(source.text, { pretty: isPretty(ctx, args) });
  return emit(ctx, result, args.output, "Extracted controls from source.");
}

async function cmdMerge(ctx: CliContext, args: ParsedArgs): Promise<number> {
  if (args.positionals.length !== 2) {
    return usage(ctx, "merge <source> <target> [-o file] [--fallback file] [--minify|--pretty]");
  }

  const [sourcePath, targetPath] = args.positionals;
  const stdinReads = [sourcePath, targetPath, args.fallback].filter((p) => p === STDIN_PATH);
  if (stdinReads.length > 1) {
    return fail(ctx, "Only one of source, target and fallback can be read from stdin.");
  }

  const source = await read(ctx, sourcePath);
  if (!source.ok) return fail(ctx, source.error.message);

  const target = await read(ctx, targetPath);
  if (!target.ok) return fail(ctx, target.error.message);

  let fallbackText: string | undefined;
  if (args.fallback !== undefined) {
    const fallback = await read(ctx, args.fallback);
    if (!fallback.ok) return fail(ctx, fallback.error.message);
    fallbackText = fallback.text;
  }

  const result = mergeText(source.text, target.text, {
    pretty: isPretty(ctx, args),
    fallbackText,
  });
  return emit(ctx, result, args.output, "Merged controls into target.");
}

async function cmdValidate(ctx: CliContext, args: ParsedArgs): Promise<number> {
  if (args.positionals.length === 0) {
    return usage(ctx, "validate <file...>");
  }

  let exitCode = 0;

  for (const input of args.positionals) {
    const file = await read(ctx, input);
    if (!file.ok) {
      console.log(`${input}: ${ctx.ansi.red("unreadable")} (${file.error.message})`);
      exitCode = 1;
      continue;
    }

    const report = validateSettingsText(file.text);
    if (!report.valid) {
      console.log(`${input}: ${ctx.ansi.red("invalid")}`);
      for (const err of report.errors) {
        console.log(`  ${err.path}: ${err.message}`);
      }
      exitCode = 1;
      continue;
    }

    const { fieldCount, bindingCount } = report.summary;
    const bindings = bindingCount === null ? "" : `, ${bindingCount} bindings`;
    console.log(`${input}: ${ctx.ansi.green("valid")} ${ctx.ansi.dim(`(${fieldCount} fields${bindings})`)}`);
    for (const warning of report.warnings ?? []) {
      console.log(`  ${ctx.ansi.yellow(`warning: ${warning}`)}`);
    }
  }

  return exitCode;
}

async function cmdFormat(ctx: CliContext, args: ParsedArgs): Promise<number> {
  if (args.positionals.length !== 1) {
    return usage(ctx, "format <file> [-o file] [--minify|--pretty]");
  }

  const file = await read(ctx, args.positionals[0]);
  if (!file.ok) return fail(ctx, file.error.message);

  const pretty = isPretty(ctx, args);
  const result = formatText(file.text, { pretty });
  return emit(ctx, result, args.output, pretty ? "Pretty-printed JSON." : "Minified JSON.");
}

async function cmdSchema(ctx: CliContext, args: ParsedArgs): Promise<number> {
  const text = JSON.stringify(generateJsonSchema(), null, 2);
  return emit(ctx, { ok: true, text }, args.output, "Generated controls JSON Schema.");
}

// =============================================================================
// Help Text
// =============================================================================

function printHelp(ansi: Ansi): void {
  console.log(`${ansi.bold("keybind-merger")} — move game keybindings between settings exports

${ansi.bold("Usage:")}
  keybind-merger <command> [args...]

${ansi.bold("Commands:")}
  extract <source>          Print only the "controls" section of a settings file
  merge <source> <target>   Copy the source's controls into the target
  validate <file...>        Check files are settings JSON with controls
  format <file>             Pretty-print (or --minify) a JSON file
  schema                    Print the JSON Schema of a controls-only file
  help                      Show this help

${ansi.bold("Options:")}
  -o, --output <file>       Save the result instead of printing it
  --fallback <file>         merge: controls to use when the source has none
  --minify                  Write JSON without whitespace
  --pretty                  Write JSON with two-space indentation (default)

Use "-" as a file name to read standard input.
Set KEYBIND_MERGER_MINIFY=1 to minify by default, NO_COLOR=1 to disable colour.

${ansi.bold("Examples:")}
  keybind-merger extract old-settings.json -o controls.json
  keybind-merger merge controls.json new-settings.json -o merged.json
  keybind-merger merge old-settings.json new-settings.json --minify
  keybind-merger validate old-settings.json new-settings.json`);
}

// =============================================================================
// Main Dispatcher
// =============================================================================

export async function main(
  argv: string[] = process.argv.slice(2),
  options: MainOptions = {},
): Promise<number> {
  const { config, warnings } = resolveConfig(
    options.env ?? process.env,
    options.isTTY ?? process.stdout.isTTY ?? false,
  );
  const ansi = createAnsi(config.color);
  const ctx: CliContext = { config, ansi, stdin: options.stdin ?? process.stdin };

  for (const warning of warnings) {
    console.error(ansi.yellow(`Warning: ${warning}`));
  }

  const command = argv[0] ?? "help";

  if (command === "help" || command === "--help" || command === "-h") {
    printHelp(ansi);
    return 0;
  }

  const parsed = parseArgs(argv.slice(1));
  if (!parsed.ok) return fail(ctx, parsed.error);
  const args = parsed.args;

  switch (command) {
    case "extract":
      return cmdExtract(ctx, args);
    case "merge":
      return cmdMerge(ctx, args);
    case "validate":
      return cmdValidate(ctx, args);
    case "format":
      return cmdFormat(ctx, args);
    case "schema":
      return cmdSchema(ctx, args);
    default:
      console.error(ansi.red(`Unknown command: ${command}`));
      console.error('Run "keybind-merger help" for usage.');
      return 1;
  }
}
