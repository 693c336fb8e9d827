import { FolioError, z } from "@folio/utils";

/**
 * Bad command line; reported with a pointer to --help
 */
export class CliUsageError extends FolioError {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const cliOptionsSchema = z
  .object({
    source: z.string().optional(),
    destination: z.string().optional(),
    config: z.array(z.string()).optional(),
    drafts: z.boolean().default(false),
    future: z.boolean().default(false),
    strict: z.boolean().default(false),
    verbose: z.boolean().default(false),
    quiet: z.boolean().default(false),
    port: z.coerce
      .number({ invalid_type_error: "must be a number" })
      .int("must be a whole number")
      .min(0, "must be between 0 and 65535")
      .max(65535, "must be between 0 and 65535")
      .optional(),
    watch: z.boolean().default(false),
  })
  .refine((options) => !(options.verbose && options.quiet), {
    message: "--verbose and --quiet cannot be combined",
  });

export type CliOptions = z.output<typeof cliOptionsSchema>;

export type CliCommand =
  | { name: "build"; options: CliOptions }
  | { name: "serve"; options: CliOptions }
  | { name: "help" }
  | { name: "version" };

type ValueFlag = "source" | "destination" | "config" | "port";
type SwitchFlag = "drafts" | "future" | "strict" | "verbose" | "quiet" | "watch";

const VALUE_FLAGS: Record<string, ValueFlag> = {
  "--source": "source",
  "-s": "source",
  "--destination": "destination",
  "-d": "destination",
  "--config": "config",
  "-c": "config",
  "--port": "port",
  "-P": "port",
};

const SWITCH_FLAGS: Record<string, SwitchFlag> = {
  "--drafts": "drafts",
  "-D": "drafts",
  "--future": "future",
  "--strict": "strict",
  "--verbose": "verbose",
  "-V": "verbose",
  "--quiet": "quiet",
  "-q": "quiet",
  "--watch": "watch",
  "-w": "watch",
};

const SERVE_ONLY: readonly string[] = ["port", "watch"];

/**
 * Parse the arguments after the program name
 *
 * @throws CliUsageError for unknown commands, unknown options and
 * missing or invalid values
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const raw: Record<string, unknown> = {};
  let command: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      return { name: "help" };
    }
    if (arg === "--version" || arg === "-v") {
      return { name: "version" };
    }

    const [flag = "", inline] = arg.startsWith("--") && arg.includes("=")
      ? [arg.slice(0, arg.indexOf("=")), arg.slice(arg.indexOf("=") + 1)]
      : [arg, undefined];

    const valueFlag = VALUE_FLAGS[flag];
    if (valueFlag) {
      const value = inline ?? argv[++i];
      if (value === undefined || value === "") {
        throw new CliUsageError(`Option ${flag} needs a value`);
      }
      raw[valueFlag] =
        valueFlag === "config"
          ? value.split(",").map((file) => file.trim()).filter((file) => file.length > 0)
          : value;
      continue;
    }

    const switchFlag = SWITCH_FLAGS[flag];
    if (switchFlag) {
      if (inline !== undefined) {
        throw new CliUsageError(`Option ${flag} takes no value`);
      }
      raw[switchFlag] = true;
      continue;
    }

    if (arg.startsWith("-")) {
      throw new CliUsageError(`Unknown option "${arg}"`);
    }
    if (command !== undefined) {
      throw new CliUsageError(`Unexpected argument "${arg}"`);
    }
    command = arg;
  }

  if (command === undefined) {
    return { name: "help" };
  }
  if (command !== "build" && command !== "serve") {
    throw new CliUsageError(`Unknown command "${command}"`);
  }
  if (command === "build") {
    const misplaced = SERVE_ONLY.find((key) => key in raw);
    if (misplaced) {
      throw new CliUsageError(`Option --${misplaced} only applies to serve`);
    }
  }

  const result = cliOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path[0];
    throw new CliUsageError(
      field === undefined
        ? (issue?.message ?? "Invalid options")
        : `Option --${String(field)} ${issue?.message ?? "is invalid"}`,
    );
  }
  return { name: command, options: result.data };
}
