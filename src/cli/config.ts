import { z } from "zod";
import { ConfigError } from "../errors";

export const DEFAULT_NOTATION = "1d20";

export const CliConfigSchema = z.object({
  notation: z.string().trim().min(1, "Roll notation cannot be empty"),
  verbose: z.boolean(),
  seed: z.string().min(1, "Seed cannot be empty").optional(),
  cache: z.boolean(),
  help: z.boolean(),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

/** Minimal shape of a zod issue (path + message). */
interface ZodIssueLike {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/**
 * Formats zod issues as `Validation failed: path: message; ...`.
 * Root-level issues (empty path) use `(root)` as the path label.
 */
export function formatZodIssues(issues: readonly ZodIssueLike[]): string {
  const details = issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });

  return `Validation failed: ${details.join("; ")}`;
}

/**
 * Read CLI flags.
 *
 * Positional words are joined with single spaces into the roll notation,
 * so `dice-trace 2 2d20 kh1 + 8` works without quoting. With no
 * positional words the notation defaults to `1d20`.
 *
 * @throws {ConfigError} on unknown flags or invalid values.
 */
export function loadCliConfig(argv: readonly string[]): CliConfig {
  const words: string[] = [];
  const raw: {
    verbose: boolean;
    seed?: string;
    cache: boolean;
    help: boolean;
  } = { verbose: false, cache: true, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-v":
      case "--verbose":
        raw.verbose = true;
        break;

      case "-s":
      case "--seed": {
        const value = argv[i + 1];
        if (value === undefined) {
          throw new ConfigError(`Missing value for ${arg}`);
        }
        raw.seed = value;
        i++;
        break;
      }

      case "--no-cache":
        raw.cache = false;
        break;

      case "-h":
      case "--help":
        raw.help = true;
        break;

      case "--":
        words.push(...argv.slice(i + 1));
        i = argv.length;
        break;

      default:
        // "-5" is a roll (a negative constant), not a flag
        if (/^--?[a-z]/i.test(arg)) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        words.push(arg);
    }
  }

  const parsed = CliConfigSchema.safeParse({
    ...raw,
    notation: words.length > 0 ? words.join(" ") : DEFAULT_NOTATION,
  });
  if (!parsed.success) {
    throw new ConfigError(formatZodIssues(parsed.error.issues));
  }
  return parsed.data;
}
