import { setCachingEnabled } from "../parser";
import { formatValue } from "../results/render";
import { roll } from "../roll";
import { DEFAULT_NOTATION, loadCliConfig } from "./config";

export interface Output {
  log(message: string): void;
  error(message: string): void;
}

export const HELP = `Usage: dice-trace [options] <roll...>

Roll dice notation and print the result (default roll: ${DEFAULT_NOTATION}).

Options:
  -v, --verbose      Print the full trace of the roll
  -s, --seed <seed>  Seed the dice for a reproducible roll
      --no-cache     Disable the parse cache
  -h, --help         Show this help

Examples:
  dice-trace 2d6 + 3
  dice-trace -v 2 2d20 kh1 + 8
  dice-trace -v "4d6 dl1, 4d6 dl1"`;

/**
 * Run the command line once. Returns the process exit code.
 */
export function runCli(argv: readonly string[], output: Output = console): number {
  let notation = argv.join(" ");

  try {
    const config = loadCliConfig(argv);
    if (config.help) {
      output.log(HELP);
      return 0;
    }

    notation = config.notation;
    setCachingEnabled(config.cache);

    const outcome = roll(notation, { seed: config.seed });
    output.log(config.verbose ? outcome.text : formatValue(outcome.value));
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    output.error(`Could not process roll string ${notation}`);
    output.error(`Error: ${message}`);
    return 1;
  }
}
