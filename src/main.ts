import { HELP_TEXT, parseArgs } from "@/cli/args";
import { runCommand } from "@/cli/commands";
import { UsageError, describeError } from "@/core/errors";
import { createRunLogger } from "@/debug/RunLogger";

/**
 * Command-line entry point for lorenz-trails
 */
async function main(argv: readonly string[]): Promise<void> {
  const options = parseArgs(argv);

  if (options.help || options.command === null) {
    process.stdout.write(HELP_TEXT);
    return;
  }

  const logger = createRunLogger(options.logLevel);
  logger.info("🌀 LORENZ ATTRACTOR 🌀");
  await runCommand(options.command, options, { logger, terminal: process.stdout });
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  if (error instanceof UsageError) {
    process.stderr.write(HELP_TEXT);
  }
  process.exitCode = 1;
});
