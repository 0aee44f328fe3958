#!/usr/bin/env node
/**
 * index.ts - CLI entry point for fabric-launch
 *
 * What this file does:
 * Parses the flags (cli.ts), builds the logger, tracing and terminal UI,
 * then hands everything to the workflow (workflow/runner.ts):
 *
 *   fabric-launch --discover-cluster-config --save-cluster-config cluster.yaml
 *   fabric-launch --user-config cluster.yaml --fabric ethernet \
 *     --deployment-type sriov --save-deployment-files out --deploy
 *   fabric-launch --user-config cluster.yaml --llm-interactive
 *
 * Ctrl+C aborts the run; providers see it through their AbortSignal.
 * Any failure sets a non-zero exit code.
 */

import { buildProgram, describeFailure, toLoggerOptions } from "./cli";
import { errorMessage } from "./errors";
import { initTracing } from "./tracing";
import { createTerminalOutput } from "./ui";
import { createLogger } from "./utils/logger";
import { runWorkflow } from "./workflow";

async function main() {
  const program = buildProgram(async (options, flags) => {
    const logger = createLogger(toLoggerOptions(flags));
    const shutdownTracing = initTracing(process.env, logger);
    const ui = createTerminalOutput();

    const controller = new AbortController();
    const onSigint = () => controller.abort(new Error("interrupted"));
    process.once("SIGINT", onSigint);

    try {
      const result = await runWorkflow(options, { logger, ui, signal: controller.signal });
      logger.info("Run finished", { status: result.status, phases: result.phases.join(",") });
    } catch (error) {
      const failure = describeFailure(error);
      ui.error(`${failure.title}: ${failure.message}`);
      if (failure.hint) ui.info(failure.hint);
      logger.error("Run failed", { error: errorMessage(error) });
      process.exitCode = 1;
    } finally {
      process.removeListener("SIGINT", onSigint);
      await shutdownTracing();
    }
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error("Error:", errorMessage(error));
  process.exit(1);
});
