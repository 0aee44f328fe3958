/**
 * ui/index.ts - Terminal output for the person running the CLI
 *
 * What this file does:
 * Everything the user sees while a run progresses: the banner, phase
 * headings, status lines, a spinner for slow calls (LLM round trips,
 * kubectl apply) and the prompts of the interactive chat.
 *
 * The Output interface is what the workflow and providers receive.
 * createTerminalOutput() backs it with @clack/prompts and picocolors;
 * createSilentOutput() discards everything and is what tests use.
 *
 * Spinner lifetime:
 * A Progress must be finished with succeed() or fail() before the operation
 * it decorates reports its outcome. Finishing twice is harmless; the second
 * call is ignored.
 */

import * as clack from "@clack/prompts";
import pc from "picocolors";

/** A running progress indicator. */
export interface Progress {
  /** Replace the message shown next to the spinner. */
  update(message: string): void;
  /** Stop the spinner with a success line. */
  succeed(message: string): void;
  /** Stop the spinner with a failure line. */
  fail(message: string): void;
}

export interface Output {
  header(text: string): void;
  section(text: string): void;
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  /** Free-form text, e.g. an assistant reply in interactive mode. */
  print(text: string): void;
  startProgress(message: string): Progress;
  /**
   * Asks for a line of input.
   * @returns The trimmed answer, or null if the user cancelled (Ctrl+C)
   */
  ask(message: string): Promise<string | null>;
  /** Asks a yes/no question; cancelling counts as no. */
  confirm(message: string): Promise<boolean>;
}

/**
 * Wraps a clack spinner so it can only be stopped once.
 */
function createSpinnerProgress(message: string): Progress {
  const spinner = clack.spinner();
  let stopped = false;
  spinner.start(message);

  const stop = (text: string, code: number) => {
    if (stopped) return;
    stopped = true;
    spinner.stop(text, code);
  };

  return {
    update: (text) => {
      if (!stopped) spinner.message(text);
    },
    succeed: (text) => stop(pc.green(text), 0),
    fail: (text) => stop(pc.red(text), 2),
  };
}

/**
 * Output backed by @clack/prompts, with colors from picocolors.
 */
export function createTerminalOutput(): Output {
  return {
    header: (text) => clack.intro(pc.bgCyan(pc.black(` ${text} `))),
    section: (text) => clack.log.step(pc.bold(text)),
    info: (message) => clack.log.info(message),
    success: (message) => clack.log.success(pc.green(message)),
    warning: (message) => clack.log.warn(pc.yellow(message)),
    error: (message) => clack.log.error(pc.red(message)),
    print: (text) => clack.log.message(text),
    startProgress: createSpinnerProgress,
    ask: async (message) => {
      const answer = await clack.text({
        message,
        placeholder: "type a message",
        defaultValue: "",
      });
      if (clack.isCancel(answer)) return null;
      // An empty line can still resolve undefined, whatever the declared type says.
      return (answer ?? "").trim();
    },
    confirm: async (message) => {
      const answer = await clack.confirm({ message, initialValue: false });
      if (clack.isCancel(answer)) return false;
      return answer;
    },
  };
}

/** A Progress that does nothing. */
const silentProgress: Progress = {
  update: () => {},
  succeed: () => {},
  fail: () => {},
};

/**
 * Output that discards everything. Prompts resolve as cancelled / no.
 */
export function createSilentOutput(): Output {
  return {
    header: () => {},
    section: () => {},
    info: () => {},
    success: () => {},
    warning: () => {},
    error: () => {},
    print: () => {},
    startProgress: () => silentProgress,
    ask: async () => null,
    confirm: async () => false,
  };
}
