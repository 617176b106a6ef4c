import readline from "node:readline";
import { Writable } from "node:stream";
import { InvalidArgumentError } from "../../../packages/core/src/index";
import type { PasswordPrompt } from "../../../packages/security/src/index";

export interface TerminalPrompt extends PasswordPrompt {
  close: () => void;
}

export interface TerminalPromptOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Echo suppression only applies to TTY input. */
  terminal?: boolean;
}

/** Forwards readline output unless muted, so typed passwords are not echoed. */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

export const createTerminalPrompt = (options: TerminalPromptOptions = {}): TerminalPrompt => {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const terminal = options.terminal ?? process.stdin.isTTY === true;

  const mutedOutput = new MutableOutput(output);
  const rl = readline.createInterface({ input, output: mutedOutput, terminal });
  const lines = rl[Symbol.asyncIterator]();
  let interrupted = false;

  // Without a listener readline only pauses input on Ctrl-C.
  rl.on("SIGINT", () => {
    interrupted = true;
    rl.close();
  });

  return {
    ask: async (question) => {
      output.write(question);
      mutedOutput.muted = true;
      try {
        const next = await lines.next();
        if (next.done) {
          throw new InvalidArgumentError(
            interrupted
              ? "Master password entry interrupted."
              : "Input closed before a master password was entered."
          );
        }
        return next.value;
      } finally {
        mutedOutput.muted = false;
        if (terminal) {
          output.write("\n");
        }
      }
    },
    notify: (message) => {
      output.write(`${message}\n`);
    },
    close: () => {
      rl.close();
    }
  };
};
