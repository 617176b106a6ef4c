import { PassThrough } from "node:stream";
import { InvalidArgumentError } from "../../../packages/core/src/index";
import { createTerminalPrompt } from "./prompt";

const assertEqual = <T>(actual: T, expected: T, message: string): void => {
  if (actual !== expected) {
    throw new Error(`${message}: expected "${String(expected)}", got "${String(actual)}"`);
  }
};

const collect = (stream: PassThrough): (() => string) => {
  const chunks: string[] = [];
  stream.on("data", (chunk: Buffer) => chunks.push(chunk.toString("utf8")));
  return () => chunks.join("");
};

// Piped input: every line answers one question, in order.
await (async () => {
  const input = new PassThrough();
  const output = new PassThrough();
  const written = collect(output);
  const prompt = createTerminalPrompt({ input, output, terminal: false });

  input.write("abcd\nabcd\n");
  assertEqual(await prompt.ask("New master password: "), "abcd", "first line should answer the first question");
  assertEqual(await prompt.ask("Confirm master password: "), "abcd", "second line should answer the second question");
  prompt.notify("done");
  prompt.close();
  await new Promise((resolve) => setImmediate(resolve));

  assertEqual(
    written(),
    "New master password: Confirm master password: done\n",
    "only questions and notices should be written"
  );
})();

// Closed input rejects instead of waiting forever.
await (async () => {
  const input = new PassThrough();
  const output = new PassThrough();
  const prompt = createTerminalPrompt({ input, output, terminal: false });
  input.end();

  let rejected = false;
  try {
    await prompt.ask("Master password: ");
  } catch (error) {
    rejected = error instanceof InvalidArgumentError;
  }
  assertEqual(rejected, true, "end of input should reject the question");
  prompt.close();
})();

// Ctrl-C on a terminal rejects the pending question.
await (async () => {
  const input = new PassThrough();
  const output = new PassThrough();
  collect(output);
  const prompt = createTerminalPrompt({ input, output, terminal: true });

  const pending = prompt.ask("Master password: ");
  input.write("\u0003");

  let message = "";
  try {
    await pending;
  } catch (error) {
    message = error instanceof InvalidArgumentError ? error.message : "";
  }
  assertEqual(message, "Master password entry interrupted.", "Ctrl-C should reject the question");
  prompt.close();
})();
