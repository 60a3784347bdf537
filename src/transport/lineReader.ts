import type { Readable } from "stream";
import { TransportError } from "../utils/errors";
import type { Logger } from "../utils/logger";

/**
 * Splits a byte stream into UTF-8 text lines without their terminators.
 *
 * Only `\n` ends a line; one `\r` right before it is dropped, any other `\r`
 * stays part of the line. Blank lines are dropped. The sequence ends at
 * end-of-file; a stream error ends it by throwing a {@link TransportError}.
 */
export async function* readLines(
  input: Readable,
  logger: Logger
): AsyncGenerator<string> {
  input.setEncoding("utf8");

  const nonBlank = function* (line: string): Generator<string> {
    const text = line.endsWith("\r") ? line.slice(0, -1) : line;
    if (text.trim().length === 0) {
      logger.debug("Skipping empty line");
      return;
    }
    yield text;
  };

  let pending = "";
  try {
    for await (const chunk of input) {
      pending += String(chunk);
      let newline = pending.indexOf("\n");
      while (newline !== -1) {
        const line = pending.slice(0, newline);
        pending = pending.slice(newline + 1);
        yield* nonBlank(line);
        newline = pending.indexOf("\n");
      }
    }
  } catch (err) {
    throw err instanceof TransportError ? err : new TransportError("read", err);
  }

  // A final line without a terminator still counts
  yield* nonBlank(pending);
}
