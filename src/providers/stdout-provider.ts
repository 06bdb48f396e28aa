import type { OutputSink, Result } from "../types/index.js";
import type { LlmInfoError } from "../core/errors.js";
import { ok } from "../core/result.js";

/**
 * Writes the rendered block to a stream (standard output by default).
 */
export class StdoutProvider implements OutputSink {
  readonly name = "stdout";

  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  async deliver(content: string): Promise<Result<void, LlmInfoError>> {
    this.stream.write(content.endsWith("\n") ? content : content + "\n");
    return ok();
  }
}
