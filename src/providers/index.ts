import type { OutputSink } from "../types/index.js";
import { ClipboardProvider } from "./clipboard-provider.js";
import { StdoutProvider } from "./stdout-provider.js";

export type SinkTarget = "clipboard" | "stdout";

/**
 * Get the sink for a given delivery target.
 */
export function getSink(
  target: SinkTarget,
  stdout: NodeJS.WritableStream = process.stdout
): OutputSink {
  switch (target) {
    case "stdout":
      return new StdoutProvider(stdout);
    case "clipboard":
      return new ClipboardProvider();
  }
}

export { ClipboardProvider, StdoutProvider };
