import type { OutputSink, Result } from "../types/index.js";
import { ClipboardError } from "../core/errors.js";
import { err, ok } from "../core/result.js";

/**
 * Copies the rendered block to the system clipboard via clipboardy
 * (pbcopy, xsel/wl-copy, clip.exe depending on the host).
 */
export class ClipboardProvider implements OutputSink {
  readonly name = "clipboard";

  async deliver(content: string): Promise<Result<void, ClipboardError>> {
    try {
      const { default: clipboard } = await import("clipboardy");
      await clipboard.write(content);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      return err(
        new ClipboardError(`Clipboard unavailable: ${reason}`, { cause: e })
      );
    }
    return ok();
  }
}
