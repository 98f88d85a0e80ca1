import React from "react";
import { render, type Instance } from "ink";
import { RunView, type BatchState } from "./components/RunView.js";
import { logError } from "./lib/errors.js";
import type { BatchEvent, MessageLevel, ViewMessage } from "./lib/types.js";

/** Where the CLI reports progress and results. */
export interface Output {
  log(level: MessageLevel, text: string): void;
  batchProgress(event: BatchEvent): void;
  flush(): Promise<void>;
}

/**
 * Terminal output backed by ink: messages accumulate above a live spinner
 * line while a batch runs. Errors go to stderr.
 */
export function createInkOutput(verbose: boolean): Output {
  const messages: ViewMessage[] = [];
  let batch: BatchState | null = null;
  let instance: Instance | null = null;

  const paint = () => {
    const view = <RunView messages={[...messages]} verbose={verbose} batch={batch} />;
    if (instance) {
      instance.rerender(view);
    } else {
      instance = render(view, { patchConsole: false });
    }
  };

  return {
    log(level, text) {
      if (level === "error") {
        logError("ERROR", text);
        return;
      }
      messages.push({ level, text });
      paint();
    },
    batchProgress(event) {
      batch = event.type === "start"
        ? { appName: event.app.displayName, index: event.index, total: event.total }
        : batch;
      paint();
    },
    async flush() {
      if (!instance) return;
      batch = null;
      paint();
      instance.unmount();
      await instance.waitUntilExit();
    },
  };
}
