import { execFile, spawn } from "child_process";
import { promisify } from "util";
import type { PaletteToolConfig } from "./config/schema.js";
import { ProfileError } from "./errors.js";

const execFileAsync = promisify(execFile);

export type ProgressEvent =
  | { type: "stdout"; data: string }
  | { type: "stderr"; data: string }
  | { type: "done"; exitCode: number }
  | { type: "error"; message: string };

/** External palette generator, run once per application. */
export interface PaletteTool {
  readonly command: string;
  buildCommand(sourceImage: string): string[];
  ensureAvailable(): Promise<void>;
  /** Run in `cwd`; the tool is expected to leave `colors.json` there. */
  run(sourceImage: string, cwd: string, onProgress?: (event: ProgressEvent) => void): Promise<void>;
}

export function buildPaletteCommand(config: PaletteToolConfig, sourceImage: string): string[] {
  return [config.command, "image", sourceImage, "-m", config.mode, "-j", config.json_format];
}

async function isCommandAvailable(command: string): Promise<boolean> {
  try {
    await execFileAsync("which", [command]);
    return true;
  } catch {
    return false;
  }
}

const STDERR_TAIL_CHARS = 400;

// No timeout: a hung tool blocks the invocation until it exits.
function runCommand(
  argv: string[],
  cwd: string,
  onProgress: (event: ProgressEvent) => void
): Promise<void> {
  const [cmd, ...args] = argv;
  return new Promise<void>((resolve, reject) => {
    const child = spawn(cmd, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    let stderr = "";
    let finished = false;

    child.stdout.on("data", (chunk) => {
      onProgress({ type: "stdout", data: String(chunk) });
    });

    child.stderr.on("data", (chunk) => {
      const data = String(chunk);
      stderr = (stderr + data).slice(-STDERR_TAIL_CHARS);
      onProgress({ type: "stderr", data });
    });

    child.on("error", (error) => {
      if (finished) return;
      finished = true;
      onProgress({ type: "error", message: error.message });
      reject(new ProfileError("TOOL_UNAVAILABLE", `Failed to start ${cmd}: ${error.message}`));
    });

    child.on("close", (code) => {
      if (finished) return;
      finished = true;
      const exitCode = code ?? 1;
      onProgress({ type: "done", exitCode });
      if (exitCode === 0) {
        resolve();
        return;
      }
      const detail = stderr.trim();
      reject(
        new ProfileError(
          "TOOL_FAILURE",
          `${cmd} exited with code ${exitCode}${detail ? `: ${detail}` : ""}`
        )
      );
    });
  });
}

export function createPaletteTool(config: PaletteToolConfig): PaletteTool {
  return {
    command: config.command,
    buildCommand: (sourceImage) => buildPaletteCommand(config, sourceImage),
    async ensureAvailable() {
      if (!(await isCommandAvailable(config.command))) {
        throw new ProfileError("TOOL_UNAVAILABLE", `${config.command} command not found in PATH.`);
      }
    },
    run(sourceImage, cwd, onProgress = () => {}) {
      return runCommand(buildPaletteCommand(config, sourceImage), cwd, onProgress);
    },
  };
}
