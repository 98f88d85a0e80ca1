import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { ConfigSchema } from "./lib/config/schema.js";
import { MIRROR_DIR_ENV, OUTPUT_DIR_ENV } from "./lib/config/path.js";
import { createApplicationEntry } from "./lib/desktop-entry.js";
import { ProfileError } from "./lib/errors.js";
import type { PaletteTool } from "./lib/palette-tool.js";
import { ProfileStore } from "./lib/state.js";
import type { ApplicationEntry, BatchEvent, Message } from "./lib/types.js";
import type { Output } from "./output.js";
import { run, type CliDeps } from "./run.js";

let TMP = "";
let store: ProfileStore;
let lines: Message[];
let events: BatchEvent[];
let out: string;
let err: string;

const SAVED_OUTPUT = process.env[OUTPUT_DIR_ENV];
const SAVED_MIRROR = process.env[MIRROR_DIR_ENV];

const FILES = createApplicationEntry({
  identity: "org.gnome.Nautilus.desktop",
  displayName: "Files",
  iconToken: "org.gnome.Nautilus",
  keywords: ["file"],
});
const KONSOLE = createApplicationEntry({
  identity: "org.kde.konsole.desktop",
  displayName: "Konsole",
  genericName: "Terminal",
});

function paletteTool(failing: (cwd: string) => boolean = () => false): PaletteTool {
  return {
    command: "matugen",
    buildCommand: (sourceImage) => ["matugen", "image", sourceImage, "-m", "dark", "-j", "hex"],
    ensureAvailable: async () => {},
    run: vi.fn(async (_sourceImage: string, cwd: string) => {
      if (failing(cwd)) throw new ProfileError("TOOL_FAILURE", "matugen exited with code 1");
    }),
  };
}

function deps(apps: ApplicationEntry[], tool: PaletteTool = paletteTool()): Partial<CliDeps> {
  const output: Output = {
    log: (level, text) => {
      lines.push({ level, text });
    },
    batchProgress: (event) => {
      events.push(event);
    },
    flush: async () => {},
  };
  return {
    discover: () => apps,
    createStore: () => store,
    createPaletteTool: () => tool,
    loadConfig: () => ({ config: ConfigSchema.parse({}), configPath: "/none/config.yaml", errors: [] }),
    createOutput: () => output,
    writeOut: (text) => {
      out += text;
    },
    writeErr: (text) => {
      err += text;
    },
  };
}

function textOf(level: Message["level"]): string[] {
  return lines.filter((line) => line.level === level).map((line) => line.text);
}

beforeEach(() => {
  TMP = mkdtempSync(join(tmpdir(), "apptint-cli-"));
  const image = join(TMP, "wall.png");
  writeFileSync(image, "");
  process.env[OUTPUT_DIR_ENV] = join(TMP, "generated");
  process.env[MIRROR_DIR_ENV] = join(TMP, "end4");
  store = new ProfileStore(join(TMP, "state.json"));
  lines = [];
  events = [];
  out = "";
  err = "";
});

afterEach(() => {
  rmSync(TMP, { recursive: true, force: true });
  if (SAVED_OUTPUT === undefined) delete process.env[OUTPUT_DIR_ENV];
  else process.env[OUTPUT_DIR_ENV] = SAVED_OUTPUT;
  if (SAVED_MIRROR === undefined) delete process.env[MIRROR_DIR_ENV];
  else process.env[MIRROR_DIR_ENV] = SAVED_MIRROR;
});

function image(): string {
  return join(TMP, "wall.png");
}

describe("argument handling", () => {
  it("prints help and exits 1 without an action", async () => {
    expect(await run([], deps([FILES]))).toBe(1);
    expect(out).toContain("Usage: apptint");
  });

  it("rejects more than one action", async () => {
    expect(await run(["--gen", "files", "--list-apps"], deps([FILES]))).toBe(1);
    expect(err).toContain("Choose only one action at a time.");
  });

  it("reports config problems as warnings", async () => {
    const withErrors: Partial<CliDeps> = {
      ...deps([]),
      loadConfig: () => ({
        config: ConfigSchema.parse({}),
        configPath: "/c.yaml",
        errors: [{ source: "/c.yaml", message: "Invalid option", path: ["settings", "palette_tool", "mode"] }],
      }),
    };
    expect(await run(["--list-apps"], withErrors)).toBe(0);
    expect(textOf("warn")).toEqual(["/c.yaml: settings.palette_tool.mode: Invalid option"]);
  });
});

describe("--list-apps", () => {
  it("lists detected applications", async () => {
    expect(await run(["--list-apps"], deps([FILES, KONSOLE]))).toBe(0);
    expect(textOf("info")).toEqual(["Detected applications: 2"]);
    expect(textOf("plain")).toEqual([
      "- Files (org.gnome.Nautilus.desktop) [icon]",
      "- Konsole (org.kde.konsole.desktop) [no-icon]",
    ]);
  });
});

describe("--gen", () => {
  it("generates and records a profile", async () => {
    expect(await run(["--gen", "files", "--image", image()], deps([FILES, KONSOLE]))).toBe(0);
    const outputDir = join(TMP, "generated", "org-gnome-nautilus-desktop");
    expect(textOf("info")).toEqual([`Generated profile for Files -> ${outputDir}`]);
    expect(store.getProfile("org-gnome-nautilus-desktop")?.output_dir).toBe(outputDir);
  });

  it("skips an existing profile unless forced", async () => {
    await run(["--gen", "files", "--image", image()], deps([FILES]));
    lines = [];
    expect(await run(["--gen", "files", "--image", image()], deps([FILES]))).toBe(0);
    expect(textOf("warn")).toEqual(["Profile already exists for Files. Use --force to regenerate."]);

    lines = [];
    expect(await run(["--gen", "files", "--force", "--image", image()], deps([FILES]))).toBe(0);
    expect(textOf("info")).toHaveLength(1);
  });

  it("exits 2 when generation fails", async () => {
    const code = await run(["--gen", "files", "--image", image()], deps([FILES], paletteTool(() => true)));
    expect(code).toBe(2);
    expect(textOf("error")).toEqual(["matugen exited with code 1"]);
    expect(store.allProfiles()).toEqual({});
  });

  it("exits 2 when no application matches", async () => {
    expect(await run(["--gen", "gimp", "--image", image()], deps([FILES]))).toBe(2);
    expect(textOf("error")).toEqual(["No likely app match for 'gimp'."]);
  });

  it("exits 2 without a usable image", async () => {
    expect(await run(["--gen", "konsole"], deps([KONSOLE]))).toBe(2);
    expect(textOf("error")[0]).toContain("Could not resolve a valid icon/image source.");
  });

  it("builds an ad-hoc entry when nothing is installed", async () => {
    expect(await run(["--gen", "Some Tool", "--image", image()], deps([]))).toBe(0);
    expect(store.getProfile("some-tool")?.name).toBe("Some Tool");
  });

  it("only previews in dry-run mode", async () => {
    expect(await run(["--gen", "files", "--dry-run", "--image", image()], deps([FILES]))).toBe(0);
    expect(textOf("info")[0]).toMatch(/^Dry run: would generate profile for Files -> /);
    expect(existsSync(store.path)).toBe(false);
  });
});

describe("--ungen", () => {
  it("removes a generated profile by name", async () => {
    await run(["--gen", "files", "--image", image()], deps([FILES]));
    lines = [];
    expect(await run(["--ungen", "Files"], deps([FILES]))).toBe(0);
    expect(textOf("info")).toEqual(["Removed profile for Files"]);
    expect(store.allProfiles()).toEqual({});
  });

  it("warns when nothing is managed for the query", async () => {
    expect(await run(["--ungen", "gimp"], deps([FILES]))).toBe(0);
    expect(textOf("warn")).toEqual(["No managed profile found for gimp"]);
    expect(textOf("detail")).toEqual(["match miss: No likely app match for 'gimp'."]);
  });

  it("exits 3 when the output directory escapes the managed root", async () => {
    await run(["--gen", "files", "--image", image()], deps([FILES]));
    lines = [];
    const code = await run(["--ungen", "files", "--output-dir", join(TMP, "other")], deps([FILES]));
    expect(code).toBe(3);
    expect(textOf("error")[0]).toMatch(/^Refusing to remove unmanaged path: /);
    expect(store.getProfile("org-gnome-nautilus-desktop")).toBeDefined();
  });
});

describe("--gen-all", () => {
  it("warns when nothing is installed", async () => {
    expect(await run(["--gen-all"], deps([]))).toBe(0);
    expect(textOf("warn")).toEqual(["No installed desktop applications detected."]);
  });

  it("summarises a partial failure and exits 4", async () => {
    const broken = createApplicationEntry({ identity: "broken.desktop", displayName: "Broken" });
    const tool = paletteTool((cwd) => cwd.endsWith("broken-desktop"));
    const code = await run(["--gen-all", "--image", image()], deps([broken, FILES], tool));

    expect(code).toBe(4);
    expect(textOf("info")).toEqual([
      "Starting gen-all for 2 detected app(s)",
      "gen-all complete: success=1 failed=1 skipped=0",
    ]);
    expect(textOf("warn")).toEqual(["Broken: matugen exited with code 1"]);
    expect(events.map((event) => event.type)).toEqual(["start", "fail", "start", "ok"]);
  });

  it("counts existing profiles as skipped", async () => {
    await run(["--gen", "files", "--image", image()], deps([FILES]));
    lines = [];
    expect(await run(["--gen-all", "--image", image()], deps([FILES]))).toBe(0);
    expect(textOf("info")).toContain("gen-all complete: success=0 failed=0 skipped=1");
  });

  it("caps the failure list unless verbose", async () => {
    const apps = ["A", "B", "C", "D", "E", "F"].map((name) =>
      createApplicationEntry({ identity: `${name.toLowerCase()}.desktop`, displayName: name })
    );
    const tool = paletteTool(() => true);

    expect(await run(["--gen-all", "--image", image()], deps(apps, tool))).toBe(4);
    const warnings = textOf("warn");
    expect(warnings).toHaveLength(6);
    expect(warnings[5]).toBe("... and 1 more failure(s). Re-run with --verbose for full details.");

    lines = [];
    await run(["--gen-all", "--verbose", "--image", image()], deps(apps, tool));
    expect(textOf("warn")).toHaveLength(6);
    expect(textOf("warn")[5]).toBe("F: matugen exited with code 1");
  });
});
