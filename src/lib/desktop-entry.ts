import { readFileSync } from "fs";
import { basename, parse } from "path";
import type { ApplicationEntry } from "./types.js";

const DESKTOP_ENTRY_GROUP = "[Desktop Entry]";

/**
 * Every string an application can be referred to by: identity, identity
 * without extension, display name, generic name, icon token and keywords.
 * Empty values and duplicates are dropped; order is preserved.
 */
export function applicationAliases(entry: ApplicationEntry): string[] {
  const candidates = [
    entry.identity,
    parse(entry.identity).name,
    entry.displayName,
    entry.genericName,
    entry.iconToken,
    ...entry.keywords,
  ];
  const seen = new Set<string>();
  const aliases: string[] = [];
  for (const candidate of candidates) {
    if (!candidate || seen.has(candidate)) continue;
    seen.add(candidate);
    aliases.push(candidate);
  }
  return aliases;
}

export function createApplicationEntry(fields: Partial<ApplicationEntry> & Pick<ApplicationEntry, "identity" | "displayName">): ApplicationEntry {
  return Object.freeze({
    identity: fields.identity,
    displayName: fields.displayName,
    genericName: fields.genericName ?? "",
    iconToken: fields.iconToken ?? "",
    launchCommand: fields.launchCommand ?? "",
    sourceRecordPath: fields.sourceRecordPath ?? "",
    keywords: Object.freeze([...(fields.keywords ?? [])]),
  });
}

function splitKeywords(value: string): string[] {
  return value
    .split(";")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Parse the `[Desktop Entry]` group of a desktop file. Returns null for
 * entries without a name, non-Application types and hidden entries.
 * Repeated fields (including localized variants) keep the first value seen;
 * text fields skip empty values.
 */
export function parseDesktopEntry(content: string, filePath: string): ApplicationEntry | null {
  let name = "";
  let genericName = "";
  let icon = "";
  let exec = "";
  let keywords: string[] = [];
  let type: string | undefined;
  let hidden: boolean | undefined;
  let noDisplay: boolean | undefined;
  let inDesktopEntry = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    if (line.startsWith("[")) {
      inDesktopEntry = line === DESKTOP_ENTRY_GROUP;
      continue;
    }
    if (!inDesktopEntry) continue;

    const eq = line.indexOf("=");
    if (eq === -1) continue;
    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();

    if ((key === "Name" || key.startsWith("Name[")) && !name) {
      name = value;
    } else if ((key === "GenericName" || key.startsWith("GenericName[")) && !genericName) {
      genericName = value;
    } else if (key === "Icon" && !icon) {
      icon = value;
    } else if (key === "Exec" && !exec) {
      exec = value;
    } else if (key === "Keywords" && keywords.length === 0) {
      keywords = splitKeywords(value);
    } else if (key === "Type" && type === undefined) {
      type = value;
    } else if (key === "Hidden" && hidden === undefined) {
      hidden = value.toLowerCase() === "true";
    } else if (key === "NoDisplay" && noDisplay === undefined) {
      noDisplay = value.toLowerCase() === "true";
    }
  }

  if (!name) return null;
  if ((type ?? "Application").toLowerCase() !== "application") return null;
  if (hidden || noDisplay) return null;

  return createApplicationEntry({
    identity: basename(filePath),
    displayName: name,
    genericName,
    iconToken: icon,
    launchCommand: exec,
    sourceRecordPath: filePath,
    keywords,
  });
}

/** Unreadable files yield no entry. */
export function readDesktopEntry(filePath: string): ApplicationEntry | null {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch {
    return null;
  }
  return parseDesktopEntry(content, filePath);
}
