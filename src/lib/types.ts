export interface ApplicationEntry {
  /** Platform-unique id: desktop-entry filename, `<name>.app` or `<name>.lnk`. */
  readonly identity: string;
  readonly displayName: string;
  readonly genericName: string;
  readonly iconToken: string;
  readonly launchCommand: string;
  /** File or bundle the entry was read from; empty for synthetic entries. */
  readonly sourceRecordPath: string;
  readonly keywords: readonly string[];
}

export type Platform = "linux" | "darwin" | "win32";

export interface ExecutionMode {
  dryRun: boolean;
  force: boolean;
}

export interface GenerationResult {
  profileKey: string;
  outputDirectory: string;
  sourceImage: string;
  command: string[];
  colorsJsonPath: string | null;
  mirrorPath: string | null;
}

export type GenerationOutcome =
  | { status: "recorded"; app: ApplicationEntry; result: GenerationResult }
  | { status: "planned"; app: ApplicationEntry; result: GenerationResult }
  | { status: "skipped"; app: ApplicationEntry; profileKey: string };

export interface BatchFailure {
  app: ApplicationEntry;
  message: string;
}

export interface BatchSummary {
  succeeded: number;
  failed: number;
  skipped: number;
  failures: BatchFailure[];
}

export type BatchEvent =
  | { type: "start"; app: ApplicationEntry; index: number; total: number }
  | { type: "ok"; app: ApplicationEntry }
  | { type: "skip"; app: ApplicationEntry }
  | { type: "fail"; app: ApplicationEntry; message: string };

export type MessageLevel = "info" | "warn" | "error" | "detail" | "plain";

export interface Message {
  level: MessageLevel;
  text: string;
}

/** Errors go to stderr, so the terminal view never renders them. */
export type ViewLevel = Exclude<MessageLevel, "error">;

export interface ViewMessage {
  level: ViewLevel;
  text: string;
}
