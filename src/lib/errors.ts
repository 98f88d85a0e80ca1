export type ProfileErrorCode =
  | "INVALID_INPUT"
  | "NOT_FOUND"
  | "INPUT_RESOLUTION"
  | "TOOL_UNAVAILABLE"
  | "TOOL_FAILURE"
  | "SAFETY_VIOLATION";

export class ProfileError extends Error {
  constructor(
    public readonly code: ProfileErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ProfileError";
  }
}

export function isProfileError(error: unknown, code?: ProfileErrorCode): error is ProfileError {
  if (!(error instanceof ProfileError)) return false;
  return code === undefined || error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function logError(context: string, error: unknown): void {
  console.error(`${context}: ${errorMessage(error)}`);
}
