/** Error kinds an action can fail with. The REST layer maps each to one HTTP status. */
export type ActionErrorCode =
  | "invalid_argument"
  | "validation"
  | "not_found"
  | "unauthenticated"
  | "internal";

export type ValidationIssue = {
  path: string;
  message: string;
};

export type ActionError = {
  code: ActionErrorCode;
  message: string;
  issues?: ValidationIssue[];
  /** Id of the log line that recorded this failure */
  logId?: string;
};
