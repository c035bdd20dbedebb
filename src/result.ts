export type ConsoleErrorKind = "NotFound" | "InvalidSchedule" | "InvalidSelection" | "DispatchFailure";

export interface ConsoleError {
  kind: ConsoleErrorKind;
  message: string;
}

export type ConsoleResult<T> = { ok: true; value: T } | { ok: false; error: ConsoleError };

export const succeed = <T>(value: T): ConsoleResult<T> => ({ ok: true, value });

export const fail = <T = never>({
  kind,
  message,
}: {
  kind: ConsoleErrorKind;
  message: string;
}): ConsoleResult<T> => ({ ok: false, error: { kind, message } });

export const formatConsoleError = ({ error }: { error: ConsoleError }): string =>
  `${error.kind}: ${error.message}`;
