export type MissingReason =
  | "no-request"
  | "malformed-request"
  | "no-template"
  | "not-found"
  | "not-a-file"
  | "outside-root";

/** Outcome of classifying a request against the document root. */
export type ResolvedResource =
  | { kind: "home"; templatePath: string }
  | { kind: "file"; path: string; size: number }
  | { kind: "missing"; reason: MissingReason };

export type ResponseStatus = 200 | 404;

export const STATUS_TEXT: Record<ResponseStatus, string> = {
  200: "OK",
  404: "Not Found",
};

export interface ResponseHeader {
  status: ResponseStatus;
  date: Date;
  server: string;
  contentType: string;
}

export function statusFor(resource: ResolvedResource): ResponseStatus {
  return resource.kind === "missing" ? 404 : 200;
}
