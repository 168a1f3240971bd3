export class MalformedRequestError extends Error {
  constructor(readonly requestLine: string) {
    super(`Malformed request line: ${JSON.stringify(requestLine)}`);
    this.name = "MalformedRequestError";
  }
}

/**
 * Extract the requested path from a request line such as
 * `GET /docs/a.html HTTP/1.1`. The path is everything after the first `/`
 * up to the next space, so `GET / HTTP/1.1` yields the empty string.
 * Method and version are not looked at.
 */
export function parseRequestPath(requestLine: string): string {
  const slash = requestLine.indexOf("/");
  if (slash === -1) {
    throw new MalformedRequestError(requestLine);
  }

  const start = slash + 1;
  const space = requestLine.indexOf(" ", start);
  if (space === -1) {
    throw new MalformedRequestError(requestLine);
  }

  return requestLine.substring(start, space);
}
